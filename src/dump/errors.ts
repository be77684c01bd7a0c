/**
 * Raised while building a dump configuration, before any byte is read.
 */
export class InvalidConfigurationError extends Error {
  readonly option: string;
  readonly value: unknown;

  constructor(option: string, value: unknown, expected: string) {
    super(`invalid ${option}: ${String(value)} (expected ${expected})`);
    this.name = "InvalidConfigurationError";
    this.option = option;
    this.value = value;
  }
}

/**
 * Raised when the byte source fails mid-dump. Lines emitted before the
 * failure have already reached the sink.
 */
export class SourceReadError extends Error {
  readonly offset: number;

  constructor(offset: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`read failed at offset 0x${offset.toString(16)}: ${reason}`, { cause });
    this.name = "SourceReadError";
    this.offset = offset;
  }
}
