import { InvalidConfigurationError } from "./errors";

export const MIN_LINE_WIDTH = 1;
export const MAX_LINE_WIDTH = 256;
export const MIN_BYTE_GROUP_LENGTH = 1;
export const MAX_BYTE_GROUP_LENGTH = 256;

export interface DumpOptions {
  readonly controlPictures: boolean;
  readonly lineCount: number | undefined;
  readonly lineWidth: number;
  readonly byteGroupLength: number;
}

export const DEFAULT_DUMP_OPTIONS: DumpOptions = Object.freeze({
  controlPictures: false,
  lineCount: undefined,
  lineWidth: 16,
  byteGroupLength: 1,
});

function checkRange(option: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidConfigurationError(option, value, `an integer from ${min} to ${max}`);
  }
  return value;
}

/**
 * Chainable builder for dump layout options. Each setter validates its
 * argument immediately, so a bad value fails before any source is touched.
 *
 * ```ts
 * const config = new DumpConfig().lineWidth(8).byteGroupLength(2).controlPictures(true);
 * ```
 */
export class DumpConfig {
  private options: DumpOptions;

  constructor(initial: Partial<DumpOptions> = {}) {
    this.options = DEFAULT_DUMP_OPTIONS;
    if (initial.controlPictures !== undefined) this.controlPictures(initial.controlPictures);
    if (initial.lineCount !== undefined) this.lineCount(initial.lineCount);
    if (initial.lineWidth !== undefined) this.lineWidth(initial.lineWidth);
    if (initial.byteGroupLength !== undefined) this.byteGroupLength(initial.byteGroupLength);
  }

  controlPictures(enabled: boolean): this {
    this.options = { ...this.options, controlPictures: enabled };
    return this;
  }

  /** `undefined` removes the cap. */
  lineCount(count: number | undefined): this {
    if (count !== undefined && (!Number.isInteger(count) || count < 0)) {
      throw new InvalidConfigurationError("line count", count, "a non-negative integer");
    }
    this.options = { ...this.options, lineCount: count };
    return this;
  }

  lineWidth(width: number): this {
    checkRange("line width", width, MIN_LINE_WIDTH, MAX_LINE_WIDTH);
    this.options = { ...this.options, lineWidth: width };
    return this;
  }

  byteGroupLength(length: number): this {
    checkRange("byte group length", length, MIN_BYTE_GROUP_LENGTH, MAX_BYTE_GROUP_LENGTH);
    this.options = { ...this.options, byteGroupLength: length };
    return this;
  }

  snapshot(): DumpOptions {
    return Object.freeze({ ...this.options });
  }
}
