import { readSync } from "fs";

/**
 * Sequential byte reader. `read` fills at most `buffer.length` bytes from the
 * start of `buffer` and returns how many it wrote; 0 means end of stream.
 * Failures are thrown.
 */
export interface ByteSource {
  read(buffer: Uint8Array): number;
}

/**
 * Reads from an already-open file descriptor at its current position.
 * Opening and closing the descriptor is up to the caller.
 */
export class FileSource implements ByteSource {
  private fd: number;

  constructor(fd: number) {
    this.fd = fd;
  }

  read(buffer: Uint8Array): number {
    return readSync(this.fd, buffer, 0, buffer.length, null);
  }
}

export class MemorySource implements ByteSource {
  private data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  read(buffer: Uint8Array): number {
    const count = Math.min(buffer.length, this.data.length - this.position);
    buffer.set(this.data.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  /** Bytes handed out so far. */
  get consumed(): number {
    return this.position;
  }
}
