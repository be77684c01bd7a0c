import { DumpConfig, type DumpOptions } from "./config";
import { SourceReadError } from "./errors";
import { formatHeader, formatLine } from "./format";
import type { ByteSource } from "./source";
import { Logger } from "../logger";

export type LineSink = (line: string) => void;

/**
 * Drives a single dump: reads `lineWidth`-sized chunks from the source in
 * order and formats each as it arrives. The configuration is copied at
 * construction; the source is only borrowed and never closed here.
 */
export class Dumper {
  private readonly source: ByteSource;
  private readonly options: DumpOptions;

  constructor(source: ByteSource, config: DumpConfig = new DumpConfig()) {
    this.source = source;
    this.options = config.snapshot();
  }

  get config(): DumpOptions {
    return this.options;
  }

  *lines(): Generator<string, void, undefined> {
    yield* formatHeader(this.options);
    yield* this.dataLines();
  }

  /**
   * Writes the headers and every data line to `sink`, returning the number of
   * data lines. A read error propagates after the lines before it were sunk.
   */
  dump(sink: LineSink): number {
    const [legend, rule] = formatHeader(this.options);
    sink(legend);
    sink(rule);

    let count = 0;
    for (const line of this.dataLines()) {
      sink(line);
      count++;
    }
    Logger.debug("Dumper", "Dump finished", { lines: count });
    return count;
  }

  private *dataLines(): Generator<string, void, undefined> {
    const { lineWidth, lineCount } = this.options;
    const limit = lineCount === undefined ? Infinity : lineCount * lineWidth;
    const buffer = new Uint8Array(lineWidth);

    for (let offset = 0; offset < limit; offset += lineWidth) {
      let filled: number;
      try {
        filled = this.source.read(buffer);
      } catch (error) {
        Logger.error("Dumper", "Source read failed", error instanceof Error ? error : undefined, { offset });
        throw new SourceReadError(offset, error);
      }
      if (filled === 0) return;
      yield formatLine(offset, buffer.subarray(0, filled), this.options);
    }

    Logger.debug("Dumper", "Line count reached", { lineCount });
  }
}
