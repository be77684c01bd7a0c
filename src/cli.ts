import { DumpConfig } from "./dump/config";
import type { LocalSettings } from "./settings";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface RunOptions {
  path: string;
  lineCount?: number;
  lineWidth?: number;
  byteGroupLength?: number;
  controlPictures: boolean;
  view: boolean;
  debug: boolean;
}

export type CliCommand =
  | { type: "help" }
  | { type: "version" }
  | { type: "run"; options: RunOptions };

export const USAGE = `
xdump - hex and ASCII dump of a file

Usage: xdump [options] <file>

Arguments:
  file                    File to dump, or - for standard input

Options:
  -n, --lines <N>         Maximum number of lines to print
  -w, --width <N>         Bytes per line, 1-256 (default: 16)
  -g, --group <N>         Bytes per group, 1-256 (default: 1)
  -c, --control-pictures  Show C0 control codes as control picture glyphs
  --view                  Browse the dump in a full-screen viewer
  --debug                 Write a debug log to ~/.config/xdump/log
  -V, --version           Print the version
  -h, --help              Show this help message

Defaults for --width, --group and --control-pictures can be set in
~/.config/xdump/settings.json.
`;

function parseCount(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new UsageError(`${flag} requires a value`);
  }
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function parseArgs(args: string[]): CliCommand {
  let path: string | undefined;
  const options: Omit<RunOptions, "path"> = {
    controlPictures: false,
    view: false,
    debug: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return { type: "help" };
    } else if (arg === "--version" || arg === "-V") {
      return { type: "version" };
    } else if (arg === "--lines" || arg === "-n") {
      options.lineCount = parseCount(arg, args[++i]);
    } else if (arg === "--width" || arg === "-w") {
      options.lineWidth = parseCount(arg, args[++i]);
    } else if (arg === "--group" || arg === "-g") {
      options.byteGroupLength = parseCount(arg, args[++i]);
    } else if (arg === "--control-pictures" || arg === "-c") {
      options.controlPictures = true;
    } else if (arg === "--view") {
      options.view = true;
    } else if (arg === "--debug") {
      options.debug = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`unknown option ${arg}`);
    } else if (path === undefined) {
      path = arg;
    } else {
      throw new UsageError(`unexpected argument ${arg}`);
    }
  }

  if (path === undefined) {
    throw new UsageError("missing file argument");
  }
  if (options.view && path === "-") {
    throw new UsageError("--view needs a file; standard input is used for keys");
  }
  return { type: "run", options: { path, ...options } };
}

/**
 * Merges command-line options over settings-file defaults. Throws
 * InvalidConfigurationError for out-of-range values from either place.
 */
export function buildConfig(options: RunOptions, settings: LocalSettings = {}): DumpConfig {
  const config = new DumpConfig()
    .controlPictures(options.controlPictures || (settings.controlPictures ?? false))
    .lineCount(options.lineCount);

  const lineWidth = options.lineWidth ?? settings.lineWidth;
  if (lineWidth !== undefined) config.lineWidth(lineWidth);

  const byteGroupLength = options.byteGroupLength ?? settings.byteGroupLength;
  if (byteGroupLength !== undefined) config.byteGroupLength(byteGroupLength);

  return config;
}
