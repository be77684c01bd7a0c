import React from "react";
import { render } from "ink";
import { closeSync, openSync, readFileSync, writeSync } from "fs";
import { parseArgs, buildConfig, UsageError, USAGE, type CliCommand, type RunOptions } from "./cli";
import { Dumper, FileSource, InvalidConfigurationError, SourceReadError, type DumpConfig } from "./dump";
import { Logger } from "./logger";
import { loadSettings, SETTINGS_FILE } from "./settings";
import { App } from "./ui/App";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const STDIN_FD = 0;

/**
 * Where the CLI writes. Writers are synchronous and throw on failure, so a
 * closed pipe stops the dump at the next line.
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  settingsPath: string;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function writeAll(fd: number, text: string): void {
  let pending = Buffer.from(text, "utf-8");
  while (pending.length > 0) {
    try {
      pending = pending.subarray(writeSync(fd, pending));
    } catch (error) {
      // Non-blocking pipe is full; wait for the reader.
      if (errorCode(error) === "EAGAIN") continue;
      throw error;
    }
  }
}

export const processIo: CliIo = {
  stdout: (text) => writeAll(process.stdout.fd, text),
  stderr: (text) => writeAll(process.stderr.fd, text),
  settingsPath: SETTINGS_FILE,
};

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "unknown";
}

function openSource(path: string, io: CliIo): number | null {
  if (path === "-") return STDIN_FD;
  try {
    return openSync(path, "r");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    Logger.error("main", "Could not open input", error instanceof Error ? error : undefined, { path });
    io.stderr(`error: could not read file ${path}: ${reason}\n`);
    return null;
  }
}

async function view(dumper: Dumper, path: string): Promise<void> {
  const output = Array.from(dumper.lines());
  const title = path === "-" ? "<stdin>" : path;
  const { waitUntilExit } = render(React.createElement(App, { title, output }));
  await waitUntilExit();
}

async function run(options: RunOptions, io: CliIo): Promise<number> {
  let config: DumpConfig;
  try {
    config = buildConfig(options, loadSettings(io.settingsPath));
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      io.stderr(`error: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const fd = openSource(options.path, io);
  if (fd === null) return EXIT_FAILURE;

  try {
    const dumper = new Dumper(new FileSource(fd), config);
    Logger.info("main", "Starting dump", { path: options.path, view: options.view, ...dumper.config });

    if (options.view) {
      await view(dumper, options.path);
    } else {
      dumper.dump((line) => io.stdout(`${line}\n`));
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof SourceReadError) {
      Logger.error("main", "Dump aborted", error, { path: options.path });
      io.stderr(`error: could not read file ${options.path}: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    // `xdump big.bin | head` closes our stdout early; that is a normal end.
    if (errorCode(error) === "EPIPE") {
      Logger.debug("main", "Output closed by reader");
      return EXIT_SUCCESS;
    }
    throw error;
  } finally {
    if (fd !== STDIN_FD) closeSync(fd);
  }
}

export async function main(argv: string[], io: CliIo = processIo): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}\nTry 'xdump --help' for more information.\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.type) {
    case "help":
      io.stdout(`${USAGE}\n`);
      return EXIT_SUCCESS;
    case "version":
      io.stdout(`xdump ${readVersion()}\n`);
      return EXIT_SUCCESS;
    case "run": {
      Logger.init(command.options.debug);
      const code = await run(command.options, io);
      if (command.options.debug) {
        io.stderr(`debug log: ${Logger.getLogPath()}\n`);
      }
      return code;
    }
  }
}
