#!/usr/bin/env tsx
import { appendFileSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { Logger } from "./logger";
import { main, EXIT_FAILURE } from "./main";
import { CONFIG_DIR } from "./paths";

// Global error handler - append errors to log file
const ERROR_LOG_PATH = join(CONFIG_DIR, "error.log");
const MAX_LOG_SIZE = 1024 * 1024; // 1 MB

function truncateLogIfNeeded() {
  try {
    if (!existsSync(ERROR_LOG_PATH)) return;
    const stats = statSync(ERROR_LOG_PATH);
    if (stats.size > MAX_LOG_SIZE) {
      const content = readFileSync(ERROR_LOG_PATH, "utf-8");
      const truncated = content.slice(-MAX_LOG_SIZE);
      // Find first complete entry (starts with newline + timestamp)
      const firstEntry = truncated.indexOf("\n[");
      writeFileSync(ERROR_LOG_PATH, firstEntry > 0 ? truncated.slice(firstEntry) : truncated);
    }
  } catch (error) {
    console.error("Failed to truncate error log:", error);
  }
}

function logError(type: string, error: unknown) {
  try {
    if (!existsSync(CONFIG_DIR)) {
      mkdirSync(CONFIG_DIR, { recursive: true });
    }
    truncateLogIfNeeded();
    const timestamp = new Date().toISOString();
    const message = error instanceof Error
      ? `${error.message}\n${error.stack || ""}`
      : String(error);
    const entry = `\n[${timestamp}] ${type}\n${message}\n${"-".repeat(60)}\n`;
    appendFileSync(ERROR_LOG_PATH, entry);
  } catch (logFailure) {
    console.error("Failed to write error log:", logFailure);
  }
}

process.on("uncaughtException", (error) => {
  logError("UNCAUGHT EXCEPTION", error);
  Logger.shutdown();
  console.error("Fatal error:", error.message);
  console.error(`Stack trace saved to ${ERROR_LOG_PATH}`);
  process.exit(EXIT_FAILURE);
});

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError("FATAL", error);
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = EXIT_FAILURE;
  })
  .finally(() => {
    Logger.shutdown();
  });
