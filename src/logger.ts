import { existsSync, mkdirSync, appendFileSync, statSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { CONFIG_DIR } from "./paths";

const LOG_PATH = join(CONFIG_DIR, "log");
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5 MB
const FLUSH_INTERVAL = 500; // ms
const MAX_QUEUED_ENTRIES = 100;

type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";
type LogData = Record<string, unknown>;

/**
 * Debug log for `--debug` runs. Until `init(true)` every call is a no-op, so
 * the engine can log unconditionally.
 */
class Logger {
  private static instance: Logger | null = null;
  private readonly path: string;
  private queue: string[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;

  private constructor(path: string) {
    this.path = path;
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.flushTimer = setInterval(() => this.flush(), FLUSH_INTERVAL);
    this.flushTimer.unref();
  }

  static init(enabled: boolean, path: string = LOG_PATH): void {
    if (enabled && Logger.instance === null) {
      Logger.instance = new Logger(path);
    }
  }

  static debug(context: string, message: string, data?: LogData): void {
    Logger.instance?.append("DEBUG", context, message, data);
  }

  static info(context: string, message: string, data?: LogData): void {
    Logger.instance?.append("INFO", context, message, data);
  }

  static warn(context: string, message: string, data?: LogData): void {
    Logger.instance?.append("WARN", context, message, data);
  }

  static error(context: string, message: string, error?: Error, data?: LogData): void {
    const errorData = error ? { ...data, error: error.message, stack: error.stack } : data;
    Logger.instance?.append("ERROR", context, message, errorData);
  }

  /** Writes out anything still queued. Safe to call right before `process.exit`. */
  static shutdown(): void {
    if (Logger.instance) {
      if (Logger.instance.flushTimer) clearInterval(Logger.instance.flushTimer);
      Logger.instance.flush();
      Logger.instance = null;
    }
  }

  static getLogPath(): string {
    return Logger.instance?.path ?? LOG_PATH;
  }

  private append(level: LogLevel, context: string, message: string, data?: LogData): void {
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    this.queue.push(`[${new Date().toISOString()}] [${level}] [${context}] ${message}${dataStr}\n`);
    if (this.queue.length > MAX_QUEUED_ENTRIES) {
      this.flush();
    }
  }

  private flush(): void {
    if (this.queue.length === 0) return;

    const entries = this.queue.join("");
    this.queue = [];
    try {
      appendFileSync(this.path, entries);
      this.rotate();
    } catch (error) {
      console.error("Failed to write log:", error);
    }
  }

  // Drops the older half of the file once it passes MAX_LOG_SIZE.
  private rotate(): void {
    if (statSync(this.path).size <= MAX_LOG_SIZE) return;
    const lines = readFileSync(this.path, "utf-8").split("\n");
    writeFileSync(this.path, lines.slice(-Math.floor(lines.length / 2)).join("\n"));
  }
}

export { Logger };
