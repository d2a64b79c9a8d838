/**
 * Structured logger for TagBox.
 *
 * Leveled logging (debug/info/warn/error) with ISO timestamps and component
 * tags. Entries go to the console by default; a global handler can intercept
 * them (tests capture entries this way) and an optional rotating file sink
 * keeps a copy on the device's data partition.
 *
 * Usage:
 *   const log = new Logger("Controller");
 *   log.info("Tag 04A1B2 accepted");
 *   // → 2026-02-21T10:30:00.000Z [INFO] [Controller] Tag 04A1B2 accepted
 */
import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_LOG_FILE_BYTES = 1024 * 1024;

let globalHandler: LogHandler | null = null;
let globalMinLevel: LogLevel = "info";
let fileSink: LogFileSink | null = null;

/** Set a global handler to intercept all log entries. Pass null to reset to console output. */
export function setLogHandler(handler: LogHandler | null): void {
  globalHandler = handler;
}

/** Set the minimum log level. Messages below this level are silently dropped. */
export function setMinLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getMinLogLevel(): LogLevel {
  return globalMinLevel;
}

/** Parse a level name from the environment. Unknown values fall back to "info". */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

/**
 * Format a LogEntry into a single-line string.
 *
 * Format: `2026-02-21T10:30:00.000Z [LEVEL] [Component] message`
 */
export function formatLogEntry(entry: LogEntry): string {
  return `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}`;
}

/** Render a caught value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Append-only log file, rotated to `<path>.1` once it passes 1 MiB.
 * Only one backup is kept; the SD card on the device is small.
 */
export class LogFileSink {
  private readonly backupPath: string;
  private currentSize = 0;
  private initialized = false;

  constructor(
    private readonly logPath: string,
    private readonly maxBytes: number = MAX_LOG_FILE_BYTES,
  ) {
    this.backupPath = `${logPath}.1`;
  }

  getLogPath(): string {
    return this.logPath;
  }

  write(entry: LogEntry): void {
    const line = `${formatLogEntry(entry)}\n`;
    try {
      if (!this.initialized) {
        this.initialize();
      }
      appendFileSync(this.logPath, line, "utf-8");
      this.currentSize += Buffer.byteLength(line, "utf-8");
      if (this.currentSize >= this.maxBytes) {
        this.rotate();
      }
    } catch (err) {
      // Console is the only place left to report a broken log file
      console.error(`Log file write failed (${this.logPath}): ${describeError(err)}`);
    }
  }

  private initialize(): void {
    this.initialized = true;
    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.currentSize = existsSync(this.logPath) ? statSync(this.logPath).size : 0;
  }

  private rotate(): void {
    renameSync(this.logPath, this.backupPath);
    this.currentSize = 0;
  }
}

/** Mirror every emitted entry into a log file. Pass null to stop. */
export function setLogFile(path: string | null): void {
  fileSink = path ? new LogFileSink(path) : null;
}

export class Logger {
  constructor(private readonly component: string) {}

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  /** Create a child logger with a sub-component prefix (e.g., "Hardware:LED"). */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}:${subComponent}`);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[globalMinLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    };

    fileSink?.write(entry);

    if (globalHandler) {
      globalHandler(entry);
      return;
    }

    const formatted = formatLogEntry(entry);
    switch (level) {
      case "error":
        console.error(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
        break;
    }
  }
}
