import { existsSync, mkdirSync, appendFileSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

export interface LoggerOptions {
  level?: LogLevel;
  /** Path of the plain-text log file; empty disables file output. */
  logFile?: string;
  console?: boolean;
  now?: () => Date;
}

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return fallback;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function formatLogEntry(
  timestamp: string,
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const extraArgs =
    args.length > 0 ? " " + args.map((a) => formatArg(a)).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

/**
 * Logging context for one process. Built once at startup and handed to every
 * component that logs.
 */
export class Logger {
  readonly level: LogLevel;
  private readonly logFile: string;
  private readonly consoleEnabled: boolean;
  private readonly now: () => Date;
  private initialized = false;
  private fileDisabled = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.logFile = options.logFile ?? "";
    this.consoleEnabled = options.console ?? true;
    this.now = options.now ?? (() => new Date());
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** Creates the log directory. Runs once per instance. */
  init(): void {
    if (this.initialized) return;
    this.initialized = true;

    if (!this.logFile) return;
    const dir = dirname(this.logFile);
    try {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    } catch (error) {
      this.fileDisabled = true;
      this.write("warn", `Log file disabled: ${formatArg(error)}`);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, ...args);
  }

  /**
   * Runs `fn` and logs one line with its outcome and duration. Errors are
   * logged and rethrown.
   */
  async timed<T>(
    event: string,
    context: Record<string, string | number | boolean>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.info(event, {
        ...context,
        status: "ok",
        durationMs: Date.now() - start,
      });
      return result;
    } catch (error) {
      this.error(event, {
        ...context,
        status: "error",
        durationMs: Date.now() - start,
        error: formatArg(error),
      });
      throw error;
    }
  }

  private write(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    if (!this.initialized) this.init();

    const entry = formatLogEntry(
      this.now().toISOString(),
      level,
      message,
      ...args,
    );

    if (this.consoleEnabled) {
      const color = LOG_COLORS[level];
      if (level === "error") {
        console.error(`${color}${entry}${RESET}`);
      } else if (level === "warn") {
        console.warn(`${color}${entry}${RESET}`);
      } else {
        console.log(`${color}${entry}${RESET}`);
      }
    }

    if (this.logFile && !this.fileDisabled) {
      try {
        appendFileSync(this.logFile, entry + "\n", "utf-8");
      } catch (error) {
        // Stop retrying a broken file; console output keeps going.
        this.fileDisabled = true;
        if (this.consoleEnabled) {
          console.error(`Log file write failed: ${formatArg(error)}`);
        }
      }
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = new Logger(options);
  logger.init();
  return logger;
}

/** Logger that drops everything; handy for tests. */
export function createSilentLogger(): Logger {
  return new Logger({ console: false, logFile: "" });
}
