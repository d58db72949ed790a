import EventEmitter from "events";

export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

type LogFormatter = (message: LogMessage) => string;

export interface Logger {
  log: (message: string) => void;

  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  getLevel: () => LogLevel;
  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LogMessage {
  level: LogLevel;
  message: string;
  ts?: string;
  [key: string]: unknown;
}

export interface LoggedError {
  stack?: string;
  message: string;
  toString: string;
}

/** Published on {@link BeaconLoggerEvents} for every record that passes the level filter. */
export interface LogRecord {
  level: LogLevel;
  message: string;
  time: Date;
  context: Record<string, unknown>;
}

export interface LoggerContext {
  str: (key: string, value?: string | null) => LoggerContext;
  num: (key: string, value?: number | bigint) => LoggerContext;
  bool: (key: string, value?: boolean) => LoggerContext;
  any: (key: string, value?: unknown, stringify?: boolean) => LoggerContext;
  array: (key: string, value?: unknown[]) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

/** Where formatted lines end up. Swapped for a file while the terminal UI owns the screen. */
export type LogDestination = (level: LogLevel, line: string) => void;

const consoleDestination: LogDestination = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
    default:
      // console.trace prints a stack for every message
      console.log(line);
  }
};

let destination: LogDestination = consoleDestination;

/** Replaces the output destination, returning the previous one. */
export function setLogDestination(next: LogDestination): LogDestination {
  const previous = destination;
  destination = next;
  return previous;
}

export function resetLogDestination(): void {
  destination = consoleDestination;
}

const contextLevels = resolveContextLevels();

const LOG_CONTEXT_FOR: Record<LogLevel, boolean> = {
  [LogLevel.TRACE]: contextLevels.includes("trace"),
  [LogLevel.DEBUG]: contextLevels.includes("debug"),
  [LogLevel.INFO]: contextLevels.includes("info"),
  [LogLevel.WARN]: contextLevels.includes("warn"),
  [LogLevel.ERROR]: contextLevels.includes("error"),
};

function resolveContextLevels(): string[] {
  const contextLevelsEnv = process.env.BEACON_LOG_CONTEXT_FOR_LEVELS;
  if (contextLevelsEnv) {
    return contextLevelsEnv.split(",").map((l) => l.trim().toLowerCase());
  }
  return ["trace", "debug", "info", "warn", "error"];
}

const logTimestamp = Boolean(process.env.BEACON_LOG_TIMESTAMP);

export const BeaconLoggerEvents = new EventEmitter();

const noop = (_message: string): void => {};

export class BeaconLogger implements Logger {
  protected _loglevel: LogLevel;
  protected _ctx: Record<string, unknown>;
  private formatter: LogFormatter;

  public log: (message: string) => void;
  public trace: (message: string) => void;
  public debug: (message: string) => void;
  public info: (message: string) => void;
  public warn: (message: string) => void;
  public error: (message: string) => void;

  constructor(level?: LogLevel, ctx?: Record<string, unknown>) {
    this.formatter =
      process.env.BEACON_LOG_FORMAT === "json"
        ? this.formatJson.bind(this)
        : this.formatSimple.bind(this);

    this._loglevel = level ?? LogLevel.INFO;
    this._ctx = ctx ?? {};

    this.log = (message: string) => this.write(LogLevel.INFO, message);
    this.trace = (message: string) => this.write(LogLevel.TRACE, message);
    this.debug = (message: string) => this.write(LogLevel.DEBUG, message);
    this.info = (message: string) => this.write(LogLevel.INFO, message);
    this.warn = (message: string) => this.write(LogLevel.WARN, message);
    this.error = (message: string) => this.write(LogLevel.ERROR, message);

    switch (this._loglevel) {
      case LogLevel.DEBUG:
        this.trace = noop;
        break;

      case LogLevel.INFO:
        this.trace = this.debug = noop;
        break;

      case LogLevel.WARN:
        this.trace = this.debug = this.info = this.log = noop;
        break;

      case LogLevel.ERROR:
        this.trace = this.debug = this.info = this.log = this.warn = noop;
        break;
    }
  }

  isTraceEnabled() {
    return this._loglevel === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this._loglevel === LogLevel.DEBUG || this.isTraceEnabled();
  }

  getLevel() {
    return this._loglevel;
  }

  private write(level: LogLevel, message: string) {
    BeaconLoggerEvents.emit("log", {
      level,
      message,
      time: new Date(),
      context: { ...this._ctx },
    } satisfies LogRecord);

    const line = LOG_CONTEXT_FOR[level]
      ? this.formatter({ ...this._ctx, message, level })
      : this.formatter({ message, level });
    destination(level, line);
  }

  setCtx(key: string, value?: unknown) {
    this._ctx[key] = value;
  }

  newLogger(level: LogLevel, ctx: Record<string, unknown>) {
    return new BeaconLogger(level, ctx);
  }

  with(): BeaconLogContext {
    // Need a better Deep Copy approach
    const copy: Record<string, unknown> = JSON.parse(safeStringify(this._ctx));
    return new BeaconLogContext(this.newLogger(this._loglevel, copy));
  }

  formatJson(message: LogMessage): string {
    if (logTimestamp) {
      message.ts = new Date().toISOString();
    }
    return safeStringify(message);
  }

  formatSimple(message: LogMessage): string {
    const { message: text, level, error, ...rest } = message;
    if (level !== LogLevel.ERROR && error !== undefined) {
      rest.error = error;
    }

    const ts = logTimestamp ? ` [${new Date().toISOString()}] ` : "";
    const ctx =
      Object.keys(rest).length > 0 ? "\n" + safeStringify(rest) + "\n" : "";

    switch (level) {
      case LogLevel.TRACE:
        return `\x1b[37m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}`;
      case LogLevel.DEBUG:
        return `\x1b[36m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}`;
      case LogLevel.INFO:
        return `\x1b[32m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${ctx}`;
      case LogLevel.WARN:
        return `\x1b[33m ${level.toUpperCase()} \x1b[0m  ${ts} ${text}${ctx}`;
      case LogLevel.ERROR: {
        let errorText = "";
        if (typeof error === "string") {
          errorText = "\n" + error;
        } else if (isLoggedError(error)) {
          errorText =
            "\n" + (error.stack ? prettyFormatStack(error.stack) : error.message);
        } else if (error !== undefined) {
          errorText = "\n" + safeStringify(error);
        }
        return `\x1b[31m ${level.toUpperCase()} \x1b[0m ${ts} ${text}${ctx}${errorText}`;
      }
      default:
        return `UNKNOWN: ${text}`;
    }
  }
}

export class BeaconLogContext implements LoggerContext {
  private _logger: BeaconLogger;

  constructor(logger: BeaconLogger) {
    this._logger = logger;
  }

  str(key: string, value?: string | null) {
    return this.any(key, value);
  }

  num(key: string, value?: number | bigint) {
    return this.any(key, value);
  }

  bool(key: string, value?: boolean) {
    return this.any(key, value);
  }

  array(key: string, value?: unknown[]) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      return this.any("error", {
        message: e.message,
        stack: e.stack,
        toString: e.toString(),
      });
    } else if (typeof e === "string") {
      return this.str("error", e);
    } else {
      return this.any("error", e);
    }
  }

  any(key: string, value?: unknown, stringify?: boolean) {
    if (stringify) {
      this._logger.setCtx(key, safeStringify(value));
    } else {
      this._logger.setCtx(key, value);
    }

    return this;
  }

  logger() {
    return this._logger;
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case "trace":
      return LogLevel.TRACE;
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

export function getLogger(): BeaconLogger {
  return new BeaconLogger(
    parseLogLevel(process.env.BEACON_LOG_LEVEL) ?? LogLevel.INFO
  );
}

function isLoggedError(value: unknown): value is LoggedError {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string"
  );
}

function prettyFormatStack(stack: string) {
  return stack
    .split("\n")
    .map((line) => line.replace(/\s+at\s+/, "  at "))
    .join("\n");
}

function safeStringify(obj: unknown): string {
  return JSON.stringify(obj, (_k, v: unknown) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
