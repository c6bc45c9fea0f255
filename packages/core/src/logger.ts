import type { LogEntry, LogLevel } from "./types.js";

const levelRank: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  OK: 25,
  WARN: 30,
  ERROR: 40,
};

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
}

export interface LoggerOptions {
  component: string;
  level: LogLevel;
  sink?: LogSink;
  /** Suppresses console output; entries still reach the sink. */
  silent?: boolean;
}

export class Logger {
  private readonly component: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink | undefined;
  private readonly silent: boolean;

  public constructor(options: LoggerOptions) {
    this.component = options.component;
    this.minLevel = options.level;
    this.sink = options.sink;
    this.silent = options.silent ?? false;
  }

  public child(component: string): Logger {
    return new Logger({
      component,
      level: this.minLevel,
      silent: this.silent,
      ...(this.sink ? { sink: this.sink } : {}),
    });
  }

  public debug(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("DEBUG", code, message, data);
  }

  public info(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("INFO", code, message, data);
  }

  public ok(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("OK", code, message, data);
  }

  public warn(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("WARN", code, message, data);
  }

  public error(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("ERROR", code, message, data);
  }

  private log(level: LogLevel, code: string, message: string, data?: Record<string, unknown>): void {
    if (levelRank[level] < levelRank[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      code,
      message,
    };
    if (data) {
      entry.data = data;
    }

    if (!this.silent) {
      const rendered = `[${entry.ts}] [${level}] [${this.component}] ${code} ${message}${
        data ? ` ${JSON.stringify(data)}` : ""
      }`;
      if (level === "ERROR") {
        // eslint-disable-next-line no-console
        console.error(rendered);
      } else {
        // eslint-disable-next-line no-console
        console.log(rendered);
      }
    }

    if (!this.sink) {
      return;
    }
    try {
      const pending = this.sink.write(entry);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => this.reportSinkFailure(error));
      }
    } catch (error) {
      this.reportSinkFailure(error);
    }
  }

  private reportSinkFailure(error: unknown): void {
    // eslint-disable-next-line no-console
    console.error(
      `[${new Date().toISOString()}] [ERROR] [${this.component}] LOG_SINK_FAIL ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}
