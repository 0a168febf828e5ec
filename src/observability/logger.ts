import { LogFields, LogLevel, LogRecord } from "./types";
import { ConsoleLogWriter, LogWriter } from "./writers";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  writers?: LogWriter[];
  minLevel?: LogLevel;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly writers: LogWriter[];
  private readonly minLevel: LogLevel;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.writers = options.writers ?? [new ConsoleLogWriter()];
    this.minLevel = options.minLevel ?? "debug";
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { writers: this.writers, minLevel: this.minLevel });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    for (const writer of this.writers) {
      writer.write(record);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
