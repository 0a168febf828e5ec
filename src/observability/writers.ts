import fs from "node:fs";
import path from "node:path";
import { LogLevel, LogRecord } from "./types";

export interface LogWriter {
  write(record: LogRecord): void;
}

export class ConsoleLogWriter implements LogWriter {
  write(record: LogRecord): void {
    const line = JSON.stringify(record);
    if (record.level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}

/** Appends one JSON line per record. Writes are synchronous so a crash keeps everything logged so far. */
export class FileLogWriter implements LogWriter {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  write(record: LogRecord): void {
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
  }
}

export class MemoryLogWriter implements LogWriter {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((record) => level === undefined || record.level === level).map((record) => record.msg);
  }
}
