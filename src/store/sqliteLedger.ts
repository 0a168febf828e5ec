import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DownloadLedger } from "./types";

export class SqliteLedger implements DownloadLedger {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    this.db.pragma("journal_mode = WAL");
    this.initializeSchema();
  }

  async contains(url: string): Promise<boolean> {
    const row = this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM downloads WHERE url = ?").get(url);
    return row !== undefined;
  }

  async record(url: string): Promise<void> {
    this.db
      .prepare<{ url: string; recordedAt: string }>(
        `
        INSERT INTO downloads (url, recordedAt)
        VALUES (@url, @recordedAt)
        ON CONFLICT(url) DO NOTHING
      `,
      )
      .run({ url, recordedAt: new Date().toISOString() });
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM downloads").get();
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS downloads (
        url TEXT PRIMARY KEY,
        recordedAt TEXT NOT NULL
      );
    `);
  }
}
