import fs from "node:fs";
import path from "node:path";
import { DownloadLedger } from "./types";

/** One URL per line. The file is re-read on every check so edits between runs are honoured. */
export class FileLedger implements DownloadLedger {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    if (!fs.existsSync(this.filePath)) {
      fs.writeFileSync(this.filePath, "", "utf-8");
    }
  }

  async contains(url: string): Promise<boolean> {
    const entries = await this.readEntries();
    return entries.includes(url);
  }

  async record(url: string): Promise<void> {
    if (await this.contains(url)) {
      return;
    }
    await fs.promises.appendFile(this.filePath, `${url}\n`, "utf-8");
  }

  async count(): Promise<number> {
    const entries = await this.readEntries();
    return new Set(entries).size;
  }

  async close(): Promise<void> {
    return;
  }

  private async readEntries(): Promise<string[]> {
    const raw = await fs.promises.readFile(this.filePath, "utf-8");
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
