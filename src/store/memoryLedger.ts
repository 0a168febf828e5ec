import { DownloadLedger } from "./types";

export class InMemoryLedger implements DownloadLedger {
  private readonly urls: string[] = [];

  constructor(initial: string[] = []) {
    for (const url of initial) {
      if (!this.urls.includes(url)) {
        this.urls.push(url);
      }
    }
  }

  async contains(url: string): Promise<boolean> {
    return this.urls.includes(url);
  }

  async record(url: string): Promise<void> {
    if (!this.urls.includes(url)) {
      this.urls.push(url);
    }
  }

  async count(): Promise<number> {
    return this.urls.length;
  }

  async close(): Promise<void> {
    return;
  }
}
