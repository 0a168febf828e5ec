import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig } from "../config";
import { sleep } from "../core/fetch";
import { Logger, MetricsRegistry, errorMessage } from "../observability";
import { HttpSession } from "../session";
import { DownloadLedger } from "../store";

const CHUNK_SIZE = 8 * 1024;

export interface DownloaderDeps {
  session: HttpSession;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  ledger: DownloadLedger;
  sleepFn?: (ms: number) => Promise<void>;
}

type AttemptOutcome =
  | { kind: "ok"; bytes: number }
  | { kind: "forbidden" }
  | { kind: "http_error"; status: number }
  | { kind: "error"; message: string };

/** Final path segment of the URL, decoded; query and fragment are ignored. */
export function localFileName(url: string): string {
  const segments = new URL(url).pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1] ?? "";
  let decoded: string;
  try {
    decoded = decodeURIComponent(last);
  } catch {
    decoded = last;
  }
  const safe = path.basename(decoded);
  return safe.length > 0 && safe !== "." && safe !== ".." ? safe : "download.pdf";
}

export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export class PdfDownloader {
  private readonly session: HttpSession;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly ledger: DownloadLedger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly outputDir: string;

  constructor(deps: DownloaderDeps) {
    this.session = deps.session;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.ledger = deps.ledger;
    this.sleepFn = deps.sleepFn ?? sleep;
    this.outputDir = path.resolve(deps.config.outputDir);
    fs.mkdirSync(this.outputDir, { recursive: true });
  }

  destinationFor(url: string): string {
    return path.join(this.outputDir, localFileName(new URL(url, this.config.baseUrl).toString()));
  }

  /**
   * Fetches one PDF to disk. Already-present files and ledger hits succeed without a request.
   * A 403 is final; any other failure is retried with exponential backoff.
   */
  async downloadPdf(url: string): Promise<boolean> {
    let absoluteUrl: string;
    try {
      absoluteUrl = new URL(url, this.config.baseUrl).toString();
    } catch (error) {
      this.logger.error("download_invalid_url", { url, error: errorMessage(error) });
      return false;
    }

    const destination = this.destinationFor(absoluteUrl);
    if (fs.existsSync(destination)) {
      this.metrics.incrementCounter("downloads_skipped", 1);
      this.logger.info("download_file_exists", { url: absoluteUrl, destination });
      return true;
    }
    let recorded: boolean;
    try {
      recorded = await this.ledger.contains(absoluteUrl);
    } catch (error) {
      this.metrics.incrementCounter("downloads_failed", 1);
      this.logger.error("download_ledger_error", { url: absoluteUrl, error: errorMessage(error) });
      return false;
    }
    if (recorded) {
      this.metrics.incrementCounter("downloads_skipped", 1);
      this.logger.info("download_already_recorded", { url: absoluteUrl, destination });
      return true;
    }

    const maxAttempts = Math.max(1, this.config.maxDownloadAttempts);
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = this.metrics.startTimer("download_ms");
      this.logger.debug("download_attempt_start", { url: absoluteUrl, attempt });
      const outcome = await this.attempt(absoluteUrl, destination);
      const durationMs = stopTimer();

      switch (outcome.kind) {
        case "ok":
          try {
            await this.ledger.record(absoluteUrl);
          } catch (error) {
            // no file on disk without a ledger entry
            await fs.promises.rm(destination, { force: true });
            this.metrics.incrementCounter("downloads_failed", 1);
            this.logger.error("download_ledger_error", { url: absoluteUrl, destination, error: errorMessage(error) });
            return false;
          }
          this.metrics.incrementCounter("downloads_ok", 1);
          this.logger.info("download_ok", { url: absoluteUrl, destination, attempt, bytes: outcome.bytes, durationMs });
          return true;
        case "forbidden":
          this.metrics.incrementCounter("downloads_failed", 1);
          this.logger.error("download_forbidden", { url: absoluteUrl, status: 403, attempt, durationMs });
          return false;
        case "http_error":
          this.logger.error("download_http_error", { url: absoluteUrl, status: outcome.status, attempt, durationMs });
          break;
        case "error":
          this.logger.error("download_error", { url: absoluteUrl, attempt, durationMs, error: outcome.message });
          break;
      }

      if (attempt < maxAttempts) {
        await this.sleepFn(backoffDelayMs(attempt, this.config.retryBaseDelayMs));
      }
    }

    this.metrics.incrementCounter("downloads_failed", 1);
    this.logger.error("download_retries_exhausted", { url: absoluteUrl, attempts: maxAttempts });
    return false;
  }

  private async attempt(url: string, destination: string): Promise<AttemptOutcome> {
    const tempPath = `${destination}.part`;
    try {
      const response = await this.session.get(url, {
        headers: { accept: "application/pdf,*/*" },
        timeoutMs: this.config.downloadTimeoutMs,
      });

      if (response.status === 403) {
        await response.body?.cancel();
        return { kind: "forbidden" };
      }
      if (response.status !== 200 || !response.body) {
        await response.body?.cancel();
        return { kind: "http_error", status: response.status };
      }

      let bytes = 0;
      const readable = Readable.fromWeb(response.body, { highWaterMark: CHUNK_SIZE });
      readable.on("data", (chunk: Buffer) => {
        bytes += chunk.length;
      });
      await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w", highWaterMark: CHUNK_SIZE }));
      await fs.promises.rename(tempPath, destination);
      return { kind: "ok", bytes };
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      return { kind: "error", message: errorMessage(error) };
    }
  }
}
