import fs from "node:fs";
import path from "node:path";
import { Response, type fetch } from "undici";
import { afterEach, describe, expect, it, vi, type Mock } from "vitest";
import { backoffDelayMs, localFileName, PdfDownloader } from "../../../src/download";
import { HttpSession } from "../../../src/session";
import { DownloadLedger, FileLedger } from "../../../src/store";
import { createHarness, disposeHarness, Harness, SITE } from "../../helpers/harness";

const PDF_BYTES = "%PDF-1.7\n1 0 obj\n<<>>\nendobj\n%%EOF\n";
const PDF_URL = `${SITE}/sites/default/files/slides/Durability_Update.pdf`;
const PDF_PATH = "/sites/default/files/slides/Durability_Update.pdf";

describe("localFileName", () => {
  it("uses the last path segment", () => {
    expect(localFileName(PDF_URL)).toBe("Durability_Update.pdf");
  });

  it("ignores the query string and decodes escapes", () => {
    expect(localFileName(`${SITE}/files/Left%20Main.pdf?itok=abc`)).toBe("Left Main.pdf");
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt", () => {
    expect([1, 2, 3].map((attempt) => backoffDelayMs(attempt, 1_000))).toEqual([1_000, 2_000, 4_000]);
  });
});

describe("PdfDownloader", () => {
  let harness: Harness;
  let ledger: FileLedger;
  let sleepFn: Mock<(ms: number) => Promise<void>>;

  function setup(options: { ledger?: DownloadLedger; session?: (harness: Harness) => HttpSession } = {}): PdfDownloader {
    harness = createHarness({ retryBaseDelayMs: 1_000 });
    ledger = new FileLedger(harness.config.ledgerPath);
    sleepFn = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    return new PdfDownloader({
      session: options.session ? options.session(harness) : harness.session,
      config: harness.config,
      logger: harness.logger,
      metrics: harness.metrics,
      ledger: options.ledger ?? ledger,
      sleepFn,
    });
  }

  function ledgerLines(): string[] {
    return fs.readFileSync(harness.config.ledgerPath, "utf-8").split("\n").filter((line) => line.length > 0);
  }

  const destination = (): string => path.join(harness.config.outputDir, "Durability_Update.pdf");

  afterEach(async () => {
    await disposeHarness(harness);
  });

  it("streams the pdf to disk and records the url", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).reply(200, PDF_BYTES);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    expect(fs.readFileSync(destination(), "utf-8")).toBe(PDF_BYTES);
    expect(fs.existsSync(`${destination()}.part`)).toBe(false);
    expect(ledgerLines()).toEqual([PDF_URL]);
  });

  it("makes no request when the file already exists", async () => {
    const downloader = setup();
    fs.writeFileSync(destination(), PDF_BYTES);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    expect(harness.fetchSpy).not.toHaveBeenCalled();
  });

  it("makes no request when the ledger already holds the url", async () => {
    const downloader = setup();
    await ledger.record(PDF_URL);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    expect(harness.fetchSpy).not.toHaveBeenCalled();
    expect(harness.metrics.getCounters().downloads_skipped).toBe(1);
  });

  it("records a url once when downloaded twice in a row", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).reply(200, PDF_BYTES);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    expect(harness.fetchSpy).toHaveBeenCalledTimes(1);
    expect(ledgerLines()).toEqual([PDF_URL]);
  });

  it("retries transient failures with backoff and succeeds on the third attempt", async () => {
    const downloader = setup();
    const site = harness.agent.get(SITE);
    site.intercept({ path: PDF_PATH, method: "GET" }).reply(500, "upstream error").times(2);
    site.intercept({ path: PDF_PATH, method: "GET" }).reply(200, PDF_BYTES);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(true);
    expect(harness.fetchSpy).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
    expect(ledgerLines()).toEqual([PDF_URL]);
  });

  it("does not retry a 403", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).reply(403, "forbidden");

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
    expect(harness.fetchSpy).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
    expect(fs.existsSync(destination())).toBe(false);
    expect(ledgerLines()).toEqual([]);
  });

  it("gives up after three failed attempts", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).reply(502, "bad gateway").times(3);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
    expect(harness.fetchSpy).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
    expect(harness.logs.messages("error")).toContain("download_retries_exhausted");
    expect(ledgerLines()).toEqual([]);
  });

  it("retries network errors and leaves no partial file behind", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).replyWithError(new Error("socket hang up")).times(3);

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
    expect(harness.fetchSpy).toHaveBeenCalledTimes(3);
    expect(fs.readdirSync(harness.config.outputDir)).toEqual([]);
    expect(ledgerLines()).toEqual([]);
  });

  it("resolves relative hrefs against the site", async () => {
    const downloader = setup();
    harness.agent.get(SITE).intercept({ path: "/files/deck.pdf", method: "GET" }).reply(200, PDF_BYTES);

    await expect(downloader.downloadPdf("/files/deck.pdf")).resolves.toBe(true);
    expect(fs.existsSync(path.join(harness.config.outputDir, "deck.pdf"))).toBe(true);
    expect(ledgerLines()).toEqual([`${SITE}/files/deck.pdf`]);
  });

  it("removes the partial file when the body fails mid-stream", async () => {
    async function* truncatedBody(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array(9 * 1024).fill(0x25);
      throw new Error("connection reset");
    }
    const fetchFn = vi.fn<typeof fetch>(async () => new Response(truncatedBody(), { status: 200 }));
    const downloader = setup({
      session: (h) => new HttpSession({ config: h.config, logger: h.logger, fetchFn }),
    });

    await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fs.readdirSync(harness.config.outputDir)).toEqual([]);
    expect(ledgerLines()).toEqual([]);
    expect(harness.logs.messages("error")).toContain("download_retries_exhausted");
  });

  describe("when the ledger fails", () => {
    function brokenLedger(failing: "contains" | "record"): DownloadLedger {
      return {
        contains: async () => {
          if (failing === "contains") {
            throw new Error("EIO: ledger read failed");
          }
          return false;
        },
        record: async () => {
          throw new Error("EACCES: ledger not writable");
        },
        count: async () => 0,
        close: async () => undefined,
      };
    }

    it("returns false instead of throwing on a read error", async () => {
      const downloader = setup({ ledger: brokenLedger("contains") });

      await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
      expect(harness.fetchSpy).not.toHaveBeenCalled();
      expect(harness.logs.messages("error")).toEqual(["download_ledger_error"]);
      expect(harness.metrics.getCounters().downloads_failed).toBe(1);
    });

    it("returns false and drops the file on a write error", async () => {
      const downloader = setup({ ledger: brokenLedger("record") });
      harness.agent.get(SITE).intercept({ path: PDF_PATH, method: "GET" }).reply(200, PDF_BYTES);

      await expect(downloader.downloadPdf(PDF_URL)).resolves.toBe(false);
      expect(harness.fetchSpy).toHaveBeenCalledTimes(1);
      expect(fs.readdirSync(harness.config.outputDir)).toEqual([]);
      expect(harness.logs.messages("error")).toEqual(["download_ledger_error"]);
    });
  });
});
