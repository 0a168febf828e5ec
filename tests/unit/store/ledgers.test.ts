import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/config";
import { createLedger, DownloadLedger, FileLedger, InMemoryLedger, SqliteLedger } from "../../../src/store";
import { makeTempDir } from "../../helpers/harness";

const DECK = "https://www.tctmd.com/sites/default/files/slides/Deck.pdf";

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir();
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

const factories: Array<[string, () => DownloadLedger]> = [
  ["FileLedger", () => new FileLedger(path.join(tempDir, "downloaded_pdfs.txt"))],
  ["SqliteLedger", () => new SqliteLedger(path.join(tempDir, "ledger.sqlite"))],
  ["InMemoryLedger", () => new InMemoryLedger()],
];

describe.each(factories)("%s", (_name, create) => {
  it("holds recorded urls exactly once", async () => {
    const ledger = create();
    expect(await ledger.contains(DECK)).toBe(false);

    await ledger.record(DECK);
    await ledger.record(DECK);

    expect(await ledger.contains(DECK)).toBe(true);
    expect(await ledger.count()).toBe(1);
    await ledger.close();
  });

  it("matches whole urls only", async () => {
    const ledger = create();
    await ledger.record(DECK);

    expect(await ledger.contains("https://www.tctmd.com/sites/default/files/slides/Deck")).toBe(false);
    await ledger.close();
  });
});

describe("FileLedger", () => {
  it("writes one url per line and survives a reopen", async () => {
    const filePath = path.join(tempDir, "nested", "downloaded_pdfs.txt");
    const first = new FileLedger(filePath);
    await first.record(DECK);
    await first.record("https://www.tctmd.com/files/Other.pdf");

    expect(fs.readFileSync(filePath, "utf-8")).toBe(`${DECK}\nhttps://www.tctmd.com/files/Other.pdf\n`);
    const reopened = new FileLedger(filePath);
    expect(await reopened.contains(DECK)).toBe(true);
    expect(await reopened.count()).toBe(2);
  });

  it("starts from an empty file", () => {
    const filePath = path.join(tempDir, "downloaded_pdfs.txt");
    new FileLedger(filePath);

    expect(fs.readFileSync(filePath, "utf-8")).toBe("");
  });
});

describe("SqliteLedger", () => {
  it("persists across connections", async () => {
    const dbPath = path.join(tempDir, "ledger.sqlite");
    const first = new SqliteLedger(dbPath);
    await first.record(DECK);
    await first.close();

    const second = new SqliteLedger(dbPath);
    expect(await second.contains(DECK)).toBe(true);
    await second.close();
  });
});

describe("createLedger", () => {
  it("builds the backing store named by ledgerMode", async () => {
    const fileLedger = createLedger({ ...DEFAULT_CONFIG, ledgerMode: "file", ledgerPath: path.join(tempDir, "a.txt") });
    const sqliteLedger = createLedger({ ...DEFAULT_CONFIG, ledgerMode: "sqlite", ledgerPath: path.join(tempDir, "a.sqlite") });

    expect(fileLedger).toBeInstanceOf(FileLedger);
    expect(sqliteLedger).toBeInstanceOf(SqliteLedger);
    await sqliteLedger.close();
  });
});
