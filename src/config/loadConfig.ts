import fs from "node:fs";
import path from "node:path";
import {
  AppConfig,
  ConfigLogLevel,
  ConfigOverrides,
  LedgerMode,
  ListingStrategy,
  PdfLinkMode,
  RedirectMode,
} from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.tctmd.com",
  identityProviderHost: "tctmd.okta.com",
  loginPath: "/api/v1/user/login",
  searchPath: "/search",
  searchApiPath: "/api/v1/search",
  postLoginRedirect: "https://www.tctmd.com/",
  loggedInMarker: "user-logged-in",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36 Edg/131.0.0.0",
  ignoreHttpsErrors: false,
  listingStrategy: "html",
  redirectMode: "strict",
  pdfLinkMode: "tracked",
  pageSize: 12,
  maxPages: 500,
  maxRedirectHops: 5,
  maxDownloadAttempts: 3,
  retryBaseDelayMs: 1_000,
  downloadDelayMs: 1_000,
  loginSettleMs: 2_000,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
  testMode: false,
  testModeDownloadLimit: 2,
  outputDir: "downloads",
  ledgerMode: "file",
  ledgerPath: "downloaded_pdfs.txt",
  logFile: "logs/pdf_downloader.log",
  logLevel: "debug",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: ConfigOverrides | null = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  return choices.find((choice) => choice === value) ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    listingStrategy: toChoice<ListingStrategy>(env.LISTING_STRATEGY, ["html", "api"], merged.listingStrategy),
    redirectMode: toChoice<RedirectMode>(env.REDIRECT_MODE, ["strict", "simple"], merged.redirectMode),
    pdfLinkMode: toChoice<PdfLinkMode>(env.PDF_LINK_MODE, ["tracked", "any"], merged.pdfLinkMode),
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    downloadDelayMs: toInt(env.DOWNLOAD_DELAY_MS, merged.downloadDelayMs),
    loginSettleMs: toInt(env.LOGIN_SETTLE_MS, merged.loginSettleMs),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    testMode: toBool(env.TEST_MODE, merged.testMode),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    ledgerMode: toChoice<LedgerMode>(env.LEDGER_MODE, ["file", "sqlite"], merged.ledgerMode),
    ledgerPath: env.LEDGER_PATH ?? merged.ledgerPath,
    logFile: env.LOG_FILE ?? merged.logFile,
    logLevel: toChoice<ConfigLogLevel>(env.LOG_LEVEL, ["debug", "info", "warn", "error"], merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
