export type ListingStrategy = "html" | "api";
export type RedirectMode = "strict" | "simple";
export type PdfLinkMode = "tracked" | "any";
export type LedgerMode = "file" | "sqlite";
export type ConfigLogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  baseUrl: string;
  identityProviderHost: string;
  loginPath: string;
  searchPath: string;
  searchApiPath: string;
  postLoginRedirect: string;
  loggedInMarker: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  listingStrategy: ListingStrategy;
  redirectMode: RedirectMode;
  pdfLinkMode: PdfLinkMode;
  pageSize: number;
  maxPages: number;
  maxRedirectHops: number;
  maxDownloadAttempts: number;
  retryBaseDelayMs: number;
  downloadDelayMs: number;
  loginSettleMs: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  testMode: boolean;
  testModeDownloadLimit: number;
  outputDir: string;
  ledgerMode: LedgerMode;
  ledgerPath: string;
  logFile: string;
  logLevel: ConfigLogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface Credentials {
  readonly username: string;
  readonly password: string;
}
