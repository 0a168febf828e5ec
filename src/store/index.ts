import { AppConfig } from "../config";
import { FileLedger } from "./fileLedger";
import { SqliteLedger } from "./sqliteLedger";
import { DownloadLedger } from "./types";

export function createLedger(config: AppConfig): DownloadLedger {
  return config.ledgerMode === "sqlite" ? new SqliteLedger(config.ledgerPath) : new FileLedger(config.ledgerPath);
}

export * from "./types";
export * from "./fileLedger";
export * from "./sqliteLedger";
export * from "./memoryLedger";
