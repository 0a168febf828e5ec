/**
 * Append-only set of source URLs whose PDF has been fully written to disk.
 * A URL is recorded only after its download completed.
 */
export interface DownloadLedger {
  contains(url: string): Promise<boolean>;
  record(url: string): Promise<void>;
  count(): Promise<number>;
  close(): Promise<void>;
}
