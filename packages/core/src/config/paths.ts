import { homedir } from "os";
import { join, resolve } from "path";

/**
 * Centralized path and connection settings for the ledger.
 * The SQLite file lives in a single data directory.
 */

export const DATABASE_FILENAME = "cdn-ledger.db";

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface LedgerPaths {
  dataDir: string;
  database: string;
}

/**
 * Get the data directory. An explicit option wins over
 * CDN_LEDGER_DATA_DIR, which wins over ~/.cdn-ledger.
 */
export function getDataDir(dataDir?: string): string {
  const dir = dataDir || process.env.CDN_LEDGER_DATA_DIR || join(homedir(), ".cdn-ledger");
  return resolve(dir);
}

/**
 * All paths the ledger reads or writes
 */
export function resolvePaths(options: { dataDir?: string } = {}): LedgerPaths {
  const dataDir = getDataDir(options.dataDir);
  return {
    dataDir,
    database: join(dataDir, DATABASE_FILENAME),
  };
}

/**
 * How long SQLite waits on a locked database before giving up
 */
export function getBusyTimeout(): number {
  const raw = process.env.CDN_LEDGER_BUSY_TIMEOUT;
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_BUSY_TIMEOUT_MS;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : DEFAULT_BUSY_TIMEOUT_MS;
}
