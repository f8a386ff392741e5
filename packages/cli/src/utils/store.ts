import type { Command } from "commander";
import { CdnStore, debug } from "@cdn-ledger/core";

export interface GlobalOptions {
  dataDir?: string;
  logLevel?: string;
}

/**
 * Open the store for one command and close it afterwards,
 * whether the command succeeds or throws.
 */
export async function withStore<T>(
  command: Command,
  fn: (store: CdnStore) => T | Promise<T>
): Promise<T> {
  const { dataDir } = command.optsWithGlobals<GlobalOptions>();
  const store = CdnStore.open({ dataDir });
  debug(`Opened store at ${store.db.filename}`);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
