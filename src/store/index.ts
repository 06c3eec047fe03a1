import { AppConfig } from "../config";
import { InMemoryLedgerStore } from "./memoryStore";
import { SqliteLedgerStore } from "./sqliteStore";
import { LedgerStore } from "./types";

export function createStore(config: AppConfig, dryRun = false): LedgerStore {
  if (dryRun) {
    return new InMemoryLedgerStore();
  }
  return new SqliteLedgerStore(config.storePath);
}

export { InMemoryLedgerStore } from "./memoryStore";
export { SqliteLedgerStore } from "./sqliteStore";
export * from "./types";
