export type { LedgerStore } from "./ledger-store.js";
export { MemoryLedgerStore } from "./memory-ledger-store.js";
export { FileLedgerStore, type FileLedgerStoreConfig } from "./file-ledger-store.js";
export type { StateStore } from "./state-store.js";
export { MemoryStateStore } from "./memory-state-store.js";
export { FileStateStore, type FileStateStoreConfig } from "./file-state-store.js";
