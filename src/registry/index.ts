export { LedgerRegistry, type LedgerRegistryConfig, type MutationOutcome } from "./ledger-registry.js";
