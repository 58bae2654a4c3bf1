export * from "./types";
export * from "./errors";
export * from "./numbers";
export * from "./pricing";
export * from "./exposure";
export * from "./registry";
export * from "./access";
export * from "./engine";
export * from "./quote";

export { checkAccount, checkAssetId, checkVaultId, pairKey } from "./utils";

export { MemoryLedger } from "./memory/ledger";
export type { Spot } from "./memory/ledger";
export { MemoryDebtToken, MemoryJoin } from "./memory/tokens";
