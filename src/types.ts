// === IDS ===

export type VaultId = string; // bytes12
export type AssetId = string; // bytes6
export type SeriesId = string; // bytes6
export type Account = string; // address

// === ENGINE DATA STRUCTURES ===

/**
 * Auction parameters for a collateral/base pair
 *
 * @param duration {s} Time until the auction releases the full collateral share
 * @param initialOffer D18{1} Share of the collateral offered at the start of the auction
 * @param proportion D18{1} Share of the vault's debt and collateral put up for auction
 */
export interface Line {
  duration: bigint;
  initialOffer: bigint;
  proportion: bigint;
}

export interface Limits {
  max: bigint; // {ink}
  sum: bigint; // {ink}
}

export interface Auction {
  owner: Account;
  start: bigint; // {s}
  baseId: AssetId;
  ilkId: AssetId;
  art: bigint; // {art}
  ink: bigint; // {ink}
}

export interface SettlementWithAsset {
  inkOut: bigint; // {ink}
  baseIn: bigint; // {base}
}

export interface SettlementWithDebtToken {
  inkOut: bigint; // {ink}
  artIn: bigint; // {art}
}

export interface FullQuote {
  inkOut: bigint; // {ink}
  artIn: bigint; // {art}
  baseIn: bigint; // {base}
}

// === LEDGER DATA STRUCTURES ===

export interface Vault {
  owner: Account;
  seriesId: SeriesId;
  ilkId: AssetId;
}

export interface Series {
  baseId: AssetId;
}

export interface Balances {
  ink: bigint; // {ink}
  art: bigint; // {art}
}

// Minimum debt is expressed in whole units of the base, `dec` is the base's decimals
export interface DebtParams {
  min: bigint;
  dec: bigint;
}

// === COLLABORATORS ===

export interface Ledger {
  vault(vaultId: VaultId): Vault;
  series(seriesId: SeriesId): Series;
  balances(vaultId: VaultId): Balances;
  isUndercollateralized(vaultId: VaultId): boolean;
  give(vaultId: VaultId, receiver: Account): Vault;
  reduceBalances(vaultId: VaultId, ink: bigint, art: bigint): Balances;
  debt(baseId: AssetId, ilkId: AssetId): DebtParams;
  debtFromBase(baseId: AssetId, base: bigint): bigint;
  debtToBase(baseId: AssetId, art: bigint): bigint;
}

export interface Join {
  readonly storedBalance: bigint;
  join(payer: Account, amount: bigint): bigint;
  exit(receiver: Account, amount: bigint): bigint;
}

export interface DebtToken {
  burn(payer: Account, amount: bigint): void;
}

export type Clock = () => bigint;

// === EVENTS ===

export interface AuctionEvents {
  AuctionOpened: { vaultId: VaultId; start: bigint };
  AuctionCancelled: { vaultId: VaultId };
  AuctionEnded: { vaultId: VaultId; owner: Account };
  LineSet: { ilkId: AssetId; baseId: AssetId } & Line;
  LimitSet: { ilkId: AssetId; baseId: AssetId; max: bigint };
  IgnoredPairSet: { ilkId: AssetId; seriesId: SeriesId; ignore: boolean };
  // baseIn is set when the buyer paid with the base asset
  Bought: { vaultId: VaultId; buyer: Account; ink: bigint; art: bigint; baseIn?: bigint };
}

export type AuctionEventName = keyof AuctionEvents;
