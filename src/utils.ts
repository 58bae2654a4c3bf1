import DecimalLight from "decimal.js-light";
import { formatUnits, isAddress, isHexString } from "ethers";

import { AuctionError, AuctionErrorCode } from "./errors";
import { Account, AssetId, SeriesId, VaultId } from "./types";

// Create a local Decimal constructor with custom precision
export const Decimal = DecimalLight.clone({ precision: 100 });

const invalid = (message: string) => new AuctionError(AuctionErrorCode.InvalidParameter, message);

export const checkVaultId = (vaultId: VaultId): VaultId => {
  if (!isHexString(vaultId, 12)) {
    throw invalid(`vault id must be 12 bytes of hex: ${vaultId}`);
  }
  return vaultId.toLowerCase();
};

export const checkAssetId = (assetId: AssetId | SeriesId, label = "asset id"): AssetId => {
  if (!isHexString(assetId, 6)) {
    throw invalid(`${label} must be 6 bytes of hex: ${assetId}`);
  }
  return assetId.toLowerCase();
};

export const checkAccount = (account: Account, label = "account"): Account => {
  if (!isAddress(account)) {
    throw invalid(`${label} is not an address: ${account}`);
  }
  return account.toLowerCase();
};

export const checkAmount = (amount: bigint, label = "amount"): bigint => {
  if (amount < 0n) {
    throw invalid(`${label} must not be negative: ${amount}`);
  }
  return amount;
};

// Key shared by lines, limits and ignored pairs
export const pairKey = (a: string, b: string): string => `${a.toLowerCase()}:${b.toLowerCase()}`;

/**
 * Format an amount in whole units for debug logs
 *
 * @param amount {tok}
 * @param decimals Decimals of the token, 18 for collateral and D18 fractions
 */
export const fmt = (amount: bigint, decimals: bigint | number = 18): string => formatUnits(amount, decimals);
