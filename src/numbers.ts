import DecimalLight from "decimal.js-light";
import type { Decimal as DecimalType } from "decimal.js-light";

import { AuctionError, AuctionErrorCode } from "./errors";

// Create a local Decimal constructor with custom precision
const Decimal = DecimalLight.clone({ precision: 100 });

export const D18n: bigint = 10n ** 18n;
export const D16n: bigint = 10n ** 16n;

export const D18d: DecimalType = new Decimal("1e18");

export const U32_MAXn: bigint = 2n ** 32n - 1n;
export const U128_MAXn: bigint = 2n ** 128n - 1n;
export const D256_MAXn: bigint = 2n ** 256n - 1n;

export const bn = (str: string | DecimalType): bigint => {
  return BigInt(new Decimal(str).toFixed(0));
};

const checkRange = (value: bigint, max: bigint, bits: number, label: string): bigint => {
  if (value < 0n || value > max) {
    throw new AuctionError(AuctionErrorCode.Overflow, `${label} out of uint${bits} range: ${value}`);
  }
  return value;
};

export const u32 = (value: bigint, label = "value"): bigint => checkRange(value, U32_MAXn, 32, label);
export const u128 = (value: bigint, label = "value"): bigint => checkRange(value, U128_MAXn, 128, label);
export const u256 = (value: bigint, label = "value"): bigint => checkRange(value, D256_MAXn, 256, label);

/**
 * Multiply every factor in `numerators` before dividing once by the product of `denominators`
 *
 * Every intermediate product must fit in uint256; the division truncates toward zero.
 */
export const mulDiv = (numerators: bigint[], denominators: bigint[]): bigint => {
  const num = numerators.reduce((acc, x) => u256(acc * x, "product"), 1n);
  const den = denominators.reduce((acc, x) => u256(acc * x, "divisor"), 1n);

  if (den === 0n) {
    throw new AuctionError(AuctionErrorCode.InvalidParameter, "division by zero");
  }

  return num / den;
};

// D18{1} * {x} / D18
export const wmul = (x: bigint, y: bigint): bigint => mulDiv([x, y], [D18n]);

export const min = (a: bigint, b: bigint): bigint => (a < b ? a : b);
