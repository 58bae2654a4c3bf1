import type { Decimal as DecimalType } from "decimal.js-light";

import { D18d } from "./numbers";
import { getPriceFraction } from "./pricing";
import { Line } from "./types";
import { Decimal } from "./utils";

/**
 * A point of an auction's price schedule
 *
 * @param elapsed {s}
 * @param fraction {1} Share of the auctioned collateral released for a full repayment
 * @param inkOut {wholeInk} Collateral released for a full repayment
 * @param pricePerBase {wholeInk/wholeBase} Collateral received per whole unit of base repaid
 */
export interface SchedulePoint {
  elapsed: bigint;
  fraction: DecimalType;
  inkOut: DecimalType;
  pricePerBase: DecimalType;
}

/**
 * Price schedule of an auction, for display and simulation
 *
 * @param line Line of the collateral/base pair
 * @param ink {ink} Collateral under auction, 18 decimals
 * @param base {base} Base needed to repay the auction's art
 * @param baseDecimals Decimals of the base
 * @param steps Number of intervals between the start and the end of the auction
 */
export const getPriceSchedule = (
  line: Line,
  ink: bigint,
  base: bigint,
  baseDecimals: bigint,
  steps: number,
): SchedulePoint[] => {
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new Error(`steps must be a positive integer: ${steps}`);
  }
  if (base <= 0n) {
    throw new Error("base must be positive");
  }

  // {wholeInk} = {ink} / {ink/wholeInk}
  const wholeInk = new Decimal(ink.toString()).div(D18d);

  // {wholeBase} = {base} / {base/wholeBase}
  const wholeBase = new Decimal(base.toString()).div(new Decimal(`1e${baseDecimals}`));

  const points: SchedulePoint[] = [];
  for (let i = 0; i <= steps; i++) {
    const elapsed = (line.duration * BigInt(i)) / BigInt(steps);

    // {1} = D18{1} / D18
    const fraction = new Decimal(getPriceFraction(line.initialOffer, elapsed, line.duration).toString()).div(D18d);

    // {wholeInk} = {wholeInk} * {1}
    const inkOut = wholeInk.mul(fraction);

    points.push({
      elapsed,
      fraction,
      inkOut,
      pricePerBase: inkOut.div(wholeBase),
    });
  }

  return points;
};

/**
 * Convert a fraction to D18
 *
 * @param fraction {1} e.g. 0.714
 * @returns D18{1}
 */
export const toD18 = (fraction: number | string): bigint => {
  const value = new Decimal(fraction.toString());
  if (value.isNegative()) {
    throw new Error(`fraction must not be negative: ${fraction}`);
  }
  return BigInt(value.mul(D18d).toFixed(0));
};
