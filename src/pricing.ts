import { AuctionError, AuctionErrorCode } from "./errors";
import { D18n, min, mulDiv, u32 } from "./numbers";
import { Auction, Line } from "./types";

/**
 * Share of the auctioned collateral released for a full repayment at a point in time
 *
 * Grows linearly from `initialOffer` at the start of the auction to 100% at `duration`, then stays there.
 *
 * @param initialOffer D18{1} Share offered at the start of the auction
 * @param elapsed {s} Time since the auction started
 * @param duration {s} Time until the full share is released
 * @returns D18{1}
 */
export const getPriceFraction = (initialOffer: bigint, elapsed: bigint, duration: bigint): bigint => {
  if (duration <= 0n) {
    throw new AuctionError(AuctionErrorCode.InvalidParameter, "duration must be positive");
  }
  if (initialOffer < 0n || initialOffer > D18n) {
    throw new AuctionError(AuctionErrorCode.InvalidParameter, `initial offer out of range: ${initialOffer}`);
  }
  if (elapsed < 0n) {
    throw new AuctionError(AuctionErrorCode.InvalidParameter, `elapsed time is negative: ${elapsed}`);
  }

  if (elapsed >= duration) {
    return D18n;
  }

  // D18{1} = D18 * {s} / {s}
  const timeFraction = mulDiv([D18n, min(elapsed, duration)], [u32(duration, "duration")]);

  // D18{1} = D18{1} + D18{1} * D18{1} / D18
  return initialOffer + mulDiv([D18n - initialOffer, timeFraction], [D18n]);
};

/**
 * Collateral paid out for repaying part of an auction's remaining debt
 *
 * All multiplications happen before the single truncating division.
 *
 * @param auction The open auction
 * @param artIn {art} Debt repaid, at most `auction.art`
 * @param line The line of the auction's collateral/base pair
 * @param now {s} Current time
 * @returns {ink}
 */
export const getPayout = (auction: Auction, artIn: bigint, line: Line, now: bigint): bigint => {
  if (artIn < 0n || artIn > auction.art) {
    throw new AuctionError(AuctionErrorCode.InvalidParameter, `artIn ${artIn} outside [0, ${auction.art}]`);
  }
  if (artIn === 0n) {
    return 0n;
  }

  const elapsed = now > auction.start ? now - auction.start : 0n;
  const fraction = getPriceFraction(line.initialOffer, elapsed, line.duration);

  // {ink} = {ink} * {art} * D18{1} / ({art} * D18)
  return mulDiv([auction.ink, artIn, fraction], [auction.art, D18n]);
};
