import { AuctionError, AuctionErrorCode } from "./errors";
import { u128 } from "./numbers";
import { AssetId, Limits } from "./types";
import { pairKey } from "./utils";

/**
 * Tracks how much collateral of each ilk/base pair is under auction
 *
 * The cap is soft: it is checked before a reservation, never against the total after it.
 */
export class ExposureLimiter {
  private readonly _limits = new Map<string, Limits>();

  get(ilkId: AssetId, baseId: AssetId): Limits {
    const limits = this._limits.get(pairKey(ilkId, baseId));
    return limits ? { ...limits } : { max: 0n, sum: 0n };
  }

  setMax(ilkId: AssetId, baseId: AssetId, max: bigint): Limits {
    const limits = this.get(ilkId, baseId);
    limits.max = u128(max, "max");
    this._limits.set(pairKey(ilkId, baseId), limits);
    return { ...limits };
  }

  /**
   * Check that `ink` could be reserved for the pair, without reserving it
   *
   * @param ink {ink}
   * @returns {ink} The sum after the reservation
   */
  check(ilkId: AssetId, baseId: AssetId, ink: bigint = 0n): bigint {
    const { max, sum } = this.get(ilkId, baseId);
    if (sum >= max) {
      throw new AuctionError(AuctionErrorCode.ExposureExceeded, `sum ${sum} has reached max ${max}`);
    }
    return u128(sum + ink, "sum");
  }

  reserve(ilkId: AssetId, baseId: AssetId, ink: bigint): Limits {
    const limits = this.get(ilkId, baseId);
    limits.sum = this.check(ilkId, baseId, ink);
    this._limits.set(pairKey(ilkId, baseId), limits);
    return { ...limits };
  }

  release(ilkId: AssetId, baseId: AssetId, ink: bigint): Limits {
    const limits = this.get(ilkId, baseId);
    limits.sum = u128(limits.sum - ink, "sum");
    this._limits.set(pairKey(ilkId, baseId), limits);
    return { ...limits };
  }
}
