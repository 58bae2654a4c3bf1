export enum AuctionErrorCode {
  NotUndercollateralized = "NotUndercollateralized",
  VaultAlreadyAuctioned = "VaultAlreadyAuctioned",
  VaultNotAuctioned = "VaultNotAuctioned",
  ExposureExceeded = "ExposureExceeded",
  StillUndercollateralized = "StillUndercollateralized",
  NotEnoughBought = "NotEnoughBought",
  LeavesDust = "LeavesDust",
  InvalidParameter = "InvalidParameter",
  Unauthorized = "Unauthorized",
  PairNotSupported = "PairNotSupported",
  PairIgnored = "PairIgnored",
  Overflow = "Overflow",
  MissingCollaborator = "MissingCollaborator",
  CollateralUnavailable = "CollateralUnavailable",
}

export class AuctionError extends Error {
  readonly code: AuctionErrorCode;

  constructor(code: AuctionErrorCode, message?: string) {
    super(message ? `${code}: ${message}` : code);
    this.name = "AuctionError";
    this.code = code;
  }
}

export const isAuctionError = (err: unknown, code?: AuctionErrorCode): err is AuctionError =>
  err instanceof AuctionError && (code === undefined || err.code === code);
