import { EventEmitter } from "node:events";

import { AccessControl } from "./access";
import { AuctionError, AuctionErrorCode } from "./errors";
import { ExposureLimiter } from "./exposure";
import { D16n, D18n, U32_MAXn, min, u128, u32, wmul } from "./numbers";
import { getPayout } from "./pricing";
import { AuctionRegistry } from "./registry";
import {
  Account,
  AssetId,
  Auction,
  AuctionEventName,
  AuctionEvents,
  Clock,
  DebtToken,
  FullQuote,
  Join,
  Ledger,
  Limits,
  Line,
  SeriesId,
  SettlementWithAsset,
  SettlementWithDebtToken,
  VaultId,
} from "./types";
import { checkAccount, checkAmount, checkAssetId, checkVaultId, fmt, pairKey } from "./utils";

export interface EngineCollaborators {
  ledger: Ledger;
  joins: Record<AssetId, Join>;
  debtTokens: Record<AssetId, DebtToken>; // by base
  clock?: Clock;
}

/**
 * @param account The engine's own account, custodian of vaults under auction
 * @param admin Account given the ROOT role; may grant the setter roles
 * @param debug Log every state change to the console
 */
export interface EngineOptions {
  account: Account;
  admin: Account;
  debug?: boolean;
}

interface EngineState {
  ledger: Ledger;
  joins: Map<AssetId, Join>;
  debtTokens: Map<AssetId, DebtToken>;
  clock: Clock;
  account: Account;
  debug: boolean;
  lines: Map<string, Line>;
  ignoredPairs: Set<string>;
  limiter: ExposureLimiter;
  registry: AuctionRegistry;
  access: AccessControl;
  events: EventEmitter;
}

// Checked state of a settlement, computed before anything is written
interface PendingSettlement {
  vaultId: VaultId;
  auction: Readonly<Auction>;
  artIn: bigint;
  inkOut: bigint;
  ilkJoin: Join;
}

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

const lowerKeys = <T>(record: Record<string, T>): Map<string, T> =>
  new Map(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));

/**
 * Dutch auctions on the collateral of undercollateralized vaults
 *
 * An engine handle acts as `sender`; use `connect()` to act as another account over the same state.
 */
export class AuctionEngine {
  private readonly _state: EngineState;
  readonly sender: Account;

  private constructor(state: EngineState, sender: Account) {
    this._state = state;
    this.sender = sender;
  }

  static create(collaborators: EngineCollaborators, options: EngineOptions): AuctionEngine {
    const admin = checkAccount(options.admin, "admin");
    const state: EngineState = {
      ledger: collaborators.ledger,
      joins: lowerKeys(collaborators.joins),
      debtTokens: lowerKeys(collaborators.debtTokens),
      clock: collaborators.clock ?? systemClock,
      account: checkAccount(options.account, "engine account"),
      debug: options.debug ?? false,
      lines: new Map(),
      ignoredPairs: new Set(),
      limiter: new ExposureLimiter(),
      registry: new AuctionRegistry(),
      access: new AccessControl(admin),
      events: new EventEmitter(),
    };
    return new AuctionEngine(state, admin);
  }

  connect(sender: Account): AuctionEngine {
    return new AuctionEngine(this._state, checkAccount(sender, "sender"));
  }

  get account(): Account {
    return this._state.account;
  }

  on<E extends AuctionEventName>(event: E, listener: (payload: AuctionEvents[E]) => void): this {
    this._state.events.on(event, listener);
    return this;
  }

  off<E extends AuctionEventName>(event: E, listener: (payload: AuctionEvents[E]) => void): this {
    this._state.events.off(event, listener);
    return this;
  }

  // === ACCESS ===

  hasRole(role: string, account: Account): boolean {
    return this._state.access.hasRole(role, account);
  }

  grantRole(role: string, account: Account): void {
    this._state.access.grantRole(this.sender, role, checkAccount(account));
  }

  grantRoles(roles: string[], account: Account): void {
    this._state.access.grantRoles(this.sender, roles, checkAccount(account));
  }

  revokeRole(role: string, account: Account): void {
    this._state.access.revokeRole(this.sender, role, checkAccount(account));
  }

  // === ADMIN ===

  /**
   * Set the auction parameters for a collateral/base pair
   *
   * @param duration {s}
   * @param initialOffer D18{1} Between 1% and 100%
   * @param proportion D18{1} Between 1% and 100%
   */
  setLine(ilkId: AssetId, baseId: AssetId, duration: bigint, initialOffer: bigint, proportion: bigint): Line {
    this._state.access.auth("setLine", this.sender);
    const ilk = checkAssetId(ilkId, "ilk id");
    const base = checkAssetId(baseId, "base id");

    if (duration <= 0n || duration > U32_MAXn) {
      throw new AuctionError(AuctionErrorCode.InvalidParameter, `duration out of range: ${duration}`);
    }
    if (initialOffer < D16n || initialOffer > D18n) {
      throw new AuctionError(AuctionErrorCode.InvalidParameter, `initial offer out of range: ${initialOffer}`);
    }
    if (proportion < D16n || proportion > D18n) {
      throw new AuctionError(AuctionErrorCode.InvalidParameter, `proportion out of range: ${proportion}`);
    }

    const line: Line = { duration, initialOffer, proportion };
    this._state.lines.set(pairKey(ilk, base), line);
    this._emit("LineSet", { ilkId: ilk, baseId: base, ...line });
    return { ...line };
  }

  setLimit(ilkId: AssetId, baseId: AssetId, max: bigint): Limits {
    this._state.access.auth("setLimit", this.sender);
    const ilk = checkAssetId(ilkId, "ilk id");
    const base = checkAssetId(baseId, "base id");

    const limits = this._state.limiter.setMax(ilk, base, checkAmount(max, "max"));
    this._emit("LimitSet", { ilkId: ilk, baseId: base, max: limits.max });
    return limits;
  }

  // Vaults of an ignored ilk/series pair are never auctioned
  setIgnoredPair(ilkId: AssetId, seriesId: SeriesId, ignore: boolean): void {
    this._state.access.auth("setIgnoredPair", this.sender);
    const ilk = checkAssetId(ilkId, "ilk id");
    const series = checkAssetId(seriesId, "series id");

    if (ignore) {
      this._state.ignoredPairs.add(pairKey(ilk, series));
    } else {
      this._state.ignoredPairs.delete(pairKey(ilk, series));
    }
    this._emit("IgnoredPairSet", { ilkId: ilk, seriesId: series, ignore });
  }

  // === VIEWS ===

  auctions(vaultId: VaultId): Readonly<Auction> | undefined {
    return this._state.registry.find(checkVaultId(vaultId));
  }

  openAuctions(): [VaultId, Readonly<Auction>][] {
    return this._state.registry.list();
  }

  lines(ilkId: AssetId, baseId: AssetId): Line | undefined {
    const line = this._state.lines.get(pairKey(ilkId, baseId));
    return line ? { ...line } : undefined;
  }

  limits(ilkId: AssetId, baseId: AssetId): Limits {
    return this._state.limiter.get(ilkId, baseId);
  }

  isIgnoredPair(ilkId: AssetId, seriesId: SeriesId): boolean {
    return this._state.ignoredPairs.has(pairKey(ilkId, seriesId));
  }

  /**
   * Collateral a bot would receive right now for repaying `artIn` of the auction's debt
   *
   * @param artIn {art} At most the auction's remaining art
   * @returns {ink}
   */
  quotePayout(vaultId: VaultId, artIn: bigint): bigint {
    const id = checkVaultId(vaultId);
    const auction = this._state.registry.get(id);
    return getPayout(auction, checkAmount(artIn, "artIn"), this._line(auction.ilkId, auction.baseId), this._now());
  }

  // Quote for repaying everything left in the auction
  quoteFull(vaultId: VaultId): FullQuote {
    const id = checkVaultId(vaultId);
    const auction = this._state.registry.get(id);
    return {
      inkOut: getPayout(auction, auction.art, this._line(auction.ilkId, auction.baseId), this._now()),
      artIn: auction.art,
      baseIn: this._state.ledger.debtToBase(auction.baseId, auction.art),
    };
  }

  // === LIFECYCLE ===

  /**
   * Take custody of an undercollateralized vault and put part or all of it up for auction
   *
   * The whole vault is auctioned when auctioning only `proportion` of it would leave less than the dust.
   */
  open(vaultId: VaultId): Readonly<Auction> {
    const { ledger, registry, limiter } = this._state;
    const id = checkVaultId(vaultId);

    if (registry.has(id)) {
      throw new AuctionError(AuctionErrorCode.VaultAlreadyAuctioned, id);
    }

    const vault = ledger.vault(id);
    const ilkId = checkAssetId(vault.ilkId, "ilk id");
    const baseId = checkAssetId(ledger.series(vault.seriesId).baseId, "base id");

    if (this.isIgnoredPair(ilkId, vault.seriesId)) {
      throw new AuctionError(AuctionErrorCode.PairIgnored, `${ilkId}/${vault.seriesId}`);
    }
    const line = this._line(ilkId, baseId);

    if (!ledger.isUndercollateralized(id)) {
      throw new AuctionError(AuctionErrorCode.NotUndercollateralized, id);
    }

    const balances = ledger.balances(id);
    const dust = this._dust(baseId, ilkId);

    // {art} = {art} * D18{1} / D18
    let art = wmul(balances.art, line.proportion);
    // {ink} = {ink} * D18{1} / D18
    let ink = wmul(balances.ink, line.proportion);

    if (balances.art - art < dust) {
      art = balances.art;
      ink = balances.ink;
    }

    u128(art, "art");
    u128(ink, "ink");
    limiter.check(ilkId, baseId, ink);
    const start = u32(this._now(), "start");

    ledger.give(id, this._state.account);
    limiter.reserve(ilkId, baseId, ink);
    const auction = registry.insert(id, { owner: vault.owner.toLowerCase(), start, baseId, ilkId, art, ink });

    this._log("open", id, `art ${art}`, `ink ${fmt(ink)}`, `start ${start}`);
    this._emit("AuctionOpened", { vaultId: id, start });
    return auction;
  }

  // Return a vault whose collateralization has recovered to its owner
  cancel(vaultId: VaultId): void {
    const { ledger, registry, limiter } = this._state;
    const id = checkVaultId(vaultId);
    const auction = registry.get(id);

    if (ledger.isUndercollateralized(id)) {
      throw new AuctionError(AuctionErrorCode.StillUndercollateralized, id);
    }

    ledger.give(id, auction.owner);
    limiter.release(auction.ilkId, auction.baseId, auction.ink);
    registry.remove(id);

    this._log("cancel", id, `released ink ${fmt(auction.ink)}`);
    this._emit("AuctionCancelled", { vaultId: id });
  }

  /**
   * Repay debt with the base asset and receive collateral
   *
   * @param to Receiver of the collateral
   * @param minInkOut {ink} Minimum collateral to receive
   * @param maxBaseIn {base} Maximum base to pay; capped at what repays the whole auction
   */
  settleWithAsset(vaultId: VaultId, to: Account, minInkOut: bigint, maxBaseIn: bigint): SettlementWithAsset {
    const { ledger, registry } = this._state;
    const id = checkVaultId(vaultId);
    const auction = registry.get(id);

    // {art} = {base} converted by the ledger
    const artIn = min(ledger.debtFromBase(auction.baseId, checkAmount(maxBaseIn, "maxBaseIn")), auction.art);
    // {base} charged for artIn only, so base lost to truncation stays with the buyer
    const baseIn = ledger.debtToBase(auction.baseId, artIn);

    const pending = this._prepare(id, auction, artIn, minInkOut);
    const baseJoin = this._join(auction.baseId);
    const receiver = checkAccount(to, "receiver");

    baseJoin.join(this.sender, baseIn);
    this._settle(pending, receiver, baseIn);

    return { inkOut: pending.inkOut, baseIn };
  }

  /**
   * Repay debt by burning debt tokens and receive collateral
   *
   * @param to Receiver of the collateral
   * @param minInkOut {ink} Minimum collateral to receive
   * @param maxArtIn {art} Maximum debt tokens to burn; capped at the auction's art
   */
  settleWithDebtToken(vaultId: VaultId, to: Account, minInkOut: bigint, maxArtIn: bigint): SettlementWithDebtToken {
    const id = checkVaultId(vaultId);
    const auction = this._state.registry.get(id);

    const artIn = min(checkAmount(maxArtIn, "maxArtIn"), auction.art);
    const pending = this._prepare(id, auction, artIn, minInkOut);
    const debtToken = this._debtToken(auction.baseId);
    const receiver = checkAccount(to, "receiver");

    debtToken.burn(this.sender, artIn);
    this._settle(pending, receiver);

    return { inkOut: pending.inkOut, artIn };
  }

  // === INTERNAL ===

  private _prepare(vaultId: VaultId, auction: Readonly<Auction>, artIn: bigint, minInkOut: bigint): PendingSettlement {
    const line = this._line(auction.ilkId, auction.baseId);
    const inkOut = getPayout(auction, artIn, line, this._now());

    if (inkOut < checkAmount(minInkOut, "minInkOut")) {
      throw new AuctionError(AuctionErrorCode.NotEnoughBought, `${inkOut} < ${minInkOut}`);
    }

    const remainder = auction.art - artIn;
    if (remainder > 0n) {
      const dust = this._dust(auction.baseId, auction.ilkId);
      if (remainder < dust) {
        throw new AuctionError(AuctionErrorCode.LeavesDust, `remaining art ${remainder} < dust ${dust}`);
      }
    }

    const balances = this._state.ledger.balances(vaultId);
    if (inkOut > balances.ink || artIn > balances.art) {
      throw new AuctionError(
        AuctionErrorCode.CollateralUnavailable,
        `vault holds ink ${balances.ink}, art ${balances.art}; settlement needs ink ${inkOut}, art ${artIn}`,
      );
    }

    const ilkJoin = this._join(auction.ilkId);
    if (inkOut > ilkJoin.storedBalance) {
      throw new AuctionError(
        AuctionErrorCode.CollateralUnavailable,
        `join holds ${ilkJoin.storedBalance}, settlement pays out ${inkOut}`,
      );
    }

    return { vaultId, auction, artIn, inkOut, ilkJoin };
  }

  // Called once the buyer has paid
  private _settle(
    { vaultId, auction, artIn, inkOut, ilkJoin }: PendingSettlement,
    receiver: Account,
    baseIn?: bigint,
  ): void {
    const { ledger, registry, limiter } = this._state;
    const full = artIn === auction.art;

    ledger.reduceBalances(vaultId, inkOut, artIn);
    ilkJoin.exit(receiver, inkOut);

    if (full) {
      ledger.give(vaultId, auction.owner);
      // collateral not paid out stays in the vault and leaves the auction with it
      limiter.release(auction.ilkId, auction.baseId, auction.ink);
      registry.remove(vaultId);
    } else {
      limiter.release(auction.ilkId, auction.baseId, inkOut);
      registry.update(vaultId, auction.art - artIn, auction.ink - inkOut);
    }

    this._log("bought", vaultId, `art ${artIn}`, `ink ${fmt(inkOut)}`, full ? "ended" : "open");
    this._emit(
      "Bought",
      baseIn === undefined
        ? { vaultId, buyer: this.sender, ink: inkOut, art: artIn }
        : { vaultId, buyer: this.sender, ink: inkOut, art: artIn, baseIn },
    );
    if (full) {
      this._emit("AuctionEnded", { vaultId, owner: auction.owner });
    }
  }

  private _line(ilkId: AssetId, baseId: AssetId): Line {
    const line = this._state.lines.get(pairKey(ilkId, baseId));
    if (!line) {
      throw new AuctionError(AuctionErrorCode.PairNotSupported, `${ilkId}/${baseId}`);
    }
    return line;
  }

  // {art} = {wholeBase} * {base/wholeBase}
  private _dust(baseId: AssetId, ilkId: AssetId): bigint {
    const debt = this._state.ledger.debt(baseId, ilkId);
    return debt.min * 10n ** debt.dec;
  }

  private _join(assetId: AssetId): Join {
    const join = this._state.joins.get(assetId.toLowerCase());
    if (!join) {
      throw new AuctionError(AuctionErrorCode.MissingCollaborator, `no join for ${assetId}`);
    }
    return join;
  }

  private _debtToken(baseId: AssetId): DebtToken {
    const debtToken = this._state.debtTokens.get(baseId.toLowerCase());
    if (!debtToken) {
      throw new AuctionError(AuctionErrorCode.MissingCollaborator, `no debt token for ${baseId}`);
    }
    return debtToken;
  }

  private _now(): bigint {
    return this._state.clock();
  }

  private _emit<E extends AuctionEventName>(event: E, payload: AuctionEvents[E]): void {
    this._state.events.emit(event, payload);
  }

  private _log(...args: string[]): void {
    if (this._state.debug) {
      console.log("[auction]", ...args);
    }
  }
}
