import { describe, it, beforeEach } from "node:test";
import { strict as assert } from "node:assert";

import { AuctionErrorCode } from "../src/errors";
import { D18n, U128_MAXn, bn } from "../src/numbers";

import { assertAuctionError } from "./assertions";
import {
  ADMIN,
  ART,
  BASE,
  BOT,
  DURATION,
  ENGINE,
  Fixture,
  ILK,
  INITIAL_OFFER,
  INK,
  OTHER_SERIES,
  OWNER,
  SERIES,
  START,
  VAULT,
  VAULT2,
  buildVault,
  makeHealthy,
  setupFixture,
} from "./setup";

describe("AuctionEngine", () => {
  let f: Fixture;

  beforeEach(() => {
    f = setupFixture();
  });

  describe("open", () => {
    it("Auctions a proportion of an undercollateralized vault", () => {
      const auction = f.bot.open(VAULT);

      assert.deepEqual(auction, {
        owner: OWNER,
        start: START,
        baseId: BASE,
        ilkId: ILK,
        art: bn("50000e6"),
        ink: bn("50e18"),
      });
      assert.deepEqual(f.engine.auctions(VAULT), auction);
      assert.equal(f.ledger.vault(VAULT).owner, ENGINE);
      assert.deepEqual(f.engine.limits(ILK, BASE), { max: bn("1000e18"), sum: bn("50e18") });
      assert.deepEqual(f.ledger.balances(VAULT), { ink: INK, art: ART });
      assert.deepEqual(f.events, [{ name: "AuctionOpened", payload: { vaultId: VAULT, start: START } }]);
    });

    it("Quotes the decaying price of the whole auction", () => {
      f.bot.open(VAULT);
      const art = bn("50000e6");

      assert.equal(f.engine.quotePayout(VAULT, art), bn("35.7e18"));
      f.clock.now = START + 300n;
      assert.equal(f.engine.quotePayout(VAULT, art), 36891666666666666650n);
      f.clock.now = START + 1800n;
      assert.equal(f.engine.quotePayout(VAULT, art), bn("42.85e18"));
      f.clock.now = START + 3600n;
      assert.equal(f.engine.quotePayout(VAULT, art), bn("50e18"));
      f.clock.now = START + 100000n;
      assert.equal(f.engine.quotePayout(VAULT, art), bn("50e18"));
    });

    it("Quotes a full repayment", () => {
      f.bot.open(VAULT);
      f.ledger.setRate(BASE, bn("1.1e18"));
      assert.deepEqual(f.engine.quoteFull(VAULT), { inkOut: bn("35.7e18"), artIn: bn("50000e6"), baseIn: bn("55000e6") });
    });

    it("Rejects a second auction on the same vault", () => {
      f.bot.open(VAULT);
      assertAuctionError(() => f.bot.open(VAULT), AuctionErrorCode.VaultAlreadyAuctioned);
      assert.equal(f.engine.limits(ILK, BASE).sum, bn("50e18"));
    });

    it("Rejects a healthy vault", () => {
      makeHealthy(f);
      assertAuctionError(() => f.bot.open(VAULT), AuctionErrorCode.NotUndercollateralized);
      assert.equal(f.engine.auctions(VAULT), undefined);
      assert.equal(f.ledger.vault(VAULT).owner, OWNER);
    });

    it("Auctions the whole vault when a partial auction would leave dust", () => {
      // half of 8000 leaves 4000, below the 5000 minimum
      buildVault(f, VAULT2, bn("10e18"), bn("8000e6"));
      const auction = f.bot.open(VAULT2);
      assert.equal(auction.art, bn("8000e6"));
      assert.equal(auction.ink, bn("10e18"));
    });

    it("Auctions only the proportion when the remainder is exactly the dust", () => {
      buildVault(f, VAULT2, bn("10e18"), bn("10000e6"));
      const auction = f.bot.open(VAULT2);
      assert.equal(auction.art, bn("5000e6"));
      assert.equal(auction.ink, bn("5e18"));
    });

    it("Stops opening auctions once the exposure limit is reached", () => {
      f.engine.setLimit(ILK, BASE, bn("50e18"));
      buildVault(f, VAULT2, INK, ART);

      f.bot.open(VAULT);
      assertAuctionError(() => f.bot.open(VAULT2), AuctionErrorCode.ExposureExceeded);
      assert.equal(f.ledger.vault(VAULT2).owner, OWNER);
      assert.equal(f.engine.auctions(VAULT2), undefined);
    });

    it("Lets one auction go past the exposure limit", () => {
      f.engine.setLimit(ILK, BASE, bn("10e18"));
      f.bot.open(VAULT);
      assert.deepEqual(f.engine.limits(ILK, BASE), { max: bn("10e18"), sum: bn("50e18") });
    });

    it("Leaves the vault with its owner when the exposure sum would overflow", () => {
      f.engine.setLine(ILK, BASE, DURATION, INITIAL_OFFER, D18n);
      f.engine.setLimit(ILK, BASE, U128_MAXn);
      f.ledger.build(VAULT2, OWNER, SERIES, ILK, { ink: U128_MAXn - 10n, art: U128_MAXn - 10n });
      f.bot.open(VAULT2);
      f.events.length = 0;

      assertAuctionError(() => f.bot.open(VAULT), AuctionErrorCode.Overflow);

      assert.equal(f.ledger.vault(VAULT).owner, OWNER);
      assert.equal(f.engine.auctions(VAULT), undefined);
      assert.equal(f.engine.limits(ILK, BASE).sum, U128_MAXn - 10n);
      assert.deepEqual(f.events, []);
    });

    it("Rejects pairs without a line", () => {
      const otherIlk = "0x574254430000";
      f.ledger.build(VAULT2, OWNER, SERIES, otherIlk, { ink: INK, art: ART });
      assertAuctionError(() => f.bot.open(VAULT2), AuctionErrorCode.PairNotSupported);
    });

    it("Rejects ignored ilk/series pairs", () => {
      f.engine.setIgnoredPair(ILK, SERIES, true);
      assert.equal(f.engine.isIgnoredPair(ILK, SERIES), true);
      assertAuctionError(() => f.bot.open(VAULT), AuctionErrorCode.PairIgnored);

      // other series of the same base are unaffected
      f.ledger.build(VAULT2, OWNER, OTHER_SERIES, ILK, { ink: INK, art: ART });
      f.bot.open(VAULT2);

      f.engine.setIgnoredPair(ILK, SERIES, false);
      f.bot.open(VAULT);
      assert.equal(f.engine.openAuctions().length, 2);
    });

    it("Rejects malformed vault ids", () => {
      assertAuctionError(() => f.bot.open("0x1234"), AuctionErrorCode.InvalidParameter);
    });
  });

  describe("cancel", () => {
    it("Rejects vaults without an auction", () => {
      assertAuctionError(() => f.bot.cancel(VAULT), AuctionErrorCode.VaultNotAuctioned);
    });

    it("Rejects vaults that are still undercollateralized", () => {
      f.bot.open(VAULT);
      assertAuctionError(() => f.bot.cancel(VAULT), AuctionErrorCode.StillUndercollateralized);
      assert.equal(f.engine.auctions(VAULT)?.art, bn("50000e6"));
    });

    it("Returns a recovered vault to its owner", () => {
      buildVault(f, VAULT2, INK, ART);
      f.bot.open(VAULT);
      f.bot.open(VAULT2);
      f.events.length = 0;

      makeHealthy(f);
      f.bot.cancel(VAULT);

      assert.equal(f.engine.auctions(VAULT), undefined);
      assert.equal(f.ledger.vault(VAULT).owner, OWNER);
      assert.equal(f.engine.limits(ILK, BASE).sum, bn("50e18"));
      assert.deepEqual(f.events, [{ name: "AuctionCancelled", payload: { vaultId: VAULT } }]);
    });

    it("Allows a new auction after cancellation", () => {
      f.bot.open(VAULT);
      makeHealthy(f);
      f.bot.cancel(VAULT);
      f.ledger.setSpot(BASE, ILK, { price: bn("1000e6"), ratio: bn("1.5e18") });
      f.clock.now = START + 10n;
      assert.equal(f.bot.open(VAULT).start, START + 10n);
    });
  });

  describe("admin", () => {
    it("Only lets role holders set lines, limits and ignored pairs", () => {
      assertAuctionError(() => f.bot.setLine(ILK, BASE, 1n, bn("1e18"), bn("1e18")), AuctionErrorCode.Unauthorized);
      assertAuctionError(() => f.bot.setLimit(ILK, BASE, 1n), AuctionErrorCode.Unauthorized);
      assertAuctionError(() => f.bot.setIgnoredPair(ILK, SERIES, true), AuctionErrorCode.Unauthorized);
      assert.equal(f.engine.lines(ILK, BASE)?.duration, 3600n);
    });

    it("Only lets root grant and revoke roles", () => {
      assertAuctionError(() => f.bot.grantRole("setLine", BOT), AuctionErrorCode.Unauthorized);

      f.engine.grantRole("setLine", BOT);
      f.bot.setLine(ILK, BASE, 60n, bn("0.5e18"), bn("1e18"));
      assert.deepEqual(f.engine.lines(ILK, BASE), { duration: 60n, initialOffer: bn("0.5e18"), proportion: bn("1e18") });

      f.engine.revokeRole("setLine", BOT);
      assert.equal(f.engine.hasRole("setLine", BOT), false);
      assert.equal(f.engine.hasRole("setLine", ADMIN), true);
    });

    it("Validates line parameters", () => {
      const cases: [bigint, bigint, bigint][] = [
        [0n, bn("0.5e18"), bn("0.5e18")],
        [2n ** 32n, bn("0.5e18"), bn("0.5e18")],
        [3600n, bn("0.01e18") - 1n, bn("0.5e18")],
        [3600n, bn("1e18") + 1n, bn("0.5e18")],
        [3600n, bn("0.5e18"), bn("0.01e18") - 1n],
        [3600n, bn("0.5e18"), bn("1e18") + 1n],
      ];
      for (const [duration, initialOffer, proportion] of cases) {
        assertAuctionError(
          () => f.engine.setLine(ILK, BASE, duration, initialOffer, proportion),
          AuctionErrorCode.InvalidParameter,
        );
      }
      f.engine.setLine(ILK, BASE, 1n, bn("0.01e18"), bn("0.01e18"));
    });

    it("Emits an event for every setter", () => {
      f.engine.setLine(ILK, BASE, 60n, bn("0.5e18"), bn("0.25e18"));
      f.engine.setLimit(ILK, BASE, 7n);
      f.engine.setIgnoredPair(ILK, SERIES, true);

      assert.deepEqual(f.events, [
        {
          name: "LineSet",
          payload: { ilkId: ILK, baseId: BASE, duration: 60n, initialOffer: bn("0.5e18"), proportion: bn("0.25e18") },
        },
        { name: "LimitSet", payload: { ilkId: ILK, baseId: BASE, max: 7n } },
        { name: "IgnoredPairSet", payload: { ilkId: ILK, seriesId: SERIES, ignore: true } },
      ]);
    });
  });
});
