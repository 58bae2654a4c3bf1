import { formatUnits } from "ethers";

import { AuctionEngine } from "../src/engine";
import { MemoryLedger } from "../src/memory/ledger";
import { MemoryDebtToken, MemoryJoin } from "../src/memory/tokens";
import { D18n } from "../src/numbers";
import { getPriceSchedule } from "../src/quote";

import { loadSimulationConfig } from "./config";

const ILK = "0x455448000000"; // ETH
const BASE = "0x555344430000"; // USDC
const SERIES = "0x303130320000";
const VAULT = "0x000000000000000000000001";

const ADMIN = "0x00000000000000000000000000000000000000a1";
const ENGINE = "0x00000000000000000000000000000000000000e1";
const OWNER = "0x0000000000000000000000000000000000000001";
const BOT = "0x0000000000000000000000000000000000000b01";

const main = () => {
  const config = loadSimulationConfig();
  const { line, ink, art, baseDecimals, debtMin, steps } = config;

  let now = 1_700_000_000n;

  const ledger = new MemoryLedger();
  const ilkJoin = new MemoryJoin();
  const baseJoin = new MemoryJoin();
  const debtToken = new MemoryDebtToken();

  ledger.addSeries(SERIES, BASE);
  ledger.setDebt(BASE, ILK, { min: debtMin, dec: baseDecimals });
  // price such that the vault sits at 100% collateralization against a 150% requirement
  ledger.setSpot(BASE, ILK, { price: (art * D18n) / ink, ratio: 15n * 10n ** 17n });
  ledger.build(VAULT, OWNER, SERIES, ILK, { ink, art });

  ilkJoin.mint(OWNER, ink);
  ilkJoin.join(OWNER, ink);
  baseJoin.mint(BOT, art);

  const engine = AuctionEngine.create(
    { ledger, joins: { [ILK]: ilkJoin, [BASE]: baseJoin }, debtTokens: { [BASE]: debtToken }, clock: () => now },
    { account: ENGINE, admin: ADMIN, debug: true },
  );
  engine.grantRoles(["setLine", "setLimit"], ADMIN);
  engine.setLine(ILK, BASE, line.duration, line.initialOffer, line.proportion);
  engine.setLimit(ILK, BASE, ink * 10n);

  console.log(`\n🚀 Opening auction on vault ${VAULT}`);
  const auction = engine.open(VAULT);
  console.log(`  art ${formatUnits(auction.art, baseDecimals)} | ink ${formatUnits(auction.ink, 18)}`);

  console.log(`\n📉 Price schedule over ${line.duration}s`);
  for (const point of getPriceSchedule(line, auction.ink, auction.art, baseDecimals, steps)) {
    console.log(
      `  t+${point.elapsed}s\t${point.fraction.mul(100).toFixed(2)}%\t${point.inkOut.toFixed(6)} ink\t${point.pricePerBase.toFixed(8)} ink/base`,
    );
  }

  const bot = engine.connect(BOT);
  const sizes = [40n, 20n];
  for (const percent of sizes) {
    now += line.duration / 4n;
    const remaining = engine.auctions(VAULT);
    if (!remaining) break;

    const baseIn = (remaining.art * percent) / 100n;
    try {
      const { inkOut } = bot.settleWithAsset(VAULT, BOT, 0n, baseIn);
      console.log(`\n💰 Bought ${percent}% of remaining art for ${formatUnits(inkOut, 18)} ink`);
    } catch (e) {
      console.log(`\n⚠️  ${percent}% fill rejected: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  now += line.duration;
  const quote = engine.quoteFull(VAULT);
  const { inkOut, baseIn } = bot.settleWithAsset(VAULT, BOT, quote.inkOut, quote.baseIn);
  console.log(`\n✅ Settled remainder: ${formatUnits(baseIn, baseDecimals)} base for ${formatUnits(inkOut, 18)} ink`);
  console.log(`   vault owner: ${ledger.vault(VAULT).owner} | balances: ${JSON.stringify(ledger.balances(VAULT), (_, v) => (typeof v === "bigint" ? v.toString() : v))}`);
};

main();
