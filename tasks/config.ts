import * as dotenv from "dotenv";
dotenv.config();

import { bn } from "../src/numbers";
import { toD18 } from "../src/quote";
import { Line } from "../src/types";

export interface SimulationConfig {
  line: Line;
  ink: bigint; // {ink}
  art: bigint; // {art}
  baseDecimals: bigint;
  debtMin: bigint; // {wholeBase}
  steps: number;
}

const readNumber = (name: string, fallback: string): string => {
  const value = process.env[name] ?? fallback;
  if (value.trim() === "" || isNaN(Number(value))) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return value;
};

export const loadSimulationConfig = (): SimulationConfig => {
  const baseDecimals = BigInt(readNumber("BASE_DECIMALS", "6"));
  const steps = parseInt(readNumber("SIM_STEPS", "12"));

  if (steps <= 0) {
    throw new Error("SIM_STEPS must be positive");
  }

  return {
    line: {
      duration: BigInt(readNumber("AUCTION_DURATION", "3600")),
      initialOffer: toD18(readNumber("AUCTION_INITIAL_OFFER", "0.714")),
      proportion: toD18(readNumber("AUCTION_PROPORTION", "0.5")),
    },
    // {ink} = {wholeInk} * {ink/wholeInk}
    ink: bn(`${readNumber("VAULT_INK", "100")}e18`),
    // {art} = {wholeBase} * {base/wholeBase}
    art: bn(`${readNumber("VAULT_ART", "100000")}e${baseDecimals}`),
    baseDecimals,
    debtMin: BigInt(readNumber("DEBT_MIN", "5000")),
    steps,
  };
};
