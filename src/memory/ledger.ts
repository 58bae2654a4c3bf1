import { D18n, mulDiv, u128, wmul } from "../numbers";
import { Account, AssetId, Balances, DebtParams, Ledger, SeriesId, Series, Vault, VaultId } from "../types";
import { pairKey } from "../utils";

/**
 * Collateralization of an ilk against a base
 *
 * @param price D18{base/ink} Value of one unit of ink in units of base
 * @param ratio D18{1} Minimum collateralization, e.g. 1.5e18 for 150%
 */
export interface Spot {
  price: bigint;
  ratio: bigint;
}

/**
 * In-memory vault ledger
 *
 * Holds vaults, series, balances, debt limits, base/art rates and spot prices. Writes validate before they mutate.
 */
export class MemoryLedger implements Ledger {
  private readonly _vaults = new Map<VaultId, Vault>();
  private readonly _balances = new Map<VaultId, Balances>();
  private readonly _series = new Map<SeriesId, Series>();
  private readonly _debt = new Map<string, DebtParams>();
  private readonly _spots = new Map<string, Spot>();
  private readonly _rates = new Map<AssetId, bigint>(); // D18{base/art}

  // === SETUP ===

  addSeries(seriesId: SeriesId, baseId: AssetId): void {
    this._series.set(seriesId.toLowerCase(), { baseId: baseId.toLowerCase() });
  }

  setDebt(baseId: AssetId, ilkId: AssetId, debt: DebtParams): void {
    this._debt.set(pairKey(baseId, ilkId), { ...debt });
  }

  setSpot(baseId: AssetId, ilkId: AssetId, spot: Spot): void {
    this._spots.set(pairKey(baseId, ilkId), { ...spot });
  }

  setRate(baseId: AssetId, rate: bigint): void {
    if (rate <= 0n) {
      throw new Error("rate must be positive");
    }
    this._rates.set(baseId.toLowerCase(), rate);
  }

  build(vaultId: VaultId, owner: Account, seriesId: SeriesId, ilkId: AssetId, balances: Balances): Vault {
    const id = vaultId.toLowerCase();
    if (this._vaults.has(id)) {
      throw new Error(`vault ${vaultId} already exists`);
    }
    this.series(seriesId);

    const vault: Vault = { owner: owner.toLowerCase(), seriesId: seriesId.toLowerCase(), ilkId: ilkId.toLowerCase() };
    this._vaults.set(id, vault);
    this._balances.set(id, { ink: u128(balances.ink, "ink"), art: u128(balances.art, "art") });
    return { ...vault };
  }

  // === LEDGER ===

  vault(vaultId: VaultId): Vault {
    const vault = this._vaults.get(vaultId.toLowerCase());
    if (!vault) {
      throw new Error(`vault ${vaultId} not found`);
    }
    return { ...vault };
  }

  series(seriesId: SeriesId): Series {
    const series = this._series.get(seriesId.toLowerCase());
    if (!series) {
      throw new Error(`series ${seriesId} not found`);
    }
    return { ...series };
  }

  balances(vaultId: VaultId): Balances {
    this.vault(vaultId);
    const balances = this._balances.get(vaultId.toLowerCase());
    return balances ? { ...balances } : { ink: 0n, art: 0n };
  }

  /**
   * Collateral value in base minus the required value of the debt
   *
   * @returns {base} Negative when the vault is undercollateralized
   */
  level(vaultId: VaultId): bigint {
    const vault = this.vault(vaultId);
    const { baseId } = this.series(vault.seriesId);
    const spot = this._spots.get(pairKey(baseId, vault.ilkId));
    if (!spot) {
      throw new Error(`no spot for ${vault.ilkId}/${baseId}`);
    }
    const { ink, art } = this.balances(vaultId);

    // {base} = {ink} * D18{base/ink} / D18 - {base} * D18{1} / D18
    return wmul(ink, spot.price) - wmul(this.debtToBase(baseId, art), spot.ratio);
  }

  isUndercollateralized(vaultId: VaultId): boolean {
    return this.level(vaultId) < 0n;
  }

  give(vaultId: VaultId, receiver: Account): Vault {
    const vault = this.vault(vaultId);
    vault.owner = receiver.toLowerCase();
    this._vaults.set(vaultId.toLowerCase(), vault);
    return { ...vault };
  }

  reduceBalances(vaultId: VaultId, ink: bigint, art: bigint): Balances {
    const balances = this.balances(vaultId);
    if (ink < 0n || art < 0n || ink > balances.ink || art > balances.art) {
      throw new Error(`cannot reduce ${vaultId} by ink ${ink}, art ${art}`);
    }

    const updated = { ink: balances.ink - ink, art: balances.art - art };
    this._balances.set(vaultId.toLowerCase(), updated);
    return { ...updated };
  }

  debt(baseId: AssetId, ilkId: AssetId): DebtParams {
    const debt = this._debt.get(pairKey(baseId, ilkId));
    if (!debt) {
      throw new Error(`no debt params for ${ilkId}/${baseId}`);
    }
    return { ...debt };
  }

  // {art} = {base} * D18 / D18{base/art}
  debtFromBase(baseId: AssetId, base: bigint): bigint {
    return mulDiv([base, D18n], [this._rate(baseId)]);
  }

  // {base} = {art} * D18{base/art} / D18
  debtToBase(baseId: AssetId, art: bigint): bigint {
    return mulDiv([art, this._rate(baseId)], [D18n]);
  }

  private _rate(baseId: AssetId): bigint {
    return this._rates.get(baseId.toLowerCase()) ?? D18n;
  }
}
