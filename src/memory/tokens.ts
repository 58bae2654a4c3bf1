import { DebtToken, Join, Account } from "../types";

// Token balances by account
class Balances {
  private readonly _balances = new Map<Account, bigint>();

  balanceOf(account: Account): bigint {
    return this._balances.get(account.toLowerCase()) ?? 0n;
  }

  credit(account: Account, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`negative amount: ${amount}`);
    }
    this._balances.set(account.toLowerCase(), this.balanceOf(account) + amount);
  }

  debit(account: Account, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (amount < 0n || amount > balance) {
      throw new Error(`insufficient balance for ${account}: ${balance} < ${amount}`);
    }
    this._balances.set(account.toLowerCase(), balance - amount);
  }
}

/**
 * Custody of one asset. `join` pulls from a payer into the join, `exit` pays out of it.
 */
export class MemoryJoin implements Join {
  private readonly _holders = new Balances();
  private _stored = 0n;

  get storedBalance(): bigint {
    return this._stored;
  }

  balanceOf(account: Account): bigint {
    return this._holders.balanceOf(account);
  }

  mint(account: Account, amount: bigint): void {
    this._holders.credit(account, amount);
  }

  join(payer: Account, amount: bigint): bigint {
    this._holders.debit(payer, amount);
    this._stored += amount;
    return amount;
  }

  exit(receiver: Account, amount: bigint): bigint {
    if (amount < 0n || amount > this._stored) {
      throw new Error(`join holds ${this._stored}, cannot exit ${amount}`);
    }
    this._stored -= amount;
    this._holders.credit(receiver, amount);
    return amount;
  }
}

export class MemoryDebtToken implements DebtToken {
  private readonly _holders = new Balances();
  private _totalSupply = 0n;

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Account): bigint {
    return this._holders.balanceOf(account);
  }

  mint(account: Account, amount: bigint): void {
    this._holders.credit(account, amount);
    this._totalSupply += amount;
  }

  burn(payer: Account, amount: bigint): void {
    this._holders.debit(payer, amount);
    this._totalSupply -= amount;
  }
}
