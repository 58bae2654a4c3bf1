import { AuctionError, AuctionErrorCode } from "./errors";
import { Account } from "./types";

export const ROOT = "ROOT";

// Roles are named after the operation they gate, e.g. "setLine"
export class AccessControl {
  private readonly _members = new Map<string, Set<Account>>();

  constructor(root: Account) {
    this._add(ROOT, root);
  }

  hasRole(role: string, account: Account): boolean {
    return this._members.get(role)?.has(account.toLowerCase()) ?? false;
  }

  auth(role: string, account: Account): void {
    if (!this.hasRole(role, account)) {
      throw new AuctionError(AuctionErrorCode.Unauthorized, `${account} lacks role ${role}`);
    }
  }

  grantRole(sender: Account, role: string, account: Account): void {
    this.auth(ROOT, sender);
    this._add(role, account);
  }

  grantRoles(sender: Account, roles: string[], account: Account): void {
    this.auth(ROOT, sender);
    for (const role of roles) {
      this._add(role, account);
    }
  }

  revokeRole(sender: Account, role: string, account: Account): void {
    this.auth(ROOT, sender);
    this._members.get(role)?.delete(account.toLowerCase());
  }

  private _add(role: string, account: Account): void {
    const members = this._members.get(role) ?? new Set<Account>();
    members.add(account.toLowerCase());
    this._members.set(role, members);
  }
}
