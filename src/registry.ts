import { AuctionError, AuctionErrorCode } from "./errors";
import { u128 } from "./numbers";
import { Auction, VaultId } from "./types";

// Open auctions by vault id. A vault without an entry is not under auction.
export class AuctionRegistry {
  private readonly _auctions = new Map<VaultId, Auction>();

  has(vaultId: VaultId): boolean {
    return this._auctions.has(vaultId);
  }

  find(vaultId: VaultId): Readonly<Auction> | undefined {
    const auction = this._auctions.get(vaultId);
    return auction ? Object.freeze({ ...auction }) : undefined;
  }

  get(vaultId: VaultId): Readonly<Auction> {
    const auction = this.find(vaultId);
    if (!auction) {
      throw new AuctionError(AuctionErrorCode.VaultNotAuctioned, vaultId);
    }
    return auction;
  }

  insert(vaultId: VaultId, auction: Auction): Readonly<Auction> {
    if (this._auctions.has(vaultId)) {
      throw new AuctionError(AuctionErrorCode.VaultAlreadyAuctioned, vaultId);
    }
    this._auctions.set(vaultId, { ...auction, art: u128(auction.art, "art"), ink: u128(auction.ink, "ink") });
    return this.get(vaultId);
  }

  update(vaultId: VaultId, art: bigint, ink: bigint): Readonly<Auction> {
    const auction = this.get(vaultId);
    this._auctions.set(vaultId, { ...auction, art: u128(art, "art"), ink: u128(ink, "ink") });
    return this.get(vaultId);
  }

  remove(vaultId: VaultId): void {
    if (!this._auctions.delete(vaultId)) {
      throw new AuctionError(AuctionErrorCode.VaultNotAuctioned, vaultId);
    }
  }

  list(): [VaultId, Readonly<Auction>][] {
    return [...this._auctions.keys()].map((vaultId) => [vaultId, this.get(vaultId)]);
  }
}
