import type { Identity } from "../utils/identity.js";
import type { Registry } from "./types.js";

export class InMemoryRegistry implements Registry {
  private verified = new Set<Identity>();
  private owners = new Map<bigint, Identity>();

  verify(...identities: Identity[]): void {
    for (const identity of identities) this.verified.add(identity);
  }

  revoke(identity: Identity): void {
    this.verified.delete(identity);
  }

  setAssetOwner(assetId: bigint, owner: Identity | null): void {
    if (owner === null) {
      this.owners.delete(assetId);
    } else {
      this.owners.set(assetId, owner);
    }
  }

  async isVerified(identity: Identity): Promise<boolean> {
    return this.verified.has(identity);
  }

  async getAssetOwner(assetId: bigint): Promise<Identity | null> {
    return this.owners.get(assetId) ?? null;
  }
}
