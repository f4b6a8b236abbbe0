export type ShareMap = Map<string, bigint>;

/**
 * Share balances of one account. Zero entries are removed, never stored.
 */
export class Account {
  constructor(
    public readonly id: string,
    public readonly supplied: ShareMap = new Map(),
    public readonly collateral: ShareMap = new Map(),
    public readonly borrowed: ShareMap = new Map()
  ) {}

  static shares(map: ShareMap, assetId: string): bigint {
    return map.get(assetId) ?? 0n;
  }

  static add(map: ShareMap, assetId: string, shares: bigint): void {
    if (shares === 0n) return;
    map.set(assetId, Account.shares(map, assetId) + shares);
  }

  static subtract(map: ShareMap, assetId: string, shares: bigint): void {
    const remaining = Account.shares(map, assetId) - shares;
    if (remaining < 0n) {
      throw new RangeError(`Share balance for ${assetId} would go negative`);
    }
    if (remaining === 0n) {
      map.delete(assetId);
    } else {
      map.set(assetId, remaining);
    }
  }

  /** Distinct assets held as collateral or debt. */
  positionAssetCount(): number {
    return new Set([...this.collateral.keys(), ...this.borrowed.keys()]).size;
  }

  touchedAssetIds(): string[] {
    return [...new Set([...this.supplied.keys(), ...this.collateral.keys(), ...this.borrowed.keys()])];
  }

  isEmpty(): boolean {
    return this.supplied.size === 0 && this.collateral.size === 0 && this.borrowed.size === 0;
  }

  clone(): Account {
    return new Account(this.id, new Map(this.supplied), new Map(this.collateral), new Map(this.borrowed));
  }
}
