import { Account } from './account';
import { Asset } from './asset';

/**
 * Working copy of the market for one operation. Records are cloned on first
 * access and only written back when the operation returns without throwing.
 */
export class MarketTransaction {
  private readonly assets = new Map<string, Asset>();
  private readonly accounts = new Map<string, Account>();
  private readonly addedAssetIds: string[] = [];

  constructor(private readonly store: MarketStore) {}

  asset(assetId: string): Asset | undefined {
    let asset = this.assets.get(assetId);
    if (!asset) {
      asset = this.store.peekAsset(assetId)?.clone();
      if (asset) {
        this.assets.set(assetId, asset);
      }
    }
    return asset;
  }

  addAsset(asset: Asset): void {
    this.assets.set(asset.id, asset);
    this.addedAssetIds.push(asset.id);
  }

  /** Loads an account, starting an empty one if it does not exist. */
  account(accountId: string): Account {
    let account = this.accounts.get(accountId);
    if (!account) {
      account = this.store.peekAccount(accountId)?.clone() ?? new Account(accountId);
      this.accounts.set(accountId, account);
    }
    return account;
  }

  assetIds(): string[] {
    return [...this.store.assetIds(), ...this.addedAssetIds];
  }

  touchedAssets(): Asset[] {
    return [...this.assets.values()];
  }

  touchedAccounts(): Account[] {
    return [...this.accounts.values()];
  }

  newAssetIds(): readonly string[] {
    return this.addedAssetIds;
  }
}

export class MarketStore {
  private readonly assets = new Map<string, Asset>();
  private readonly assetOrder: string[] = [];
  private readonly accounts = new Map<string, Account>();

  transaction<T>(fn: (tx: MarketTransaction) => T): T {
    const tx = new MarketTransaction(this);
    const result = fn(tx);
    this.commit(tx);
    return result;
  }

  /** Runs `fn` against a working copy that is thrown away. */
  simulate<T>(fn: (tx: MarketTransaction) => T): T {
    return fn(new MarketTransaction(this));
  }

  peekAsset(assetId: string): Asset | undefined {
    return this.assets.get(assetId);
  }

  peekAccount(accountId: string): Account | undefined {
    return this.accounts.get(accountId);
  }

  hasAsset(assetId: string): boolean {
    return this.assets.has(assetId);
  }

  assetIds(): string[] {
    return [...this.assetOrder];
  }

  accountIds(): string[] {
    return [...this.accounts.keys()];
  }

  private commit(tx: MarketTransaction): void {
    for (const asset of tx.touchedAssets()) {
      this.assets.set(asset.id, asset);
    }
    this.assetOrder.push(...tx.newAssetIds());
    for (const account of tx.touchedAccounts()) {
      if (account.isEmpty()) {
        this.accounts.delete(account.id);
      } else {
        this.accounts.set(account.id, account);
      }
    }
  }
}
