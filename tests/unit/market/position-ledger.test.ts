import { describe, it, expect, beforeEach } from 'vitest';
import { Account } from '../../../src/market/account';
import { Asset } from '../../../src/market/asset';
import { Pool } from '../../../src/market/pool';
import {
  borrowedBalance,
  collateralBalance,
  decreaseBorrowed,
  decreaseCollateral,
  decreaseSupplied,
  increaseBorrowed,
  increaseCollateral,
  increaseSupplied,
  suppliedBalance,
} from '../../../src/market/position-ledger';
import { ACCOUNTS, ASSETS, START_TIME, lendableAssetConfig } from '../../helpers';

describe('position primitives', () => {
  let asset: Asset;
  let account: Account;

  beforeEach(() => {
    // Share price 1.5 on both pools
    asset = new Asset(
      ASSETS.usdt,
      lendableAssetConfig(6),
      false,
      START_TIME,
      true,
      new Pool(100n, 150n),
      new Pool(100n, 150n)
    );
    account = new Account(ACCOUNTS.alice);
  });

  describe('supplied', () => {
    it('rounds new shares down', () => {
      expect(increaseSupplied(account, asset, 31n)).toEqual({ shares: 20n, amount: 31n });
      expect(asset.supplied.shares).toBe(120n);
      expect(asset.supplied.balance).toBe(181n);
    });

    it('rounds shares taken on a partial withdrawal up', () => {
      increaseSupplied(account, asset, 30n);
      expect(suppliedBalance(account, asset)).toBe(30n);

      expect(decreaseSupplied(account, asset, 15n)).toEqual({ shares: 10n, amount: 15n });
      expect(Account.shares(account.supplied, ASSETS.usdt)).toBe(10n);
    });

    it('caps a withdrawal at the held balance', () => {
      increaseSupplied(account, asset, 30n);
      expect(decreaseSupplied(account, asset, 1_000n)).toEqual({ shares: 20n, amount: 30n });
      expect(account.supplied.has(ASSETS.usdt)).toBe(false);
    });
  });

  describe('collateral', () => {
    beforeEach(() => {
      increaseSupplied(account, asset, 30n);
    });

    it('moves shares without touching the pool', () => {
      expect(increaseCollateral(account, asset)).toEqual({ shares: 20n, amount: 30n });
      expect(collateralBalance(account, asset)).toBe(30n);
      expect(account.supplied.size).toBe(0);
      expect(asset.supplied.shares).toBe(120n);
    });

    it('pledges a partial amount rounding shares up', () => {
      expect(increaseCollateral(account, asset, 10n)).toEqual({ shares: 7n, amount: 10n });
      expect(Account.shares(account.supplied, ASSETS.usdt)).toBe(13n);
    });

    it('releases a partial amount rounding shares down', () => {
      increaseCollateral(account, asset);
      expect(decreaseCollateral(account, asset, 10n)).toEqual({ shares: 6n, amount: 10n });
      expect(Account.shares(account.collateral, ASSETS.usdt)).toBe(14n);
    });
  });

  describe('borrowed', () => {
    it('rounds new debt shares up', () => {
      expect(increaseBorrowed(account, asset, 10n)).toEqual({ shares: 7n, amount: 10n });
      expect(asset.borrowed.shares).toBe(107n);
      expect(asset.borrowed.balance).toBe(160n);
    });

    it('rounds the owed amount up', () => {
      increaseBorrowed(account, asset, 10n);
      expect(borrowedBalance(account, asset)).toBe(11n);
    });

    it('caps repayment at what is owed', () => {
      increaseBorrowed(account, asset, 10n);
      expect(decreaseBorrowed(account, asset, 100n)).toEqual({ shares: 7n, amount: 11n });
      expect(account.borrowed.size).toBe(0);
    });

    it('rounds repaid shares down', () => {
      increaseBorrowed(account, asset, 10n);
      expect(decreaseBorrowed(account, asset, 5n)).toEqual({ shares: 3n, amount: 5n });
    });
  });
});
