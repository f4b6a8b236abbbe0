import { describe, it, expect } from 'vitest';
import { Pool } from '../../../src/market/pool';
import { expectEngineError } from '../../helpers';

describe('Pool', () => {
  it('issues shares one to one while empty', () => {
    expect(new Pool().amountToShares(100n, false)).toBe(100n);
    expect(new Pool().amountToShares(100n, true)).toBe(100n);
  });

  it('converts amounts and shares in either rounding direction', () => {
    const pool = new Pool(100n, 150n);
    expect(pool.amountToShares(10n, false)).toBe(6n);
    expect(pool.amountToShares(10n, true)).toBe(7n);
    expect(pool.sharesToAmount(10n, false)).toBe(15n);
    expect(pool.sharesToAmount(3n, false)).toBe(4n);
    expect(pool.sharesToAmount(3n, true)).toBe(5n);
  });

  it('values all remaining shares at the whole balance', () => {
    expect(new Pool(100n, 151n).sharesToAmount(100n, false)).toBe(151n);
  });

  it('refuses to withdraw more than it holds', async () => {
    const pool = new Pool(10n, 10n);
    await expectEngineError(() => pool.withdraw(11n, 10n), 'InsufficientBalance');
    await expectEngineError(() => pool.withdraw(10n, 11n), 'InsufficientBalance');
    expect(pool.shares).toBe(10n);
  });

  it('clones independently', () => {
    const pool = new Pool(10n, 20n);
    const copy = pool.clone();
    copy.deposit(5n, 5n);
    expect(pool.balance).toBe(20n);
    expect(copy.balance).toBe(25n);
  });
});
