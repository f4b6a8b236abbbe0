import { describe, it, expect, beforeEach } from 'vitest';
import { CommissionSchedule } from '../../../src/treasury/commission';
import { fixed } from '../../../src/utils/fixed-point';
import { ASSETS, expectDecimalEquals, expectEngineError } from '../../helpers';

describe('CommissionSchedule', () => {
  let schedule: CommissionSchedule;

  beforeEach(() => {
    schedule = new CommissionSchedule();
    schedule.register(ASSETS.native);
    schedule.register(ASSETS.usdt, { deposit: fixed('0.001'), withdraw: fixed('0.002') });
  });

  it('applies default rates', () => {
    expectDecimalEquals(schedule.rates(ASSETS.native).deposit, '0.0001');
    expectDecimalEquals(schedule.rates(ASSETS.native).withdraw, '0.0001');
  });

  it('rejects duplicate registration and out-of-range rates', async () => {
    await expectEngineError(() => schedule.register(ASSETS.native), 'InvalidConfiguration');
    await expectEngineError(
      () => schedule.setRates(ASSETS.usdt, { deposit: fixed('0.06'), withdraw: fixed('0') }),
      'InvalidConfiguration'
    );
    expectDecimalEquals(schedule.rates(ASSETS.usdt).deposit, '0.001');
  });

  it('floors charged commission', () => {
    expect(schedule.charge(fixed('0.001'), 1999n)).toBe(1n);
    expect(schedule.charge(fixed('0.0001'), 10n ** 18n)).toBe(10n ** 14n);
  });

  it('books, reverses and totals accrued commission', () => {
    schedule.book(ASSETS.native, 300n);
    schedule.book(ASSETS.usdt, 200n);
    schedule.reverse(ASSETS.native, 100n);

    expect(schedule.accrued(ASSETS.native)).toBe(200n);
    expect(schedule.totalAccrued()).toBe(400n);
  });

  it('drains in registration order', () => {
    schedule.book(ASSETS.native, 300n);
    schedule.book(ASSETS.usdt, 200n);

    expect(schedule.drain(350n)).toEqual([
      { assetId: ASSETS.native, amount: 300n },
      { assetId: ASSETS.usdt, amount: 50n },
    ]);
    expect(schedule.totalAccrued()).toBe(150n);
  });

  it('refuses to drain more than accrued', async () => {
    schedule.book(ASSETS.native, 10n);
    await expectEngineError(() => schedule.drain(11n), 'InsufficientBalance');
    expect(schedule.accrued(ASSETS.native)).toBe(10n);
  });

  it('reports unknown assets', async () => {
    await expectEngineError(() => schedule.rates(ASSETS.eth), 'UnknownAsset');
  });
});
