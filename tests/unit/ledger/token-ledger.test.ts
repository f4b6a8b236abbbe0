import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryTokenLedger } from '../../../src/ledger/token-ledger';
import { ACCOUNTS, expectEngineError } from '../../helpers';

describe('InMemoryTokenLedger', () => {
  let ledger: InMemoryTokenLedger;

  beforeEach(() => {
    ledger = new InMemoryTokenLedger();
  });

  it('tracks balances and total supply', () => {
    ledger.credit(ACCOUNTS.alice, 500n);
    ledger.credit(ACCOUNTS.bob, 250n);
    ledger.debit(ACCOUNTS.alice, 100n);

    expect(ledger.balanceOf(ACCOUNTS.alice)).toBe(400n);
    expect(ledger.balanceOf(ACCOUNTS.carol)).toBe(0n);
    expect(ledger.totalSupply()).toBe(650n);
  });

  it('registers accounts without touching balances', () => {
    ledger.credit(ACCOUNTS.alice, 5n);
    ledger.register(ACCOUNTS.alice);
    ledger.register(ACCOUNTS.bob);

    expect(ledger.isRegistered(ACCOUNTS.bob)).toBe(true);
    expect(ledger.balanceOf(ACCOUNTS.alice)).toBe(5n);
  });

  it('refuses to overdraw', async () => {
    ledger.credit(ACCOUNTS.alice, 10n);
    await expectEngineError(() => ledger.debit(ACCOUNTS.alice, 11n), 'InsufficientBalance');
    expect(ledger.balanceOf(ACCOUNTS.alice)).toBe(10n);
    expect(ledger.totalSupply()).toBe(10n);
  });

  it('rejects negative amounts', () => {
    expect(() => ledger.credit(ACCOUNTS.alice, -1n)).toThrow(RangeError);
    expect(() => ledger.debit(ACCOUNTS.alice, -1n)).toThrow(RangeError);
  });
});
