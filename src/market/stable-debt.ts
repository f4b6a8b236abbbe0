import { InsufficientBalanceError } from '../errors';
import type { TokenLedger } from '../ledger/token-ledger';
import { minBigInt } from '../utils/fixed-point';
import { Asset } from './asset';

// The stable asset is never supplied by accounts. Its supplied pool stands
// for the system's own liability: it grows with every stable borrow and
// shrinks with every repayment, so supplied + reserved always equals debt.

export function expandStableSupply(asset: Asset, amount: bigint): void {
  asset.supplied.deposit(asset.supplied.amountToShares(amount, false), amount);
}

/**
 * Retires `amount` of liability, from the supplied pool first and the
 * reserve for whatever interest was routed there.
 */
export function contractStableSupply(asset: Asset, amount: bigint): void {
  const pool = asset.supplied;
  const fromSupply = amount < pool.balance ? amount : pool.balance;
  if (fromSupply > 0n) {
    const shares =
      fromSupply === pool.balance
        ? pool.shares
        : minBigInt(pool.amountToShares(fromSupply, true), pool.shares);
    pool.withdraw(shares, fromSupply);
  }
  const fromReserve = amount - fromSupply;
  asset.reserved = asset.reserved > fromReserve ? asset.reserved - fromReserve : 0n;
}

/**
 * Stable mints and burns collected during one market operation. They reach
 * the token ledger only once every check has passed, netted per account.
 */
export class StableFlows {
  private readonly net = new Map<string, bigint>();

  mint(accountId: string, amount: bigint): void {
    this.net.set(accountId, (this.net.get(accountId) ?? 0n) + amount);
  }

  burn(accountId: string, amount: bigint): void {
    this.net.set(accountId, (this.net.get(accountId) ?? 0n) - amount);
  }

  assertCovered(ledger: TokenLedger): void {
    for (const [accountId, amount] of this.net) {
      const balance = ledger.balanceOf(accountId);
      if (amount < 0n && balance < -amount) {
        throw new InsufficientBalanceError(`${accountId} holds ${balance}`, {
          accountId,
          balance: balance.toString(),
          requested: (-amount).toString(),
        });
      }
    }
  }

  settle(ledger: TokenLedger): void {
    this.assertCovered(ledger);
    for (const [accountId, amount] of this.net) {
      if (amount < 0n) {
        ledger.debit(accountId, -amount);
      }
    }
    for (const [accountId, amount] of this.net) {
      if (amount > 0n) {
        if (!ledger.isRegistered(accountId)) {
          ledger.register(accountId);
        }
        ledger.credit(accountId, amount);
      }
    }
  }
}
