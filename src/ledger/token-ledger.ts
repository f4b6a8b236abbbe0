import { InsufficientBalanceError } from '../errors';

/**
 * Balance ledger of the stable asset. Minting credits, burning debits.
 */
export interface TokenLedger {
  register(accountId: string): void;
  isRegistered(accountId: string): boolean;
  balanceOf(accountId: string): bigint;
  credit(accountId: string, amount: bigint): void;
  /** Throws InsufficientBalance when the debit would underflow. */
  debit(accountId: string, amount: bigint): void;
  totalSupply(): bigint;
}

export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new Map<string, bigint>();
  private supply = 0n;

  register(accountId: string): void {
    if (!this.balances.has(accountId)) {
      this.balances.set(accountId, 0n);
    }
  }

  isRegistered(accountId: string): boolean {
    return this.balances.has(accountId);
  }

  balanceOf(accountId: string): bigint {
    return this.balances.get(accountId) ?? 0n;
  }

  credit(accountId: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Credit amount must not be negative');
    }
    this.balances.set(accountId, this.balanceOf(accountId) + amount);
    this.supply += amount;
  }

  debit(accountId: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('Debit amount must not be negative');
    }
    const balance = this.balanceOf(accountId);
    if (balance < amount) {
      throw new InsufficientBalanceError(`${accountId} holds ${balance}`, {
        accountId,
        balance: balance.toString(),
        requested: amount.toString(),
      });
    }
    this.balances.set(accountId, balance - amount);
    this.supply -= amount;
  }

  totalSupply(): bigint {
    return this.supply;
  }
}
