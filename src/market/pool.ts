import { InsufficientBalanceError } from '../errors';
import { mulDivCeil, mulDivFloor } from '../utils/fixed-point';

/**
 * Share-accounted balance. Shares are never worth less than one unit each.
 */
export class Pool {
  constructor(
    public shares: bigint = 0n,
    public balance: bigint = 0n
  ) {}

  amountToShares(amount: bigint, roundUp: boolean): bigint {
    if (this.balance === 0n) {
      return amount;
    }
    return roundUp ? mulDivCeil(this.shares, amount, this.balance) : mulDivFloor(this.shares, amount, this.balance);
  }

  sharesToAmount(shares: bigint, roundUp: boolean): bigint {
    if (shares >= this.shares) {
      return this.balance;
    }
    if (this.shares === 0n) {
      return 0n;
    }
    return roundUp ? mulDivCeil(this.balance, shares, this.shares) : mulDivFloor(this.balance, shares, this.shares);
  }

  deposit(shares: bigint, amount: bigint): void {
    this.shares += shares;
    this.balance += amount;
  }

  withdraw(shares: bigint, amount: bigint): void {
    if (shares > this.shares || amount > this.balance) {
      throw new InsufficientBalanceError('pool cannot cover withdrawal', {
        shares: shares.toString(),
        poolShares: this.shares.toString(),
        amount: amount.toString(),
        poolBalance: this.balance.toString(),
      });
    }
    this.shares -= shares;
    this.balance -= amount;
  }

  clone(): Pool {
    return new Pool(this.shares, this.balance);
  }
}
