import { Decimal } from 'decimal.js';
import { InsufficientBalanceError, InvalidConfigurationError, UnknownAssetError } from '../errors';
import { ZERO, fixed, floorMulInt } from '../utils/fixed-point';

export interface CommissionRates {
  deposit: Decimal;
  withdraw: Decimal;
}

export const MAX_COMMISSION_RATE = fixed('0.05');
export const DEFAULT_COMMISSION_RATES: CommissionRates = {
  deposit: fixed('0.0001'),
  withdraw: fixed('0.0001'),
};

interface CommissionEntry {
  rates: CommissionRates;
  /** Accrued commission in stable units. */
  accrued: bigint;
}

export function validateCommissionRates(rates: CommissionRates): void {
  for (const [side, rate] of Object.entries(rates)) {
    if (rate.lt(ZERO) || rate.gt(MAX_COMMISSION_RATE)) {
      throw new InvalidConfigurationError(`${side} commission must be within [0, 0.05]`, {
        side,
        rate: rate.toString(),
      });
    }
  }
}

/**
 * Deposit/withdraw commission rates per accepted asset, and what they earned.
 */
export class CommissionSchedule {
  private readonly entries = new Map<string, CommissionEntry>();

  register(assetId: string, rates: CommissionRates = DEFAULT_COMMISSION_RATES): void {
    if (this.entries.has(assetId)) {
      throw new InvalidConfigurationError(`commission for ${assetId} already registered`, { assetId });
    }
    validateCommissionRates(rates);
    this.entries.set(assetId, { rates, accrued: 0n });
  }

  has(assetId: string): boolean {
    return this.entries.has(assetId);
  }

  rates(assetId: string): CommissionRates {
    return this.entry(assetId).rates;
  }

  setRates(assetId: string, rates: CommissionRates): void {
    const entry = this.entry(assetId);
    validateCommissionRates(rates);
    entry.rates = rates;
  }

  /**
   * Commission charged on a gross stable notional, floored.
   */
  charge(rate: Decimal, grossStable: bigint): bigint {
    return floorMulInt(rate, grossStable);
  }

  book(assetId: string, amount: bigint): void {
    this.entry(assetId).accrued += amount;
  }

  reverse(assetId: string, amount: bigint): void {
    const entry = this.entry(assetId);
    entry.accrued = entry.accrued > amount ? entry.accrued - amount : 0n;
  }

  accrued(assetId: string): bigint {
    return this.entry(assetId).accrued;
  }

  totalAccrued(): bigint {
    let total = 0n;
    for (const entry of this.entries.values()) {
      total += entry.accrued;
    }
    return total;
  }

  /**
   * Removes `amount` of accrued commission, draining assets in registration order.
   */
  drain(amount: bigint): Array<{ assetId: string; amount: bigint }> {
    const total = this.totalAccrued();
    if (amount > total) {
      throw new InsufficientBalanceError(`only ${total} commission accrued`, {
        requested: amount.toString(),
        accrued: total.toString(),
      });
    }
    const drained: Array<{ assetId: string; amount: bigint }> = [];
    let remaining = amount;
    for (const [assetId, entry] of this.entries) {
      if (remaining === 0n) break;
      const take = entry.accrued < remaining ? entry.accrued : remaining;
      if (take > 0n) {
        entry.accrued -= take;
        remaining -= take;
        drained.push({ assetId, amount: take });
      }
    }
    return drained;
  }

  assetIds(): string[] {
    return [...this.entries.keys()];
  }

  private entry(assetId: string): CommissionEntry {
    const entry = this.entries.get(assetId);
    if (!entry) {
      throw new UnknownAssetError(assetId);
    }
    return entry;
  }
}
