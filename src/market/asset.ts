import { Decimal } from 'decimal.js';
import {
  MS_PER_YEAR,
  ONE,
  ZERO,
  fixedMul,
  fixedPow,
  floorMulInt,
  ratioFixed,
  roundMulInt,
} from '../utils/fixed-point';
import { type AssetConfig, type AssetConfigInput, describeAssetConfig } from './asset-config';
import { Pool } from './pool';

export interface PoolView {
  shares: bigint;
  balance: bigint;
}

export interface AssetView {
  assetId: string;
  isStable: boolean;
  enabled: boolean;
  config: AssetConfigInput;
  supplied: PoolView;
  borrowed: PoolView;
  reserved: bigint;
  available: bigint;
  utilization: Decimal;
  borrowApr: Decimal;
  supplyApr: Decimal;
  lastUpdateTimestamp: number;
}

/**
 * Per-asset pools with lazily compounded interest.
 */
export class Asset {
  constructor(
    public readonly id: string,
    public config: AssetConfig,
    public readonly isStable: boolean,
    public lastUpdateTimestamp: number,
    public enabled: boolean = true,
    public readonly supplied: Pool = new Pool(),
    public readonly borrowed: Pool = new Pool(),
    public reserved: bigint = 0n
  ) {}

  /**
   * borrowed / supplied, capped at 1. The stable asset's supply mirrors its
   * own debt, so it is fully utilized whenever anything is borrowed.
   */
  utilization(): Decimal {
    if (this.borrowed.balance === 0n) {
      return ZERO;
    }
    if (this.isStable || this.supplied.balance <= this.borrowed.balance) {
      return ONE;
    }
    return ratioFixed(this.borrowed.balance, this.supplied.balance);
  }

  /**
   * Per-millisecond compounding factor. Exactly 1 when nothing is borrowed.
   */
  rate(): Decimal {
    if (this.borrowed.balance === 0n) {
      return ONE;
    }
    const { baseRate, slope1, slope2, kink } = this.config.curve;
    const utilization = this.utilization();
    const increment = utilization.lte(kink)
      ? baseRate.plus(fixedMul(utilization, slope1))
      : baseRate.plus(fixedMul(kink, slope1)).plus(fixedMul(utilization.minus(kink), slope2));
    return ONE.plus(increment);
  }

  borrowApr(): Decimal {
    if (this.borrowed.balance === 0n) {
      return ZERO;
    }
    return fixedPow(this.rate(), MS_PER_YEAR).minus(ONE);
  }

  supplyApr(): Decimal {
    if (this.supplied.balance === 0n || this.borrowed.balance === 0n) {
      return ZERO;
    }
    const interest = roundMulInt(this.borrowApr(), this.borrowed.balance);
    const supplyInterest = floorMulInt(ONE.minus(this.config.reserveFactor), interest);
    return ratioFixed(supplyInterest, this.supplied.balance);
  }

  /**
   * Liquidity not lent out: supplied plus reserve, less borrowed.
   */
  available(): bigint {
    return this.supplied.balance + this.reserved - this.borrowed.balance;
  }

  /**
   * Compounds interest up to `now`. Borrowers' debt grows; suppliers receive
   * it less the reserve part, or the reserve takes all of it when nobody supplies.
   */
  accrue(now: number): void {
    const elapsed = now - this.lastUpdateTimestamp;
    if (elapsed <= 0) {
      return;
    }
    const rate = this.rate();
    this.lastUpdateTimestamp = now;
    if (this.borrowed.balance === 0n) {
      return;
    }

    const interest = roundMulInt(fixedPow(rate, elapsed), this.borrowed.balance) - this.borrowed.balance;
    if (interest <= 0n) {
      return;
    }
    const reservePart = floorMulInt(this.config.reserveFactor, interest);
    if (this.supplied.shares > 0n) {
      this.supplied.balance += interest - reservePart;
      this.reserved += reservePart;
    } else {
      this.reserved += interest;
    }
    this.borrowed.balance += interest;
  }

  clone(): Asset {
    return new Asset(
      this.id,
      this.config,
      this.isStable,
      this.lastUpdateTimestamp,
      this.enabled,
      this.supplied.clone(),
      this.borrowed.clone(),
      this.reserved
    );
  }

  toView(): AssetView {
    return {
      assetId: this.id,
      isStable: this.isStable,
      enabled: this.enabled,
      config: describeAssetConfig(this.config),
      supplied: { shares: this.supplied.shares, balance: this.supplied.balance },
      borrowed: { shares: this.borrowed.shares, balance: this.borrowed.balance },
      reserved: this.reserved,
      available: this.available(),
      utilization: this.utilization(),
      borrowApr: this.borrowApr(),
      supplyApr: this.supplyApr(),
      lastUpdateTimestamp: this.lastUpdateTimestamp,
    };
  }
}
