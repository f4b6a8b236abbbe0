import { Decimal } from 'decimal.js';
import { InvalidConfigurationError } from '../errors';
import { FIXED_DECIMALS, ONE, ZERO, fixed } from '../utils/fixed-point';

/**
 * Piecewise-linear curve of per-millisecond interest over utilization.
 */
export interface InterestCurve {
  baseRate: Decimal;
  slope1: Decimal;
  slope2: Decimal;
  kink: Decimal;
}

export interface AssetConfig {
  decimals: number;
  curve: InterestCurve;
  /** Share of borrower interest kept as reserve. */
  reserveFactor: Decimal;
  /** Share of collateral value that counts toward borrowing power. */
  collateralFactor: Decimal;
  canDeposit: boolean;
  canWithdraw: boolean;
  canUseAsCollateral: boolean;
  canBorrow: boolean;
}

/** String form, as taken over the API or from JSON. */
export interface AssetConfigInput {
  decimals: number;
  curve: {
    baseRate: string;
    slope1: string;
    slope2: string;
    kink: string;
  };
  reserveFactor: string;
  collateralFactor: string;
  canDeposit?: boolean;
  canWithdraw?: boolean;
  canUseAsCollateral?: boolean;
  canBorrow?: boolean;
}

export const MAX_ASSET_DECIMALS = 37;

function parseDecimal(value: string, field: string): Decimal {
  try {
    return fixed(value);
  } catch {
    throw new InvalidConfigurationError(`${field} is not a number`, { field, value });
  }
}

export function parseAssetConfig(input: AssetConfigInput): AssetConfig {
  const config: AssetConfig = {
    decimals: input.decimals,
    curve: {
      baseRate: parseDecimal(input.curve.baseRate, 'curve.baseRate'),
      slope1: parseDecimal(input.curve.slope1, 'curve.slope1'),
      slope2: parseDecimal(input.curve.slope2, 'curve.slope2'),
      kink: parseDecimal(input.curve.kink, 'curve.kink'),
    },
    reserveFactor: parseDecimal(input.reserveFactor, 'reserveFactor'),
    collateralFactor: parseDecimal(input.collateralFactor, 'collateralFactor'),
    canDeposit: input.canDeposit ?? true,
    canWithdraw: input.canWithdraw ?? true,
    canUseAsCollateral: input.canUseAsCollateral ?? true,
    canBorrow: input.canBorrow ?? true,
  };
  validateAssetConfig(config);
  return config;
}

export function validateAssetConfig(config: AssetConfig): void {
  if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > MAX_ASSET_DECIMALS) {
    throw new InvalidConfigurationError(`decimals must be within [0, ${MAX_ASSET_DECIMALS}]`, {
      decimals: config.decimals,
    });
  }
  const { baseRate, slope1, slope2, kink } = config.curve;
  for (const [field, value] of [
    ['baseRate', baseRate],
    ['slope1', slope1],
    ['slope2', slope2],
  ] as const) {
    if (value.lt(ZERO) || value.decimalPlaces() > FIXED_DECIMALS) {
      throw new InvalidConfigurationError(`${field} must be non-negative with at most 27 decimals`, {
        field,
        value: value.toString(),
      });
    }
  }
  if (kink.lt(ZERO) || kink.gt(ONE)) {
    throw new InvalidConfigurationError('kink must be within [0, 1]', { kink: kink.toString() });
  }
  if (config.reserveFactor.lt(ZERO) || config.reserveFactor.gte(ONE)) {
    throw new InvalidConfigurationError('reserve factor must be within [0, 1)', {
      reserveFactor: config.reserveFactor.toString(),
    });
  }
  if (config.collateralFactor.lt(ZERO) || config.collateralFactor.gte(ONE)) {
    throw new InvalidConfigurationError('collateral factor must be within [0, 1)', {
      collateralFactor: config.collateralFactor.toString(),
    });
  }
}

export function describeAssetConfig(config: AssetConfig): AssetConfigInput {
  return {
    decimals: config.decimals,
    curve: {
      baseRate: config.curve.baseRate.toFixed(),
      slope1: config.curve.slope1.toFixed(),
      slope2: config.curve.slope2.toFixed(),
      kink: config.curve.kink.toFixed(),
    },
    reserveFactor: config.reserveFactor.toFixed(),
    collateralFactor: config.collateralFactor.toFixed(),
    canDeposit: config.canDeposit,
    canWithdraw: config.canWithdraw,
    canUseAsCollateral: config.canUseAsCollateral,
    canBorrow: config.canBorrow,
  };
}

/**
 * Curve of the stable asset: a flat rate compounding to about 2.49% a year.
 */
export function stableAssetConfig(decimals: number): AssetConfig {
  return {
    decimals,
    curve: {
      baseRate: fixed('0.000000000000780000000000002'),
      slope1: ZERO,
      slope2: ZERO,
      kink: fixed('0.8'),
    },
    reserveFactor: fixed('0.2'),
    collateralFactor: ZERO,
    canDeposit: false,
    canWithdraw: false,
    canUseAsCollateral: false,
    canBorrow: true,
  };
}
