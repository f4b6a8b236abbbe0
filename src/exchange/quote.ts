import { Decimal } from 'decimal.js';
import { BelowMinimumExchangeError, InvalidConfigurationError, SlippageExceededError } from '../errors';
import type { Price } from '../oracle/types';
import { ONE, floorMulInt, pow10 } from '../utils/fixed-point';

export const STABLE_DECIMALS = 18;

/**
 * Rate the caller expects, with the tolerated deviation in the same decimals.
 */
export interface ExpectedRate {
  multiplier: bigint;
  decimals: number;
  slippage: bigint;
}

export interface QuoteParams {
  /** Stable value of one smallest native unit. */
  rate: Price;
  spread: Decimal;
  commission: Decimal;
}

export interface BuyQuote {
  nativeAmount: bigint;
  grossStable: bigint;
  stableAmount: bigint;
  commission: bigint;
  spread: Decimal;
}

export interface SellQuote {
  stableAmount: bigint;
  grossNative: bigint;
  nativeAmount: bigint;
  /** Commission in stable units. */
  commission: bigint;
  spread: Decimal;
}

// ============================================================================
// Conversions
// ============================================================================

export function nativeToStable(nativeAmount: bigint, rate: Price): bigint {
  const shift = rate.decimals - STABLE_DECIMALS;
  return shift >= 0
    ? (nativeAmount * rate.multiplier) / pow10(shift)
    : nativeAmount * rate.multiplier * pow10(-shift);
}

export function stableToNative(stableAmount: bigint, rate: Price): bigint {
  const shift = rate.decimals - STABLE_DECIMALS;
  return shift >= 0
    ? (stableAmount * pow10(shift)) / rate.multiplier
    : stableAmount / (rate.multiplier * pow10(-shift));
}

/**
 * Converts an amount between decimal scales, flooring when scaling down.
 */
export function convertDecimals(amount: bigint, from: number, to: number): bigint {
  if (from === to) return amount;
  return from < to ? amount * pow10(to - from) : amount / pow10(from - to);
}

// ============================================================================
// Quotes
// ============================================================================

function netFactor(params: QuoteParams): Decimal {
  return ONE.minus(params.spread).minus(params.commission);
}

/**
 * Stable amount minted for `nativeAmount`. Spread and commission are both
 * charged on the gross notional.
 */
export function predictBuy(nativeAmount: bigint, params: QuoteParams): BuyQuote {
  const grossStable = nativeToStable(nativeAmount, params.rate);
  const stableAmount = floorMulInt(netFactor(params), grossStable);
  if (stableAmount <= 0n) {
    throw new BelowMinimumExchangeError({ nativeAmount: nativeAmount.toString() });
  }
  return {
    nativeAmount,
    grossStable,
    stableAmount,
    commission: floorMulInt(params.commission, grossStable),
    spread: params.spread,
  };
}

/**
 * Native amount paid out for burning `stableAmount`.
 */
export function predictSell(stableAmount: bigint, params: QuoteParams): SellQuote {
  const grossNative = stableToNative(stableAmount, params.rate);
  const nativeAmount = floorMulInt(netFactor(params), grossNative);
  if (nativeAmount <= 0n) {
    throw new BelowMinimumExchangeError({ stableAmount: stableAmount.toString() });
  }
  return {
    stableAmount,
    grossNative,
    nativeAmount,
    commission: floorMulInt(params.commission, stableAmount),
    spread: params.spread,
  };
}

/**
 * Owner mint backed by native coin at a collateral ratio given in percent.
 */
export function predictMint(nativeAmount: bigint, rate: Price, collateralRatio: number): bigint {
  if (!Number.isInteger(collateralRatio) || collateralRatio <= 0) {
    throw new InvalidConfigurationError('collateral ratio must be a positive integer', {
      collateralRatio,
    });
  }
  const amount = (nativeToStable(nativeAmount, rate) * 100n) / BigInt(collateralRatio);
  if (amount <= 0n) {
    throw new BelowMinimumExchangeError({ nativeAmount: nativeAmount.toString() });
  }
  return amount;
}

// ============================================================================
// Slippage
// ============================================================================

/**
 * Both rates are brought to the larger decimal count before comparing.
 */
export function checkSlippage(actual: Price, expected: ExpectedRate): void {
  const decimals = Math.max(actual.decimals, expected.decimals);
  const actualScaled = actual.multiplier * pow10(decimals - actual.decimals);
  const expectedScaled = expected.multiplier * pow10(decimals - expected.decimals);
  const tolerance = expected.slippage * pow10(decimals - expected.decimals);
  const deviation =
    actualScaled > expectedScaled ? actualScaled - expectedScaled : expectedScaled - actualScaled;

  if (deviation > tolerance) {
    throw new SlippageExceededError({
      actualMultiplier: actual.multiplier.toString(),
      actualDecimals: actual.decimals,
      expectedMultiplier: expected.multiplier.toString(),
      expectedDecimals: expected.decimals,
      slippage: expected.slippage.toString(),
    });
  }
}
