import { Decimal } from 'decimal.js';

// ============================================================================
// Fixed-point rate arithmetic
// ============================================================================
//
// Rates are 27-decimal fixed-point values. They are carried as decimal.js
// instances from a high-precision clone so intermediate products are exact
// before each explicit rounding step. Balances and shares stay bigint.

export const FIXED_DECIMALS = 27;
export const FIXED_SCALE = 10n ** BigInt(FIXED_DECIMALS);
export const MS_PER_YEAR = 31_536_000_000;

export const Fixed = Decimal.clone({
  precision: 100,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -80,
  toExpPos: 80,
});

export type Numeric = Decimal.Value | bigint;

export function fixed(value: Numeric): Decimal {
  return new Fixed(typeof value === 'bigint' ? value.toString() : value);
}

export const ZERO = fixed(0);
export const ONE = fixed(1);

/**
 * Builds a fixed-point value from its raw 27-decimal integer representation.
 */
export function fromRaw(raw: bigint): Decimal {
  return fixed(raw).div(fixed(FIXED_SCALE));
}

/**
 * Fixed-point multiplication, rounded half-up to 27 places.
 */
export function fixedMul(a: Decimal, b: Decimal): Decimal {
  return fixed(a).mul(b).toDecimalPlaces(FIXED_DECIMALS, Decimal.ROUND_HALF_UP);
}

/**
 * Square-and-multiply exponentiation with a rounded multiply at every step.
 */
export function fixedPow(base: Decimal, exponent: bigint | number): Decimal {
  let e = BigInt(exponent);
  if (e < 0n) {
    throw new RangeError('Negative exponent');
  }
  let x = fixed(base);
  let result = ONE;
  while (e > 0n) {
    if (e & 1n) {
      result = fixedMul(result, x);
    }
    e >>= 1n;
    if (e > 0n) {
      x = fixedMul(x, x);
    }
  }
  return result;
}

/**
 * floor(numerator / denominator) as a 27-decimal value.
 */
export function ratioFixed(numerator: bigint, denominator: bigint): Decimal {
  if (denominator === 0n) {
    throw new RangeError('Division by zero');
  }
  return fromRaw((numerator * FIXED_SCALE) / denominator);
}

/**
 * Integer product of a rate and an amount, rounded half-up.
 */
export function roundMulInt(rate: Decimal, amount: bigint): bigint {
  return toBigIntFloor(fixed(amount).mul(rate).toDecimalPlaces(0, Decimal.ROUND_HALF_UP));
}

/**
 * Integer product of a rate and an amount, floored.
 */
export function floorMulInt(rate: Decimal, amount: bigint): bigint {
  return toBigIntFloor(fixed(amount).mul(rate));
}

export function toBigIntFloor(value: Decimal): bigint {
  return BigInt(fixed(value).toDecimalPlaces(0, Decimal.ROUND_FLOOR).toFixed(0));
}

export function mulDivFloor(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) {
    throw new RangeError('Division by zero');
  }
  return (a * b) / c;
}

export function mulDivCeil(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) {
    throw new RangeError('Division by zero');
  }
  return (a * b + c - 1n) / c;
}

export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Parses a non-negative integer amount from a decimal string, number or bigint.
 */
export function parseAmount(value: string | number | bigint): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n) {
      throw new RangeError(`Negative amount: ${value}`);
    }
    return value;
  }
  const text = String(value).trim();
  if (!/^\d+$/.test(text)) {
    throw new RangeError(`Invalid amount: ${text}`);
  }
  return BigInt(text);
}
