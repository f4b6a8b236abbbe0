import { describe, it, expect } from 'vitest';
import {
  checkSlippage,
  convertDecimals,
  nativeToStable,
  predictBuy,
  predictMint,
  predictSell,
  stableToNative,
} from '../../../src/exchange/quote';
import { fixed } from '../../../src/utils/fixed-point';
import { NATIVE_PRICE, expectDecimalEquals, expectEngineError } from '../../helpers';

const TEN_NATIVE = 10n ** 25n;

describe('conversions', () => {
  it('converts native to stable through the oracle rate', () => {
    expect(nativeToStable(TEN_NATIVE, NATIVE_PRICE)).toBe(111_439_000_000_000_000_000n);
    expect(stableToNative(111_439_000_000_000_000_000n, NATIVE_PRICE)).toBe(TEN_NATIVE);
  });

  it('handles rates with fewer decimals than the stable asset', () => {
    const rate = { multiplier: 2n, decimals: 10 };
    expect(nativeToStable(5n, rate)).toBe(1_000_000_000n);
    expect(stableToNative(1_000_000_000n, rate)).toBe(5n);
  });

  it('rescales token amounts, flooring on the way down', () => {
    expect(convertDecimals(1_000_000n, 6, 18)).toBe(10n ** 18n);
    expect(convertDecimals(1_234_567_890_123n, 18, 6)).toBe(1n);
    expect(convertDecimals(42n, 8, 8)).toBe(42n);
  });
});

describe('predictBuy', () => {
  it('charges spread and commission on the gross notional', () => {
    const quote = predictBuy(TEN_NATIVE, {
      rate: NATIVE_PRICE,
      spread: fixed('0.001'),
      commission: fixed('0.0001'),
    });
    expect(quote.grossStable).toBe(111_439_000_000_000_000_000n);
    expect(quote.stableAmount).toBe(111_316_417_100_000_000_000n);
    expect(quote.commission).toBe(11_143_900_000_000_000n);
    expectDecimalEquals(quote.spread, '0.001');
  });

  it('rejects amounts that round to nothing', async () => {
    await expectEngineError(
      () => predictBuy(1n, { rate: NATIVE_PRICE, spread: fixed('0.001'), commission: fixed('0.0001') }),
      'BelowMinimumExchange'
    );
  });
});

describe('predictSell', () => {
  it('pays out native less spread and commission', () => {
    const quote = predictSell(111_316_417_100_000_000_000n, {
      rate: NATIVE_PRICE,
      spread: fixed('0.001'),
      commission: fixed('0.0002'),
    });
    expect(quote.grossNative).toBe(9_989_000_000_000_000_000_000_000n);
    expect(quote.nativeAmount).toBe(9_977_013_200_000_000_000_000_000n);
    expect(quote.commission).toBe(22_263_283_420_000_000n);
  });
});

describe('predictMint', () => {
  it('divides the native value by the collateral ratio', () => {
    expect(predictMint(TEN_NATIVE, NATIVE_PRICE, 100)).toBe(111_439_000_000_000_000_000n);
    expect(predictMint(TEN_NATIVE, NATIVE_PRICE, 210)).toBe(53_066_190_476_190_476_190n);
    expect(predictMint(TEN_NATIVE, NATIVE_PRICE, 1000)).toBe(11_143_900_000_000_000_000n);
  });

  it('rejects non-integer ratios', async () => {
    await expectEngineError(() => predictMint(TEN_NATIVE, NATIVE_PRICE, 150.5), 'InvalidConfiguration');
  });
});

describe('checkSlippage', () => {
  it('accepts a rate within tolerance across decimal scales', () => {
    expect(() =>
      checkSlippage(NATIVE_PRICE, { multiplier: 1114n, decimals: 26, slippage: 1n })
    ).not.toThrow();
  });

  it('rejects a rate outside tolerance', async () => {
    await expectEngineError(
      () => checkSlippage(NATIVE_PRICE, { multiplier: 1113n, decimals: 26, slippage: 1n }),
      'SlippageExceeded'
    );
  });
});
