import { describe, it, expect } from 'vitest';
import {
  describeAssetConfig,
  parseAssetConfig,
  validateAssetConfig,
  type AssetConfigInput,
} from '../../../src/market/asset-config';
import { fixed } from '../../../src/utils/fixed-point';
import { expectDecimalEquals, expectEngineError, lendableAssetConfig } from '../../helpers';

const input: AssetConfigInput = {
  decimals: 6,
  curve: { baseRate: '0.000000000001', slope1: '0.000000000002', slope2: '0.00000000002', kink: '0.8' },
  reserveFactor: '0.2',
  collateralFactor: '0.9',
};

describe('asset configuration', () => {
  it('parses string fields and defaults every capability on', () => {
    const config = parseAssetConfig(input);
    expectDecimalEquals(config.curve.slope2, '0.00000000002');
    expectDecimalEquals(config.collateralFactor, '0.9');
    expect(config.canDeposit && config.canWithdraw && config.canUseAsCollateral && config.canBorrow).toBe(true);
  });

  it('keeps explicit capability flags', () => {
    expect(parseAssetConfig({ ...input, canBorrow: false }).canBorrow).toBe(false);
  });

  it('describes a config back into its string form', () => {
    expect(describeAssetConfig(parseAssetConfig(input))).toEqual({
      ...input,
      canDeposit: true,
      canWithdraw: true,
      canUseAsCollateral: true,
      canBorrow: true,
    });
  });

  it('rejects fields that are not numbers', async () => {
    await expectEngineError(() => parseAssetConfig({ ...input, reserveFactor: 'lots' }), 'InvalidConfiguration');
  });

  it.each([
    ['decimals out of range', { decimals: 38 }],
    ['fractional decimals', { decimals: 1.5 }],
    ['kink above one', { curve: { ...lendableAssetConfig(6).curve, kink: fixed('1.1') } }],
    ['negative slope', { curve: { ...lendableAssetConfig(6).curve, slope1: fixed('-0.1') } }],
    ['base rate finer than 27 places', { curve: { ...lendableAssetConfig(6).curve, baseRate: fixed('1e-28') } }],
    ['reserve factor of one', { reserveFactor: fixed(1) }],
    ['collateral factor of one', { collateralFactor: fixed(1) }],
    ['negative collateral factor', { collateralFactor: fixed('-0.5') }],
  ])('rejects %s', async (_name, patch) => {
    await expectEngineError(
      () => validateAssetConfig({ ...lendableAssetConfig(6), ...patch }),
      'InvalidConfiguration'
    );
  });

  it('accepts the boundaries of each range', () => {
    expect(() =>
      validateAssetConfig({ ...lendableAssetConfig(0), reserveFactor: fixed(0), collateralFactor: fixed('0.99') })
    ).not.toThrow();
  });
});
