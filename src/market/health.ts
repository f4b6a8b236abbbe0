import { Decimal } from 'decimal.js';
import { type Price, Prices } from '../oracle/types';
import { ZERO, fixed, pow10 } from '../utils/fixed-point';
import { Account } from './account';
import { Asset } from './asset';
import { borrowedBalance, collateralBalance } from './position-ledger';

export interface HealthReport {
  /** Σ collateral value × collateral factor. */
  borrowingPower: Decimal;
  /** Σ collateral value, unweighted. */
  collateralValue: Decimal;
  debtValue: Decimal;
  healthy: boolean;
  /** borrowingPower / debtValue, or null without debt. */
  healthFactor: Decimal | null;
}

export type AssetLookup = (assetId: string) => Asset;

export function assetValue(amount: bigint, price: Price): Decimal {
  return fixed(amount).mul(fixed(price.multiplier)).div(fixed(pow10(price.decimals)));
}

/**
 * Assets whose prices a health check of `account` needs.
 */
export function pricedAssetIds(account: Account): string[] {
  return [...new Set([...account.collateral.keys(), ...account.borrowed.keys()])];
}

export function evaluateHealth(account: Account, lookup: AssetLookup, prices: Prices): HealthReport {
  let borrowingPower = ZERO;
  let collateralValue = ZERO;
  let debtValue = ZERO;

  for (const assetId of account.collateral.keys()) {
    const asset = lookup(assetId);
    const value = assetValue(collateralBalance(account, asset), prices.get(assetId));
    collateralValue = collateralValue.plus(value);
    borrowingPower = borrowingPower.plus(value.mul(asset.config.collateralFactor));
  }

  for (const assetId of account.borrowed.keys()) {
    const asset = lookup(assetId);
    debtValue = debtValue.plus(assetValue(borrowedBalance(account, asset), prices.get(assetId)));
  }

  return {
    borrowingPower,
    collateralValue,
    debtValue,
    healthy: debtValue.lte(borrowingPower),
    healthFactor: debtValue.isZero() ? null : borrowingPower.div(debtValue),
  };
}
