import { Decimal } from 'decimal.js';
import {
  InsufficientBalanceError,
  NotLiquidatableError,
  UnsupportedActionError,
} from '../errors';
import { Prices } from '../oracle/types';
import { ONE, ZERO, minBigInt } from '../utils/fixed-point';
import { Account } from './account';
import { Asset } from './asset';
import { type AssetLookup, type HealthReport, assetValue, evaluateHealth } from './health';
import { MarketTransaction } from './market-store';
import {
  borrowedBalance,
  collateralBalance,
  decreaseBorrowed,
  decreaseSupplied,
  suppliedBalance,
} from './position-ledger';
import { contractStableSupply } from './stable-debt';

export interface AssetAmount {
  assetId: string;
  amount: bigint;
}

export interface LiquidationRequest {
  liquidatorId: string;
  accountId: string;
  repay: AssetAmount[];
  seize: AssetAmount[];
}

export interface LiquidationResult {
  repaid: AssetAmount[];
  seized: AssetAmount[];
  repaidValue: Decimal;
  seizedValue: Decimal;
  before: HealthReport;
  after: HealthReport;
  /** Stable amount the liquidator burns to cover stable debt. */
  stableBurn: bigint;
}

export interface ForceCloseResult {
  collateral: AssetAmount[];
  debt: AssetAmount[];
}

export interface LiquidationSettings {
  liquidationIncentive: Decimal;
}

function assertDistinct(entries: AssetAmount[], role: string): void {
  const seen = new Set<string>();
  for (const { assetId, amount } of entries) {
    if (seen.has(assetId)) {
      throw new UnsupportedActionError(`${assetId} listed twice in ${role}`, { assetId });
    }
    if (amount <= 0n) {
      throw new UnsupportedActionError(`${role} amount for ${assetId} must be positive`, { assetId });
    }
    seen.add(assetId);
  }
}

/**
 * Repays part of an unhealthy account's debt and takes collateral in exchange.
 * Every check runs against the working copy, so a rejected call leaves the
 * market untouched.
 */
export function liquidate(
  tx: MarketTransaction,
  lookup: AssetLookup,
  prices: Prices,
  request: LiquidationRequest,
  settings: LiquidationSettings
): LiquidationResult {
  if (request.liquidatorId === request.accountId) {
    throw new UnsupportedActionError('an account cannot liquidate itself');
  }
  assertDistinct(request.repay, 'repay');
  assertDistinct(request.seize, 'seize');
  if (request.repay.length === 0) {
    throw new UnsupportedActionError('liquidation must repay some debt');
  }

  const target = tx.account(request.accountId);
  const liquidator = tx.account(request.liquidatorId);
  const before = evaluateHealth(target, lookup, prices);
  if (before.healthy) {
    throw new NotLiquidatableError(`account ${request.accountId} is healthy`, {
      accountId: request.accountId,
    });
  }

  let repaidValue = ZERO;
  let stableBurn = 0n;
  const repaid: AssetAmount[] = [];
  for (const { assetId, amount } of request.repay) {
    const asset = lookup(assetId);
    const debt = borrowedBalance(target, asset);
    if (amount > debt) {
      throw new NotLiquidatableError(`repay of ${assetId} exceeds the debt`, {
        assetId,
        debt: debt.toString(),
        amount: amount.toString(),
      });
    }
    if (asset.isStable) {
      stableBurn += amount;
      decreaseBorrowed(target, asset, amount);
      contractStableSupply(asset, amount);
    } else {
      payFromSupplied(liquidator, asset, amount);
      decreaseBorrowed(target, asset, amount);
    }
    repaidValue = repaidValue.plus(assetValue(amount, prices.get(assetId)));
    repaid.push({ assetId, amount });
  }

  let seizedValue = ZERO;
  const seized: AssetAmount[] = [];
  for (const { assetId, amount } of request.seize) {
    const asset = lookup(assetId);
    const pledged = Account.shares(target.collateral, assetId);
    const pledgedAmount = collateralBalance(target, asset);
    if (pledged === 0n) {
      throw new NotLiquidatableError(`account holds no ${assetId} collateral`, { assetId });
    }
    const taken = amount >= pledgedAmount ? pledgedAmount : amount;
    const shares =
      amount >= pledgedAmount ? pledged : minBigInt(asset.supplied.amountToShares(amount, true), pledged);
    Account.subtract(target.collateral, assetId, shares);
    Account.add(liquidator.supplied, assetId, shares);
    seizedValue = seizedValue.plus(assetValue(taken, prices.get(assetId)));
    seized.push({ assetId, amount: taken });
  }

  const maxSeized = repaidValue.mul(ONE.plus(settings.liquidationIncentive));
  if (seizedValue.gt(maxSeized)) {
    throw new NotLiquidatableError('seized collateral exceeds the liquidation incentive', {
      repaidValue: repaidValue.toString(),
      seizedValue: seizedValue.toString(),
    });
  }

  const after = evaluateHealth(target, lookup, prices);
  if (
    before.healthFactor !== null &&
    after.healthFactor !== null &&
    after.healthFactor.lt(before.healthFactor)
  ) {
    throw new NotLiquidatableError('liquidation would lower the health factor', {
      before: before.healthFactor.toString(),
      after: after.healthFactor.toString(),
    });
  }

  return { repaid, seized, repaidValue, seizedValue, before, after, stableBurn };
}

/**
 * Closes an insolvent account against the protocol reserve: collateral is
 * moved into reserve and every debt is paid out of it.
 */
export function forceClose(
  tx: MarketTransaction,
  lookup: AssetLookup,
  prices: Prices,
  accountId: string
): ForceCloseResult {
  const target = tx.account(accountId);
  const report = evaluateHealth(target, lookup, prices);
  if (report.debtValue.lte(report.collateralValue)) {
    throw new NotLiquidatableError(`account ${accountId} is not insolvent`, {
      accountId,
      debtValue: report.debtValue.toString(),
      collateralValue: report.collateralValue.toString(),
    });
  }

  const collateral: AssetAmount[] = [];
  for (const [assetId, shares] of [...target.collateral]) {
    const asset = lookup(assetId);
    const amount = asset.supplied.sharesToAmount(shares, false);
    asset.supplied.withdraw(shares, amount);
    asset.reserved += amount;
    Account.subtract(target.collateral, assetId, shares);
    collateral.push({ assetId, amount });
  }

  const debt: AssetAmount[] = [];
  for (const assetId of [...target.borrowed.keys()]) {
    const asset = lookup(assetId);
    const owed = borrowedBalance(target, asset);
    if (asset.isStable) {
      // The issuer absorbs its own liability; the seized collateral backs it.
      contractStableSupply(asset, owed);
    } else {
      coverFromReserve(asset, owed);
    }
    decreaseBorrowed(target, asset, owed);
    debt.push({ assetId, amount: owed });
  }

  return { collateral, debt };
}

function payFromSupplied(liquidator: Account, asset: Asset, amount: bigint): void {
  const available = suppliedBalance(liquidator, asset);
  if (available < amount) {
    throw new InsufficientBalanceError(`liquidator holds ${available} ${asset.id}`, {
      assetId: asset.id,
      available: available.toString(),
      requested: amount.toString(),
    });
  }
  decreaseSupplied(liquidator, asset, amount);
}

function coverFromReserve(asset: Asset, amount: bigint): void {
  if (asset.reserved < amount) {
    throw new InsufficientBalanceError(`reserve of ${asset.id} cannot cover the debt`, {
      assetId: asset.id,
      reserved: asset.reserved.toString(),
      owed: amount.toString(),
    });
  }
  asset.reserved -= amount;
}
