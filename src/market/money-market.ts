import { Decimal } from 'decimal.js';
import { type AuthContext, requireRole } from '../auth/roles';
import {
  AssetDisabledError,
  InsufficientBalanceError,
  InsufficientCollateralError,
  InvalidConfigurationError,
  NotLiquidatableError,
  UnknownAssetError,
  UnsupportedActionError,
} from '../errors';
import { EventBus } from '../events/bus';
import type { PositionEvent } from '../events/types';
import type { TokenLedger } from '../ledger/token-ledger';
import type { TransferVenue } from '../ledger/transfer-venue';
import { OraclePriceAdapter } from '../oracle/price-adapter';
import { Prices } from '../oracle/types';
import { SagaCoordinator } from '../saga/coordinator';
import type { MarketWithdrawAction, PendingAction } from '../saga/types';
import { type Clock, systemClock } from '../utils/clock';
import { parseAmount } from '../utils/fixed-point';
import { logger } from '../utils/logger';
import { Account } from './account';
import { Asset, type AssetView } from './asset';
import { type AssetConfig, validateAssetConfig } from './asset-config';
import { type AssetLookup, type HealthReport, evaluateHealth, pricedAssetIds } from './health';
import {
  type AssetAmount,
  type ForceCloseResult,
  type LiquidationResult,
  forceClose,
  liquidate,
} from './liquidation';
import { MarketStore, MarketTransaction } from './market-store';
import {
  type ShareMovement,
  borrowedBalance,
  collateralBalance,
  decreaseBorrowed,
  decreaseCollateral,
  decreaseSupplied,
  increaseBorrowed,
  increaseCollateral,
  increaseSupplied,
  suppliedBalance,
} from './position-ledger';
import { StableFlows, contractStableSupply, expandStableSupply } from './stable-debt';

export interface MoneyMarketDeps {
  store: MarketStore;
  prices: OraclePriceAdapter;
  ledger: TokenLedger;
  venue: TransferVenue;
  saga: SagaCoordinator;
  events: EventBus;
  clock?: Clock;
}

export interface MoneyMarketOptions {
  stableAssetId: string;
  maxNumAssets: number;
  liquidationIncentive: Decimal;
  forceClosingEnabled: boolean;
}

export type AssetConfigPatch = Partial<Omit<AssetConfig, 'curve'>> & {
  curve?: Partial<AssetConfig['curve']>;
};

export interface PositionEntry {
  assetId: string;
  shares: bigint;
  balance: bigint;
  apr: Decimal;
}

export interface AccountView {
  accountId: string;
  supplied: PositionEntry[];
  collateral: PositionEntry[];
  borrowed: PositionEntry[];
  health: HealthReport;
}

export interface LiquidationCall {
  accountId: string;
  repay: AssetAmount[];
  seize: AssetAmount[];
}

/** One step of a batched market call, run for the calling account. */
export type MarketAction =
  | { kind: 'increaseCollateral'; assetId: string; amount?: bigint }
  | { kind: 'decreaseCollateral'; assetId: string; amount?: bigint }
  | { kind: 'borrow'; assetId: string; amount: bigint }
  | { kind: 'repay'; assetId: string; amount?: bigint }
  | { kind: 'withdraw'; assetId: string; amount?: bigint }
  | ({ kind: 'liquidate' } & LiquidationCall);

type PositionActionKind = Exclude<MarketAction['kind'], 'liquidate'>;

export type ActionOutcome =
  | { kind: PositionActionKind; assetId: string; movement: ShareMovement }
  | { kind: 'liquidate'; accountId: string; result: LiquidationResult };

const POSITION_EVENTS = {
  increaseCollateral: 'increase_collateral',
  decreaseCollateral: 'decrease_collateral',
  borrow: 'borrow',
  repay: 'repay',
  withdraw: 'withdraw_started',
} as const satisfies Record<PositionActionKind, PositionEvent['action']>;

interface StepContext {
  tx: MarketTransaction;
  lookup: AssetLookup;
  account: Account;
  prices: Prices;
  flows: StableFlows;
}

interface Payout {
  assetId: string;
  amount: bigint;
}

/**
 * Multi-asset lending ledger. Each operation works on a store transaction,
 * so a failed check leaves no partial state behind.
 */
export class MoneyMarket {
  private readonly clock: Clock;

  constructor(
    private readonly deps: MoneyMarketDeps,
    private readonly options: MoneyMarketOptions
  ) {
    this.clock = deps.clock ?? systemClock;
    deps.saga.registerCompensators({
      marketWithdraw: (action) => this.restoreWithdraw(action),
    });
  }

  // ============================================================================
  // Asset Registry
  // ============================================================================

  registerAsset(auth: AuthContext, assetId: string, config: AssetConfig): AssetView {
    requireRole(auth, 'owner');
    if (this.deps.store.hasAsset(assetId)) {
      throw new InvalidConfigurationError(`asset ${assetId} is already registered`, { assetId });
    }
    validateAssetConfig(config);
    const now = this.clock();
    const view = this.deps.store.transaction((tx) => {
      const asset = new Asset(assetId, config, assetId === this.options.stableAssetId, now);
      tx.addAsset(asset);
      return asset.toView();
    });
    this.deps.events.emit({ action: 'asset_registered', assetId, caller: auth.caller, timestamp: now });
    return view;
  }

  /**
   * Merges `patch` into an asset's configuration. Interest up to now accrues
   * under the old curve.
   */
  updateAssetConfig(auth: AuthContext, assetId: string, patch: AssetConfigPatch): AssetView {
    requireRole(auth, 'owner');
    const now = this.clock();
    const view = this.deps.store.transaction((tx) => {
      const asset = this.loadAsset(tx, assetId, now);
      if (patch.decimals !== undefined && patch.decimals !== asset.config.decimals) {
        throw new InvalidConfigurationError('asset decimals cannot change', { assetId });
      }
      const next: AssetConfig = {
        ...asset.config,
        ...patch,
        curve: { ...asset.config.curve, ...patch.curve },
      };
      validateAssetConfig(next);
      asset.config = next;
      return asset.toView();
    });
    this.deps.events.emit({ action: 'asset_updated', assetId, caller: auth.caller, timestamp: now });
    return view;
  }

  setAssetEnabled(auth: AuthContext, assetId: string, enabled: boolean): AssetView {
    requireRole(auth, 'owner', 'guardian');
    const now = this.clock();
    const view = this.deps.store.transaction((tx) => {
      const asset = this.loadAsset(tx, assetId, now);
      asset.enabled = enabled;
      return asset.toView();
    });
    this.deps.events.emit({
      action: enabled ? 'asset_enabled' : 'asset_disabled',
      assetId,
      caller: auth.caller,
      timestamp: now,
    });
    return view;
  }

  // ============================================================================
  // Views
  // ============================================================================

  getAsset(assetId: string): AssetView {
    const asset = this.deps.store.peekAsset(assetId);
    if (!asset) {
      throw new UnknownAssetError(assetId);
    }
    const accrued = asset.clone();
    accrued.accrue(this.clock());
    return accrued.toView();
  }

  listAssets(): AssetView[] {
    return this.deps.store.assetIds().map((assetId) => this.getAsset(assetId));
  }

  listAccounts(): string[] {
    return this.deps.store.accountIds();
  }

  async getAccount(accountId: string): Promise<AccountView> {
    const account = this.deps.store.peekAccount(accountId) ?? new Account(accountId);
    const prices = await this.deps.prices.getPrices(pricedAssetIds(account));
    return this.describeAccount(account, prices);
  }

  describeAccount(account: Account, prices: Prices): AccountView {
    const now = this.clock();
    const assets = new Map<string, Asset>();
    const lookup: AssetLookup = (assetId) => {
      let asset = assets.get(assetId);
      if (!asset) {
        asset = this.requireStoredAsset(assetId).clone();
        asset.accrue(now);
        assets.set(assetId, asset);
      }
      return asset;
    };

    const entries = (
      map: Map<string, bigint>,
      balance: (asset: Asset) => bigint,
      apr: (asset: Asset) => Decimal
    ): PositionEntry[] =>
      [...map.entries()].map(([assetId, shares]) => {
        const asset = lookup(assetId);
        return { assetId, shares, balance: balance(asset), apr: apr(asset) };
      });

    return {
      accountId: account.id,
      supplied: entries(account.supplied, (a) => suppliedBalance(account, a), (a) => a.supplyApr()),
      collateral: entries(account.collateral, (a) => collateralBalance(account, a), (a) => a.supplyApr()),
      borrowed: entries(account.borrowed, (a) => borrowedBalance(account, a), (a) => a.borrowApr()),
      health: evaluateHealth(account, lookup, prices),
    };
  }

  // ============================================================================
  // Position Operations
  // ============================================================================

  /**
   * Credits tokens the host has already received to the supplied role.
   */
  supply(accountId: string, assetId: string, amount: bigint): ShareMovement {
    assertPositive(amount, 'supply');
    const now = this.clock();
    const movement = this.deps.store.transaction((tx) => {
      const asset = this.loadAsset(tx, assetId, now);
      if (asset.isStable) {
        throw new UnsupportedActionError('the stable asset can only be borrowed', { assetId });
      }
      this.assertEnabled(asset);
      this.assertCapability(asset.config.canDeposit, 'deposit', assetId);
      return increaseSupplied(tx.account(accountId), asset, amount);
    });
    this.emitPosition('supply', accountId, assetId, movement.amount, now);
    return movement;
  }

  /**
   * Pays out up to `amount` of supplied balance (all of it when omitted).
   * The payout is recorded before the balance is removed, and the balance is
   * restored if the transfer fails.
   */
  async withdraw(accountId: string, assetId: string, amount?: bigint): Promise<ShareMovement> {
    const outcomes = await this.runBatch(accountId, [{ kind: 'withdraw', assetId, amount }], new Prices(), false);
    return movementOf(outcomes);
  }

  increaseCollateral(accountId: string, assetId: string, amount?: bigint): ShareMovement {
    const now = this.clock();
    const movement = this.commitSteps(accountId, now, new Prices(), false, (ctx) =>
      this.increaseCollateralStep(ctx, assetId, amount)
    );
    this.emitPosition('increase_collateral', accountId, assetId, movement.amount, now);
    return movement;
  }

  async decreaseCollateral(accountId: string, assetId: string, amount?: bigint): Promise<ShareMovement> {
    const prices = await this.pricesFor(accountId, []);
    const now = this.clock();
    const movement = this.commitSteps(accountId, now, prices, true, (ctx) =>
      this.decreaseCollateralStep(ctx, assetId, amount)
    );
    this.emitPosition('decrease_collateral', accountId, assetId, movement.amount, now);
    return movement;
  }

  /**
   * Borrowed funds land in the account's supplied balance; the stable asset
   * is minted to the account's token balance instead.
   */
  async borrow(accountId: string, assetId: string, amount: bigint): Promise<ShareMovement> {
    const prices = await this.pricesFor(accountId, [assetId]);
    const now = this.clock();
    const movement = this.commitSteps(accountId, now, prices, true, (ctx) => this.borrowStep(ctx, assetId, amount));
    this.emitPosition('borrow', accountId, assetId, movement.amount, now);
    return movement;
  }

  /**
   * Repays up to `amount` (the full debt when omitted), capped at what is owed.
   * Stable debt is burnt from the token balance; other debt is paid from the
   * account's supplied balance.
   */
  repay(accountId: string, assetId: string, amount?: bigint): ShareMovement {
    const now = this.clock();
    const movement = this.commitSteps(accountId, now, new Prices(), false, (ctx) =>
      this.repayStep(ctx, assetId, amount)
    );
    this.emitPosition('repay', accountId, assetId, movement.amount, now);
    return movement;
  }

  depositToReserve(accountId: string, assetId: string, amount: bigint): bigint {
    assertPositive(amount, 'reserve deposit');
    const now = this.clock();
    const reserved = this.deps.store.transaction((tx) => {
      const asset = this.loadAsset(tx, assetId, now);
      if (asset.isStable) {
        throw new UnsupportedActionError('the stable asset reserve is not funded externally', { assetId });
      }
      asset.reserved += amount;
      return asset.reserved;
    });
    this.emitPosition('deposit_to_reserve', accountId, assetId, amount, now);
    return reserved;
  }

  /**
   * Runs `actions` in order against one price snapshot. The asset limit and
   * the health check apply to the final position only, so an intermediate
   * step may leave the account under-collateralized.
   */
  async execute(accountId: string, actions: readonly MarketAction[]): Promise<ActionOutcome[]> {
    if (actions.length === 0) {
      throw new UnsupportedActionError('no actions to execute', { accountId });
    }
    const priced: string[] = [];
    for (const action of actions) {
      if (action.kind === 'liquidate') {
        const target = this.requireLiquidationTarget(action.accountId);
        priced.push(
          ...pricedAssetIds(target),
          ...action.repay.map((entry) => entry.assetId),
          ...action.seize.map((entry) => entry.assetId)
        );
      } else {
        priced.push(action.assetId);
      }
    }
    const prices = await this.pricesFor(accountId, priced);
    return this.runBatch(accountId, actions, prices, true);
  }

  // ============================================================================
  // Liquidation
  // ============================================================================

  async liquidate(liquidatorId: string, call: LiquidationCall): Promise<LiquidationResult> {
    this.requireLiquidationTarget(call.accountId);
    const prices = await this.pricesFor(call.accountId, [
      ...call.repay.map((entry) => entry.assetId),
      ...call.seize.map((entry) => entry.assetId),
    ]);
    const now = this.clock();

    let result: LiquidationResult;
    try {
      result = this.commitSteps(liquidatorId, now, prices, false, (ctx) => this.liquidateStep(ctx, call));
    } catch (error) {
      logger.warn('Liquidation rejected', {
        liquidatorId,
        accountId: call.accountId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.emitLiquidation(liquidatorId, call.accountId, result, now);
    return result;
  }

  /**
   * Settles an account whose debt exceeds its unweighted collateral against
   * the protocol reserve. Open to any caller but the account itself.
   */
  async forceClose(caller: string, accountId: string): Promise<ForceCloseResult> {
    if (!this.options.forceClosingEnabled) {
      throw new UnsupportedActionError('force closing is disabled');
    }
    if (caller === accountId) {
      throw new UnsupportedActionError('an account cannot force close itself', { accountId });
    }
    if (!this.deps.store.peekAccount(accountId)) {
      throw new NotLiquidatableError(`account ${accountId} has no position`, { accountId });
    }
    const prices = await this.pricesFor(accountId, []);
    const now = this.clock();
    const result = this.deps.store.transaction((tx) => forceClose(tx, this.lookupIn(tx, now), prices, accountId));

    logger.info('Account force closed', { caller, accountId });
    this.deps.events.emit({
      action: 'force_close',
      accountId,
      collateral: result.collateral.map(toEventAmount),
      debt: result.debt.map(toEventAmount),
      timestamp: now,
    });
    return result;
  }

  // ============================================================================
  // Steps
  // ============================================================================

  private runAction(ctx: StepContext, action: MarketAction): ActionOutcome {
    if (action.kind === 'liquidate') {
      return { kind: action.kind, accountId: action.accountId, result: this.liquidateStep(ctx, action) };
    }
    return { kind: action.kind, assetId: action.assetId, movement: this.positionStep(ctx, action) };
  }

  private positionStep(ctx: StepContext, action: Exclude<MarketAction, { kind: 'liquidate' }>): ShareMovement {
    switch (action.kind) {
      case 'increaseCollateral':
        return this.increaseCollateralStep(ctx, action.assetId, action.amount);
      case 'decreaseCollateral':
        return this.decreaseCollateralStep(ctx, action.assetId, action.amount);
      case 'borrow':
        return this.borrowStep(ctx, action.assetId, action.amount);
      case 'repay':
        return this.repayStep(ctx, action.assetId, action.amount);
      case 'withdraw':
        return this.withdrawStep(ctx, action.assetId, action.amount);
    }
  }

  private increaseCollateralStep(ctx: StepContext, assetId: string, amount?: bigint): ShareMovement {
    assertOptionalPositive(amount, 'collateral');
    const asset = ctx.lookup(assetId);
    this.assertEnabled(asset);
    this.assertCapability(asset.config.canUseAsCollateral, 'use as collateral', assetId);
    const moved = increaseCollateral(ctx.account, asset, amount);
    if (moved.shares === 0n) {
      throw new InsufficientBalanceError(`${ctx.account.id} has no ${assetId} supplied`, {
        accountId: ctx.account.id,
        assetId,
      });
    }
    return moved;
  }

  private decreaseCollateralStep(ctx: StepContext, assetId: string, amount?: bigint): ShareMovement {
    assertOptionalPositive(amount, 'collateral');
    const moved = decreaseCollateral(ctx.account, ctx.lookup(assetId), amount);
    if (moved.shares === 0n) {
      throw new InsufficientBalanceError(`${ctx.account.id} has no ${assetId} collateral`, {
        accountId: ctx.account.id,
        assetId,
      });
    }
    return moved;
  }

  private borrowStep(ctx: StepContext, assetId: string, amount: bigint): ShareMovement {
    assertPositive(amount, 'borrow');
    const asset = ctx.lookup(assetId);
    this.assertEnabled(asset);
    this.assertCapability(asset.config.canBorrow, 'borrow', assetId);

    if (asset.isStable) {
      const borrowed = increaseBorrowed(ctx.account, asset, amount);
      expandStableSupply(asset, amount);
      ctx.flows.mint(ctx.account.id, amount);
      return borrowed;
    }
    this.assertLiquidity(asset, amount);
    const borrowed = increaseBorrowed(ctx.account, asset, amount);
    increaseSupplied(ctx.account, asset, amount);
    return borrowed;
  }

  private repayStep(ctx: StepContext, assetId: string, amount?: bigint): ShareMovement {
    assertOptionalPositive(amount, 'repay');
    const { account } = ctx;
    const asset = ctx.lookup(assetId);
    const owed = borrowedBalance(account, asset);
    if (owed === 0n) {
      throw new InsufficientBalanceError(`${account.id} owes no ${assetId}`, { accountId: account.id, assetId });
    }
    const payment = amount === undefined || amount > owed ? owed : amount;

    if (asset.isStable) {
      const repaid = decreaseBorrowed(account, asset, payment);
      contractStableSupply(asset, repaid.amount);
      ctx.flows.burn(account.id, repaid.amount);
      return repaid;
    }

    const available = suppliedBalance(account, asset);
    if (available < payment) {
      throw new InsufficientBalanceError(`${account.id} has ${available} ${assetId} supplied`, {
        accountId: account.id,
        assetId,
        requested: payment.toString(),
      });
    }
    decreaseSupplied(account, asset, payment);
    return decreaseBorrowed(account, asset, payment);
  }

  private withdrawStep(ctx: StepContext, assetId: string, amount?: bigint): ShareMovement {
    assertOptionalPositive(amount, 'withdraw');
    const asset = ctx.lookup(assetId);
    this.assertCapability(asset.config.canWithdraw, 'withdraw', assetId);
    const held = suppliedBalance(ctx.account, asset);
    const capped = amount === undefined || amount > held ? held : amount;
    if (capped === 0n) {
      throw new InsufficientBalanceError(`${ctx.account.id} has no ${assetId} supplied`, {
        accountId: ctx.account.id,
        assetId,
      });
    }
    this.assertLiquidity(asset, capped);
    return decreaseSupplied(ctx.account, asset, capped);
  }

  private liquidateStep(ctx: StepContext, call: LiquidationCall): LiquidationResult {
    const result = liquidate(
      ctx.tx,
      ctx.lookup,
      ctx.prices,
      { liquidatorId: ctx.account.id, accountId: call.accountId, repay: call.repay, seize: call.seize },
      { liquidationIncentive: this.options.liquidationIncentive }
    );
    if (result.stableBurn > 0n) {
      ctx.flows.burn(ctx.account.id, result.stableBurn);
    }
    return result;
  }

  /**
   * Runs `body` for one account, then checks the final position.
   */
  private runSteps<T>(
    tx: MarketTransaction,
    accountId: string,
    now: number,
    prices: Prices,
    checkHealth: boolean,
    body: (ctx: StepContext) => T
  ): { result: T; flows: StableFlows } {
    const ctx: StepContext = {
      tx,
      lookup: this.lookupIn(tx, now),
      account: tx.account(accountId),
      prices,
      flows: new StableFlows(),
    };
    const result = body(ctx);
    this.assertAssetLimit(ctx.account);
    if (checkHealth) {
      this.assertHealthy(ctx.account, ctx.lookup, prices);
    }
    return { result, flows: ctx.flows };
  }

  private commitSteps<T>(
    accountId: string,
    now: number,
    prices: Prices,
    checkHealth: boolean,
    body: (ctx: StepContext) => T
  ): T {
    return this.deps.store.transaction((tx) => {
      const { result, flows } = this.runSteps(tx, accountId, now, prices, checkHealth, body);
      flows.settle(this.deps.ledger);
      return result;
    });
  }

  /**
   * Plans the batch on a throwaway copy, records a marker per payout, then
   * applies the batch and attempts every payout.
   */
  private async runBatch(
    accountId: string,
    actions: readonly MarketAction[],
    prices: Prices,
    checkHealth: boolean
  ): Promise<ActionOutcome[]> {
    const now = this.clock();
    const body = (ctx: StepContext): ActionOutcome[] => actions.map((action) => this.runAction(ctx, action));

    const planned = this.deps.store.simulate((tx) => {
      const { result, flows } = this.runSteps(tx, accountId, now, prices, checkHealth, body);
      flows.assertCovered(this.deps.ledger);
      return result;
    });
    const payouts = payoutsOf(planned);

    const recorded: Array<{ action: PendingAction; payout: Payout }> = [];
    for (const payout of payouts) {
      const action = await this.deps.saga.begin({
        kind: 'marketWithdraw',
        accountId,
        assetId: payout.assetId,
        amount: payout.amount.toString(),
      });
      recorded.push({ action, payout });
    }

    const outcomes = await this.deps.saga.apply(
      recorded.map((entry) => entry.action),
      () =>
        this.deps.store.transaction((tx) => {
          const { result, flows } = this.runSteps(tx, accountId, now, prices, checkHealth, body);
          if (!samePayouts(payouts, payoutsOf(result))) {
            throw new InsufficientBalanceError(`${accountId} balances changed while the payout was recorded`, {
              accountId,
            });
          }
          flows.settle(this.deps.ledger);
          return result;
        })
    );
    for (const outcome of outcomes) {
      this.emitOutcome(accountId, outcome, now);
    }

    const failures: unknown[] = [];
    for (const { action, payout } of recorded) {
      try {
        await this.deps.saga.execute(action, () => this.deps.venue.transfer(accountId, payout.assetId, payout.amount));
        this.emitPosition('withdraw_succeeded', accountId, payout.assetId, payout.amount, this.clock());
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
    return outcomes;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private restoreWithdraw(action: MarketWithdrawAction): void {
    const now = this.clock();
    const amount = parseAmount(action.amount);
    this.deps.store.transaction((tx) => {
      increaseSupplied(tx.account(action.accountId), this.loadAsset(tx, action.assetId, now), amount);
    });
    this.emitPosition('withdraw_failed', action.accountId, action.assetId, amount, now);
  }

  private requireLiquidationTarget(accountId: string): Account {
    const target = this.deps.store.peekAccount(accountId);
    if (!target) {
      throw new NotLiquidatableError(`account ${accountId} has no position`, { accountId });
    }
    return target;
  }

  private async pricesFor(accountId: string, extra: string[]): Promise<Prices> {
    const account = this.deps.store.peekAccount(accountId) ?? new Account(accountId);
    return this.deps.prices.getPrices([...pricedAssetIds(account), ...extra]);
  }

  private loadAsset(tx: MarketTransaction, assetId: string, now: number): Asset {
    const asset = tx.asset(assetId);
    if (!asset) {
      throw new UnknownAssetError(assetId);
    }
    asset.accrue(now);
    return asset;
  }

  private lookupIn(tx: MarketTransaction, now: number): AssetLookup {
    return (assetId) => this.loadAsset(tx, assetId, now);
  }

  private requireStoredAsset(assetId: string): Asset {
    const asset = this.deps.store.peekAsset(assetId);
    if (!asset) {
      throw new UnknownAssetError(assetId);
    }
    return asset;
  }

  private assertHealthy(account: Account, lookup: AssetLookup, prices: Prices): void {
    if (account.borrowed.size === 0) {
      return;
    }
    if (!evaluateHealth(account, lookup, prices).healthy) {
      throw new InsufficientCollateralError(account.id);
    }
  }

  private assertEnabled(asset: Asset): void {
    if (!asset.enabled) {
      throw new AssetDisabledError(asset.id);
    }
  }

  private assertCapability(allowed: boolean, action: string, assetId: string): void {
    if (!allowed) {
      throw new UnsupportedActionError(`${assetId} does not allow ${action}`, { assetId });
    }
  }

  private assertLiquidity(asset: Asset, amount: bigint): void {
    if (asset.available() < amount) {
      throw new InsufficientBalanceError(`not enough ${asset.id} liquidity`, {
        assetId: asset.id,
        available: asset.available().toString(),
        requested: amount.toString(),
      });
    }
  }

  private assertAssetLimit(account: Account): void {
    if (account.positionAssetCount() > this.options.maxNumAssets) {
      throw new InvalidConfigurationError(`positions are limited to ${this.options.maxNumAssets} assets`, {
        accountId: account.id,
      });
    }
  }

  private emitOutcome(accountId: string, outcome: ActionOutcome, timestamp: number): void {
    if (outcome.kind === 'liquidate') {
      this.emitLiquidation(accountId, outcome.accountId, outcome.result, timestamp);
      return;
    }
    this.emitPosition(POSITION_EVENTS[outcome.kind], accountId, outcome.assetId, outcome.movement.amount, timestamp);
  }

  private emitLiquidation(liquidatorId: string, accountId: string, result: LiquidationResult, timestamp: number): void {
    this.deps.events.emit({
      action: 'liquidate',
      liquidatorId,
      accountId,
      repaid: result.repaid.map(toEventAmount),
      seized: result.seized.map(toEventAmount),
      repaidValue: result.repaidValue.toString(),
      seizedValue: result.seizedValue.toString(),
      timestamp,
    });
  }

  private emitPosition(
    action: PositionEvent['action'],
    accountId: string,
    assetId: string,
    amount: bigint,
    timestamp: number
  ): void {
    this.deps.events.emit({ action, accountId, assetId, amount: amount.toString(), timestamp });
  }
}

function assertPositive(amount: bigint, action: string): void {
  if (amount <= 0n) {
    throw new UnsupportedActionError(`${action} amount must be positive`, { amount: amount.toString() });
  }
}

function assertOptionalPositive(amount: bigint | undefined, action: string): void {
  if (amount !== undefined) {
    assertPositive(amount, action);
  }
}

function payoutsOf(outcomes: readonly ActionOutcome[]): Payout[] {
  const payouts: Payout[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'withdraw') {
      payouts.push({ assetId: outcome.assetId, amount: outcome.movement.amount });
    }
  }
  return payouts;
}

function samePayouts(a: readonly Payout[], b: readonly Payout[]): boolean {
  return a.length === b.length && a.every((payout, i) => payout.assetId === b[i]?.assetId && payout.amount === b[i]?.amount);
}

function movementOf(outcomes: readonly ActionOutcome[]): ShareMovement {
  const [outcome] = outcomes;
  if (!outcome || outcome.kind === 'liquidate') {
    throw new Error('expected a position movement');
  }
  return outcome.movement;
}

function toEventAmount(entry: AssetAmount): { assetId: string; amount: string } {
  return { assetId: entry.assetId, amount: entry.amount.toString() };
}
