import { Decimal } from 'decimal.js';
import { type AuthContext, requireRole } from '../auth/roles';
import {
  BelowMinimumExchangeError,
  InsufficientBalanceError,
  InvalidConfigurationError,
} from '../errors';
import { EventBus } from '../events/bus';
import type { TokenLedger } from '../ledger/token-ledger';
import type { TransferVenue } from '../ledger/transfer-venue';
import { OraclePriceAdapter } from '../oracle/price-adapter';
import type { Price } from '../oracle/types';
import { SagaCoordinator } from '../saga/coordinator';
import type { BuyAction, SellAction } from '../saga/types';
import { CommissionSchedule } from '../treasury/commission';
import { type Clock, systemClock } from '../utils/clock';
import { fixed, parseAmount, pow10 } from '../utils/fixed-point';
import { logger } from '../utils/logger';
import {
  type BuyQuote,
  type ExpectedRate,
  type QuoteParams,
  STABLE_DECIMALS,
  type SellQuote,
  checkSlippage,
  predictBuy,
  predictMint,
  predictSell,
} from './quote';
import { SpreadCalculator, type SpreadConfig, describeSpreadConfig } from './spread';

export interface ExchangeDeps {
  prices: OraclePriceAdapter;
  ledger: TokenLedger;
  venue: TransferVenue;
  saga: SagaCoordinator;
  commissions: CommissionSchedule;
  spread: SpreadCalculator;
  events: EventBus;
  clock?: Clock;
}

export interface ExchangeOptions {
  nativeAssetId: string;
  minCollateralRatio: number;
  maxCollateralRatio: number;
}

export interface BuyRequest {
  accountId: string;
  /** Native coin attached to the call, already held by the host. */
  nativeAmount: bigint;
  expectedRate?: ExpectedRate;
  recipientId?: string;
}

export interface SellRequest {
  accountId: string;
  stableAmount: bigint;
  expectedRate?: ExpectedRate;
}

const STABLE_UNIT = pow10(STABLE_DECIMALS);

/**
 * Mints and redeems the stable asset against the native coin at the oracle
 * rate, less spread and commission.
 */
export class StableExchange {
  private readonly clock: Clock;

  constructor(
    private readonly deps: ExchangeDeps,
    private readonly options: ExchangeOptions
  ) {
    this.clock = deps.clock ?? systemClock;
    deps.saga.registerCompensators({
      buy: (action) => this.refundNative(action),
      sell: (action) => this.restoreStable(action),
    });
  }

  // ============================================================================
  // Quotes
  // ============================================================================

  currentSpread(): Decimal {
    return this.deps.spread.spread(this.clock());
  }

  spreadConfig(): SpreadConfig {
    return this.deps.spread.config;
  }

  predictBuy(nativeAmount: bigint, rate: Price): BuyQuote {
    return predictBuy(nativeAmount, this.quoteParams(rate, 'deposit', this.clock()));
  }

  predictSell(stableAmount: bigint, rate: Price): SellQuote {
    return predictSell(stableAmount, this.quoteParams(rate, 'withdraw', this.clock()));
  }

  // ============================================================================
  // Trades
  // ============================================================================

  async buy(request: BuyRequest): Promise<BuyQuote> {
    const { accountId, nativeAmount } = request;
    if (nativeAmount <= 0n) {
      throw new BelowMinimumExchangeError({ nativeAmount: nativeAmount.toString() });
    }
    const recipientId = request.recipientId ?? accountId;

    const action = await this.deps.saga.begin({
      kind: 'buy',
      accountId,
      recipientId,
      nativeAmount: nativeAmount.toString(),
    });

    return this.deps.saga.execute(action, async () => {
      const rate = await this.deps.prices.getPrice(this.options.nativeAssetId);
      if (request.expectedRate) {
        checkSlippage(rate, request.expectedRate);
      }
      const now = this.clock();
      const quote = predictBuy(nativeAmount, this.quoteParams(rate, 'deposit', now));

      if (!this.deps.ledger.isRegistered(recipientId)) {
        this.deps.ledger.register(recipientId);
      }
      this.deps.ledger.credit(recipientId, quote.stableAmount);
      this.deps.commissions.book(this.options.nativeAssetId, quote.commission);
      this.deps.spread.recordTrade(this.toNotional(quote.grossStable), now);

      this.deps.events.emit({
        action: 'buy',
        accountId,
        recipientId,
        nativeAmount: nativeAmount.toString(),
        stableAmount: quote.stableAmount.toString(),
        spread: quote.spread.toString(),
        timestamp: now,
      });
      return quote;
    });
  }

  async sell(request: SellRequest): Promise<SellQuote> {
    const { accountId, stableAmount } = request;
    if (stableAmount <= 0n) {
      throw new BelowMinimumExchangeError({ stableAmount: stableAmount.toString() });
    }
    const balance = this.deps.ledger.balanceOf(accountId);
    if (balance < stableAmount) {
      throw new InsufficientBalanceError(`${accountId} holds ${balance}`, {
        accountId,
        requested: stableAmount.toString(),
      });
    }

    const rate = await this.deps.prices.getPrice(this.options.nativeAssetId);
    if (request.expectedRate) {
      checkSlippage(rate, request.expectedRate);
    }
    const now = this.clock();
    const quote = predictSell(stableAmount, this.quoteParams(rate, 'withdraw', now));

    const action = await this.deps.saga.begin({
      kind: 'sell',
      accountId,
      stableAmount: stableAmount.toString(),
      nativeAmount: quote.nativeAmount.toString(),
      commission: quote.commission.toString(),
    });
    await this.deps.saga.apply([action], () => {
      this.deps.ledger.debit(accountId, stableAmount);
      this.deps.commissions.book(this.options.nativeAssetId, quote.commission);
    });
    await this.deps.saga.execute(action, () =>
      this.deps.venue.transfer(accountId, this.options.nativeAssetId, quote.nativeAmount)
    );

    this.deps.spread.recordTrade(this.toNotional(stableAmount), now);
    this.deps.events.emit({
      action: 'sell',
      accountId,
      recipientId: accountId,
      nativeAmount: quote.nativeAmount.toString(),
      stableAmount: stableAmount.toString(),
      spread: quote.spread.toString(),
      timestamp: now,
    });
    return quote;
  }

  /**
   * Owner mint against attached native coin at `collateralRatio` percent.
   * No spread or commission is charged.
   */
  async mintByNative(auth: AuthContext, nativeAmount: bigint, collateralRatio: number): Promise<bigint> {
    requireRole(auth, 'owner');
    const { minCollateralRatio, maxCollateralRatio } = this.options;
    if (
      !Number.isInteger(collateralRatio) ||
      collateralRatio < minCollateralRatio ||
      collateralRatio > maxCollateralRatio
    ) {
      throw new InvalidConfigurationError(
        `collateral ratio must be within [${minCollateralRatio}, ${maxCollateralRatio}]`,
        { collateralRatio }
      );
    }
    if (nativeAmount <= 0n) {
      throw new BelowMinimumExchangeError({ nativeAmount: nativeAmount.toString() });
    }

    const action = await this.deps.saga.begin({
      kind: 'buy',
      accountId: auth.caller,
      recipientId: auth.caller,
      nativeAmount: nativeAmount.toString(),
    });

    return this.deps.saga.execute(action, async () => {
      const rate = await this.deps.prices.getPrice(this.options.nativeAssetId);
      const amount = predictMint(nativeAmount, rate, collateralRatio);
      if (!this.deps.ledger.isRegistered(auth.caller)) {
        this.deps.ledger.register(auth.caller);
      }
      this.deps.ledger.credit(auth.caller, amount);
      this.deps.events.emit({
        action: 'mint',
        accountId: auth.caller,
        recipientId: auth.caller,
        nativeAmount: nativeAmount.toString(),
        stableAmount: amount.toString(),
        spread: '0',
        timestamp: this.clock(),
      });
      return amount;
    });
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  setSpreadConfig(auth: AuthContext, next: SpreadConfig): void {
    requireRole(auth, 'owner');
    this.deps.spread.setConfig(next);
    logger.info('Spread configuration updated', {
      caller: auth.caller,
      ...describeSpreadConfig(next),
    });
  }

  // ============================================================================
  // Compensation
  // ============================================================================

  private async refundNative(action: BuyAction): Promise<void> {
    await this.deps.venue.transfer(action.accountId, this.options.nativeAssetId, parseAmount(action.nativeAmount));
    logger.warn('Native deposit refunded', { id: action.id, accountId: action.accountId });
  }

  private restoreStable(action: SellAction): void {
    this.deps.ledger.credit(action.accountId, parseAmount(action.stableAmount));
    this.deps.commissions.reverse(this.options.nativeAssetId, parseAmount(action.commission));
    logger.warn('Stable burn reverted', { id: action.id, accountId: action.accountId });
  }

  private quoteParams(rate: Price, side: 'deposit' | 'withdraw', now: number): QuoteParams {
    const rates = this.deps.commissions.rates(this.options.nativeAssetId);
    return {
      rate,
      spread: this.deps.spread.spread(now),
      commission: side === 'deposit' ? rates.deposit : rates.withdraw,
    };
  }

  private toNotional(stableAmount: bigint): Decimal {
    return fixed(stableAmount).div(fixed(STABLE_UNIT));
  }
}
