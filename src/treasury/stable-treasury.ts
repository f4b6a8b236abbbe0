import { type AuthContext, requireRole } from '../auth/roles';
import {
  AssetDisabledError,
  BelowMinimumExchangeError,
  InsufficientBalanceError,
  InvalidConfigurationError,
  UnknownAssetError,
} from '../errors';
import { EventBus } from '../events/bus';
import { STABLE_DECIMALS, convertDecimals } from '../exchange/quote';
import type { TokenLedger } from '../ledger/token-ledger';
import type { TransferVenue } from '../ledger/transfer-venue';
import { SagaCoordinator } from '../saga/coordinator';
import type { TreasuryWithdrawAction } from '../saga/types';
import { type Clock, systemClock } from '../utils/clock';
import { parseAmount } from '../utils/fixed-point';
import { logger } from '../utils/logger';
import { type CommissionRates, CommissionSchedule } from './commission';

export const MIN_TOKEN_DECIMALS = 1;
export const MAX_TOKEN_DECIMALS = 37;

export interface TreasuryAsset {
  assetId: string;
  decimals: number;
  enabled: boolean;
}

export interface TreasuryDeps {
  ledger: TokenLedger;
  venue: TransferVenue;
  saga: SagaCoordinator;
  commissions: CommissionSchedule;
  events: EventBus;
  clock?: Clock;
}

export interface TreasuryExchangeResult {
  tokenAmount: bigint;
  stableAmount: bigint;
  commission: bigint;
}

/**
 * 1:1 exchange between accepted stable tokens and the stable asset.
 */
export class StableTreasury {
  private readonly assets = new Map<string, TreasuryAsset>();
  private readonly clock: Clock;

  constructor(private readonly deps: TreasuryDeps) {
    this.clock = deps.clock ?? systemClock;
    deps.saga.registerCompensators({
      treasuryWithdraw: (action) => this.restoreWithdraw(action),
    });
  }

  // ============================================================================
  // Asset Management
  // ============================================================================

  addAsset(auth: AuthContext, assetId: string, decimals: number, rates?: CommissionRates): TreasuryAsset {
    requireRole(auth, 'owner');
    if (this.assets.has(assetId)) {
      throw new InvalidConfigurationError(`${assetId} is already accepted`, { assetId });
    }
    if (!Number.isInteger(decimals) || decimals < MIN_TOKEN_DECIMALS || decimals > MAX_TOKEN_DECIMALS) {
      throw new InvalidConfigurationError(
        `decimals must be within [${MIN_TOKEN_DECIMALS}, ${MAX_TOKEN_DECIMALS}]`,
        { assetId, decimals }
      );
    }
    this.deps.commissions.register(assetId, rates);
    const asset: TreasuryAsset = { assetId, decimals, enabled: true };
    this.assets.set(assetId, asset);
    logger.info('Treasury asset added', { assetId, decimals, caller: auth.caller });
    return { ...asset };
  }

  enableAsset(auth: AuthContext, assetId: string): void {
    this.setEnabled(auth, assetId, true);
  }

  disableAsset(auth: AuthContext, assetId: string): void {
    this.setEnabled(auth, assetId, false);
  }

  getAsset(assetId: string): TreasuryAsset {
    return { ...this.requireAsset(assetId) };
  }

  listAssets(): TreasuryAsset[] {
    return [...this.assets.values()].map((asset) => ({ ...asset }));
  }

  // ============================================================================
  // Commission
  // ============================================================================

  setCommissionRates(auth: AuthContext, assetId: string, rates: CommissionRates): void {
    requireRole(auth, 'owner');
    this.deps.commissions.setRates(assetId, rates);
    logger.info('Commission rates updated', {
      assetId,
      deposit: rates.deposit.toString(),
      withdraw: rates.withdraw.toString(),
      caller: auth.caller,
    });
  }

  /**
   * Mints accrued commission to `receiverId`.
   */
  transferCommission(auth: AuthContext, receiverId: string, amount: bigint): void {
    requireRole(auth, 'owner');
    if (amount <= 0n) {
      throw new InsufficientBalanceError('commission transfer must be positive', {
        requested: amount.toString(),
      });
    }
    this.deps.commissions.drain(amount);
    if (!this.deps.ledger.isRegistered(receiverId)) {
      this.deps.ledger.register(receiverId);
    }
    this.deps.ledger.credit(receiverId, amount);
    this.deps.events.emit({
      action: 'commission_transfer',
      receiverId,
      amount: amount.toString(),
      timestamp: this.clock(),
    });
  }

  // ============================================================================
  // Exchange
  // ============================================================================

  /**
   * Credits the stable asset for tokens the host has already received.
   */
  deposit(accountId: string, assetId: string, tokenAmount: bigint): TreasuryExchangeResult {
    const asset = this.requireEnabled(assetId);
    const gross = convertDecimals(tokenAmount, asset.decimals, STABLE_DECIMALS);
    const commission = this.deps.commissions.charge(this.deps.commissions.rates(assetId).deposit, gross);
    const stableAmount = gross - commission;
    if (stableAmount <= 0n) {
      throw new BelowMinimumExchangeError({ assetId, tokenAmount: tokenAmount.toString() });
    }

    if (!this.deps.ledger.isRegistered(accountId)) {
      this.deps.ledger.register(accountId);
    }
    this.deps.ledger.credit(accountId, stableAmount);
    this.deps.commissions.book(assetId, commission);

    this.deps.events.emit({
      action: 'treasury_deposit',
      accountId,
      assetId,
      tokenAmount: tokenAmount.toString(),
      stableAmount: stableAmount.toString(),
      commission: commission.toString(),
      timestamp: this.clock(),
    });
    return { tokenAmount, stableAmount, commission };
  }

  /**
   * Burns `stableAmount` and pays out the converted token amount.
   */
  async withdraw(accountId: string, assetId: string, stableAmount: bigint): Promise<TreasuryExchangeResult> {
    const asset = this.requireEnabled(assetId);
    const commission = this.deps.commissions.charge(
      this.deps.commissions.rates(assetId).withdraw,
      stableAmount
    );
    const tokenAmount = convertDecimals(stableAmount - commission, STABLE_DECIMALS, asset.decimals);
    if (stableAmount <= 0n || tokenAmount <= 0n) {
      throw new BelowMinimumExchangeError({ assetId, stableAmount: stableAmount.toString() });
    }

    const balance = this.deps.ledger.balanceOf(accountId);
    if (balance < stableAmount) {
      throw new InsufficientBalanceError(`${accountId} holds ${balance}`, {
        accountId,
        requested: stableAmount.toString(),
      });
    }

    const action = await this.deps.saga.begin({
      kind: 'treasuryWithdraw',
      accountId,
      assetId,
      stableAmount: stableAmount.toString(),
      tokenAmount: tokenAmount.toString(),
      commission: commission.toString(),
    });
    await this.deps.saga.apply([action], () => {
      this.deps.ledger.debit(accountId, stableAmount);
      this.deps.commissions.book(assetId, commission);
    });
    await this.deps.saga.execute(action, () => this.deps.venue.transfer(accountId, assetId, tokenAmount));

    this.deps.events.emit({
      action: 'treasury_withdraw',
      accountId,
      assetId,
      tokenAmount: tokenAmount.toString(),
      stableAmount: stableAmount.toString(),
      commission: commission.toString(),
      timestamp: this.clock(),
    });
    return { tokenAmount, stableAmount, commission };
  }

  private restoreWithdraw(action: TreasuryWithdrawAction): void {
    this.deps.ledger.credit(action.accountId, parseAmount(action.stableAmount));
    this.deps.commissions.reverse(action.assetId, parseAmount(action.commission));
    logger.warn('Treasury withdraw reverted', { id: action.id, accountId: action.accountId });
  }

  private setEnabled(auth: AuthContext, assetId: string, enabled: boolean): void {
    requireRole(auth, 'owner');
    const asset = this.requireAsset(assetId);
    if (asset.enabled === enabled) {
      throw new InvalidConfigurationError(`${assetId} is already ${enabled ? 'enabled' : 'disabled'}`, {
        assetId,
      });
    }
    asset.enabled = enabled;
    logger.info('Treasury asset status changed', { assetId, enabled, caller: auth.caller });
  }

  private requireAsset(assetId: string): TreasuryAsset {
    const asset = this.assets.get(assetId);
    if (!asset) {
      throw new UnknownAssetError(assetId);
    }
    return asset;
  }

  private requireEnabled(assetId: string): TreasuryAsset {
    const asset = this.requireAsset(assetId);
    if (!asset.enabled) {
      throw new AssetDisabledError(assetId);
    }
    return asset;
  }
}
