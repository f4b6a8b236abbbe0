import type { GraphQLContext } from '../context';
import type { Engine } from '../../engine';
import { describeSpreadConfig } from '../../exchange/spread';
import { InvalidConfigurationError, isEngineError } from '../../errors';
import type { Price } from '../../oracle/types';
import type { PendingActionStatus } from '../../saga/types';

export interface CandidateRate {
  multiplier?: bigint | null;
  decimals?: number | null;
}

// An explicit candidate rate quotes off-chain; otherwise the oracle rate is used
async function quoteRate(engine: Engine, { multiplier, decimals }: CandidateRate): Promise<Price> {
  if ((multiplier === undefined || multiplier === null) && (decimals === undefined || decimals === null)) {
    return engine.prices.getPrice(engine.config.native.assetId);
  }
  if (multiplier === undefined || multiplier === null || decimals === undefined || decimals === null) {
    throw new InvalidConfigurationError('multiplier and decimals must be given together');
  }
  if (multiplier <= 0n || decimals < 0) {
    throw new InvalidConfigurationError('a candidate rate needs a positive multiplier and non-negative decimals', {
      multiplier: multiplier.toString(),
      decimals,
    });
  }
  return { multiplier, decimals };
}

export const Query = {
  // ============================================================================
  // Money Market Queries
  // ============================================================================

  assets(_: unknown, __: unknown, context: GraphQLContext) {
    return context.engine.market.listAssets();
  },

  asset(_: unknown, { assetId }: { assetId: string }, context: GraphQLContext) {
    try {
      return context.engine.market.getAsset(assetId);
    } catch (error) {
      if (isEngineError(error, 'UnknownAsset')) {
        return null;
      }
      throw error;
    }
  },

  accounts(_: unknown, __: unknown, context: GraphQLContext) {
    return context.engine.market.listAccounts();
  },

  async account(_: unknown, { accountId }: { accountId: string }, context: GraphQLContext) {
    return context.engine.market.getAccount(accountId);
  },

  // ============================================================================
  // Exchange & Treasury Queries
  // ============================================================================

  spread(_: unknown, __: unknown, context: GraphQLContext) {
    const { exchange } = context.engine;
    return {
      config: describeSpreadConfig(exchange.spreadConfig()),
      current: exchange.currentSpread(),
    };
  },

  async predictBuy(
    _: unknown,
    { nativeAmount, ...candidate }: { nativeAmount: bigint } & CandidateRate,
    context: GraphQLContext
  ) {
    const { engine } = context;
    const rate = await quoteRate(engine, candidate);
    return { ...engine.exchange.predictBuy(nativeAmount, rate), rate };
  },

  async predictSell(
    _: unknown,
    { stableAmount, ...candidate }: { stableAmount: bigint } & CandidateRate,
    context: GraphQLContext
  ) {
    const { engine } = context;
    const rate = await quoteRate(engine, candidate);
    return { ...engine.exchange.predictSell(stableAmount, rate), rate };
  },

  treasuryAssets(_: unknown, __: unknown, context: GraphQLContext) {
    const { treasury, commissions } = context.engine;
    return treasury.listAssets().map((asset) => {
      const rates = commissions.rates(asset.assetId);
      return {
        ...asset,
        depositCommission: rates.deposit,
        withdrawCommission: rates.withdraw,
        accruedCommission: commissions.accrued(asset.assetId),
      };
    });
  },

  stableBalance(_: unknown, { accountId }: { accountId: string }, context: GraphQLContext) {
    return context.engine.ledger.balanceOf(accountId);
  },

  // ============================================================================
  // Pending Action Queries
  // ============================================================================

  async pendingActions(
    _: unknown,
    args: { status?: PendingActionStatus | null; accountId?: string | null },
    context: GraphQLContext
  ) {
    return context.engine.saga.list({
      status: args.status ?? undefined,
      accountId: args.accountId ?? undefined,
    });
  },
};
