import { type AuthContext, type RoleRoster, resolveAuthContext } from './auth/roles';
import type { EngineConfig } from './config';
import { EventBus } from './events/bus';
import { StableExchange } from './exchange/exchange';
import { SpreadCalculator } from './exchange/spread';
import { InMemoryTokenLedger, type TokenLedger } from './ledger/token-ledger';
import type { TransferVenue } from './ledger/transfer-venue';
import { stableAssetConfig } from './market/asset-config';
import { MarketStore } from './market/market-store';
import { MoneyMarket } from './market/money-market';
import { OraclePriceAdapter } from './oracle/price-adapter';
import type { PriceOracle } from './oracle/types';
import { SagaCoordinator } from './saga/coordinator';
import { InMemoryPendingActionRepository, type PendingActionRepository } from './saga/pending-actions';
import { CommissionSchedule } from './treasury/commission';
import { StableTreasury } from './treasury/stable-treasury';
import { type Clock, systemClock } from './utils/clock';
import { logger } from './utils/logger';

export interface EngineDeps {
  oracle: PriceOracle;
  ledger?: TokenLedger;
  venue: TransferVenue;
  repository?: PendingActionRepository;
  clock?: Clock;
}

export interface Engine {
  config: EngineConfig;
  roster: RoleRoster;
  events: EventBus;
  prices: OraclePriceAdapter;
  ledger: TokenLedger;
  venue: TransferVenue;
  saga: SagaCoordinator;
  commissions: CommissionSchedule;
  exchange: StableExchange;
  treasury: StableTreasury;
  market: MoneyMarket;
  authFor(caller: string): AuthContext;
}

/**
 * Wires the engine components around the given collaborators. An omitted
 * ledger or pending-action store gets its in-memory implementation.
 */
export function createEngine(config: EngineConfig, deps: EngineDeps): Engine {
  const clock = deps.clock ?? systemClock;
  const ledger = deps.ledger ?? new InMemoryTokenLedger();
  const { venue } = deps;
  const events = new EventBus();
  const saga = new SagaCoordinator(deps.repository ?? new InMemoryPendingActionRepository(), events, clock);
  const roster: RoleRoster = { owner: config.owner.accountId, guardians: config.owner.guardians };

  const prices = new OraclePriceAdapter(deps.oracle, {
    recencyWindowMs: config.oracle.recencyWindowMs,
    maxRecencyDurationSec: config.oracle.maxRecencyDurationSec,
    fixedPrices: new Map([[config.stable.assetId, config.stable.price]]),
    clock,
  });

  const commissions = new CommissionSchedule();
  commissions.register(config.native.assetId);

  const spread = new SpreadCalculator(config.exchange.spread, {
    halfLifeMs: config.exchange.spreadHalfLifeMs,
    volumeUnit: config.exchange.spreadVolumeUnit,
  });

  const exchange = new StableExchange(
    { prices, ledger, venue, saga, commissions, spread, events, clock },
    {
      nativeAssetId: config.native.assetId,
      minCollateralRatio: config.exchange.minCollateralRatio,
      maxCollateralRatio: config.exchange.maxCollateralRatio,
    }
  );

  const treasury = new StableTreasury({ ledger, venue, saga, commissions, events, clock });

  const market = new MoneyMarket(
    { store: new MarketStore(), prices, ledger, venue, saga, events, clock },
    {
      stableAssetId: config.stable.assetId,
      maxNumAssets: config.market.maxNumAssets,
      liquidationIncentive: config.market.liquidationIncentive,
      forceClosingEnabled: config.market.forceClosingEnabled,
    }
  );

  const authFor = (caller: string): AuthContext => resolveAuthContext(caller, roster);
  market.registerAsset(authFor(roster.owner), config.stable.assetId, stableAssetConfig(config.stable.decimals));

  logger.info('Engine created', {
    stableAssetId: config.stable.assetId,
    nativeAssetId: config.native.assetId,
    spread: config.exchange.spread.kind,
  });

  return {
    config,
    roster,
    events,
    prices,
    ledger,
    venue,
    saga,
    commissions,
    exchange,
    treasury,
    market,
    authFor,
  };
}
