import { ExternalCallFailedError, StalePriceError, UnknownAssetError, isEngineError } from '../errors';
import { type Clock, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';
import { type Price, type PriceData, type PriceOracle, type PriceQuote, Prices } from './types';

const MAX_PRICE_DECIMALS = 77;

export interface PriceAdapterOptions {
  recencyWindowMs: number;
  maxRecencyDurationSec: number;
  /** Assets priced by the core itself, never asked of the oracle. */
  fixedPrices?: ReadonlyMap<string, Price>;
  clock?: Clock;
}

/**
 * Fetches quotes from the oracle and refuses anything stale or malformed.
 * Nothing is cached: each call returns quotes valid at the moment it returns.
 */
export class OraclePriceAdapter {
  private readonly clock: Clock;
  private readonly fixedPrices: ReadonlyMap<string, Price>;

  constructor(
    private readonly oracle: PriceOracle,
    private readonly options: PriceAdapterOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.fixedPrices = options.fixedPrices ?? new Map();
  }

  async getPrice(assetId: string): Promise<PriceQuote> {
    const prices = await this.getPrices([assetId]);
    return prices.get(assetId);
  }

  async getPrices(assetIds: Iterable<string>): Promise<Prices> {
    const now = this.clock();
    const quotes: PriceQuote[] = [];
    const requested: string[] = [];

    for (const assetId of new Set(assetIds)) {
      const fixedPrice = this.fixedPrices.get(assetId);
      if (fixedPrice) {
        quotes.push({ assetId, ...fixedPrice, observedAt: now });
      } else {
        requested.push(assetId);
      }
    }

    if (requested.length === 0) {
      return new Prices(quotes);
    }

    let data: PriceData;
    try {
      data = await this.oracle.getPriceData(requested);
    } catch (error) {
      if (isEngineError(error)) {
        throw error;
      }
      logger.error('Failed to fetch price data', { error, assetIds: requested });
      throw new ExternalCallFailedError('price oracle query', error);
    }

    const checkedAt = this.clock();
    this.assertFresh(data, checkedAt);

    const byAsset = new Map(data.prices.map((entry) => [entry.assetId, entry.price]));
    for (const assetId of requested) {
      const price = byAsset.get(assetId);
      if (!price) {
        throw new UnknownAssetError(assetId);
      }
      if (price.multiplier <= 0n || price.decimals < 0 || price.decimals > MAX_PRICE_DECIMALS) {
        throw new ExternalCallFailedError(
          'malformed price',
          new Error(`multiplier ${price.multiplier} decimals ${price.decimals}`),
          { assetId }
        );
      }
      quotes.push({ assetId, ...price, observedAt: data.timestamp });
    }

    logger.debug('Prices fetched', { assetIds: requested, timestamp: data.timestamp });
    return new Prices(quotes);
  }

  private assertFresh(data: PriceData, now: number): void {
    if (data.recencyDurationSec > this.options.maxRecencyDurationSec) {
      throw new StalePriceError('oracle recency duration is too long', {
        recencyDurationSec: data.recencyDurationSec,
        maxRecencyDurationSec: this.options.maxRecencyDurationSec,
      });
    }
    if (data.timestamp > now) {
      throw new StalePriceError('price timestamp is in the future', {
        timestamp: data.timestamp,
        now,
      });
    }
    if (now - data.timestamp > this.options.recencyWindowMs) {
      throw new StalePriceError('price is older than the recency window', {
        timestamp: data.timestamp,
        now,
        recencyWindowMs: this.options.recencyWindowMs,
      });
    }
  }
}
