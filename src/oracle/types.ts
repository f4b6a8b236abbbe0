import { UnknownAssetError } from '../errors';

/**
 * Price of one smallest unit: `multiplier × 10^-decimals` reference units.
 */
export interface Price {
  multiplier: bigint;
  decimals: number;
}

export interface PriceQuote extends Price {
  assetId: string;
  /** Milliseconds since epoch. */
  observedAt: number;
}

export interface AssetPrice {
  assetId: string;
  price: Price | null;
}

/**
 * Batched answer from the price oracle.
 */
export interface PriceData {
  timestamp: number;
  recencyDurationSec: number;
  prices: AssetPrice[];
}

export interface PriceOracle {
  getPriceData(assetIds: readonly string[]): Promise<PriceData>;
}

/**
 * Quotes obtained within one logical operation.
 */
export class Prices {
  private readonly quotes = new Map<string, PriceQuote>();

  constructor(quotes: Iterable<PriceQuote> = []) {
    for (const quote of quotes) {
      this.quotes.set(quote.assetId, quote);
    }
  }

  get(assetId: string): PriceQuote {
    const quote = this.quotes.get(assetId);
    if (!quote) {
      throw new UnknownAssetError(assetId);
    }
    return quote;
  }

  has(assetId: string): boolean {
    return this.quotes.has(assetId);
  }

  assetIds(): string[] {
    return [...this.quotes.keys()];
  }
}
