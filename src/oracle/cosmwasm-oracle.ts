import type { CosmWasmClient } from '@cosmjs/cosmwasm-stargate';
import { getCosmWasmClient } from '../utils/blockchain';
import type { AssetPrice, PriceData, PriceOracle } from './types';

/**
 * Price data response (from { get_price_data: { asset_ids } } query)
 */
export interface OraclePriceDataResponse {
  /** Nanoseconds since epoch. */
  timestamp: string;
  recency_duration_sec: number;
  prices: Array<{
    asset_id: string;
    price: { multiplier: string; decimals: number } | null;
  }>;
}

type ContractQuerier = Pick<CosmWasmClient, 'queryContractSmart'>;

const NANOS_PER_MILLI = 1_000_000n;

function parseUint(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Oracle returned a non-integer ${field}: ${value}`);
  }
  return BigInt(value);
}

export function toPriceData(response: OraclePriceDataResponse): PriceData {
  const prices: AssetPrice[] = response.prices.map((entry) => ({
    assetId: entry.asset_id,
    price: entry.price
      ? {
          multiplier: parseUint(entry.price.multiplier, 'multiplier'),
          decimals: entry.price.decimals,
        }
      : null,
  }));

  return {
    timestamp: Number(parseUint(response.timestamp, 'timestamp') / NANOS_PER_MILLI),
    recencyDurationSec: response.recency_duration_sec,
    prices,
  };
}

/**
 * Price oracle backed by a CosmWasm price-feed contract.
 */
export class CosmWasmPriceOracle implements PriceOracle {
  constructor(
    private readonly contractAddress: string,
    private readonly connect: () => Promise<ContractQuerier> = getCosmWasmClient
  ) {}

  async getPriceData(assetIds: readonly string[]): Promise<PriceData> {
    const client = await this.connect();
    const response = (await client.queryContractSmart(this.contractAddress, {
      get_price_data: { asset_ids: assetIds },
    })) as OraclePriceDataResponse;
    return toPriceData(response);
  }
}
