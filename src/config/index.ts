import * as dotenv from 'dotenv';
import { Decimal } from 'decimal.js';
import { type SpreadConfig, parseSpreadConfig } from '../exchange/spread';
import { type AssetRoute, parseAssetRoutes } from '../ledger/transfer-venue';
import type { Price } from '../oracle/types';
import { fixed } from '../utils/fixed-point';

dotenv.config();

export interface EngineConfig {
  owner: {
    accountId: string;
    guardians: string[];
  };
  stable: {
    assetId: string;
    decimals: number;
    price: Price;
  };
  native: {
    assetId: string;
    decimals: number;
  };
  oracle: {
    rpcEndpoint: string;
    contractAddress: string;
    recencyWindowMs: number;
    maxRecencyDurationSec: number;
  };
  venue: {
    mnemonic: string;
    addressPrefix: string;
    gasPrice: string;
    assets: Map<string, AssetRoute>;
  };
  exchange: {
    spread: SpreadConfig;
    spreadHalfLifeMs: number;
    spreadVolumeUnit: Decimal;
    minCollateralRatio: number;
    maxCollateralRatio: number;
  };
  market: {
    maxNumAssets: number;
    liquidationIncentive: Decimal;
    forceClosingEnabled: boolean;
  };
  saga: {
    recoveryIntervalMs: number;
  };
  api: {
    port: number;
    enableSubscriptions: boolean;
  };
  logging: {
    level: string;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value) {
    return value;
  }
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvInt(key: string, defaultValue: string): number {
  const value = parseInt(getEnvVar(key, defaultValue), 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return value;
}

function getEnvList(key: string): string[] {
  const parsed: unknown = JSON.parse(getEnvVar(key, '[]'));
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Environment variable ${key} must be a JSON array of strings`);
  }
  return parsed;
}

export const config: EngineConfig = {
  owner: {
    accountId: getEnvVar('OWNER_ACCOUNT_ID', 'owner'),
    guardians: getEnvList('GUARDIAN_ACCOUNT_IDS'),
  },
  stable: {
    assetId: getEnvVar('STABLE_ASSET_ID', 'stable'),
    decimals: 18,
    // 1 stable unit (10^18) is worth exactly one reference unit.
    price: { multiplier: 10000n, decimals: 22 },
  },
  native: {
    assetId: getEnvVar('NATIVE_ASSET_ID', 'wrap'),
    decimals: getEnvInt('NATIVE_DECIMALS', '24'),
  },
  oracle: {
    rpcEndpoint: getEnvVar('RPC_ENDPOINT', 'http://localhost:26657'),
    contractAddress: getEnvVar('ORACLE_ADDRESS', ''),
    recencyWindowMs: getEnvInt('PRICE_RECENCY_WINDOW_MS', '90000'),
    maxRecencyDurationSec: getEnvInt('PRICE_MAX_RECENCY_DURATION_SEC', '90'),
  },
  venue: {
    mnemonic: getEnvVar('VENUE_MNEMONIC', ''),
    addressPrefix: getEnvVar('ADDRESS_PREFIX', 'wasm'),
    gasPrice: getEnvVar('GAS_PRICE', '0.025uwasm'),
    assets: parseAssetRoutes(JSON.parse(getEnvVar('VENUE_ASSETS', '{}'))),
  },
  exchange: {
    spread: parseSpreadConfig(JSON.parse(getEnvVar('EXCHANGE_SPREAD', '{"kind":"fixed","spread":"0.005"}'))),
    spreadHalfLifeMs: getEnvInt('SPREAD_HALF_LIFE_MS', '3600000'),
    spreadVolumeUnit: fixed(getEnvVar('SPREAD_VOLUME_UNIT', '1000000')),
    minCollateralRatio: 100,
    maxCollateralRatio: 1000,
  },
  market: {
    maxNumAssets: getEnvInt('MAX_NUM_ASSETS', '20'),
    liquidationIncentive: fixed(getEnvVar('LIQUIDATION_INCENTIVE', '0.05')),
    forceClosingEnabled: getEnvVar('FORCE_CLOSING_ENABLED', 'true') === 'true',
  },
  saga: {
    recoveryIntervalMs: getEnvInt('SAGA_RECOVERY_INTERVAL_MS', '30000'),
  },
  api: {
    port: getEnvInt('API_PORT', '4000'),
    enableSubscriptions: getEnvVar('ENABLE_SUBSCRIPTIONS', 'true') === 'true',
  },
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
  },
};
