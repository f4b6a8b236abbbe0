import type { EngineConfig } from '../../src/config';
import { createEngine, type Engine, type EngineDeps } from '../../src/engine';
import { InMemoryTokenLedger } from '../../src/ledger/token-ledger';
import type { AssetConfig } from '../../src/market/asset-config';
import { ZERO, fixed } from '../../src/utils/fixed-point';
import { FakeOracle, ManualClock, ScriptedVenue } from './mocks';

// Test accounts
export const ACCOUNTS = {
  owner: 'owner.test',
  guardian: 'guardian.test',
  alice: 'alice.test',
  bob: 'bob.test',
  carol: 'carol.test',
  liquidator: 'liquidator.test',
};

export const ASSETS = {
  stable: 'stable.test',
  native: 'wrap.test',
  usdt: 'usdt.test',
  eth: 'eth.test',
};

// Amount helpers (smallest units)
export const STABLE = (units: number | bigint) => BigInt(units) * 10n ** 18n;
export const ETH = (units: number | bigint) => BigInt(units) * 10n ** 18n;
export const USDT = (units: number | bigint) => BigInt(units) * 10n ** 6n;

export const START_TIME = 1_700_000_000_000;
export const ONE_DAY_MS = 86_400_000;

// 1 yocto-native = 111439 × 10^-28 stable reference units
export const NATIVE_PRICE = { multiplier: 111439n, decimals: 28 };
// 1 wei of eth = 2000 × 10^-18 reference units
export const ETH_PRICE = { multiplier: 2000n, decimals: 18 };
// 1 micro-usdt = 10^-6 reference units
export const USDT_PRICE = { multiplier: 1n, decimals: 6 };

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    owner: { accountId: ACCOUNTS.owner, guardians: [ACCOUNTS.guardian] },
    stable: {
      assetId: ASSETS.stable,
      decimals: 18,
      price: { multiplier: 10000n, decimals: 22 },
    },
    native: { assetId: ASSETS.native, decimals: 24 },
    oracle: {
      rpcEndpoint: 'http://localhost:26657',
      contractAddress: 'cosmos1oracletest',
      recencyWindowMs: 90_000,
      maxRecencyDurationSec: 90,
    },
    exchange: {
      spread: { kind: 'fixed', spread: fixed('0.001') },
      spreadHalfLifeMs: 3_600_000,
      spreadVolumeUnit: fixed('1000000'),
      minCollateralRatio: 100,
      maxCollateralRatio: 1000,
    },
    market: {
      maxNumAssets: 10,
      liquidationIncentive: fixed('0.05'),
      forceClosingEnabled: true,
    },
    saga: { recoveryIntervalMs: 30_000 },
    api: { port: 4000, enableSubscriptions: false },
    venue: { mnemonic: '', addressPrefix: 'wasm', gasPrice: '0.025uwasm', assets: new Map() },
    logging: { level: 'error' },
    ...overrides,
  };
}

// Collateral asset without its own borrowing demand
export function collateralAssetConfig(decimals: number, collateralFactor = '0.8'): AssetConfig {
  return {
    decimals,
    curve: { baseRate: ZERO, slope1: ZERO, slope2: ZERO, kink: fixed('0.8') },
    reserveFactor: fixed('0.1'),
    collateralFactor: fixed(collateralFactor),
    canDeposit: true,
    canWithdraw: true,
    canUseAsCollateral: true,
    canBorrow: true,
  };
}

// Lendable asset with a kinked curve
export function lendableAssetConfig(decimals: number): AssetConfig {
  return {
    decimals,
    curve: {
      baseRate: fixed('0.000000000001'),
      slope1: fixed('0.000000000002'),
      slope2: fixed('0.00000000002'),
      kink: fixed('0.8'),
    },
    reserveFactor: fixed('0.2'),
    collateralFactor: fixed('0.9'),
    canDeposit: true,
    canWithdraw: true,
    canUseAsCollateral: true,
    canBorrow: true,
  };
}

export interface TestEngine {
  engine: Engine;
  oracle: FakeOracle;
  clock: ManualClock;
  venue: ScriptedVenue;
  ledger: InMemoryTokenLedger;
}

export function createTestEngine(
  overrides: Partial<EngineConfig> = {},
  deps: Pick<EngineDeps, 'repository'> = {}
): TestEngine {
  const clock = new ManualClock(START_TIME);
  const oracle = new FakeOracle(clock.now);
  oracle.setPrice(ASSETS.native, NATIVE_PRICE.multiplier, NATIVE_PRICE.decimals);
  oracle.setPrice(ASSETS.eth, ETH_PRICE.multiplier, ETH_PRICE.decimals);
  oracle.setPrice(ASSETS.usdt, USDT_PRICE.multiplier, USDT_PRICE.decimals);
  const venue = new ScriptedVenue();
  const ledger = new InMemoryTokenLedger();
  const engine = createEngine(testConfig(overrides), { ...deps, oracle, venue, ledger, clock: clock.now });
  return { engine, oracle, clock, venue, ledger };
}

// Engine with eth (collateral) and usdt (lendable) registered in the market
export function createMarketEngine(
  overrides: Partial<EngineConfig> = {},
  deps: Pick<EngineDeps, 'repository'> = {}
): TestEngine {
  const test = createTestEngine(overrides, deps);
  const owner = test.engine.authFor(ACCOUNTS.owner);
  test.engine.market.registerAsset(owner, ASSETS.eth, collateralAssetConfig(18));
  test.engine.market.registerAsset(owner, ASSETS.usdt, lendableAssetConfig(6));
  return test;
}
