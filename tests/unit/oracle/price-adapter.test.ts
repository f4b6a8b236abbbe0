import { describe, it, expect, beforeEach } from 'vitest';
import { UnknownAssetError } from '../../../src/errors';
import { OraclePriceAdapter } from '../../../src/oracle/price-adapter';
import { ASSETS, ETH_PRICE, FakeOracle, ManualClock, START_TIME, expectEngineError } from '../../helpers';

describe('OraclePriceAdapter', () => {
  let clock: ManualClock;
  let oracle: FakeOracle;
  let adapter: OraclePriceAdapter;

  beforeEach(() => {
    clock = new ManualClock(START_TIME);
    oracle = new FakeOracle(clock.now);
    oracle.setPrice(ASSETS.eth, ETH_PRICE.multiplier, ETH_PRICE.decimals);
    adapter = new OraclePriceAdapter(oracle, {
      recencyWindowMs: 90_000,
      maxRecencyDurationSec: 90,
      fixedPrices: new Map([[ASSETS.stable, { multiplier: 10000n, decimals: 22 }]]),
      clock: clock.now,
    });
  });

  describe('happy path', () => {
    it('returns the oracle quote stamped with its observation time', async () => {
      oracle.ageMs = 5_000;
      const quote = await adapter.getPrice(ASSETS.eth);
      expect(quote).toEqual({
        assetId: ASSETS.eth,
        multiplier: 2000n,
        decimals: 18,
        observedAt: START_TIME - 5_000,
      });
    });

    it('serves fixed prices without asking the oracle', async () => {
      const quote = await adapter.getPrice(ASSETS.stable);
      expect(quote.multiplier).toBe(10000n);
      expect(oracle.requests).toHaveLength(0);
    });

    it('asks for each oracle-priced asset once', async () => {
      const prices = await adapter.getPrices([ASSETS.stable, ASSETS.eth, ASSETS.eth]);
      expect(oracle.requests).toEqual([[ASSETS.eth]]);
      expect(prices.assetIds().sort()).toEqual([ASSETS.eth, ASSETS.stable].sort());
    });

    it('accepts a quote exactly at the edge of the window', async () => {
      oracle.ageMs = 90_000;
      await expect(adapter.getPrice(ASSETS.eth)).resolves.toMatchObject({ multiplier: 2000n });
    });
  });

  describe('freshness', () => {
    it('rejects quotes older than the window', async () => {
      oracle.ageMs = 90_001;
      await expectEngineError(() => adapter.getPrice(ASSETS.eth), 'StalePrice');
    });

    it('rejects quotes from the future', async () => {
      oracle.ageMs = -1;
      await expectEngineError(() => adapter.getPrice(ASSETS.eth), 'StalePrice');
    });

    it('rejects an oracle recency duration above the limit', async () => {
      oracle.recencyDurationSec = 91;
      await expectEngineError(() => adapter.getPrice(ASSETS.eth), 'StalePrice');
    });
  });

  describe('failures', () => {
    it('reports an asset the oracle does not price', async () => {
      await expectEngineError(() => adapter.getPrice(ASSETS.usdt), 'UnknownAsset');
    });

    it('wraps transport errors as ExternalCallFailed', async () => {
      oracle.failure = new Error('connection refused');
      await expectEngineError(() => adapter.getPrice(ASSETS.eth), 'ExternalCallFailed');
    });

    it('passes engine errors through unchanged', async () => {
      const failure = new UnknownAssetError(ASSETS.eth);
      oracle.failure = failure;
      await expect(adapter.getPrice(ASSETS.eth)).rejects.toBe(failure);
    });

    it('rejects malformed prices', async () => {
      oracle.setPrice(ASSETS.eth, 0n, 18);
      await expectEngineError(() => adapter.getPrice(ASSETS.eth), 'ExternalCallFailed');
    });
  });
});
