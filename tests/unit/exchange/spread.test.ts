import { describe, it, expect } from 'vitest';
import {
  SpreadCalculator,
  describeSpreadConfig,
  parseSpreadConfig,
  type SpreadConfig,
} from '../../../src/exchange/spread';
import { fixed } from '../../../src/utils/fixed-point';
import { START_TIME, expectDecimalEquals, expectEngineError } from '../../helpers';

const OPTIONS = { halfLifeMs: 3_600_000, volumeUnit: fixed(1000) };

const adaptive: SpreadConfig = {
  kind: 'adaptive',
  min: fixed('0.001'),
  max: fixed('0.02'),
  scaler: fixed('0.1'),
};

describe('spread configuration', () => {
  it('parses the fixed form', () => {
    const cfg = parseSpreadConfig({ kind: 'fixed', spread: '0.005' });
    expect(describeSpreadConfig(cfg)).toEqual({ kind: 'fixed', spread: '0.005' });
  });

  it('parses the adaptive form', () => {
    const cfg = parseSpreadConfig({ kind: 'adaptive', min: '0.001', max: '0.02', scaler: '0.1' });
    expect(describeSpreadConfig(cfg)).toEqual({
      kind: 'adaptive',
      min: '0.001',
      max: '0.02',
      scaler: '0.1',
    });
  });

  it('rejects unknown kinds and missing fields', async () => {
    await expectEngineError(() => parseSpreadConfig({ kind: 'curve' }), 'InvalidConfiguration');
    await expectEngineError(() => parseSpreadConfig({ kind: 'fixed' }), 'InvalidConfiguration');
    await expectEngineError(() => parseSpreadConfig('0.01'), 'InvalidConfiguration');
  });

  it('enforces bounds', async () => {
    await expectEngineError(() => parseSpreadConfig({ kind: 'fixed', spread: '0.05' }), 'InvalidConfiguration');
    await expectEngineError(
      () => parseSpreadConfig({ kind: 'adaptive', min: '0.02', max: '0.01', scaler: '0.1' }),
      'InvalidConfiguration'
    );
    await expectEngineError(
      () => parseSpreadConfig({ kind: 'adaptive', min: '0.001', max: '0.02', scaler: '0.5' }),
      'InvalidConfiguration'
    );
  });
});

describe('SpreadCalculator', () => {
  it('keeps a fixed spread regardless of volume', () => {
    const calculator = new SpreadCalculator({ kind: 'fixed', spread: fixed('0.005') }, OPTIONS);
    calculator.recordTrade(fixed(1_000_000), START_TIME);
    expectDecimalEquals(calculator.spread(START_TIME), '0.005');
  });

  it('starts an adaptive spread at its minimum', () => {
    const calculator = new SpreadCalculator(adaptive, OPTIONS);
    expectDecimalEquals(calculator.spread(START_TIME), '0.001');
  });

  it('widens with traded volume', () => {
    const calculator = new SpreadCalculator(adaptive, OPTIONS);
    calculator.recordTrade(fixed(1000), START_TIME);
    expectDecimalEquals(calculator.spread(START_TIME), '0.013010290617742595889685048');
  });

  it('halves the volume every scaler × half-life', () => {
    const calculator = new SpreadCalculator(adaptive, OPTIONS);
    calculator.recordTrade(fixed(1000), START_TIME);
    const later = START_TIME + 360_000;
    expectDecimalEquals(calculator.volume(later), '500');
    expectDecimalEquals(calculator.spread(later), '0.008475917465459964951527809');
  });

  it('never exceeds the maximum', () => {
    const calculator = new SpreadCalculator(adaptive, OPTIONS);
    calculator.recordTrade(fixed(1_000_000), START_TIME);
    expectDecimalEquals(calculator.spread(START_TIME), '0.02');
  });

  it('keeps the previous configuration when a new one is invalid', async () => {
    const calculator = new SpreadCalculator(adaptive, OPTIONS);
    await expectEngineError(
      () => calculator.setConfig({ kind: 'fixed', spread: fixed('0.2') }),
      'InvalidConfiguration'
    );
    expect(calculator.config).toBe(adaptive);
  });
});
