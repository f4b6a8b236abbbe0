import { Decimal } from 'decimal.js';
import { InvalidConfigurationError } from '../errors';
import { FIXED_DECIMALS, ONE, ZERO, fixed } from '../utils/fixed-point';

export type SpreadConfig =
  | { kind: 'fixed'; spread: Decimal }
  | { kind: 'adaptive'; min: Decimal; max: Decimal; scaler: Decimal };

export const MAX_SPREAD = fixed('0.05');
export const MAX_SCALER = fixed('0.4');

export interface SpreadCalculatorOptions {
  /** Base half-life; the effective one is `scaler × halfLifeMs`. */
  halfLifeMs: number;
  /** Traded notional (whole stable units) at which the spread is ~63% of the way to `max`. */
  volumeUnit: Decimal;
}

function parseFraction(raw: unknown, field: string): Decimal {
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw new InvalidConfigurationError(`spread ${field} must be a decimal string`, { field });
  }
  try {
    return fixed(raw);
  } catch {
    throw new InvalidConfigurationError(`spread ${field} is not a number`, { field, value: String(raw) });
  }
}

/**
 * Builds a spread configuration from its JSON form, e.g.
 * `{"kind":"adaptive","min":"0.001","max":"0.02","scaler":"0.1"}`.
 */
export function parseSpreadConfig(raw: unknown): SpreadConfig {
  if (typeof raw !== 'object' || raw === null) {
    throw new InvalidConfigurationError('spread configuration must be an object');
  }
  const fields = new Map(Object.entries(raw));
  const kind = fields.get('kind');
  let parsed: SpreadConfig;
  if (kind === 'fixed') {
    parsed = { kind, spread: parseFraction(fields.get('spread'), 'spread') };
  } else if (kind === 'adaptive') {
    parsed = {
      kind,
      min: parseFraction(fields.get('min'), 'min'),
      max: parseFraction(fields.get('max'), 'max'),
      scaler: parseFraction(fields.get('scaler'), 'scaler'),
    };
  } else {
    throw new InvalidConfigurationError(`unknown spread kind ${String(kind)}`);
  }
  validateSpreadConfig(parsed);
  return parsed;
}

function inSpreadRange(value: Decimal): boolean {
  return value.gte(ZERO) && value.lt(MAX_SPREAD);
}

export function validateSpreadConfig(cfg: SpreadConfig): void {
  if (cfg.kind === 'fixed') {
    if (!inSpreadRange(cfg.spread)) {
      throw new InvalidConfigurationError('spread must be within [0, 0.05)', {
        spread: cfg.spread.toString(),
      });
    }
    return;
  }
  if (!inSpreadRange(cfg.min) || !inSpreadRange(cfg.max)) {
    throw new InvalidConfigurationError('min and max spread must be within [0, 0.05)', {
      min: cfg.min.toString(),
      max: cfg.max.toString(),
    });
  }
  if (!cfg.min.lt(cfg.max)) {
    throw new InvalidConfigurationError('min spread must be below max spread', {
      min: cfg.min.toString(),
      max: cfg.max.toString(),
    });
  }
  if (!cfg.scaler.gt(ZERO) || cfg.scaler.gt(MAX_SCALER)) {
    throw new InvalidConfigurationError('scaler must be within (0, 0.4]', {
      scaler: cfg.scaler.toString(),
    });
  }
}

export function describeSpreadConfig(cfg: SpreadConfig): Record<string, string> {
  if (cfg.kind === 'fixed') {
    return { kind: cfg.kind, spread: cfg.spread.toString() };
  }
  return {
    kind: cfg.kind,
    min: cfg.min.toString(),
    max: cfg.max.toString(),
    scaler: cfg.scaler.toString(),
  };
}

/**
 * Fixed or volume-adaptive exchange spread.
 *
 * In adaptive mode a decaying accumulator tracks recently traded notional.
 * It halves every `scaler × halfLifeMs` milliseconds, and the spread rises
 * from `min` toward `max` as `1 − e^(−volume / volumeUnit)`.
 */
export class SpreadCalculator {
  private current: SpreadConfig;
  private accumulator: Decimal = ZERO;
  private lastTradeAt: number | null = null;

  constructor(initial: SpreadConfig, private readonly options: SpreadCalculatorOptions) {
    validateSpreadConfig(initial);
    if (options.halfLifeMs <= 0 || !options.volumeUnit.gt(ZERO)) {
      throw new InvalidConfigurationError('spread half-life and volume unit must be positive');
    }
    this.current = initial;
  }

  get config(): SpreadConfig {
    return this.current;
  }

  /**
   * Replaces the active configuration. Validation runs first, so a rejected
   * configuration leaves the previous one in place.
   */
  setConfig(next: SpreadConfig): void {
    validateSpreadConfig(next);
    this.current = next;
  }

  /**
   * Recent traded notional in whole stable units, decayed to `now`.
   */
  volume(now: number): Decimal {
    if (this.lastTradeAt === null || this.accumulator.isZero()) {
      return this.accumulator;
    }
    const elapsed = Math.max(0, now - this.lastTradeAt);
    if (elapsed === 0) {
      return this.accumulator;
    }
    const halfLife = this.halfLifeMs();
    return this.accumulator.mul(fixed('0.5').pow(fixed(elapsed).div(halfLife)));
  }

  spread(now: number): Decimal {
    const cfg = this.current;
    if (cfg.kind === 'fixed') {
      return cfg.spread;
    }
    const response = ONE.minus(this.volume(now).div(this.options.volumeUnit).neg().exp());
    const raw = cfg.min.plus(cfg.max.minus(cfg.min).mul(response));
    const bounded = raw.lt(cfg.min) ? cfg.min : raw.gt(cfg.max) ? cfg.max : raw;
    return bounded.toDecimalPlaces(FIXED_DECIMALS, Decimal.ROUND_HALF_UP);
  }

  recordTrade(notional: Decimal, now: number): void {
    this.accumulator = this.volume(now).plus(notional);
    this.lastTradeAt = now;
  }

  private halfLifeMs(): Decimal {
    const cfg = this.current;
    const scaler = cfg.kind === 'adaptive' ? cfg.scaler : MAX_SCALER;
    return scaler.mul(this.options.halfLifeMs);
  }
}
