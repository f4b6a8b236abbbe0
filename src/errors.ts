export type EngineErrorCode =
  | 'StalePrice'
  | 'UnknownAsset'
  | 'AssetDisabled'
  | 'SlippageExceeded'
  | 'BelowMinimumExchange'
  | 'InsufficientBalance'
  | 'InsufficientCollateral'
  | 'NotLiquidatable'
  | 'Unauthorized'
  | 'InvalidConfiguration'
  | 'ExternalCallFailed'
  | 'UnsupportedAction'
  | 'PendingActionNotFound';

export type ErrorDetails = Record<string, string | number | boolean | null>;

/**
 * Base class for every failure the engine reports. Callers branch on `code`.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details: ErrorDetails;

  constructor(code: EngineErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = `${code}Error`;
    this.code = code;
    this.details = details;
  }
}

export class StalePriceError extends EngineError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('StalePrice', `Stale price: ${message}`, details);
  }
}

export class UnknownAssetError extends EngineError {
  constructor(assetId: string) {
    super('UnknownAsset', `Unknown asset: ${assetId}`, { assetId });
  }
}

export class AssetDisabledError extends EngineError {
  constructor(assetId: string) {
    super('AssetDisabled', `Asset is disabled: ${assetId}`, { assetId });
  }
}

export class SlippageExceededError extends EngineError {
  constructor(details: ErrorDetails) {
    super('SlippageExceeded', 'Slippage error: rate moved beyond the expected tolerance', details);
  }
}

export class BelowMinimumExchangeError extends EngineError {
  constructor(details: ErrorDetails = {}) {
    super('BelowMinimumExchange', 'Exchange amount is too small', details);
  }
}

export class InsufficientBalanceError extends EngineError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('InsufficientBalance', `Insufficient balance: ${message}`, details);
  }
}

export class InsufficientCollateralError extends EngineError {
  constructor(accountId: string) {
    super('InsufficientCollateral', `Not enough collateral to keep account ${accountId} healthy`, {
      accountId,
    });
  }
}

export class NotLiquidatableError extends EngineError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('NotLiquidatable', `Not liquidatable: ${message}`, details);
  }
}

export class UnauthorizedError extends EngineError {
  constructor(caller: string, required: readonly string[]) {
    super('Unauthorized', `${caller} is not allowed to perform this action`, {
      caller,
      required: required.join(','),
    });
  }
}

export class InvalidConfigurationError extends EngineError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('InvalidConfiguration', `Invalid configuration: ${message}`, details);
  }
}

export class ExternalCallFailedError extends EngineError {
  constructor(message: string, cause: unknown, details: ErrorDetails = {}) {
    super('ExternalCallFailed', `External call failed: ${message}`, details, cause);
  }
}

export class UnsupportedActionError extends EngineError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('UnsupportedAction', `Unsupported action: ${message}`, details);
  }
}

export class PendingActionNotFoundError extends EngineError {
  constructor(id: string) {
    super('PendingActionNotFound', `No unsettled pending action ${id}`, { id });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error('Invalid error type', { cause: err });
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}
