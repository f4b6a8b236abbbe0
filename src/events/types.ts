// Events emitted by the engine after a state change commits.
// Amounts are decimal strings in the asset's smallest unit.

export interface AssetAmount {
  assetId: string;
  amount: string;
}

// ============================================================================
// Money Market Events
// ============================================================================

export interface PositionEvent {
  action:
    | 'supply'
    | 'withdraw_started'
    | 'withdraw_succeeded'
    | 'withdraw_failed'
    | 'increase_collateral'
    | 'decrease_collateral'
    | 'borrow'
    | 'repay'
    | 'deposit_to_reserve';
  accountId: string;
  assetId: string;
  amount: string;
  timestamp: number;
}

export interface LiquidateEvent {
  action: 'liquidate';
  liquidatorId: string;
  accountId: string;
  repaid: AssetAmount[];
  seized: AssetAmount[];
  repaidValue: string;
  seizedValue: string;
  timestamp: number;
}

export interface ForceCloseEvent {
  action: 'force_close';
  accountId: string;
  collateral: AssetAmount[];
  debt: AssetAmount[];
  timestamp: number;
}

export interface AssetConfigEvent {
  action: 'asset_registered' | 'asset_updated' | 'asset_enabled' | 'asset_disabled';
  assetId: string;
  caller: string;
  timestamp: number;
}

// ============================================================================
// Exchange & Treasury Events
// ============================================================================

export interface ExchangeEvent {
  action: 'buy' | 'sell' | 'mint';
  accountId: string;
  recipientId: string;
  nativeAmount: string;
  stableAmount: string;
  spread: string;
  timestamp: number;
}

export interface TreasuryEvent {
  action: 'treasury_deposit' | 'treasury_withdraw';
  accountId: string;
  assetId: string;
  tokenAmount: string;
  stableAmount: string;
  commission: string;
  timestamp: number;
}

export interface CommissionTransferEvent {
  action: 'commission_transfer';
  receiverId: string;
  amount: string;
  timestamp: number;
}

export interface SagaSettledEvent {
  action: 'saga_settled';
  actionId: string;
  kind: string;
  status: string;
  timestamp: number;
}

export type EngineEvent =
  | PositionEvent
  | LiquidateEvent
  | ForceCloseEvent
  | AssetConfigEvent
  | ExchangeEvent
  | TreasuryEvent
  | CommissionTransferEvent
  | SagaSettledEvent;
