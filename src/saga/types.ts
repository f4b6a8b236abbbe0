export type PendingActionStatus = 'pending' | 'committed' | 'compensated' | 'stuck';

interface PendingActionBase {
  id: string;
  accountId: string;
  status: PendingActionStatus;
  createdAt: number;
  updatedAt: number;
  error: string | null;
}

/** Native coin held for a buy; refunded if the buy cannot complete. */
export interface BuyAction extends PendingActionBase {
  kind: 'buy';
  recipientId: string;
  nativeAmount: string;
}

/** Stable burnt for a sell; re-credited if the native payout fails. */
export interface SellAction extends PendingActionBase {
  kind: 'sell';
  stableAmount: string;
  nativeAmount: string;
  commission: string;
}

export interface TreasuryWithdrawAction extends PendingActionBase {
  kind: 'treasuryWithdraw';
  assetId: string;
  stableAmount: string;
  tokenAmount: string;
  commission: string;
}

/** Supplied balance removed ahead of an outbound token transfer. */
export interface MarketWithdrawAction extends PendingActionBase {
  kind: 'marketWithdraw';
  assetId: string;
  amount: string;
}

export type PendingAction = BuyAction | SellAction | TreasuryWithdrawAction | MarketWithdrawAction;

export type PendingActionKind = PendingAction['kind'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type PendingActionInput = DistributiveOmit<
  PendingAction,
  'id' | 'status' | 'createdAt' | 'updatedAt' | 'error'
>;

export type Compensator<K extends PendingActionKind> = (
  action: Extract<PendingAction, { kind: K }>
) => Promise<void> | void;

export type CompensatorMap = {
  [K in PendingActionKind]?: Compensator<K>;
};

export interface PendingActionFilter {
  status?: PendingActionStatus;
  accountId?: string;
  kind?: PendingActionKind;
}

export type SettledOutcome = 'committed' | 'compensated';
