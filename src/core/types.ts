export type TradeAction = 'BUY' | 'SELL';

/** Reserved identifier for the synthetic cash position sent to the strategy engine. */
export const CASH_IDENTIFIER = '$CASH';

export interface Position {
  securityIdentifier: string;
  brokerSymbol: string;
  shareQuantity: number; // signed: negative is short
}

/** Position as the brokerage reports it, before identity resolution. */
export interface BrokerPosition {
  symbol: string;
  quantity: number;
}

export type AllocationTarget = Record<string, number>;

export interface Transaction {
  securityIdentifier: string;
  brokerSymbol: string;
  kind: TradeAction;
  sharesRequested: number;
  referencePrice: number;
}

export interface PriceSnapshot {
  asOf: string;
  prices: Record<string, number>;
}

export interface Quote {
  symbol: string;
  bid: number;
  ask: number;
}

export type OrderType = 'LIMIT';
export type TimeInForce = 'DAY';

export interface OrderRequest {
  accountId: string;
  symbol: string;
  action: TradeAction;
  orderType: OrderType;
  quantity: number;
  limitPrice: number;
  timeInForce: TimeInForce;
}

export interface OrderLeg {
  symbol: string;
  action: TradeAction;
  quantityRequested: number;
  quantityFilled: number;
  quantityRemaining: number;
}

export interface OrderExecutionRecord {
  orderId: string;
  status: string;
  statusDescription: string;
  legs: OrderLeg[];
}

export interface RebalancePlan {
  allocation: AllocationTarget;
  allocationDate?: string;
  nextTradeDate?: string;
  transactions: Transaction[];
}

export interface LegRemainder {
  orderId: string;
  symbol: string;
  action: TradeAction;
  quantityRequested: number;
  quantityFilled: number;
  remainder: number;
}

export type AbortReason = 'NOT_CONFIRMED' | 'DID_NOT_CONVERGE' | 'ORDERS_STILL_WORKING' | 'CANCELLED';

export type SyncOutcome =
  | {
      status: 'CONVERGED';
      runId: string;
      iterations: number;
      executions: OrderExecutionRecord[];
      nextTradeDate?: string;
    }
  | {
      status: 'ABORTED';
      runId: string;
      iterations: number;
      reason: AbortReason;
      message: string;
      remainders: LegRemainder[];
      executions: OrderExecutionRecord[];
    }
  | {
      status: 'SKIPPED';
      runId: string;
      message: string;
    };

export type LedgerEventType =
  | 'SYNC_STARTED'
  | 'SYNC_SKIPPED'
  | 'ALLOCATION_RECEIVED'
  | 'SNAPSHOT_TAKEN'
  | 'PLAN_CREATED'
  | 'TRANSACTION_DROPPED'
  | 'ORDERS_PROPOSED'
  | 'CONFIRMATION_DECLINED'
  | 'ORDERS_CONFIRMED'
  | 'ORDERS_SUBMITTED'
  | 'FILLS_OBSERVED'
  | 'ORDERS_CANCELLED'
  | 'SYNC_CONVERGED'
  | 'SYNC_ABORTED'
  | 'SYNC_FAILED';

export interface LedgerEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
