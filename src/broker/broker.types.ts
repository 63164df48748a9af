import { BrokerPosition, OrderExecutionRecord, OrderRequest, Quote } from '../core/types';

export interface Brokerage {
  listPositions(accountId: string): Promise<BrokerPosition[]>;
  getCashBalance(accountId: string): Promise<number>;
  /** All requested symbols must come back; a per-symbol error fails the whole call. */
  getQuotes(symbols: string[]): Promise<Quote[]>;
  /** Places every order in one group request. */
  submitOrderGroup(accountId: string, orders: OrderRequest[]): Promise<OrderExecutionRecord[]>;
  getOrderStatus(accountId: string): Promise<OrderExecutionRecord[]>;
  cancelOrder(accountId: string, orderId: string): Promise<void>;
}

/** Broker order status codes that no longer change. */
export const TERMINAL_ORDER_STATUSES: ReadonlySet<string> = new Set(['FLL', 'CAN', 'REJ', 'EXP', 'BRO']);

export const isSettledStatus = (status: string) => TERMINAL_ORDER_STATUSES.has(status.toUpperCase());
