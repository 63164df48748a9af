import { z } from 'zod';
import { BrokerPosition, OrderExecutionRecord, OrderRequest, Quote } from '../core/types';
import { BrokerRequestError, ConfigError, OrderSubmissionError, describeError } from '../core/errors';
import { hashString, readJSONFile } from '../core/utils';
import { Brokerage, isSettledStatus } from './broker.types';

const quoteSchema = z.object({ bid: z.number().positive(), ask: z.number().positive() });

export const stubAccountSchema = z.object({
  accountId: z.string().min(1).optional(),
  cash: z.number(),
  positions: z.record(z.number()).default({}),
  quotes: z.record(quoteSchema).default({}),
  fillRatio: z.number().min(0).max(1).default(1)
});

export type StubAccountSeed = z.input<typeof stubAccountSchema>;

/**
 * In-memory brokerage. Orders fill immediately at their limit price, up to
 * `fillRatio` of the requested quantity (floored); the rest stays working
 * until cancelled.
 */
export class StubBroker implements Brokerage {
  private cash: number;
  private readonly positions = new Map<string, number>();
  private readonly quotes = new Map<string, Quote>();
  private readonly orders = new Map<string, OrderExecutionRecord>();
  private readonly accountId?: string;
  private sequence = 0;
  fillRatio: number;

  constructor(seed: StubAccountSeed) {
    const parsed = stubAccountSchema.parse(seed);
    this.accountId = parsed.accountId;
    this.cash = parsed.cash;
    this.fillRatio = parsed.fillRatio;
    for (const [symbol, qty] of Object.entries(parsed.positions)) this.positions.set(symbol, qty);
    for (const [symbol, q] of Object.entries(parsed.quotes)) this.quotes.set(symbol, { symbol, bid: q.bid, ask: q.ask });
  }

  static fromFile(filePath: string): StubBroker {
    let raw: unknown;
    try {
      raw = readJSONFile(filePath);
    } catch (err) {
      throw new ConfigError(`Could not read stub account file: ${describeError(err)}`, { file: filePath });
    }
    const result = stubAccountSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid stub account file: ${issues}`, { file: filePath });
    }
    return new StubBroker(result.data);
  }

  setQuote(symbol: string, bid: number, ask: number) {
    this.quotes.set(symbol, { symbol, bid, ask });
  }

  private checkAccount(accountId: string, operation: string) {
    if (this.accountId && this.accountId !== accountId) {
      throw new BrokerRequestError('Unknown account', { operation, accountId });
    }
  }

  async listPositions(accountId: string): Promise<BrokerPosition[]> {
    this.checkAccount(accountId, 'listPositions');
    return [...this.positions.entries()]
      .filter(([, quantity]) => quantity !== 0)
      .map(([symbol, quantity]) => ({ symbol, quantity }));
  }

  async getCashBalance(accountId: string): Promise<number> {
    this.checkAccount(accountId, 'getCashBalance');
    return this.cash;
  }

  async getQuotes(symbols: string[]): Promise<Quote[]> {
    const missing = symbols.filter((s) => !this.quotes.has(s));
    if (missing.length) {
      throw new BrokerRequestError('No quote for symbol', { operation: 'getQuotes', symbols: missing.join(',') });
    }
    return symbols.flatMap((s) => {
      const quote = this.quotes.get(s);
      return quote ? [{ ...quote }] : [];
    });
  }

  async submitOrderGroup(accountId: string, orders: OrderRequest[]): Promise<OrderExecutionRecord[]> {
    this.checkAccount(accountId, 'submitOrderGroup');
    const invalid = orders.find((o) => !Number.isInteger(o.quantity) || o.quantity <= 0 || o.limitPrice <= 0);
    if (invalid) {
      throw new OrderSubmissionError('Invalid order in group', {
        operation: 'submitOrderGroup',
        accountId,
        symbol: invalid.symbol,
        quantity: invalid.quantity
      });
    }
    return orders.map((order) => {
      this.sequence += 1;
      const orderId = `ord-${order.symbol}-${hashString(`${order.symbol}-${this.sequence}`)}`;
      const filled = Math.floor(order.quantity * this.fillRatio);
      this.applyFill(order, filled);
      const record: OrderExecutionRecord = {
        orderId,
        status: filled === order.quantity ? 'FLL' : filled > 0 ? 'FPR' : 'OPN',
        statusDescription: filled === order.quantity ? 'Filled' : filled > 0 ? 'Partial Fill' : 'Received',
        legs: [
          {
            symbol: order.symbol,
            action: order.action,
            quantityRequested: order.quantity,
            quantityFilled: filled,
            quantityRemaining: order.quantity - filled
          }
        ]
      };
      this.orders.set(orderId, record);
      return cloneRecord(record);
    });
  }

  private applyFill(order: OrderRequest, quantity: number) {
    if (quantity === 0) return;
    const direction = order.action === 'BUY' ? 1 : -1;
    this.cash -= direction * quantity * order.limitPrice;
    const next = (this.positions.get(order.symbol) ?? 0) + direction * quantity;
    if (next === 0) this.positions.delete(order.symbol);
    else this.positions.set(order.symbol, next);
  }

  async getOrderStatus(accountId: string): Promise<OrderExecutionRecord[]> {
    this.checkAccount(accountId, 'getOrderStatus');
    return [...this.orders.values()].map(cloneRecord);
  }

  async cancelOrder(accountId: string, orderId: string): Promise<void> {
    this.checkAccount(accountId, 'cancelOrder');
    const record = this.orders.get(orderId);
    if (!record) {
      throw new BrokerRequestError('Unknown order', { operation: 'cancelOrder', accountId, orderId });
    }
    if (isSettledStatus(record.status)) return;
    record.status = 'CAN';
    record.statusDescription = 'Cancelled';
  }
}

const cloneRecord = (record: OrderExecutionRecord): OrderExecutionRecord => ({
  ...record,
  legs: record.legs.map((leg) => ({ ...leg }))
});
