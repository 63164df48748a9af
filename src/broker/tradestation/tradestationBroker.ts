import { z } from 'zod';
import {
  BrokerPosition,
  OrderExecutionRecord,
  OrderLeg,
  OrderRequest,
  Quote,
  TradeAction
} from '../../core/types';
import { BrokerRequestError, OrderSubmissionError } from '../../core/errors';
import { Brokerage } from '../broker.types';
import { TradeStationClient } from '../../integrations/tradestationClient';

// TradeStation sends most numbers as strings; an empty string is not a number.
const numeric = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const n = typeof v === 'number' ? v : v.trim() === '' ? Number.NaN : Number(v);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${v}"` });
    return z.NEVER;
  }
  return n;
});

// Order legs of unrelated orders can carry blank quantities; blank reads as zero.
const quantity = z.union([z.literal(''), numeric]).transform((v) => (v === '' ? 0 : v));

const apiErrorSchema = z.object({
  AccountID: z.string().optional(),
  OrderID: z.string().optional(),
  Symbol: z.string().optional(),
  Error: z.string().optional(),
  Message: z.string().optional()
});

const positionsSchema = z.object({
  Positions: z.array(
    z.object({
      Symbol: z.string(),
      Quantity: numeric,
      LongShort: z.string().optional()
    })
  ).default([]),
  Errors: z.array(apiErrorSchema).default([])
});

const balancesSchema = z.object({
  Balances: z.array(z.object({ AccountID: z.string().optional(), CashBalance: numeric })).default([]),
  Errors: z.array(apiErrorSchema).default([])
});

const quotesSchema = z.object({
  Quotes: z.array(z.object({ Symbol: z.string(), Bid: numeric, Ask: numeric })).default([]),
  Errors: z.array(apiErrorSchema).default([])
});

const legSchema = z.object({
  Symbol: z.string(),
  BuyOrSell: z.string(),
  QuantityOrdered: quantity,
  ExecQuantity: quantity.default(0),
  QuantityRemaining: z.preprocess((v) => (v === '' ? undefined : v), numeric.optional())
});

const orderSchema = z.object({
  OrderID: z.string(),
  Status: z.string().default(''),
  StatusDescription: z.string().default(''),
  Legs: z.array(legSchema).default([])
});

const ordersSchema = z.object({
  Orders: z.array(orderSchema).default([]),
  Errors: z.array(apiErrorSchema).default([]),
  NextToken: z.string().optional()
});

const placeResponseSchema = z.object({
  Orders: z
    .array(
      z.object({
        OrderID: z.string(),
        Message: z.string().optional(),
        Error: z.string().optional()
      })
    )
    .default([]),
  Errors: z.array(apiErrorSchema).default([])
});

const parseWire = <T extends z.ZodTypeAny>(schema: T, payload: unknown, operation: string, accountId?: string): z.infer<T> => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new BrokerRequestError(`Unexpected brokerage response: ${issues}`, { operation, accountId });
  }
  return result.data;
};

const describeApiErrors = (errors: z.infer<typeof apiErrorSchema>[]) =>
  errors.map((e) => [e.Symbol ?? e.OrderID, e.Error, e.Message].filter(Boolean).join(': ')).join('; ');

const toAction = (buyOrSell: string): TradeAction => (/^sell/i.test(buyOrSell) ? 'SELL' : 'BUY');

const toLeg = (leg: z.infer<typeof legSchema>): OrderLeg => ({
  symbol: leg.Symbol,
  action: toAction(leg.BuyOrSell),
  quantityRequested: leg.QuantityOrdered,
  quantityFilled: leg.ExecQuantity,
  quantityRemaining: leg.QuantityRemaining ?? Math.max(0, leg.QuantityOrdered - leg.ExecQuantity)
});

/** Wire form of an order: quantities and prices as strings, limit price at cent precision. */
export const toWireOrder = (order: OrderRequest) => ({
  AccountID: order.accountId,
  Symbol: order.symbol,
  Quantity: String(order.quantity),
  OrderType: 'Limit',
  LimitPrice: order.limitPrice.toFixed(2),
  TradeAction: order.action,
  TimeInForce: { Duration: order.timeInForce }
});

export class TradeStationBroker implements Brokerage {
  constructor(private readonly client: TradeStationClient) {}

  async listPositions(accountId: string): Promise<BrokerPosition[]> {
    const op = 'listPositions';
    const json = await this.client.request('GET', `/brokerage/accounts/${encodeURIComponent(accountId)}/positions`, {
      context: { accountId }
    });
    const parsed = parseWire(positionsSchema, json, op, accountId);
    if (parsed.Errors.length) {
      throw new BrokerRequestError(`Positions request returned errors: ${describeApiErrors(parsed.Errors)}`, {
        operation: op,
        accountId
      });
    }
    return parsed.Positions.map((p) => ({
      symbol: p.Symbol,
      quantity: p.LongShort?.toLowerCase() === 'short' && p.Quantity > 0 ? -p.Quantity : p.Quantity
    }));
  }

  async getCashBalance(accountId: string): Promise<number> {
    const op = 'getCashBalance';
    const json = await this.client.request('GET', `/brokerage/accounts/${encodeURIComponent(accountId)}/balances`, {
      context: { accountId }
    });
    const parsed = parseWire(balancesSchema, json, op, accountId);
    if (parsed.Errors.length) {
      throw new BrokerRequestError(`Balances request returned errors: ${describeApiErrors(parsed.Errors)}`, {
        operation: op,
        accountId
      });
    }
    const balance = parsed.Balances.find((b) => !b.AccountID || b.AccountID === accountId);
    if (!balance) {
      throw new BrokerRequestError('No balance returned for account', { operation: op, accountId });
    }
    return balance.CashBalance;
  }

  async getQuotes(symbols: string[]): Promise<Quote[]> {
    if (!symbols.length) return [];
    const op = 'getQuotes';
    const joined = symbols.map((s) => encodeURIComponent(s)).join(',');
    const json = await this.client.request('GET', `/marketdata/quotes/${joined}`, {
      context: { symbols: symbols.join(',') }
    });
    const parsed = parseWire(quotesSchema, json, op);
    if (parsed.Errors.length) {
      throw new BrokerRequestError(`Quote request failed: ${describeApiErrors(parsed.Errors)}`, {
        operation: op,
        symbols: parsed.Errors.map((e) => e.Symbol).filter(Boolean).join(',')
      });
    }
    return parsed.Quotes.map((q) => ({ symbol: q.Symbol, bid: q.Bid, ask: q.Ask }));
  }

  async submitOrderGroup(accountId: string, orders: OrderRequest[]): Promise<OrderExecutionRecord[]> {
    const op = 'submitOrderGroup';
    let json: unknown;
    try {
      json = await this.client.request('POST', '/orderexecution/ordergroups', {
        body: { Type: 'NORMAL', Orders: orders.map(toWireOrder) },
        context: { accountId }
      });
    } catch (err) {
      throw new OrderSubmissionError('Order group submission failed', { operation: op, accountId }, { cause: err });
    }
    const result = placeResponseSchema.safeParse(json);
    if (!result.success) {
      throw new OrderSubmissionError('Unexpected order group response', { operation: op, accountId });
    }
    const failed = result.data.Orders.filter((o) => o.Error);
    if (result.data.Errors.length || failed.length) {
      const detail = describeApiErrors([
        ...result.data.Errors,
        ...failed.map((o) => ({ OrderID: o.OrderID, Error: o.Error, Message: o.Message }))
      ]);
      throw new OrderSubmissionError(`Order group rejected: ${detail}`, { operation: op, accountId });
    }
    return result.data.Orders.map((placed, idx) => {
      const req = orders[idx];
      return {
        orderId: placed.OrderID,
        status: 'ACK',
        statusDescription: placed.Message ?? 'Received',
        legs: req
          ? [
              {
                symbol: req.symbol,
                action: req.action,
                quantityRequested: req.quantity,
                quantityFilled: 0,
                quantityRemaining: req.quantity
              }
            ]
          : []
      };
    });
  }

  async getOrderStatus(accountId: string): Promise<OrderExecutionRecord[]> {
    const op = 'getOrderStatus';
    const records: OrderExecutionRecord[] = [];
    let nextToken: string | undefined;
    do {
      const json = await this.client.request('GET', `/brokerage/accounts/${encodeURIComponent(accountId)}/orders`, {
        params: nextToken ? { nextToken } : undefined,
        context: { accountId }
      });
      const parsed = parseWire(ordersSchema, json, op, accountId);
      if (parsed.Errors.length) {
        throw new BrokerRequestError(`Orders request returned errors: ${describeApiErrors(parsed.Errors)}`, {
          operation: op,
          accountId
        });
      }
      for (const o of parsed.Orders) {
        records.push({
          orderId: o.OrderID,
          status: o.Status,
          statusDescription: o.StatusDescription,
          legs: o.Legs.map(toLeg)
        });
      }
      nextToken = parsed.NextToken || undefined;
    } while (nextToken);
    return records;
  }

  async cancelOrder(accountId: string, orderId: string): Promise<void> {
    await this.client.request('DELETE', `/orderexecution/orders/${encodeURIComponent(orderId)}`, {
      context: { accountId, orderId }
    });
  }
}
