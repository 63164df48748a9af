import { OrderRequest, Transaction } from '../core/types';
import { roundCents } from '../core/utils';

/**
 * Running cash projection for one sizing pass. Display only: it never blocks
 * an order, since the engine already planned against the live cash balance.
 */
export class CashLedger {
  private balance: number;

  constructor(startingCash: number) {
    this.balance = startingCash;
  }

  get remaining(): number {
    return this.balance;
  }

  apply(order: Pick<OrderRequest, 'action' | 'quantity' | 'limitPrice'>) {
    const notional = order.quantity * order.limitPrice;
    this.balance += order.action === 'BUY' ? -notional : notional;
  }
}

export class OrderSizer {
  constructor(private readonly accountId: string) {}

  /** One whole-share DAY limit order per transaction, quantity truncated toward zero. */
  buildOrders(transactions: Transaction[], cashLedger: CashLedger): OrderRequest[] {
    return transactions.map((t) => {
      const order: OrderRequest = {
        accountId: this.accountId,
        symbol: t.brokerSymbol,
        action: t.kind,
        orderType: 'LIMIT',
        quantity: Math.floor(t.sharesRequested),
        limitPrice: roundCents(t.referencePrice),
        timeInForce: 'DAY'
      };
      cashLedger.apply(order);
      return order;
    });
  }
}
