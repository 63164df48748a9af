import { OrderRequest } from '../src/core/types';
import { renderOrders, renderOutcome } from '../src/ui/render';

describe('render', () => {
  it('lays out orders with an expected cost column', () => {
    const order: OrderRequest = {
      accountId: 'ACC-1',
      symbol: 'MSFT',
      action: 'BUY',
      orderType: 'LIMIT',
      quantity: 100,
      limitPrice: 10,
      timeInForce: 'DAY'
    };
    expect(renderOrders([order]).split('\n')).toEqual([
      'ACTION  SYMBOL  QTY  LIMIT  EXPECTED COST',
      '------  ------  ---  -----  -------------',
      'BUY     MSFT    100  10.00  1000.00'
    ]);
  });

  it('summarises each outcome', () => {
    expect(renderOutcome({ status: 'SKIPPED', runId: 'r', message: 'No trades necessary' })).toBe('Run r: No trades necessary');
    expect(
      renderOutcome({ status: 'CONVERGED', runId: 'r', iterations: 1, executions: [], nextTradeDate: '2024-07-01' })
    ).toBe('Run r: CONVERGED after 1 iteration(s)\nNext trade date: 2024-07-01');
    const aborted = renderOutcome({
      status: 'ABORTED',
      runId: 'r',
      iterations: 2,
      reason: 'DID_NOT_CONVERGE',
      message: 'Unfilled quantity remains',
      executions: [],
      remainders: [
        { orderId: 'o1', symbol: 'MSFT', action: 'BUY', quantityRequested: 10, quantityFilled: 4, remainder: 6 },
        { orderId: 'o2', symbol: 'AAPL', action: 'SELL', quantityRequested: 5, quantityFilled: 5, remainder: 0 }
      ]
    });
    expect(aborted.split('\n')).toEqual([
      'Run r: ABORTED (DID_NOT_CONVERGE) after 2 iteration(s): Unfilled quantity remains',
      'SYMBOL  ACTION  REQUESTED  FILLED  REMAINDER',
      '------  ------  ---------  ------  ---------',
      'MSFT    BUY     10         4       6'
    ]);
  });
});
