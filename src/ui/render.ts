import { BrokerPosition, LegRemainder, OrderExecutionRecord, OrderRequest, Quote, SyncOutcome } from '../core/types';
import { referencePrice } from '../data/priceSnapshot';

export const formatTable = (headers: string[], rows: string[][]): string => {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: string[]) =>
    cells
      .map((c, i) => c.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(headers), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
};

export const renderOrders = (orders: OrderRequest[]) =>
  formatTable(
    ['ACTION', 'SYMBOL', 'QTY', 'LIMIT', 'EXPECTED COST'],
    orders.map((o) => [o.action, o.symbol, String(o.quantity), o.limitPrice.toFixed(2), (o.quantity * o.limitPrice).toFixed(2)])
  );

export const renderExecutions = (records: OrderExecutionRecord[]) =>
  formatTable(
    ['ORDER', 'STATUS', 'ACTION', 'SYMBOL', 'REQUESTED', 'FILLED'],
    records.flatMap((r) =>
      r.legs.map((l) => [r.orderId, r.status, l.action, l.symbol, String(l.quantityRequested), String(l.quantityFilled)])
    )
  );

export const renderRemainders = (remainders: LegRemainder[]) =>
  formatTable(
    ['SYMBOL', 'ACTION', 'REQUESTED', 'FILLED', 'REMAINDER'],
    remainders.map((r) => [r.symbol, r.action, String(r.quantityRequested), String(r.quantityFilled), String(r.remainder)])
  );

export const renderPositions = (positions: BrokerPosition[]) =>
  formatTable(
    ['SYMBOL', 'QTY'],
    positions.map((p) => [p.symbol, String(p.quantity)])
  );

export const renderQuotes = (quotes: Quote[]) =>
  formatTable(
    ['SYMBOL', 'BID', 'ASK', 'REF'],
    quotes.map((q) => [q.symbol, q.bid.toFixed(2), q.ask.toFixed(2), referencePrice(q).toFixed(4)])
  );

export const renderOutcome = (outcome: SyncOutcome): string => {
  switch (outcome.status) {
    case 'SKIPPED':
      return `Run ${outcome.runId}: ${outcome.message}`;
    case 'CONVERGED': {
      const head = `Run ${outcome.runId}: CONVERGED after ${outcome.iterations} iteration(s)`;
      const next = outcome.nextTradeDate ? `\nNext trade date: ${outcome.nextTradeDate}` : '';
      const fills = outcome.executions.length ? `\n${renderExecutions(outcome.executions)}` : '';
      return `${head}${next}${fills}`;
    }
    case 'ABORTED': {
      const head = `Run ${outcome.runId}: ABORTED (${outcome.reason}) after ${outcome.iterations} iteration(s): ${outcome.message}`;
      const open = outcome.remainders.filter((r) => r.remainder !== 0);
      return open.length ? `${head}\n${renderRemainders(open)}` : head;
    }
  }
};
