import { AllocationTarget, CASH_IDENTIFIER } from '../../src/core/types';
import {
  EngineTransaction,
  RebalanceRequest,
  RebalanceResponse,
  SecurityRecord,
  StrategyEngine
} from '../../src/strategy/strategyEngine.types';

/**
 * In-process strategy engine. Securities are keyed by engine ticker; a
 * rebalance trades each security from its held share count to
 * `targetShares`, priced from the request's price data.
 */
export class FakeStrategyEngine implements StrategyEngine {
  readonly lookups: string[] = [];
  readonly requests: RebalanceRequest[] = [];
  targetShares: Record<string, number> = {};
  extraTransactions: EngineTransaction[] = [];
  allocation?: AllocationTarget;
  nextTradeDate?: string;

  constructor(private readonly securities: Record<string, string>) {}

  private tickerFor(figi: string): string {
    const hit = Object.entries(this.securities).find(([, id]) => id === figi);
    return hit ? hit[0] : figi;
  }

  async resolveSecurity(query: string): Promise<SecurityRecord> {
    this.lookups.push(query);
    const byTicker = this.securities[query];
    if (byTicker) return { securityIdentifier: byTicker, canonicalSymbol: query };
    const byId = Object.entries(this.securities).find(([, id]) => id === query);
    if (byId) return { securityIdentifier: byId[1], canonicalSymbol: byId[0] };
    throw new Error(`security not found: ${query}`);
  }

  async rebalance(request: RebalanceRequest): Promise<RebalanceResponse> {
    this.requests.push(request);
    const targets = Object.keys(this.targetShares);
    const allocation = this.allocation ?? Object.fromEntries(targets.map((id) => [id, 1 / targets.length]));
    if (request.allocationOnly) {
      return { allocation, nextTradeDate: this.nextTradeDate, transactions: [] };
    }
    const held = new Map(
      request.positions.filter((p) => p.securityIdentifier !== CASH_IDENTIFIER).map((p) => [p.securityIdentifier, p.shares])
    );
    const ids = [...new Set([...targets, ...held.keys()])].sort();
    const transactions: EngineTransaction[] = [];
    for (const id of ids) {
      const diff = (this.targetShares[id] ?? 0) - (held.get(id) ?? 0);
      if (diff === 0) continue;
      transactions.push({
        securityIdentifier: id,
        ticker: this.tickerFor(id),
        kind: diff > 0 ? 'BUY' : 'SELL',
        shares: Math.abs(diff),
        pricePerShare: request.prices[id] ?? 0
      });
    }
    return { allocation, nextTradeDate: this.nextTradeDate, transactions: [...transactions, ...this.extraTransactions] };
  }
}

export const defaultSecurities = (): Record<string, string> => ({
  AAPL: 'FIGI-AAPL',
  MSFT: 'FIGI-MSFT',
  'BRK/A': 'FIGI-BRKA',
  'BRK/B': 'FIGI-BRKB'
});
