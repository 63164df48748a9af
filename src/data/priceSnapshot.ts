import { AllocationTarget, CASH_IDENTIFIER, Position, PriceSnapshot, Quote } from '../core/types';
import { ResolutionError } from '../core/errors';
import { chunk } from '../core/utils';
import { Brokerage } from '../broker/broker.types';
import { SecurityIdentityResolver } from '../strategy/securityResolver';

export const referencePrice = (quote: Quote): number => quote.bid + (quote.ask - quote.bid) / 2;

const isUsableQuote = (quote: Quote) =>
  Number.isFinite(quote.bid) && Number.isFinite(quote.ask) && quote.bid > 0 && quote.ask > 0;

export class PriceSnapshotProvider {
  constructor(
    private readonly broker: Pick<Brokerage, 'getQuotes'>,
    private readonly resolver: SecurityIdentityResolver,
    private readonly batchSize = 100
  ) {}

  /** Broker symbols to price: current holdings plus every member of the target allocation. */
  async tickerUniverse(positions: Position[], allocation: AllocationTarget): Promise<string[]> {
    const members = await Promise.all(
      Object.keys(allocation)
        .filter((id) => id !== CASH_IDENTIFIER)
        .map((id) => this.resolver.toBrokerSymbol(id))
    );
    const held = positions.map((p) => this.resolver.quoteSymbolFor(p.brokerSymbol));
    return [...new Set([...held, ...members])].sort();
  }

  async getSnapshot(positions: Position[], allocation: AllocationTarget, now: Date = new Date()): Promise<PriceSnapshot> {
    const symbols = await this.tickerUniverse(positions, allocation);
    return this.quoteSymbols(symbols, now);
  }

  /** Fails closed: any symbol without a usable quote aborts the whole snapshot. */
  async quoteSymbols(symbols: string[], now: Date = new Date()): Promise<PriceSnapshot> {
    let quotes: Quote[];
    try {
      const batches = await Promise.all(chunk(symbols, this.batchSize).map((batch) => this.broker.getQuotes(batch)));
      quotes = batches.flat();
    } catch (err) {
      throw new ResolutionError('Could not price the sync universe', { operation: 'getQuotes', symbols: symbols.join(',') }, {
        cause: err
      });
    }

    const bySymbol = new Map(quotes.map((q) => [q.symbol, q]));
    const unpriced = symbols.filter((s) => {
      const quote = bySymbol.get(s);
      return !quote || !isUsableQuote(quote);
    });
    if (unpriced.length) {
      throw new ResolutionError('Missing or unusable quote', { operation: 'getSnapshot', symbols: unpriced.join(',') });
    }

    const prices: Record<string, number> = {};
    await Promise.all(
      symbols.map(async (symbol) => {
        const quote = bySymbol.get(symbol);
        if (!quote) return;
        const price = referencePrice(quote);
        const sharing = [symbol, ...this.resolver.pricedThrough(symbol)];
        for (const s of sharing) {
          const id = await this.resolver.toStrategyIdentity(s);
          prices[id] = price;
        }
      })
    );
    return { asOf: now.toISOString(), prices };
  }
}
