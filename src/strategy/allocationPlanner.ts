import {
  AllocationTarget,
  CASH_IDENTIFIER,
  Position,
  PriceSnapshot,
  RebalancePlan,
  TradeAction,
  Transaction
} from '../core/types';
import { PlanRequestError, ResolutionError, SyncError } from '../core/errors';
import { ExecutionSettings } from '../core/config';
import { SecurityIdentityResolver, toEngineTicker } from './securityResolver';
import { EngineTransaction, RebalanceRequest, RebalanceResponse, StrategyEngine } from './strategyEngine.types';

export interface AllocationPlannerOptions {
  portfolioId: string;
  unknownTransactionKind: ExecutionSettings['unknownTransactionKind'];
  /** Called for each transaction dropped because of an unrecognised kind. */
  onDropped?: (transaction: EngineTransaction) => void;
}

const isTradeAction = (kind: string): kind is TradeAction => kind === 'BUY' || kind === 'SELL';

export class AllocationPlanner {
  private lastNextTradeDate?: string;

  constructor(
    private readonly engine: StrategyEngine,
    private readonly resolver: SecurityIdentityResolver,
    private readonly options: AllocationPlannerOptions
  ) {}

  /** Next trade date from the most recent engine response, if it sent one. */
  get nextTradeDate(): string | undefined {
    return this.lastNextTradeDate;
  }

  private async callEngine(request: RebalanceRequest): Promise<RebalanceResponse> {
    try {
      const response = await this.engine.rebalance(request);
      if (response.nextTradeDate) this.lastNextTradeDate = response.nextTradeDate;
      return response;
    } catch (err) {
      if (err instanceof SyncError) throw err;
      throw new PlanRequestError('Rebalance request failed', { portfolioId: request.portfolioId }, { cause: err });
    }
  }

  /** Discovers the target universe; runs before any pricing. */
  async planAllocationOnly(): Promise<AllocationTarget> {
    const response = await this.callEngine({
      portfolioId: this.options.portfolioId,
      allocationOnly: true,
      positions: [],
      prices: {}
    });
    return response.allocation;
  }

  async planRebalance(positions: Position[], cash: number, snapshot: PriceSnapshot): Promise<RebalancePlan> {
    const { portfolioId } = this.options;
    const unpriced = positions.filter((p) => !(p.securityIdentifier in snapshot.prices));
    if (unpriced.length) {
      throw new ResolutionError('Held security missing from price snapshot', {
        portfolioId,
        security: unpriced.map((p) => p.brokerSymbol).join(',')
      });
    }

    const response = await this.callEngine({
      portfolioId,
      allocationOnly: false,
      positions: [
        ...positions.map((p) => ({
          securityIdentifier: p.securityIdentifier,
          ticker: toEngineTicker(p.brokerSymbol),
          shares: p.shareQuantity
        })),
        { securityIdentifier: CASH_IDENTIFIER, ticker: CASH_IDENTIFIER, shares: cash }
      ],
      prices: snapshot.prices
    });

    const transactions: Transaction[] = [];
    for (const t of response.transactions) {
      const kind = t.kind;
      if (!isTradeAction(kind)) {
        if (this.options.unknownTransactionKind === 'fail') {
          throw new PlanRequestError(`Unknown transaction kind "${kind}"`, { portfolioId, security: t.securityIdentifier });
        }
        console.warn(`Skipping ${t.ticker} (${t.securityIdentifier}) for portfolio ${portfolioId}: unknown transaction kind "${kind}"`);
        this.options.onDropped?.(t);
        continue;
      }
      const snapshotPrice = snapshot.prices[t.securityIdentifier];
      if (snapshotPrice === undefined) {
        throw new ResolutionError('Planned security missing from price snapshot', {
          portfolioId,
          security: t.securityIdentifier,
          ticker: t.ticker
        });
      }
      if (!Number.isFinite(t.shares) || t.shares < 0) {
        throw new PlanRequestError(`Invalid share count ${t.shares}`, { portfolioId, security: t.securityIdentifier });
      }
      transactions.push({
        securityIdentifier: t.securityIdentifier,
        brokerSymbol: this.resolver.brokerSymbolFor(t.ticker),
        kind,
        sharesRequested: t.shares,
        referencePrice: t.pricePerShare > 0 ? t.pricePerShare : snapshotPrice
      });
    }

    return {
      allocation: response.allocation,
      allocationDate: response.allocationDate,
      nextTradeDate: response.nextTradeDate,
      transactions
    };
  }
}
