import { z } from 'zod';
import { PlanRequestError, ResolutionError } from '../core/errors';
import { StrategySettings } from '../core/config';
import {
  RebalanceRequest,
  RebalanceResponse,
  SecurityRecord,
  StrategyEngine
} from '../strategy/strategyEngine.types';

const securitySchema = z.object({
  compositeFigi: z.string().min(1),
  ticker: z.string().min(1)
});

const transactionSchema = z.object({
  CompositeFIGI: z.string(),
  Ticker: z.string(),
  Kind: z.string(),
  Shares: z.number(),
  PricePerShare: z.number()
});

const rebalanceSchema = z.object({
  Allocation: z
    .object({
      Date: z.string().optional(),
      Members: z.record(z.number()).nullish()
    })
    .nullish(),
  NextTradeDate: z.string().optional(),
  Transactions: z.array(transactionSchema).nullish()
});

const issuesText = (error: z.ZodError) => error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');

export class StrategyEngineClient implements StrategyEngine {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly settings: StrategySettings, fetchImpl?: typeof fetch) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private headers(): Record<string, string> {
    return {
      [this.settings.apiKeyHeader]: this.settings.apiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json'
    };
  }

  /** `symbolOrQuery` must already be in the engine's form (class separator `/`). */
  async resolveSecurity(symbolOrQuery: string): Promise<SecurityRecord> {
    const url = `${this.settings.baseUrl}/v1/security/${encodeURIComponent(symbolOrQuery)}/`;
    const context = { operation: 'resolveSecurity', security: symbolOrQuery };
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, { method: 'GET', headers: this.headers() });
    } catch (err) {
      throw new ResolutionError('Strategy engine unreachable', context, { cause: err });
    }
    const text = await resp.text();
    if (!resp.ok) {
      throw new ResolutionError(`Strategy engine returned ${resp.status}: ${text.slice(0, 200)}`, {
        ...context,
        status: resp.status
      });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ResolutionError(`Security response parse error: ${text.slice(0, 200)}`, context, { cause: err });
    }
    const result = securitySchema.safeParse(parsed);
    if (!result.success) {
      throw new ResolutionError(`Unexpected security response: ${issuesText(result.error)}`, context);
    }
    return { securityIdentifier: result.data.compositeFigi, canonicalSymbol: result.data.ticker };
  }

  async rebalance(request: RebalanceRequest): Promise<RebalanceResponse> {
    const url = `${this.settings.baseUrl}/v1/portfolio/${encodeURIComponent(request.portfolioId)}/rebalance`;
    const context = {
      operation: request.allocationOnly ? 'rebalance(allocationOnly)' : 'rebalance',
      portfolioId: request.portfolioId
    };
    const body = {
      AllocationOnly: request.allocationOnly,
      Positions: request.positions.map((p) => ({
        CompositeFIGI: p.securityIdentifier,
        Ticker: p.ticker,
        Shares: p.shares
      })),
      Precision: 0,
      PriceData: request.prices
    };
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, { method: 'POST', headers: this.headers(), body: JSON.stringify(body) });
    } catch (err) {
      throw new PlanRequestError('Strategy engine unreachable', context, { cause: err });
    }
    const text = await resp.text();
    if (!resp.ok) {
      throw new PlanRequestError(`Strategy engine returned ${resp.status}: ${text.slice(0, 400)}`, {
        ...context,
        status: resp.status
      });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new PlanRequestError(`Rebalance response parse error: ${text.slice(0, 200)}`, context, { cause: err });
    }
    const result = rebalanceSchema.safeParse(parsed);
    if (!result.success) {
      throw new PlanRequestError(`Unexpected rebalance response: ${issuesText(result.error)}`, context);
    }
    const data = result.data;
    return {
      allocation: data.Allocation?.Members ?? {},
      allocationDate: data.Allocation?.Date,
      nextTradeDate: data.NextTradeDate,
      transactions: (data.Transactions ?? []).map((t) => ({
        securityIdentifier: t.CompositeFIGI,
        ticker: t.Ticker,
        kind: t.Kind,
        shares: t.Shares,
        pricePerShare: t.PricePerShare
      }))
    };
  }
}
