import { AllocationTarget } from '../core/types';

export interface SecurityRecord {
  securityIdentifier: string;
  canonicalSymbol: string;
}

export interface EnginePosition {
  securityIdentifier: string;
  ticker: string;
  shares: number;
}

export interface RebalanceRequest {
  portfolioId: string;
  allocationOnly: boolean;
  positions: EnginePosition[];
  prices: Record<string, number>;
}

/** Transaction as the engine sends it; `kind` is not yet validated. */
export interface EngineTransaction {
  securityIdentifier: string;
  ticker: string;
  kind: string;
  shares: number;
  pricePerShare: number;
}

export interface RebalanceResponse {
  allocation: AllocationTarget;
  allocationDate?: string;
  nextTradeDate?: string;
  transactions: EngineTransaction[];
}

export interface StrategyEngine {
  resolveSecurity(symbolOrQuery: string): Promise<SecurityRecord>;
  rebalance(request: RebalanceRequest): Promise<RebalanceResponse>;
}
