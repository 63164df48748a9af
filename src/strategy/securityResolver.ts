import { BrokerPosition, Position } from '../core/types';
import { DualClassPair } from '../core/config';
import { ResolutionError, SyncError } from '../core/errors';
import { SecurityRecord, StrategyEngine } from './strategyEngine.types';

/** Broker symbols separate share classes with `.`, the engine with `/`. */
export const toEngineTicker = (brokerSymbol: string) => brokerSymbol.replace(/\./g, '/');

/**
 * Maps between brokerage symbols and strategy engine identifiers. Lookups are
 * cached for the life of the resolver; build a new one per sync run.
 */
export class SecurityIdentityResolver {
  private readonly lookups = new Map<string, Promise<SecurityRecord>>();
  private readonly byIdentifier = new Map<string, SecurityRecord>();
  private readonly aliasFor = new Map<string, string>();
  private readonly primariesFor = new Map<string, string[]>();

  constructor(private readonly engine: StrategyEngine, dualClassPairs: DualClassPair[] = []) {
    for (const { primary, alias } of dualClassPairs) {
      this.aliasFor.set(primary, alias);
      this.primariesFor.set(alias, [...(this.primariesFor.get(alias) ?? []), primary]);
    }
  }

  private lookup(query: string): Promise<SecurityRecord> {
    const cached = this.lookups.get(query);
    if (cached) return cached;
    const pending = this.engine.resolveSecurity(query).then(
      (record) => {
        this.byIdentifier.set(record.securityIdentifier, record);
        return record;
      },
      (err: unknown) => {
        if (err instanceof SyncError) throw err;
        throw new ResolutionError('Security lookup failed', { operation: 'resolveSecurity', security: query }, { cause: err });
      }
    );
    this.lookups.set(query, pending);
    return pending;
  }

  async toStrategyIdentity(brokerSymbol: string): Promise<string> {
    const record = await this.lookup(toEngineTicker(brokerSymbol));
    return record.securityIdentifier;
  }

  async toBrokerSymbol(securityIdentifier: string): Promise<string> {
    const known = this.byIdentifier.get(securityIdentifier);
    const record = known ?? (await this.lookup(securityIdentifier));
    return this.brokerSymbolFor(record.canonicalSymbol);
  }

  /** Symbol to trade for an engine ticker; the primary of a dual-class pair trades as its alias. */
  brokerSymbolFor(engineTicker: string): string {
    const symbol = engineTicker.replace(/\//g, '.');
    return this.aliasFor.get(symbol) ?? symbol;
  }

  /** Symbol whose quote prices `brokerSymbol`. */
  quoteSymbolFor(brokerSymbol: string): string {
    return this.aliasFor.get(brokerSymbol) ?? brokerSymbol;
  }

  /** Primary-class symbols that take their price from a quote of `brokerSymbol`. */
  pricedThrough(brokerSymbol: string): string[] {
    return this.primariesFor.get(brokerSymbol) ?? [];
  }

  async resolvePositions(positions: BrokerPosition[]): Promise<Position[]> {
    return Promise.all(
      positions.map(async (p) => ({
        securityIdentifier: await this.toStrategyIdentity(p.symbol),
        brokerSymbol: p.symbol,
        shareQuantity: p.quantity
      }))
    );
  }
}
