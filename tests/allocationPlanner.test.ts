import { PlanRequestError, ResolutionError } from '../src/core/errors';
import { Position, PriceSnapshot } from '../src/core/types';
import { AllocationPlanner } from '../src/strategy/allocationPlanner';
import { SecurityIdentityResolver } from '../src/strategy/securityResolver';
import { EngineTransaction } from '../src/strategy/strategyEngine.types';
import { FakeStrategyEngine, defaultSecurities } from './helpers/fakeStrategyEngine';
import { randomInt, seededRandom } from './helpers/random';

const snapshot = (prices: Record<string, number>): PriceSnapshot => ({ asOf: '2024-06-03T14:30:00.000Z', prices });

const aapl: Position = { securityIdentifier: 'FIGI-AAPL', brokerSymbol: 'AAPL', shareQuantity: 10 };

const setup = (unknownTransactionKind: 'skip' | 'fail' = 'skip', securities = defaultSecurities()) => {
  const engine = new FakeStrategyEngine(securities);
  const dropped: EngineTransaction[] = [];
  const planner = new AllocationPlanner(engine, new SecurityIdentityResolver(engine, [{ primary: 'BRK.A', alias: 'BRK.B' }]), {
    portfolioId: 'pf-1',
    unknownTransactionKind,
    onDropped: (t) => dropped.push(t)
  });
  return { engine, planner, dropped };
};

describe('AllocationPlanner', () => {
  let warn: jest.SpyInstance;
  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => {
    warn.mockRestore();
  });

  it('asks for the allocation with empty positions and prices', async () => {
    const { engine, planner } = setup();
    engine.allocation = { 'FIGI-MSFT': 0.6, 'FIGI-AAPL': 0.4 };
    engine.nextTradeDate = '2024-07-01';
    await expect(planner.planAllocationOnly()).resolves.toEqual({ 'FIGI-MSFT': 0.6, 'FIGI-AAPL': 0.4 });
    expect(engine.requests).toEqual([{ portfolioId: 'pf-1', allocationOnly: true, positions: [], prices: {} }]);
    expect(planner.nextTradeDate).toBe('2024-07-01');
  });

  it('sends cash as a synthetic position and maps the plan to broker symbols', async () => {
    const { engine, planner } = setup();
    engine.targetShares = { 'FIGI-MSFT': 100 };
    const plan = await planner.planRebalance([aapl], 1000, snapshot({ 'FIGI-AAPL': 150.25, 'FIGI-MSFT': 10 }));

    expect(engine.requests[0]?.positions).toEqual([
      { securityIdentifier: 'FIGI-AAPL', ticker: 'AAPL', shares: 10 },
      { securityIdentifier: '$CASH', ticker: '$CASH', shares: 1000 }
    ]);
    expect(engine.requests[0]?.prices).toEqual({ 'FIGI-AAPL': 150.25, 'FIGI-MSFT': 10 });
    expect(plan.transactions).toEqual([
      { securityIdentifier: 'FIGI-AAPL', brokerSymbol: 'AAPL', kind: 'SELL', sharesRequested: 10, referencePrice: 150.25 },
      { securityIdentifier: 'FIGI-MSFT', brokerSymbol: 'MSFT', kind: 'BUY', sharesRequested: 100, referencePrice: 10 }
    ]);
  });

  it('sends engine tickers for dual-class holdings and trades the primary through its alias', async () => {
    const { engine, planner } = setup();
    engine.targetShares = { 'FIGI-BRKA': 1 };
    const holding: Position = { securityIdentifier: 'FIGI-BRKB', brokerSymbol: 'BRK.B', shareQuantity: 3 };
    const plan = await planner.planRebalance([holding], 0, snapshot({ 'FIGI-BRKA': 400.5, 'FIGI-BRKB': 400.5 }));
    expect(engine.requests[0]?.positions[0]).toEqual({ securityIdentifier: 'FIGI-BRKB', ticker: 'BRK/B', shares: 3 });
    expect(plan.transactions.map((t) => [t.brokerSymbol, t.kind, t.sharesRequested])).toEqual([
      ['BRK.B', 'BUY', 1],
      ['BRK.B', 'SELL', 3]
    ]);
  });

  it('drops unknown transaction kinds with a warning by default', async () => {
    const { engine, planner, dropped } = setup();
    engine.targetShares = { 'FIGI-AAPL': 10 };
    const dividend = { securityIdentifier: 'FIGI-AAPL', ticker: 'AAPL', kind: 'DIVIDEND', shares: 1, pricePerShare: 150.25 };
    engine.extraTransactions = [dividend];
    const plan = await planner.planRebalance([aapl], 0, snapshot({ 'FIGI-AAPL': 150.25 }));
    expect(plan.transactions).toEqual([]);
    expect(dropped).toEqual([dividend]);
    expect(warn).toHaveBeenCalledWith('Skipping AAPL (FIGI-AAPL) for portfolio pf-1: unknown transaction kind "DIVIDEND"');
  });

  it('fails on unknown transaction kinds when configured to', async () => {
    const { engine, planner } = setup('fail');
    engine.extraTransactions = [{ securityIdentifier: 'FIGI-AAPL', ticker: 'AAPL', kind: 'SPLIT', shares: 1, pricePerShare: 1 }];
    await expect(planner.planRebalance([], 0, snapshot({}))).rejects.toBeInstanceOf(PlanRequestError);
  });

  it('refuses to plan when a holding has no price, before calling the engine', async () => {
    const { engine, planner } = setup();
    await expect(planner.planRebalance([aapl], 0, snapshot({}))).rejects.toBeInstanceOf(ResolutionError);
    expect(engine.requests).toHaveLength(0);
  });

  it('refuses a plan that trades an unpriced security', async () => {
    const { engine, planner } = setup();
    engine.targetShares = { 'FIGI-MSFT': 5 };
    await expect(planner.planRebalance([], 100, snapshot({}))).rejects.toThrow('Planned security missing from price snapshot');
  });

  it('wraps engine failures as PlanRequestError', async () => {
    const { engine, planner } = setup();
    jest.spyOn(engine, 'rebalance').mockRejectedValue(new Error('socket hang up'));
    await expect(planner.planAllocationOnly()).rejects.toBeInstanceOf(PlanRequestError);
  });

  it('fails closed whenever a held or traded security is unpriced (seeded random cases)', async () => {
    const rand = seededRandom(20240603);
    const universe = ['A', 'B', 'C', 'D', 'E', 'F'];
    const securities = Object.fromEntries(universe.map((t) => [t, `FIGI-${t}`]));

    for (let trial = 0; trial < 60; trial++) {
      const { engine, planner } = setup('skip', securities);
      const positions: Position[] = universe
        .filter(() => rand() < 0.5)
        .map((t) => ({ securityIdentifier: `FIGI-${t}`, brokerSymbol: t, shareQuantity: randomInt(rand, 1, 50) }));
      engine.targetShares = Object.fromEntries(
        universe.filter(() => rand() < 0.5).map((t) => [`FIGI-${t}`, randomInt(rand, 0, 50)])
      );
      const prices: Record<string, number> = Object.fromEntries(universe.map((t) => [`FIGI-${t}`, randomInt(rand, 1, 500)]));
      const dropped = rand() < 0.5 ? `FIGI-${universe[randomInt(rand, 0, universe.length - 1)]}` : undefined;
      if (dropped) delete prices[dropped];

      const heldShares = positions.find((p) => p.securityIdentifier === dropped)?.shareQuantity ?? 0;
      const traded = dropped !== undefined && (engine.targetShares[dropped] ?? 0) !== heldShares;
      const held = heldShares !== 0;

      const result = planner.planRebalance(positions, 1000, snapshot(prices));
      if (held || traded) {
        await expect(result).rejects.toBeInstanceOf(ResolutionError);
      } else {
        const plan = await result;
        for (const t of plan.transactions) expect(prices[t.securityIdentifier]).toBeDefined();
      }
    }
  });
});
