import path from 'path';
import { getBroker } from '../src/broker/broker';
import { StubBroker } from '../src/broker/broker.stub';
import { TradeStationBroker } from '../src/broker/tradestation/tradestationBroker';
import { BrokerSettings } from '../src/core/config';
import { ConfigError } from '../src/core/errors';
import { OrderRequest } from '../src/core/types';

const order = (symbol: string, action: 'BUY' | 'SELL', quantity: number, limitPrice: number): OrderRequest => ({
  accountId: 'ACC-1',
  symbol,
  action,
  orderType: 'LIMIT',
  quantity,
  limitPrice,
  timeInForce: 'DAY'
});

const exampleFile = path.join(__dirname, '..', 'config', 'stub-account.example.json');

describe('StubBroker', () => {
  const seed = {
    accountId: 'ACC-1',
    cash: 1000,
    positions: { AAPL: 10 },
    quotes: { AAPL: { bid: 10, ask: 10.2 } },
    fillRatio: 0.5
  };

  it('partially fills at the limit price and leaves the rest working until cancelled', async () => {
    const broker = new StubBroker(seed);
    const [buy, sell] = await broker.submitOrderGroup('ACC-1', [order('MSFT', 'BUY', 5, 20), order('AAPL', 'SELL', 10, 10)]);

    expect(buy?.status).toBe('FPR');
    expect(buy?.legs).toEqual([
      { symbol: 'MSFT', action: 'BUY', quantityRequested: 5, quantityFilled: 2, quantityRemaining: 3 }
    ]);
    expect(sell?.legs[0]?.quantityFilled).toBe(5);
    await expect(broker.getCashBalance('ACC-1')).resolves.toBe(1010);
    await expect(broker.listPositions('ACC-1')).resolves.toEqual([
      { symbol: 'AAPL', quantity: 5 },
      { symbol: 'MSFT', quantity: 2 }
    ]);

    await broker.cancelOrder('ACC-1', buy?.orderId ?? '');
    const statuses = await broker.getOrderStatus('ACC-1');
    expect(statuses.map((r) => r.status)).toEqual(['CAN', 'FPR']);
  });

  it('does not cancel a filled order', async () => {
    const broker = new StubBroker({ ...seed, fillRatio: 1 });
    const [record] = await broker.submitOrderGroup('ACC-1', [order('AAPL', 'SELL', 10, 10)]);
    await broker.cancelOrder('ACC-1', record?.orderId ?? '');
    const [status] = await broker.getOrderStatus('ACC-1');
    expect(status?.status).toBe('FLL');
    await expect(broker.listPositions('ACC-1')).resolves.toEqual([]);
  });

  it('rejects unknown accounts, orders and symbols', async () => {
    const broker = new StubBroker(seed);
    await expect(broker.listPositions('ACC-2')).rejects.toThrow('Unknown account [operation=listPositions accountId=ACC-2]');
    await expect(broker.cancelOrder('ACC-1', 'ord-x')).rejects.toThrow('Unknown order');
    await expect(broker.getQuotes(['AAPL', 'MSFT'])).rejects.toThrow('No quote for symbol [operation=getQuotes symbols=MSFT]');
    await expect(broker.submitOrderGroup('ACC-1', [order('AAPL', 'BUY', 0, 10)])).rejects.toThrow('Invalid order in group');
  });

  it('loads the example account file', async () => {
    const broker = StubBroker.fromFile(exampleFile);
    await expect(broker.getCashBalance('SIM0000001')).resolves.toBe(10000);
    await expect(broker.listPositions('SIM0000001')).resolves.toEqual([{ symbol: 'AAPL', quantity: 10 }]);
    await expect(broker.getQuotes(['BRK.B'])).resolves.toEqual([{ symbol: 'BRK.B', bid: 400, ask: 400.2 }]);
    expect(() => StubBroker.fromFile(path.join(__dirname, 'missing.json'))).toThrow('Could not read stub account file');
  });
});

describe('getBroker', () => {
  const base: BrokerSettings = {
    provider: 'tradestation',
    env: 'sim',
    baseUrl: 'https://sim-api.tradestation.com/v3',
    tokenStorePath: '/tmp/tokens.json'
  };

  it('builds the brokerage named by the settings', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(getBroker({ ...base, accessToken: 'test-token' })).toBeInstanceOf(TradeStationBroker);
    expect(getBroker({ ...base, provider: 'stub', stubAccountFile: exampleFile })).toBeInstanceOf(StubBroker);
    expect(() => getBroker({ ...base, provider: 'stub' })).toThrow(ConfigError);
    log.mockRestore();
  });
});
