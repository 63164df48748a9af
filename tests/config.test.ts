import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildAppConfig, brokerSettingsFromEnv, loadAppConfig, parseBrokerEnv } from '../src/core/config';
import { ConfigError } from '../src/core/errors';

const env = {
  STRATEGY_API_URL: 'https://strategy.example.com/',
  STRATEGY_API_KEY: 'test-key'
};

const syncFile = { portfolioId: 'pf-1', accountId: 'ACC-1' };

describe('app config', () => {
  it('fills documented defaults and resolves paths against the working directory', () => {
    const cfg = buildAppConfig(syncFile, env, '/work');
    expect(cfg.strategy).toEqual({ baseUrl: 'https://strategy.example.com', apiKey: 'test-key', apiKeyHeader: 'X-Pv-Api' });
    expect(cfg.broker).toEqual({
      provider: 'tradestation',
      env: 'sim',
      baseUrl: 'https://sim-api.tradestation.com/v3',
      accessToken: undefined,
      tokenStorePath: '/work/.secrets/broker_tokens.sim.json',
      tokenStoreEncryptionKey: undefined,
      stubAccountFile: undefined
    });
    expect(cfg.execution).toEqual({
      maxIterations: 5,
      initialWaitMs: 30_000,
      pollIntervalMs: 300_000,
      monitorTimeoutMs: 1_800_000,
      quoteBatchSize: 100,
      cancelPendingOnTimeout: true,
      unknownTransactionKind: 'skip',
      dualClassPairs: [{ primary: 'BRK.A', alias: 'BRK.B' }]
    });
    expect(cfg.ledgerFile).toBe('/work/ledger/events.jsonl');
    expect(cfg.runsDir).toBe('/work/runs');
    expect(cfg.approval).toEqual({ port: 8787, bind: '127.0.0.1' });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it('applies execution overrides from the sync file', () => {
    const cfg = buildAppConfig(
      { ...syncFile, nextTradeDate: '2024-07-01', execution: { maxIterations: 1, unknownTransactionKind: 'fail' } },
      { ...env, BROKER_ENV: 'live', APPROVAL_PORT: '0' },
      '/work'
    );
    expect(cfg.execution.maxIterations).toBe(1);
    expect(cfg.execution.unknownTransactionKind).toBe('fail');
    expect(cfg.execution.pollIntervalMs).toBe(300_000);
    expect(cfg.nextTradeDate).toBe('2024-07-01');
    expect(cfg.broker.baseUrl).toBe('https://api.tradestation.com/v3');
    expect(cfg.broker.tokenStorePath).toBe('/work/.secrets/broker_tokens.live.json');
    expect(cfg.approval.port).toBe(0);
  });

  it('lists every invalid environment variable', () => {
    expect(() => buildAppConfig(syncFile, { STRATEGY_API_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => buildAppConfig(syncFile, { STRATEGY_API_URL: 'not a url' })).toThrow(
      'Invalid environment: STRATEGY_API_URL: Invalid url; STRATEGY_API_KEY: Required'
    );
  });

  it('rejects an invalid sync file', () => {
    expect(() => buildAppConfig({ ...syncFile, execution: { maxIterations: 0 } }, env)).toThrow(
      'Invalid sync file: execution.maxIterations: Number must be greater than or equal to 1'
    );
    expect(() => buildAppConfig({ accountId: 'ACC-1' }, env)).toThrow('portfolioId: Required');
  });

  it('needs only broker variables for the account commands', () => {
    const settings = brokerSettingsFromEnv(parseBrokerEnv({ BROKER_PROVIDER: 'stub', STUB_ACCOUNT_FILE: 'stub.json' }), '/work');
    expect(settings.provider).toBe('stub');
    expect(settings.stubAccountFile).toBe('/work/stub.json');
  });

  it('loads the sync file from disk', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'sync-config-'));
    const file = path.join(tmp, 'sync.json');
    fs.writeFileSync(file, JSON.stringify(syncFile));
    expect(loadAppConfig(file, env).portfolioId).toBe('pf-1');
    expect(() => loadAppConfig(path.join(tmp, 'missing.json'), env)).toThrow('Could not read sync file');
  });
});
