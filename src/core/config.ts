import path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { readJSONFile } from './utils';

const DEFAULT_SIM_URL = 'https://sim-api.tradestation.com/v3';
const DEFAULT_LIVE_URL = 'https://api.tradestation.com/v3';

const dualClassPairSchema = z.object({
  primary: z.string().min(1),
  alias: z.string().min(1)
});

export const executionSettingsSchema = z.object({
  maxIterations: z.number().int().min(1).default(5),
  initialWaitMs: z.number().int().min(0).default(30_000),
  pollIntervalMs: z.number().int().min(1).default(300_000),
  monitorTimeoutMs: z.number().int().min(0).default(1_800_000),
  maxElapsedMs: z.number().int().positive().optional(),
  quoteBatchSize: z.number().int().min(1).default(100),
  cancelPendingOnTimeout: z.boolean().default(true),
  unknownTransactionKind: z.enum(['skip', 'fail']).default('skip'),
  dualClassPairs: z.array(dualClassPairSchema).default([{ primary: 'BRK.A', alias: 'BRK.B' }])
});

export type ExecutionSettings = z.infer<typeof executionSettingsSchema>;
export type DualClassPair = z.infer<typeof dualClassPairSchema>;

const isoDate = z.string().refine((val) => !Number.isNaN(Date.parse(val)), {
  message: 'must be an ISO date'
});

export const syncFileSchema = z.object({
  portfolioId: z.string().min(1),
  accountId: z.string().min(1),
  lastTradeDate: isoDate.optional(),
  nextTradeDate: isoDate.optional(),
  execution: executionSettingsSchema.partial().optional()
});

export type SyncFile = z.infer<typeof syncFileSchema>;

const brokerEnvSchema = z.object({
  BROKER_PROVIDER: z.enum(['tradestation', 'stub']).default('tradestation'),
  BROKER_ENV: z.enum(['sim', 'live']).default('sim'),
  BROKER_SIM_URL: z.string().url().default(DEFAULT_SIM_URL),
  BROKER_LIVE_URL: z.string().url().default(DEFAULT_LIVE_URL),
  BROKER_ACCESS_TOKEN: z.string().min(1).optional(),
  TOKEN_STORE_PATH: z.string().min(1).optional(),
  TOKEN_STORE_ENCRYPTION_KEY: z.string().min(1).optional(),
  STUB_ACCOUNT_FILE: z.string().min(1).optional()
});

const envSchema = brokerEnvSchema.extend({
  STRATEGY_API_URL: z.string().url(),
  STRATEGY_API_KEY: z.string().min(1),
  STRATEGY_API_KEY_HEADER: z.string().min(1).default('X-Pv-Api'),
  LEDGER_FILE: z.string().min(1).default('ledger/events.jsonl'),
  RUNS_DIR: z.string().min(1).default('runs'),
  APPROVAL_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  APPROVAL_BIND: z.string().min(1).default('127.0.0.1')
});

export type BrokerEnvSettings = z.infer<typeof brokerEnvSchema>;
export type EnvSettings = z.infer<typeof envSchema>;

export interface StrategySettings {
  baseUrl: string;
  apiKey: string;
  apiKeyHeader: string;
}

export interface BrokerSettings {
  provider: 'tradestation' | 'stub';
  env: 'sim' | 'live';
  baseUrl: string;
  accessToken?: string;
  tokenStorePath: string;
  tokenStoreEncryptionKey?: string;
  stubAccountFile?: string;
}

export interface AppConfig {
  portfolioId: string;
  accountId: string;
  lastTradeDate?: string;
  nextTradeDate?: string;
  strategy: StrategySettings;
  broker: BrokerSettings;
  execution: ExecutionSettings;
  ledgerFile: string;
  runsDir: string;
  approval: { port: number; bind: string };
}

const formatIssues = (issues: z.ZodIssue[]) => issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);

const parseOrThrow = <T extends z.ZodTypeAny>(schema: T, input: unknown, source: string): z.infer<T> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error.issues).join('; ')}`, { source });
  }
  return result.data;
};

/** Broker variables only: enough for the account and quote commands. */
export const parseBrokerEnv = (env: NodeJS.ProcessEnv): BrokerEnvSettings => parseOrThrow(brokerEnvSchema, env, 'environment');

export const parseEnvSettings = (env: NodeJS.ProcessEnv): EnvSettings => parseOrThrow(envSchema, env, 'environment');

export const brokerSettingsFromEnv = (env: BrokerEnvSettings, cwd: string = process.cwd()): BrokerSettings => ({
  provider: env.BROKER_PROVIDER,
  env: env.BROKER_ENV,
  baseUrl: env.BROKER_ENV === 'live' ? env.BROKER_LIVE_URL : env.BROKER_SIM_URL,
  accessToken: env.BROKER_ACCESS_TOKEN,
  tokenStorePath: path.resolve(cwd, env.TOKEN_STORE_PATH ?? `.secrets/broker_tokens.${env.BROKER_ENV}.json`),
  tokenStoreEncryptionKey: env.TOKEN_STORE_ENCRYPTION_KEY,
  stubAccountFile: env.STUB_ACCOUNT_FILE ? path.resolve(cwd, env.STUB_ACCOUNT_FILE) : undefined
});

export const buildAppConfig = (syncInput: unknown, rawEnv: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig => {
  const sync = parseOrThrow(syncFileSchema, syncInput, 'sync file');
  const env = parseEnvSettings(rawEnv);
  const execution = parseOrThrow(executionSettingsSchema, sync.execution ?? {}, 'execution settings');
  return Object.freeze({
    portfolioId: sync.portfolioId,
    accountId: sync.accountId,
    lastTradeDate: sync.lastTradeDate,
    nextTradeDate: sync.nextTradeDate,
    strategy: {
      baseUrl: env.STRATEGY_API_URL.replace(/\/+$/, ''),
      apiKey: env.STRATEGY_API_KEY,
      apiKeyHeader: env.STRATEGY_API_KEY_HEADER
    },
    broker: brokerSettingsFromEnv(env, cwd),
    execution,
    ledgerFile: path.resolve(cwd, env.LEDGER_FILE),
    runsDir: path.resolve(cwd, env.RUNS_DIR),
    approval: { port: env.APPROVAL_PORT, bind: env.APPROVAL_BIND }
  });
};

export const loadAppConfig = (syncFilePath: string, rawEnv: NodeJS.ProcessEnv = process.env): AppConfig => {
  let raw: unknown;
  try {
    raw = readJSONFile(syncFilePath);
  } catch (err) {
    throw new ConfigError(`Could not read sync file: ${describeError(err)}`, { syncFile: syncFilePath });
  }
  return buildAppConfig(raw, rawEnv);
};
