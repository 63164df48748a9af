import { AppConfig } from '../core/config';
import { SyncOutcome } from '../core/types';
import { isBeforeNextTradeDate, makeRunId } from '../core/time';
import { nullRecorder } from '../ledger/ledger';
import { ExecutionController, ExecutionControllerDeps } from './executionController';

export interface SyncOptions {
  /** Run even though the next trade date has not arrived. */
  force?: boolean;
  now?: Date;
  runId?: string;
  signal?: AbortSignal;
}

export const runSync = async (
  config: AppConfig,
  deps: ExecutionControllerDeps,
  options: SyncOptions = {}
): Promise<SyncOutcome> => {
  const now = options.now ?? new Date();
  const runId = options.runId ?? makeRunId(now);
  if (!options.force && isBeforeNextTradeDate(now, config.lastTradeDate, config.nextTradeDate)) {
    const message = `No trades necessary: next trade date ${config.nextTradeDate} has not arrived`;
    (deps.recorder ?? nullRecorder).record(runId, 'SYNC_SKIPPED', {
      accountId: config.accountId,
      portfolioId: config.portfolioId,
      lastTradeDate: config.lastTradeDate,
      nextTradeDate: config.nextTradeDate
    });
    console.log(`Account ${config.accountId}: ${message}`);
    return { status: 'SKIPPED', runId, message };
  }
  return new ExecutionController(config, deps).run({ runId, signal: options.signal });
};
