export const makeRunId = (now: Date = new Date()): string => {
  // ISO up to seconds; dash in place of colon for path safety.
  const isoSecond = now.toISOString().slice(0, 19);
  return isoSecond.replace(/:/g, '-');
};

export const parseDate = (value: string, label: string): Date => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parsed;
};

/**
 * True when a previous trade is on record and the strategy's next trade date
 * is still in the future.
 */
export const isBeforeNextTradeDate = (now: Date, lastTradeDate?: string, nextTradeDate?: string): boolean => {
  if (!lastTradeDate || !nextTradeDate) return false;
  return now.getTime() < parseDate(nextTradeDate, 'nextTradeDate').getTime();
};

export class WaitCancelledError extends Error {
  constructor() {
    super('wait cancelled');
    this.name = 'WaitCancelledError';
  }
}

/** Resolves after `ms`, or rejects with WaitCancelledError once `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new WaitCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new WaitCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/** Time source for the fill monitor and the run budget; tests swap in a fake. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};
