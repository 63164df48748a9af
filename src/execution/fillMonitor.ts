import { OrderExecutionRecord } from '../core/types';
import { Clock, systemClock } from '../core/time';
import { Brokerage, isSettledStatus } from '../broker/broker.types';

export interface FillMonitorOptions {
  initialWaitMs: number;
  pollIntervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface FillMonitorResult {
  records: OrderExecutionRecord[];
  timedOut: boolean;
  polls: number;
}

/**
 * Waits, then polls the account's orders until every submitted order is in a
 * terminal state or the timeout passes. Orders missing from a poll keep their
 * last known record.
 */
export const monitorFills = async (
  broker: Pick<Brokerage, 'getOrderStatus'>,
  accountId: string,
  submitted: OrderExecutionRecord[],
  options: FillMonitorOptions
): Promise<FillMonitorResult> => {
  const clock = options.clock ?? systemClock;
  const deadline = clock.now() + options.timeoutMs;
  let records = submitted;
  let polls = 0;

  await clock.sleep(options.initialWaitMs, options.signal);
  for (;;) {
    const polled = new Map((await broker.getOrderStatus(accountId)).map((r) => [r.orderId, r]));
    polls += 1;
    records = records.map((r) => polled.get(r.orderId) ?? r);
    if (records.every((r) => isSettledStatus(r.status))) {
      return { records, timedOut: false, polls };
    }
    const left = deadline - clock.now();
    if (left <= 0) {
      return { records, timedOut: true, polls };
    }
    const pending = records.filter((r) => !isSettledStatus(r.status)).length;
    console.log(`Account ${accountId}: ${pending} order(s) still working; next check in ${Math.round(Math.min(options.pollIntervalMs, left) / 1000)}s`);
    await clock.sleep(Math.min(options.pollIntervalMs, left), options.signal);
  }
};
