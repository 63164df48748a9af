import {
  AbortReason,
  LegRemainder,
  OrderExecutionRecord,
  OrderRequest,
  SyncOutcome
} from '../core/types';
import { AppConfig } from '../core/config';
import { OrderSubmissionError, describeError } from '../core/errors';
import { Clock, WaitCancelledError, makeRunId, systemClock } from '../core/time';
import { Brokerage, isSettledStatus } from '../broker/broker.types';
import { RunRecorder, nullRecorder } from '../ledger/ledger';
import { PriceSnapshotProvider } from '../data/priceSnapshot';
import { AllocationPlanner } from '../strategy/allocationPlanner';
import { SecurityIdentityResolver } from '../strategy/securityResolver';
import { StrategyEngine } from '../strategy/strategyEngine.types';
import { renderOrders, renderRemainders } from '../ui/render';
import { ConfirmationProvider, OrderProposal } from './confirmation';
import { monitorFills } from './fillMonitor';
import { CashLedger, OrderSizer } from './orderSizer';

export type ControllerState =
  | 'PLANNING'
  | 'AWAITING_CONFIRMATION'
  | 'SUBMITTING'
  | 'MONITORING'
  | 'PARTIAL_REPLAN'
  | 'CONVERGED'
  | 'ABORTED';

export interface ExecutionControllerDeps {
  broker: Brokerage;
  engine: StrategyEngine;
  confirmation: ConfirmationProvider;
  recorder?: RunRecorder;
  clock?: Clock;
}

export interface SyncRunOptions {
  runId?: string;
  /** Aborting cancels the fill-monitor wait; the run ends ABORTED/CANCELLED. */
  signal?: AbortSignal;
}

export type ControllerConfig = Pick<AppConfig, 'accountId' | 'portfolioId' | 'execution'>;

export const remaindersOf = (records: OrderExecutionRecord[]): LegRemainder[] =>
  records.flatMap((r) =>
    r.legs.map((leg) => ({
      orderId: r.orderId,
      symbol: leg.symbol,
      action: leg.action,
      quantityRequested: leg.quantityRequested,
      quantityFilled: leg.quantityFilled,
      remainder: Math.max(0, leg.quantityRequested - leg.quantityFilled)
    }))
  );

const mergeRecords = (current: OrderExecutionRecord[], latest: OrderExecutionRecord[]) => {
  const byId = new Map(latest.map((r) => [r.orderId, r]));
  return current.map((r) => byId.get(r.orderId) ?? r);
};

/**
 * Drives one sync run: plan, confirm, submit, monitor, and re-plan against
 * fresh positions and prices until nothing is left to fill or the budget runs
 * out. Brokerage state is re-read at the top of every iteration.
 */
export class ExecutionController {
  private readonly broker: Brokerage;
  private readonly engine: StrategyEngine;
  private readonly confirmation: ConfirmationProvider;
  private readonly recorder: RunRecorder;
  private readonly clock: Clock;
  private readonly history: ControllerState[] = [];

  constructor(private readonly config: ControllerConfig, deps: ExecutionControllerDeps) {
    this.broker = deps.broker;
    this.engine = deps.engine;
    this.confirmation = deps.confirmation;
    this.recorder = deps.recorder ?? nullRecorder;
    this.clock = deps.clock ?? systemClock;
  }

  /** Every state entered so far, in order. */
  get states(): readonly ControllerState[] {
    return this.history;
  }

  get state(): ControllerState | undefined {
    return this.history.at(-1);
  }

  private enter(state: ControllerState) {
    this.history.push(state);
  }

  async run(options: SyncRunOptions = {}): Promise<SyncOutcome> {
    const { accountId, portfolioId, execution } = this.config;
    const runId = options.runId ?? makeRunId(new Date(this.clock.now()));
    const startedAt = this.clock.now();
    const executions: OrderExecutionRecord[] = [];
    let remainders: LegRemainder[] = [];
    let iteration = 0;

    const resolver = new SecurityIdentityResolver(this.engine, execution.dualClassPairs);
    const planner = new AllocationPlanner(this.engine, resolver, {
      portfolioId,
      unknownTransactionKind: execution.unknownTransactionKind,
      onDropped: (t) =>
        this.recorder.record(runId, 'TRANSACTION_DROPPED', {
          iteration,
          securityIdentifier: t.securityIdentifier,
          ticker: t.ticker,
          kind: t.kind,
          shares: t.shares
        })
    });
    const snapshots = new PriceSnapshotProvider(this.broker, resolver, execution.quoteBatchSize);
    const sizer = new OrderSizer(accountId);

    const converge = (): SyncOutcome => {
      this.enter('CONVERGED');
      this.recorder.record(runId, 'SYNC_CONVERGED', { iterations: iteration, nextTradeDate: planner.nextTradeDate });
      console.log(`Account ${accountId} converged to portfolio ${portfolioId} after ${iteration} iteration(s)`);
      return { status: 'CONVERGED', runId, iterations: iteration, executions, nextTradeDate: planner.nextTradeDate };
    };

    const abort = (reason: AbortReason, message: string): SyncOutcome => {
      this.enter('ABORTED');
      const open = remainders.filter((r) => r.remainder !== 0);
      this.recorder.record(runId, 'SYNC_ABORTED', { reason, message, iterations: iteration, remainders: open });
      console.warn(`Account ${accountId}: sync aborted (${reason}): ${message}`);
      return { status: 'ABORTED', runId, iterations: iteration, reason, message, remainders: open, executions };
    };

    this.recorder.record(runId, 'SYNC_STARTED', { accountId, portfolioId, execution });
    try {
      this.enter('PLANNING');
      const allocation = await planner.planAllocationOnly();
      this.recorder.record(runId, 'ALLOCATION_RECEIVED', { allocation, nextTradeDate: planner.nextTradeDate });
      console.log(`Portfolio ${portfolioId}: ${Object.keys(allocation).length} security(ies) in target allocation`);

      for (;;) {
        iteration += 1;
        if (iteration > 1) this.enter('PLANNING');

        const [brokerPositions, cash] = await Promise.all([
          this.broker.listPositions(accountId),
          this.broker.getCashBalance(accountId)
        ]);
        const positions = await resolver.resolvePositions(brokerPositions);
        const snapshot = await snapshots.getSnapshot(positions, allocation, new Date(this.clock.now()));
        this.recorder.record(runId, 'SNAPSHOT_TAKEN', { iteration, asOf: snapshot.asOf, prices: snapshot.prices });

        const plan = await planner.planRebalance(positions, cash, snapshot);
        this.recorder.record(runId, 'PLAN_CREATED', {
          iteration,
          transactions: plan.transactions.length,
          nextTradeDate: plan.nextTradeDate
        });
        this.recorder.writeArtifact(runId, `plan-${iteration}.json`, { positions, cash, snapshot, plan });

        const cashLedger = new CashLedger(cash);
        const sized = sizer.buildOrders(plan.transactions, cashLedger);
        const orders = this.dropZeroShareOrders(sized);
        this.recorder.writeArtifact(runId, `orders-${iteration}.json`, {
          orders,
          cashBefore: cash,
          projectedCash: cashLedger.remaining
        });
        if (!orders.length) return converge();

        this.enter('AWAITING_CONFIRMATION');
        const proposal: OrderProposal = {
          runId,
          iteration,
          accountId,
          portfolioId,
          orders,
          cashBefore: cash,
          projectedCash: cashLedger.remaining
        };
        console.log(`\nProposed orders for account ${accountId} (iteration ${iteration}):\n${renderOrders(orders)}`);
        console.log(`Cash ${cash.toFixed(2)} -> projected ${cashLedger.remaining.toFixed(2)}\n`);
        this.recorder.record(runId, 'ORDERS_PROPOSED', { iteration, orders, projectedCash: cashLedger.remaining });
        const confirmed = await this.confirmation.confirm(proposal, options.signal);
        if (options.signal?.aborted) {
          return abort('CANCELLED', 'Interrupted before submission; nothing submitted');
        }
        if (!confirmed) {
          this.recorder.record(runId, 'CONFIRMATION_DECLINED', { iteration });
          return abort('NOT_CONFIRMED', 'Proposed orders were not confirmed; nothing submitted');
        }
        this.recorder.record(runId, 'ORDERS_CONFIRMED', { iteration });

        this.enter('SUBMITTING');
        const submitted = await this.submit(orders);
        this.recorder.record(runId, 'ORDERS_SUBMITTED', { iteration, orderIds: submitted.map((r) => r.orderId) });
        console.log(`Submitted ${submitted.length} order(s) for account ${accountId}`);

        this.enter('MONITORING');
        const monitored = await monitorFills(this.broker, accountId, submitted, {
          initialWaitMs: execution.initialWaitMs,
          pollIntervalMs: execution.pollIntervalMs,
          timeoutMs: execution.monitorTimeoutMs,
          clock: this.clock,
          signal: options.signal
        });
        let records = monitored.records;
        this.recorder.record(runId, 'FILLS_OBSERVED', { iteration, polls: monitored.polls, timedOut: monitored.timedOut, records });

        if (monitored.timedOut) {
          const working = records.filter((r) => !isSettledStatus(r.status));
          if (!execution.cancelPendingOnTimeout) {
            executions.push(...records);
            remainders = remaindersOf(records);
            return abort(
              'ORDERS_STILL_WORKING',
              `${working.length} order(s) still working at monitoring timeout; not re-planning over live orders`
            );
          }
          const cancels = await Promise.allSettled(working.map((r) => this.broker.cancelOrder(accountId, r.orderId)));
          const orderIds: string[] = [];
          const failed: { orderId: string; error: string }[] = [];
          cancels.forEach((result, idx) => {
            const orderId = working[idx]?.orderId ?? '';
            if (result.status === 'fulfilled') {
              orderIds.push(orderId);
              return;
            }
            const error = describeError(result.reason);
            failed.push({ orderId, error });
            console.warn(`Account ${accountId}: could not cancel order ${orderId} at monitoring timeout: ${error}`);
          });
          if (orderIds.length) {
            console.warn(`Account ${accountId}: cancelled ${orderIds.length} working order(s) at monitoring timeout: ${orderIds.join(', ')}`);
          }
          this.recorder.record(runId, 'ORDERS_CANCELLED', { iteration, orderIds, failed });
          // Fills can land between the last poll and the cancel.
          records = mergeRecords(records, await this.broker.getOrderStatus(accountId));
          const live = records.filter((r) => !isSettledStatus(r.status));
          if (live.length) {
            executions.push(...records);
            remainders = remaindersOf(records);
            return abort(
              'ORDERS_STILL_WORKING',
              `${live.length} order(s) still working after cancelling at monitoring timeout: ${live.map((r) => r.orderId).join(', ')}`
            );
          }
        }

        executions.push(...records);
        this.recorder.writeArtifact(runId, `executions-${iteration}.json`, records);
        remainders = remaindersOf(records);
        if (remainders.every((r) => r.remainder === 0)) return converge();

        if (iteration >= execution.maxIterations) {
          return abort('DID_NOT_CONVERGE', `Unfilled quantity remains after ${iteration} iteration(s)`);
        }
        const elapsed = this.clock.now() - startedAt;
        if (execution.maxElapsedMs !== undefined && elapsed >= execution.maxElapsedMs) {
          return abort('DID_NOT_CONVERGE', `Unfilled quantity remains after ${Math.round(elapsed / 1000)}s`);
        }

        this.enter('PARTIAL_REPLAN');
        const open = remainders.filter((r) => r.remainder !== 0);
        console.log(`Re-planning account ${accountId} for unfilled quantity:\n${renderRemainders(open)}`);
      }
    } catch (err) {
      if (err instanceof WaitCancelledError) {
        return abort('CANCELLED', 'Fill monitoring was cancelled; submitted orders may still be working');
      }
      this.enter('ABORTED');
      this.recorder.record(runId, 'SYNC_FAILED', { iteration, error: describeError(err) });
      throw err;
    }
  }

  private dropZeroShareOrders(orders: OrderRequest[]): OrderRequest[] {
    return orders.filter((o) => {
      if (o.quantity > 0) return true;
      console.warn(`Skipping ${o.action} ${o.symbol} for account ${o.accountId}: planned quantity is below one share`);
      return false;
    });
  }

  private async submit(orders: OrderRequest[]): Promise<OrderExecutionRecord[]> {
    const { accountId } = this.config;
    try {
      return await this.broker.submitOrderGroup(accountId, orders);
    } catch (err) {
      if (err instanceof OrderSubmissionError) throw err;
      throw new OrderSubmissionError('Order group submission failed', { accountId, orders: orders.length }, { cause: err });
    }
  }
}
