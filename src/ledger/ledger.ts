import crypto from 'crypto';
import { LedgerEvent, LedgerEventType } from '../core/types';
import { appendLedgerEvent, readLedgerEvents, writeRunArtifact } from './storage';

export const makeEvent = (runId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export type RunStatus = 'IN_PROGRESS' | 'SKIPPED' | 'CONVERGED' | 'ABORTED' | 'FAILED' | 'UNKNOWN';

/** Where a sync run leaves its audit trail. */
export interface RunRecorder {
  record(runId: string, type: LedgerEventType, details?: Record<string, unknown>): void;
  writeArtifact(runId: string, fileName: string, data: unknown): void;
}

export class Ledger implements RunRecorder {
  constructor(private readonly ledgerFile: string, private readonly runsDir: string) {}

  record(runId: string, type: LedgerEventType, details?: Record<string, unknown>) {
    appendLedgerEvent(this.ledgerFile, makeEvent(runId, type, details));
  }

  writeArtifact(runId: string, fileName: string, data: unknown) {
    writeRunArtifact(this.runsDir, runId, fileName, data);
  }

  getEvents(): LedgerEvent[] {
    return readLedgerEvents(this.ledgerFile);
  }

  getEventsForRun(runId: string): LedgerEvent[] {
    return this.getEvents().filter((e) => e.runId === runId);
  }

  getRunStatus(runId: string): RunStatus {
    const events = this.getEventsForRun(runId);
    const last = events
      .slice()
      .sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime())
      .at(-1);
    if (!last) return 'UNKNOWN';
    switch (last.type) {
      case 'SYNC_CONVERGED':
        return 'CONVERGED';
      case 'SYNC_ABORTED':
        return 'ABORTED';
      case 'SYNC_FAILED':
        return 'FAILED';
      case 'SYNC_SKIPPED':
        return 'SKIPPED';
      default:
        return 'IN_PROGRESS';
    }
  }
}

/** Discards everything; for callers that do not want an audit trail. */
export const nullRecorder: RunRecorder = {
  record: () => undefined,
  writeArtifact: () => undefined
};
