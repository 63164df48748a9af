import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ensureDir, writeJSONFile } from '../core/utils';
import { LedgerEvent } from '../core/types';
import { describeError } from '../core/errors';

const ledgerEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum([
    'SYNC_STARTED',
    'SYNC_SKIPPED',
    'ALLOCATION_RECEIVED',
    'SNAPSHOT_TAKEN',
    'PLAN_CREATED',
    'TRANSACTION_DROPPED',
    'ORDERS_PROPOSED',
    'CONFIRMATION_DECLINED',
    'ORDERS_CONFIRMED',
    'ORDERS_SUBMITTED',
    'FILLS_OBSERVED',
    'ORDERS_CANCELLED',
    'SYNC_CONVERGED',
    'SYNC_ABORTED',
    'SYNC_FAILED'
  ]),
  details: z.record(z.unknown()).optional()
}) satisfies z.ZodType<LedgerEvent>;

export const appendLedgerEvent = (ledgerFile: string, event: LedgerEvent) => {
  ensureDir(path.dirname(ledgerFile));
  const line = JSON.stringify(event);
  fs.appendFileSync(ledgerFile, `${line}\n`);
};

export const readLedgerEvents = (ledgerFile: string): LedgerEvent[] => {
  if (!fs.existsSync(ledgerFile)) return [];
  const content = fs.readFileSync(ledgerFile, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  const events: LedgerEvent[] = [];
  lines.forEach((line, idx) => {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      console.warn(`ledger ${ledgerFile}: skipping unparsable line ${idx + 1}: ${describeError(err)}`);
      return;
    }
    const parsed = ledgerEventSchema.safeParse(raw);
    if (parsed.success) events.push(parsed.data);
    else console.warn(`ledger ${ledgerFile}: skipping malformed event on line ${idx + 1}`);
  });
  return events;
};

export const writeRunArtifact = (runsDir: string, runId: string, fileName: string, data: unknown) => {
  const runDir = path.join(runsDir, runId);
  ensureDir(runDir);
  writeJSONFile(path.join(runDir, fileName), data);
};

export const readRunArtifact = (runsDir: string, runId: string, fileName: string): unknown => {
  const filePath = path.join(runsDir, runId, fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
};
