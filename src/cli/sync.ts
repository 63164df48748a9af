#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadAppConfig } from '../core/config';
import { describeError } from '../core/errors';
import { getBroker } from '../broker/broker';
import { StrategyEngineClient } from '../integrations/strategyEngineClient';
import { Ledger } from '../ledger/ledger';
import { AutoConfirmProvider, ConfirmationProvider, TerminalConfirmProvider } from '../execution/confirmation';
import { runSync } from '../execution/sync';
import { HttpApprovalProvider } from '../ui/approvalServer';
import { renderOutcome } from '../ui/render';

interface SyncCliOptions {
  confirmYes: boolean;
  approveViaHttp: boolean;
  force: boolean;
}

const program = new Command();

program
  .name('sync')
  .description('Trade the account toward the strategy engine\'s target allocation')
  .argument('<syncFile>', 'JSON sync file naming the portfolio and account')
  .option('-y, --confirm-yes', 'confirm proposed orders without prompting', false)
  .option('--approve-via-http', 'wait for approval on the local approval page', false)
  .option('--force', 'sync even if the next trade date has not arrived', false);

const run = async () => {
  program.parse(process.argv);
  const [syncFile] = program.args;
  const opts = program.opts<SyncCliOptions>();
  if (!syncFile) {
    program.help();
    return;
  }
  const config = loadAppConfig(syncFile);
  const confirmation: ConfirmationProvider = opts.confirmYes
    ? new AutoConfirmProvider()
    : opts.approveViaHttp
      ? new HttpApprovalProvider(config.approval)
      : new TerminalConfirmProvider();

  const abort = new AbortController();
  process.on('SIGINT', () => {
    if (abort.signal.aborted) process.exit(130);
    console.warn('Interrupted; stopping at the next prompt or wait. Press Ctrl-C again to exit now.');
    abort.abort();
  });

  const outcome = await runSync(
    config,
    {
      broker: getBroker(config.broker),
      engine: new StrategyEngineClient(config.strategy),
      confirmation,
      recorder: new Ledger(config.ledgerFile, config.runsDir)
    },
    { force: opts.force, signal: abort.signal }
  );
  console.log(renderOutcome(outcome));
};

if (require.main === module) {
  run()
    .catch((err) => {
      console.error(`sync failed: ${describeError(err)}`);
      process.exitCode = 1;
    })
    .finally(() => process.exit());
}
