#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { brokerSettingsFromEnv, parseBrokerEnv } from '../core/config';
import { describeError } from '../core/errors';
import { getBroker } from '../broker/broker';
import { renderExecutions, renderPositions } from '../ui/render';

const VIEWS = ['positions', 'balance', 'orders'] as const;
type AccountView = (typeof VIEWS)[number];

const isView = (value: string): value is AccountView => VIEWS.some((v) => v === value);

const program = new Command();

program
  .name('account')
  .description('Show brokerage account data')
  .argument('<view>', VIEWS.join(' | '))
  .argument('<accountId>', 'brokerage account id')
  .option('--json', 'print raw JSON', false);

const run = async () => {
  program.parse(process.argv);
  const [view, accountId] = program.args;
  const { json } = program.opts<{ json: boolean }>();
  if (!view || !accountId || !isView(view)) {
    program.help();
    return;
  }
  const broker = getBroker(brokerSettingsFromEnv(parseBrokerEnv(process.env)));
  switch (view) {
    case 'positions': {
      const positions = await broker.listPositions(accountId);
      console.log(json ? JSON.stringify(positions, null, 2) : renderPositions(positions));
      break;
    }
    case 'balance': {
      const cash = await broker.getCashBalance(accountId);
      console.log(json ? JSON.stringify({ accountId, cash }, null, 2) : `Account ${accountId} cash: ${cash.toFixed(2)}`);
      break;
    }
    case 'orders': {
      const orders = await broker.getOrderStatus(accountId);
      console.log(json ? JSON.stringify(orders, null, 2) : renderExecutions(orders));
      break;
    }
  }
};

if (require.main === module) {
  run().catch((err) => {
    console.error(`account failed: ${describeError(err)}`);
    process.exitCode = 1;
  });
}
