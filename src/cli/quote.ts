#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { brokerSettingsFromEnv, parseBrokerEnv } from '../core/config';
import { describeError } from '../core/errors';
import { getBroker } from '../broker/broker';
import { renderQuotes } from '../ui/render';

const program = new Command();

program
  .name('quote')
  .description('Show bid, ask and reference price for brokerage symbols')
  .argument('<symbols...>', 'brokerage symbols, e.g. AAPL BRK.B');

const run = async () => {
  program.parse(process.argv);
  const symbols = program.args.map((s) => s.toUpperCase());
  const broker = getBroker(brokerSettingsFromEnv(parseBrokerEnv(process.env)));
  console.log(renderQuotes(await broker.getQuotes(symbols)));
};

if (require.main === module) {
  run().catch((err) => {
    console.error(`quote failed: ${describeError(err)}`);
    process.exitCode = 1;
  });
}
