import { Command } from 'commander';
import { AmountSchema } from '../schemas/index.js';
import {
  callerFromKey,
  jsonOption,
  keyOption,
  mutate,
  openRegistry,
  print,
  stateOption,
  type CallerOpts,
  type StateOpts,
} from './shared.js';

export function createTipCommand(): Command {
  const tip = new Command('tip').description('Tip amount, deposits and payouts');

  tip
    .command('show')
    .description('Show the tip amount, balance, collector and payouts so far')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: StateOpts) => {
      const { registry, rail } = await openRegistry(opts.state);
      const summary = {
        tipAmount: registry.tipAmount(),
        balance: registry.balance(),
        tipCollector: registry.tipCollector(),
      };
      const payouts = rail.entries();
      print(
        opts,
        { ...summary, payouts },
        [
          `tip amount:    ${summary.tipAmount} wei`,
          `balance:       ${summary.balance} wei`,
          `tip collector: ${summary.tipCollector}`,
          ...payouts.map(([to, amount]) => `  paid ${amount} wei to ${to}`),
        ].join('\n'),
      );
    });

  tip
    .command('amount')
    .description('Set the minimum tip for creating an assertion (owner or tip collector)')
    .argument('<wei>', 'New tip amount in wei')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (wei: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      const amount = AmountSchema.parse(wei);
      await mutate(opts, (registry) => registry.setTipAmount(ctx, amount));
    });

  tip
    .command('deposit')
    .description('Send value to the registry; must cover the tip amount')
    .argument('<wei>', 'Value in wei')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (wei: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key, AmountSchema.parse(wei));
      await mutate(opts, (registry) => registry.deposit(ctx));
    });

  tip
    .command('out')
    .description('Pay the whole balance to the tip collector (anyone may call)')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: StateOpts) => {
      const paid = await mutate(opts, (registry) => registry.tipOut());
      if (!opts.json && paid === 0n) console.log('Nothing to pay out.');
    });

  return tip;
}
