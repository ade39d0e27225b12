import { Command } from 'commander';
import {
  callerFromKey,
  jsonOption,
  keyOption,
  mutate,
  print,
  query,
  stateOption,
  type CallerOpts,
  type StateOpts,
} from './shared.js';

export function createRoleCommand(): Command {
  const role = new Command('role').description('Owner, overrider and tip collector');

  role
    .command('show')
    .description('Show who holds each role')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: StateOpts) => {
      const roles = await query(opts, (registry) => ({
        owner: registry.owner(),
        overrider: registry.overrider(),
        tipCollector: registry.tipCollector(),
      }));
      print(
        opts,
        roles,
        [`owner:         ${roles.owner}`, `overrider:     ${roles.overrider}`, `tip collector: ${roles.tipCollector}`].join(
          '\n',
        ),
      );
    });

  role
    .command('transfer-owner')
    .description('Hand ownership to another address (owner)')
    .argument('<address>', 'New owner')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (address: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.transferOwnership(ctx, address));
    });

  role
    .command('renounce-owner')
    .description('Give up ownership for good (owner)')
    .option('--force', 'Required to confirm; owner-only actions become impossible')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: CallerOpts & { force?: boolean }) => {
      if (!opts.force) {
        throw new Error('Renouncing ownership is irreversible. Use --force to confirm.');
      }
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.renounceOwnership(ctx));
    });

  role
    .command('overrider')
    .description('Set the overrider (owner or current overrider)')
    .argument('<address>', 'New overrider')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (address: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.setOverrider(ctx, address));
    });

  role
    .command('tip-collector')
    .description('Set the tip collector (owner or current tip collector)')
    .argument('<address>', 'New tip collector')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (address: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.setTipCollector(ctx, address));
    });

  return role;
}
