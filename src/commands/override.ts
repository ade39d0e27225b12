import { Command } from 'commander';
import { systemClock } from '../lib/timestamp.js';
import { SecondsArgSchema } from '../schemas/index.js';
import { callerFromKey, jsonOption, keyOption, mutate, stateOption, type CallerOpts } from './shared.js';

interface ForceAttestOpts extends CallerOpts {
  signedAt?: string;
}

/** Overrider-only controls; none of these need a subject signature */
export function createOverrideCommand(): Command {
  const override = new Command('override').description('Overrider actions (force attest/revoke, blocklist)');

  override
    .command('attest')
    .description('Record an attestation without a signature')
    .argument('<assertionId>', 'Assertion id')
    .argument('<subject>', 'Subject address')
    .option('--signed-at <ts>', 'Timestamp to record (default: now)')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (id: string, subject: string, opts: ForceAttestOpts) => {
      const ctx = await callerFromKey(opts.key);
      const signedAt = opts.signedAt === undefined ? systemClock() : SecondsArgSchema.parse(opts.signedAt);
      await mutate(opts, (registry) => registry.forceAttest(ctx, id, subject, signedAt));
    });

  override
    .command('revoke')
    .description('Revoke an attestation without a signature')
    .argument('<assertionId>', 'Assertion id')
    .argument('<subject>', 'Subject address')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (id: string, subject: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.forceRevoke(ctx, id, subject));
    });

  override
    .command('block')
    .description('Block an address from attesting')
    .argument('<address>', 'Address to block')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (address: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.blockAddress(ctx, address));
    });

  override
    .command('unblock')
    .description('Lift a block')
    .argument('<address>', 'Address to unblock')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (address: string, opts: CallerOpts) => {
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.unBlockAddress(ctx, address));
    });

  return override;
}
