import { Command } from 'commander';
import { formatTimestamp } from '../lib/timestamp.js';
import type { AssertionView } from '../registry/registry.js';
import { AmountSchema, AssertionInputSchema, SecondsArgSchema } from '../schemas/index.js';
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

interface AddOpts extends CallerOpts {
  freshness: string;
  expiry: string;
  requiresGateway?: boolean;
  gateway?: string;
  controller?: string;
  value: string;
}

function describeAssertion(a: AssertionView): string {
  return [
    `${a.assertionId}  ${JSON.stringify(a.text)}`,
    `  revokeId:   ${a.revokeId}`,
    `  freshness:  ${a.freshnessWindow}s   expiry: ${a.expiryWindow}s`,
    `  gateway:    ${a.gateway}${a.requiresGateway ? ' (required)' : ''}`,
    `  controller: ${a.controller}`,
    `  stopped:    ${a.stopped ? 'yes' : 'no'}`,
  ].join('\n');
}

/** Assertion-scoped command run by the holder of `--key` */
function callerCommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .argument('<assertionId>', 'Assertion id (0x + 64 hex)')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption());
}

export function createAssertionCommand(): Command {
  const assertion = new Command('assertion').description('Register and administer assertions');

  assertion
    .command('add')
    .description('Register a new assertion (anyone may do this)')
    .argument('<text>', 'Assertion text, e.g. "I certify that ..."')
    .requiredOption('--freshness <seconds>', 'Max age of a signature at attest time')
    .requiredOption('--expiry <seconds>', 'Age after which an attestation is stale')
    .option('--requires-gateway', 'Only the gateway may submit attestations; expiry is enforced')
    .option('--gateway <address>', 'Gateway address')
    .option('--controller <address>', 'Controller address (default: caller)')
    .option('--value <wei>', 'Value sent with the call', '0')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (text: string, opts: AddOpts) => {
      const ctx = await callerFromKey(opts.key, AmountSchema.parse(opts.value));
      const input = AssertionInputSchema.parse({
        text,
        freshnessWindow: SecondsArgSchema.parse(opts.freshness),
        expiryWindow: SecondsArgSchema.parse(opts.expiry),
        requiresGateway: opts.requiresGateway ?? false,
        gateway: opts.gateway,
        controller: opts.controller ?? ctx.caller,
      });
      const id = await mutate(opts, (registry) => registry.addAssertion(ctx, input));
      if (!opts.json) console.log(id);
    });

  assertion.addCommand(
    callerCommand('controller', 'Hand the assertion to a new controller (controller or owner)')
      .argument('<controller>', 'New controller address')
      .action(async (id: string, next: string, opts: CallerOpts) => {
        const ctx = await callerFromKey(opts.key);
        await mutate(opts, (registry) => registry.setController(ctx, id, next));
      }),
  );

  assertion.addCommand(
    callerCommand('gateway', 'Set the gateway address (controller or owner)')
      .argument('<gateway>', 'New gateway address')
      .action(async (id: string, next: string, opts: CallerOpts) => {
        const ctx = await callerFromKey(opts.key);
        await mutate(opts, (registry) => registry.setGateway(ctx, id, next));
      }),
  );

  assertion.addCommand(
    callerCommand('stop', 'Stop new attestations (controller or overrider)').action(
      async (id: string, opts: CallerOpts) => {
        const ctx = await callerFromKey(opts.key);
        await mutate(opts, (registry) => registry.stopAssertion(ctx, id));
      },
    ),
  );

  assertion.addCommand(
    callerCommand('unstop', 'Allow attestations again (controller or overrider)').action(
      async (id: string, opts: CallerOpts) => {
        const ctx = await callerFromKey(opts.key);
        await mutate(opts, (registry) => registry.unStopAssertion(ctx, id));
      },
    ),
  );

  assertion
    .command('list')
    .description('List assertions in creation order')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: StateOpts) => {
      const { list, updated } = await query(opts, (registry) => ({
        list: registry.listAssertions(),
        updated: registry.lastAssertionListUpdate(),
      }));
      print(
        opts,
        { lastAssertionListUpdate: updated, assertions: list },
        [
          `${list.length} assertion(s), last update ${formatTimestamp(updated)}`,
          ...list.map((a, i) => `[${i}] ${a.assertionId}  ${JSON.stringify(a.text)}${a.stopped ? '  (stopped)' : ''}`),
        ].join('\n'),
      );
    });

  assertion
    .command('show')
    .description('Show one assertion')
    .argument('<assertionId>', 'Assertion id')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (id: string, opts: StateOpts) => {
      const found = await query(opts, (registry) => registry.getAssertion(id));
      if (!found) {
        throw new Error(`Assertion ${id} does not exist`);
      }
      print(opts, found, describeAssertion(found));
    });

  return assertion;
}
