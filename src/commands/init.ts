import { Command, Option } from 'commander';
import { access } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { toChecksumAddress } from '../lib/address.js';
import { DEFAULT_CHAIN_ID } from '../lib/config.js';
import { toHex, type DocumentFormat } from '../lib/encoding.js';
import { loadKeyFromFile } from '../lib/keys.js';
import { saveState } from '../lib/store.js';
import { AttestationRegistry } from '../registry/registry.js';
import { AddressSchema, ChainIdSchema } from '../schemas/index.js';
import { jsonOption, print, stateOption } from './shared.js';

interface InitOpts {
  state: string;
  ownerKey: string;
  chainId: string;
  address?: string;
  encoding: DocumentFormat;
  force?: boolean;
  json?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a new registry snapshot owned by the given key')
    .requiredOption('--owner-key <file>', 'Key file of the deploying owner')
    .option('--chain-id <id>', 'Chain id bound into signatures', String(DEFAULT_CHAIN_ID))
    .option('--address <address>', 'Registry address bound into signatures (default: random)')
    .addOption(new Option('--encoding <format>', 'Snapshot encoding').choices(['json', 'cbor']).default('json'))
    .option('--force', 'Overwrite an existing snapshot')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (opts: InitOpts) => {
      if (!opts.force && (await exists(opts.state))) {
        throw new Error(`Snapshot ${opts.state} already exists. Use --force to overwrite.`);
      }
      const owner = await loadKeyFromFile(opts.ownerKey);
      const address = opts.address
        ? AddressSchema.parse(opts.address)
        : toChecksumAddress(toHex(randomBytes(20)));
      const registry = new AttestationRegistry({
        owner: owner.address,
        address,
        chainId: ChainIdSchema.parse(Number(opts.chainId)),
      });

      await saveState(opts.state, registry.exportState(), [], opts.encoding);
      const domain = registry.domain;
      print(
        opts,
        { state: opts.state, owner: registry.owner(), domain },
        [
          `Registry written to: ${opts.state}`,
          `  owner:   ${registry.owner()}`,
          `  address: ${domain.verifyingContract}`,
          `  chainId: ${domain.chainId}`,
        ].join('\n'),
      );
    });
}
