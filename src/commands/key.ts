import { Command, Option } from 'commander';
import { access, writeFile } from 'node:fs/promises';
import { keysDir } from '../lib/config.js';
import { toHex } from '../lib/encoding.js';
import {
  deleteStoredKey,
  generateSecp256k1,
  keyFilePath,
  listStoredKeys,
  loadKeyFromFile,
  loadStoredKey,
  saveKey,
  serializeKey,
} from '../lib/keys.js';
import { AddressSchema } from '../schemas/index.js';
import { jsonOption, print } from './shared.js';

export function createKeyCommand(): Command {
  const key = new Command('key').description('Key management');

  key
    .command('generate')
    .description('Generate a secp256k1 keypair')
    .option('--output <file>', 'Write the key file here instead of the local key store')
    .addOption(jsonOption())
    .action(async (opts: { output?: string; json?: boolean }) => {
      const generated = generateSecp256k1();
      let file: string;
      if (opts.output) {
        await writeFile(opts.output, serializeKey(generated), { mode: 0o600 });
        file = opts.output;
      } else {
        file = await saveKey(keysDir(), generated);
      }
      print(opts, { address: generated.address, file }, generated.address);
      if (!opts.json) console.error(`Key written to: ${file}`);
    });

  key
    .command('import')
    .description('Import an existing private key into the local key store')
    .requiredOption('--private-key <file>', 'Path to private key file')
    .option('--force', 'Overwrite if key already exists')
    .action(async (opts: { privateKey: string; force?: boolean }) => {
      const keyData = await loadKeyFromFile(opts.privateKey);
      const dir = keysDir();

      if (!opts.force) {
        const taken = await access(keyFilePath(dir, keyData.address)).then(
          () => true,
          () => false,
        );
        if (taken) {
          throw new Error(`Key ${keyData.address} already exists in store. Use --force to overwrite.`);
        }
      }

      await saveKey(dir, keyData);
      console.log(keyData.address);
    });

  key
    .command('list')
    .description('List all keys in the local store')
    .addOption(jsonOption())
    .action(async (opts: { json?: boolean }) => {
      const entries = await listStoredKeys(keysDir());
      if (entries.length === 0 && !opts.json) {
        console.log('No keys found in store.');
        return;
      }
      print(opts, entries, entries.map((e) => `${e.address}\t${e.type}\t${e.file}`).join('\n'));
    });

  key
    .command('export <address>')
    .description('Export a key from the store')
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'hex']).default('json'))
    .option('--public-only', 'Only output the public key')
    .action(async (address: string, opts: { format: 'json' | 'hex'; publicOnly?: boolean }) => {
      const data = await loadStoredKey(keysDir(), AddressSchema.parse(address));
      if (opts.format === 'hex') {
        console.log(toHex(opts.publicOnly ? data.publicKey : data.privateKey));
      } else if (opts.publicOnly) {
        console.log(JSON.stringify({ type: data.type, address: data.address, publicKey: toHex(data.publicKey) }, null, 2));
      } else {
        console.log(serializeKey(data));
      }
    });

  key
    .command('delete <address>')
    .description('Remove a key from the store')
    .option('--force', 'Required to confirm deletion')
    .action(async (address: string, opts: { force?: boolean }) => {
      if (!opts.force) {
        throw new Error('Deleting a key is irreversible. Use --force to confirm.');
      }
      const normalized = AddressSchema.parse(address);
      await deleteStoredKey(keysDir(), normalized);
      console.log(`Deleted key ${normalized}`);
    });

  return key;
}
