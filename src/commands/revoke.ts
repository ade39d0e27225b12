import { Command } from 'commander';
import { readSignedDocument } from './attest.js';
import { callerFromKey, jsonOption, keyOption, mutate, stateOption, type CallerOpts } from './shared.js';

export function createRevokeCommand(): Command {
  return new Command('revoke')
    .description('Submit a signed revocation; works on stopped assertions and blocked subjects')
    .argument('<file>', 'Signed revocation produced by `sign --revoke`')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (file: string, opts: CallerOpts) => {
      const doc = await readSignedDocument(file, 'revoke');
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => registry.revoke(ctx, doc.assertionId, doc.signer, doc.signedAt, doc.signature));
    });
}
