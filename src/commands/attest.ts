import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { SignedAttestationSchema, type SignedAttestation } from '../schemas/index.js';
import { callerFromKey, jsonOption, keyOption, mutate, stateOption, type CallerOpts } from './shared.js';

export async function readSignedDocument(path: string, expected: SignedAttestation['t']): Promise<SignedAttestation> {
  const doc = SignedAttestationSchema.parse(JSON.parse(await readFile(path, 'utf8')));
  if (doc.t !== expected) {
    throw new Error(`Document ${path} is a signed '${doc.t}', expected '${expected}'`);
  }
  return doc;
}

export function createAttestCommand(): Command {
  return new Command('attest')
    .description('Submit a signed attestation (as the subject, or as the gateway of a gated assertion)')
    .argument('<file>', 'Signed attestation produced by `sign`')
    .addOption(keyOption())
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (file: string, opts: CallerOpts) => {
      const doc = await readSignedDocument(file, 'attest');
      const ctx = await callerFromKey(opts.key);
      await mutate(opts, (registry) => {
        if (registry.domain.verifyingContract !== doc.domain.verifyingContract) {
          console.error(`Warning: ${file} was signed for registry ${doc.domain.verifyingContract}`);
        }
        registry.attest(ctx, doc.assertionId, doc.signer, doc.signedAt, doc.signature);
      });
    });
}
