import { Command } from 'commander';
import { formatTimestamp } from '../lib/timestamp.js';
import { print, query, stateOption, jsonOption, type StateOpts } from './shared.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show whether a subject holds a live attestation for an assertion')
    .argument('<assertionId>', 'Assertion id')
    .argument('<subject>', 'Subject address')
    .addOption(stateOption())
    .addOption(jsonOption())
    .action(async (id: string, subject: string, opts: StateOpts) => {
      const status = await query(opts, (registry) => {
        const record = registry.getAttestation(id, subject);
        return {
          assertionId: id,
          subject,
          attested: registry.isAttested(id, subject),
          expired: registry.isExpired(id, subject),
          blocked: registry.isBlocked(subject),
          stopped: registry.isStopped(id),
          signedAt: record?.signedAt ?? 0,
          revoked: record?.revoked ?? false,
        };
      });
      print(
        opts,
        status,
        [
          `attested: ${status.attested ? 'yes' : 'no'}`,
          `expired:  ${status.expired ? 'yes' : 'no'}`,
          `revoked:  ${status.revoked ? 'yes' : 'no'}`,
          `signed:   ${formatTimestamp(status.signedAt)}`,
          `blocked:  ${status.blocked ? 'yes' : 'no'}`,
          `stopped:  ${status.stopped ? 'yes' : 'no'}`,
        ].join('\n'),
      );
    });
}
