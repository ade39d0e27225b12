import { Command } from 'commander';
import { createAssertionCommand } from './commands/assertion.js';
import { createAttestCommand } from './commands/attest.js';
import { createInitCommand } from './commands/init.js';
import { createKeyCommand } from './commands/key.js';
import { createOverrideCommand } from './commands/override.js';
import { createRevokeCommand } from './commands/revoke.js';
import { createRoleCommand } from './commands/role.js';
import { createSignCommand } from './commands/sign.js';
import { createStatusCommand } from './commands/status.js';
import { createTipCommand } from './commands/tip.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('attreg')
    .version(VERSION)
    .description('Attestation registry CLI: assertions, signed attestations, revocations, tips');

  program.addCommand(createInitCommand());
  program.addCommand(createKeyCommand());
  program.addCommand(createAssertionCommand());
  program.addCommand(createSignCommand());
  program.addCommand(createAttestCommand());
  program.addCommand(createRevokeCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createOverrideCommand());
  program.addCommand(createTipCommand());
  program.addCommand(createRoleCommand());

  return program;
}
