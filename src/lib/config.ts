import { join } from 'node:path';
import { homedir } from 'node:os';

/** Typed-data domain name signed into every attestation */
export const DOMAIN_NAME = 'attestation-registry';
export const DOMAIN_VERSION = '1.0';

/** Chain id of a local development network */
export const DEFAULT_CHAIN_ID = 31337;

export const DEFAULT_STATE_FILE = 'attreg-state.json';

export const STATE_ENV = 'ATTREG_STATE';
export const HOME_ENV = 'ATTREG_HOME';

export function registryHome(env: NodeJS.ProcessEnv = process.env): string {
  return env[HOME_ENV] || join(homedir(), '.attreg');
}

export function keysDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(registryHome(env), 'keys');
}
