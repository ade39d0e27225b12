import { Option } from 'commander';
import { DEFAULT_STATE_FILE, STATE_ENV } from '../lib/config.js';
import type { DocumentFormat } from '../lib/encoding.js';
import { EventDeliveryError } from '../lib/errors.js';
import { loadKeyFromFile } from '../lib/keys.js';
import { loadState, saveState } from '../lib/store.js';
import type { Clock } from '../lib/timestamp.js';
import type { CallContext } from '../registry/context.js';
import { formatEvent, type RegistryEvent } from '../registry/events.js';
import { InMemoryRail } from '../registry/rail.js';
import { AttestationRegistry } from '../registry/registry.js';

export interface StateOpts {
  state: string;
  json?: boolean;
}

export interface CallerOpts extends StateOpts {
  key: string;
}

export function stateOption(): Option {
  return new Option('--state <file>', 'Registry snapshot file').env(STATE_ENV).default(DEFAULT_STATE_FILE);
}

export function jsonOption(): Option {
  return new Option('--json', 'Print machine-readable JSON');
}

export function keyOption(): Option {
  return new Option('--key <file>', 'Key file of the calling address').makeOptionMandatory();
}

/** JSON with bigints written as decimal strings */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v), 2);
}

export function print(opts: { json?: boolean }, value: unknown, text: string): void {
  console.log(opts.json ? toJson(value) : text);
}

export async function callerFromKey(keyFile: string, value?: bigint): Promise<CallContext> {
  const key = await loadKeyFromFile(keyFile);
  return { caller: key.address, value };
}

export interface OpenRegistry {
  registry: AttestationRegistry;
  rail: InMemoryRail;
  format: DocumentFormat;
}

export async function openRegistry(path: string, clock?: Clock): Promise<OpenRegistry> {
  const loaded = await loadState(path);
  const rail = new InMemoryRail(loaded.payouts);
  const registry = AttestationRegistry.fromState(loaded.state, { rail, clock });
  return { registry, rail, format: loaded.format };
}

/**
 * Run one registry call against the snapshot at `opts.state`.
 * Events are printed as they are delivered; the snapshot is rewritten only when the call commits.
 */
export async function mutate<T>(
  opts: StateOpts,
  call: (registry: AttestationRegistry) => T | Promise<T>,
): Promise<T> {
  const { registry, rail, format } = await openRegistry(opts.state);
  const events: RegistryEvent[] = [];
  const unsubscribe = registry.subscribe((event) => {
    events.push(event);
    if (!opts.json) console.log(formatEvent(event));
  });
  const save = () => saveState(opts.state, registry.exportState(), rail.entries(), format);
  try {
    let result: T;
    try {
      result = await call(registry);
    } catch (e) {
      if (e instanceof EventDeliveryError) await save();
      throw e;
    }
    await save();
    if (opts.json) console.log(toJson({ result: result ?? null, events }));
    return result;
  } finally {
    unsubscribe();
  }
}

/** Run a read-only query against the snapshot */
export async function query<T>(opts: StateOpts, read: (registry: AttestationRegistry) => T): Promise<T> {
  const { registry } = await openRegistry(opts.state);
  return read(registry);
}
