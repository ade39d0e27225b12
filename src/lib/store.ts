import { readFile, writeFile, rename } from 'node:fs/promises';
import { SnapshotSchema, snapshotToState, stateToSnapshot, type RestoredSnapshot } from '../schemas/state.js';
import type { RegistryState } from '../registry/state.js';
import type { Address } from './address.js';
import { decodeDocument, detectFormat, encodeDocument, type DocumentFormat } from './encoding.js';

export function encodeSnapshot(
  state: RegistryState,
  payouts: Iterable<[Address, bigint]>,
  format: DocumentFormat = 'json',
): Buffer {
  return encodeDocument(stateToSnapshot(state, payouts), format);
}

export function decodeSnapshot(data: Uint8Array): RestoredSnapshot {
  return snapshotToState(SnapshotSchema.parse(decodeDocument(data)));
}

export interface LoadedState extends RestoredSnapshot {
  format: DocumentFormat;
}

export async function loadState(path: string): Promise<LoadedState> {
  const data = await readFile(path);
  return { ...decodeSnapshot(data), format: detectFormat(data) };
}

/** Written to `<path>.tmp`, then renamed over `path` */
export async function saveState(
  path: string,
  state: RegistryState,
  payouts: Iterable<[Address, bigint]>,
  format: DocumentFormat = 'json',
): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, encodeSnapshot(state, payouts, format));
  await rename(tmp, path);
}
