import { secp256k1 } from '@noble/curves/secp256k1';
import { mkdir, writeFile, readFile, readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { addressFromPublicKey, type Address } from './address.js';
import { fromHex, toHex } from './encoding.js';

export const KEY_TYPE = 'secp256k1';

const KeyFileSchema = z.object({
  type: z.literal(KEY_TYPE),
  address: z.string(),
  publicKey: z.string(),
  privateKey: z.string(),
});

export interface KeyData {
  type: typeof KEY_TYPE;
  address: Address;
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

export function keyFromPrivate(privateKey: Uint8Array): KeyData {
  if (!secp256k1.utils.isValidPrivateKey(privateKey)) {
    throw new Error('Private key is not a valid secp256k1 scalar');
  }
  const publicKey = secp256k1.getPublicKey(privateKey, false);
  return {
    type: KEY_TYPE,
    address: addressFromPublicKey(publicKey),
    publicKey,
    privateKey: Uint8Array.from(privateKey),
  };
}

export function generateSecp256k1(): KeyData {
  return keyFromPrivate(secp256k1.utils.randomPrivateKey());
}

export function serializeKey(key: KeyData): string {
  return JSON.stringify(
    {
      type: key.type,
      address: key.address,
      publicKey: toHex(key.publicKey),
      privateKey: toHex(key.privateKey),
    },
    null,
    2,
  );
}

export async function ensureKeysDir(keysDir: string): Promise<void> {
  await mkdir(keysDir, { recursive: true, mode: 0o700 });
}

export function keyFilePath(keysDir: string, address: string): string {
  return join(keysDir, `${address.toLowerCase()}.json`);
}

/** Save a keypair to the key store; returns the file written */
export async function saveKey(keysDir: string, key: KeyData): Promise<string> {
  await ensureKeysDir(keysDir);
  const keyFile = keyFilePath(keysDir, key.address);
  await writeFile(keyFile, serializeKey(key), { mode: 0o600 });
  return keyFile;
}

/**
 * Load a private key from a file. Auto-detects format:
 * - JSON key file with a `privateKey` field (hex)
 * - 64-char hex string, with or without 0x
 * - 32 bytes raw binary
 */
export async function loadKeyFromFile(filePath: string): Promise<KeyData> {
  const raw = await readFile(filePath);
  const text = raw.toString('utf8').trim();

  if (text.startsWith('{')) {
    const parsed = KeyFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`JSON key file ${filePath} must have type "${KEY_TYPE}" and a "privateKey" field`);
    }
    return keyFromPrivate(fromHex(parsed.data.privateKey));
  }
  if (/^(0x)?[0-9a-fA-F]{64}$/.test(text)) {
    return keyFromPrivate(fromHex(text));
  }
  if (raw.length === 32) {
    return keyFromPrivate(new Uint8Array(raw));
  }
  throw new Error('Cannot detect key format. Expected: JSON key file, 64-char hex, or 32 raw bytes');
}

export async function loadStoredKey(keysDir: string, address: string): Promise<KeyData> {
  return loadKeyFromFile(keyFilePath(keysDir, address));
}

export interface StoredKeyEntry {
  address: string;
  type: string;
  file: string;
}

export async function listStoredKeys(keysDir: string): Promise<StoredKeyEntry[]> {
  await ensureKeysDir(keysDir);
  const files = (await readdir(keysDir)).filter((f) => f.endsWith('.json')).sort();
  const entries: StoredKeyEntry[] = [];
  for (const file of files) {
    const path = join(keysDir, file);
    const parsed = KeyFileSchema.safeParse(JSON.parse(await readFile(path, 'utf8')));
    if (parsed.success) {
      entries.push({ address: parsed.data.address, type: parsed.data.type, file: path });
    }
  }
  return entries;
}

export async function deleteStoredKey(keysDir: string, address: string): Promise<void> {
  await unlink(keyFilePath(keysDir, address));
}
