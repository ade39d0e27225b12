import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { ZERO_ADDRESS } from '../src/lib/address.js';
import { HOME_ENV } from '../src/lib/config.js';
import { toHex } from '../src/lib/encoding.js';
import { assertionIdOf, revokeIdOf } from '../src/lib/hashing.js';
import { createProgram } from '../src/program.js';
import { OVERRIDER, OWNER, REGISTRY_ADDRESS, SUBJECT } from './helpers.js';

const TEXT = 'I like cheese';

describe('attreg CLI', () => {
  let tmpDir: string;
  let state: string;
  let ownerKey: string;
  let subjectKey: string;
  let overriderKey: string;
  let log: MockInstance<typeof console.log>;

  async function run(...args: string[]): Promise<string[]> {
    log.mockClear();
    await createProgram().exitOverride().parseAsync(args, { from: 'user' });
    return log.mock.calls.map((call) => String(call[0]));
  }

  async function json(...args: string[]): Promise<unknown> {
    const lines = await run(...args, '--json');
    return JSON.parse(lines.join('\n'));
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'attreg-cli-test-'));
    process.env[HOME_ENV] = join(tmpDir, 'home');
    state = join(tmpDir, 'state.json');
    ownerKey = join(tmpDir, 'owner.hex');
    subjectKey = join(tmpDir, 'subject.hex');
    overriderKey = join(tmpDir, 'overrider.hex');
    await writeFile(ownerKey, toHex(OWNER.privateKey));
    await writeFile(subjectKey, toHex(SUBJECT.privateKey));
    await writeFile(overriderKey, toHex(OVERRIDER.privateKey));
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await run('init', '--owner-key', ownerKey, '--address', REGISTRY_ADDRESS, '--state', state);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    delete process.env[HOME_ENV];
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('initialises a snapshot and refuses to overwrite it', async () => {
    const out = await run('role', 'show', '--state', state);
    expect(out).toEqual([
      [`owner:         ${OWNER.address}`, `overrider:     ${ZERO_ADDRESS}`, `tip collector: ${OWNER.address}`].join('\n'),
    ]);
    await expect(run('init', '--owner-key', ownerKey, '--state', state)).rejects.toThrow(
      `Snapshot ${state} already exists. Use --force to overwrite.`,
    );
  });

  it('registers, attests, checks and revokes', async () => {
    const id = assertionIdOf(TEXT);
    const added = await run(
      'assertion', 'add', TEXT,
      '--freshness', '86400',
      '--expiry', '8640000',
      '--key', ownerKey,
      '--state', state,
    );
    expect(added).toEqual([
      `Event AssertionAdded text="${TEXT}" freshnessWindow=86400 expiryWindow=8640000 requiresGateway=false ` +
        `gateway="${ZERO_ADDRESS}" controller="${OWNER.address}" assertionId="${id}" revokeId="${revokeIdOf(TEXT)}"`,
      id,
    ]);

    const attestation = join(tmpDir, 'attest.json');
    await run('sign', TEXT, '--key', subjectKey, '--state', state, '--output', attestation);
    const attested = await run('attest', attestation, '--key', subjectKey, '--state', state);
    expect(attested).toHaveLength(1);
    expect(attested[0]).toMatch(new RegExp(`^Event Attested assertionId="${id}" subject="${SUBJECT.address}" signedAt=\\d+$`));

    expect(await json('status', id, SUBJECT.address, '--state', state)).toMatchObject({
      attested: true,
      expired: false,
      revoked: false,
      blocked: false,
      stopped: false,
    });

    const revocation = join(tmpDir, 'revoke.json');
    await run('sign', TEXT, '--revoke', '--key', subjectKey, '--state', state, '--output', revocation);
    await expect(run('attest', revocation, '--key', subjectKey, '--state', state)).rejects.toThrow(
      `Document ${revocation} is a signed 'revoke', expected 'attest'`,
    );
    expect(await run('revoke', revocation, '--key', subjectKey, '--state', state)).toEqual([
      `Event Revoked assertionId="${id}" subject="${SUBJECT.address}"`,
    ]);
    expect(await json('status', id, SUBJECT.address, '--state', state)).toMatchObject({ attested: false, revoked: true });
  });

  it('leaves the snapshot untouched when a call is rejected', async () => {
    const before = await readFile(state, 'utf8');
    await expect(run('override', 'block', SUBJECT.address, '--key', ownerKey, '--state', state)).rejects.toThrow(
      'Must be override address',
    );
    expect(await readFile(state, 'utf8')).toBe(before);

    await run('role', 'overrider', OVERRIDER.address, '--key', ownerKey, '--state', state);
    expect(await run('override', 'block', SUBJECT.address, '--key', overriderKey, '--state', state)).toEqual([
      `Event Blocked address="${SUBJECT.address}"`,
    ]);
  });

  it('collects tips and pays them out', async () => {
    await run('tip', 'amount', '100', '--key', ownerKey, '--state', state);
    const add = ['assertion', 'add', TEXT, '--freshness', '60', '--expiry', '60', '--key', subjectKey, '--state', state];
    await expect(run(...add, '--value', '50')).rejects.toThrow('Must send tipAmount()');
    await run(...add, '--value', '150');

    expect(await run('tip', 'out', '--state', state)).toEqual(['Event TipOut amount=150']);
    expect(await run('tip', 'out', '--state', state)).toEqual(['Nothing to pay out.']);
    expect(await json('tip', 'show', '--state', state)).toEqual({
      tipAmount: '100',
      balance: '0',
      tipCollector: OWNER.address,
      payouts: [[OWNER.address, '150']],
    });
  });

  it('prints results and events as JSON', async () => {
    expect(await json('tip', 'amount', '5', '--key', ownerKey, '--state', state)).toEqual({
      result: null,
      events: [{ type: 'NewTipAmount', oldAmount: '0', newAmount: '5' }],
    });
  });

  it('lists and shows assertions', async () => {
    await run('assertion', 'add', 'one', '--freshness', '60', '--expiry', '60', '--key', ownerKey, '--state', state);
    await run('assertion', 'add', 'two', '--freshness', '60', '--expiry', '60', '--key', ownerKey, '--state', state);
    const list = await run('assertion', 'list', '--state', state);
    expect(list[0].split('\n').slice(1)).toEqual([
      `[0] ${assertionIdOf('one')}  "one"`,
      `[1] ${assertionIdOf('two')}  "two"`,
    ]);
    await expect(run('assertion', 'show', assertionIdOf('three'), '--state', state)).rejects.toThrow(
      `Assertion ${assertionIdOf('three')} does not exist`,
    );
  });

  describe('key', () => {
    it('generates, lists, exports and deletes keys in the local store', async () => {
      const generated = await json('key', 'generate');
      const { address } = z.object({ address: z.string().regex(/^0x[0-9a-fA-F]{40}$/) }).parse(generated);

      expect(await json('key', 'list')).toEqual([
        { address, type: 'secp256k1', file: join(tmpDir, 'home', 'keys', `${address.toLowerCase()}.json`) },
      ]);

      const [publicHex] = await run('key', 'export', address, '--format', 'hex', '--public-only');
      expect(publicHex).toMatch(/^0x04[0-9a-f]{128}$/);

      await expect(run('key', 'delete', address)).rejects.toThrow('Use --force to confirm');
      await run('key', 'delete', address, '--force');
      expect(await run('key', 'list')).toEqual(['No keys found in store.']);
    });

    it('imports a key file and refuses duplicates', async () => {
      expect(await run('key', 'import', '--private-key', subjectKey)).toEqual([SUBJECT.address]);
      await expect(run('key', 'import', '--private-key', subjectKey)).rejects.toThrow(
        `Key ${SUBJECT.address} already exists in store. Use --force to overwrite.`,
      );
    });
  });
});
