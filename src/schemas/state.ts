import { z } from 'zod';
import { assertionIdOf, revokeIdOf } from '../lib/hashing.js';
import type { Address } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';
import type { AttestationRecord, RegistryState } from '../registry/state.js';
import {
  AddressSchema,
  AmountSchema,
  Bytes32Schema,
  ChainIdSchema,
  TimestampSchema,
  WindowSchema,
} from './common.js';

/**
 * Snapshot layout version. Later versions may only add optional fields, so
 * every older snapshot still loads and ids stay addressable.
 */
export const SNAPSHOT_VERSION = 1;

export const DomainSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  chainId: ChainIdSchema,
  verifyingContract: AddressSchema,
});

export const RolesSchema = z.object({
  owner: AddressSchema,
  overrider: AddressSchema,
  tipCollector: AddressSchema,
});

export const AssertionEntrySchema = z
  .object({
    id: Bytes32Schema,
    text: z.string().min(1),
    revokeId: Bytes32Schema,
    freshnessWindow: WindowSchema,
    expiryWindow: WindowSchema,
    requiresGateway: z.boolean(),
    gateway: AddressSchema,
    controller: AddressSchema,
    stopped: z.boolean(),
  })
  .refine((a) => a.id === assertionIdOf(a.text), { message: 'id does not match text', path: ['id'] })
  .refine((a) => a.revokeId === revokeIdOf(a.text), { message: 'revokeId does not match text', path: ['revokeId'] });

export const AttestationEntrySchema = z.object({
  assertionId: Bytes32Schema,
  subject: AddressSchema,
  signedAt: TimestampSchema,
  revoked: z.boolean(),
});

export const SnapshotSchema = z.object({
  schemaVersion: z
    .number()
    .int()
    .positive()
    .refine((v) => v <= SNAPSHOT_VERSION, (v) => ({
      message: `Snapshot schema version ${v} is newer than supported version ${SNAPSHOT_VERSION}`,
    })),
  domain: DomainSchema,
  roles: RolesSchema,
  tipAmount: AmountSchema,
  balance: AmountSchema,
  /** In list order */
  assertions: z.array(AssertionEntrySchema),
  lastAssertionListUpdate: TimestampSchema,
  attestations: z.array(AttestationEntrySchema),
  blocked: z.array(AddressSchema),
  /** Payouts recorded by the local value rail */
  payouts: z.record(z.string(), AmountSchema).optional(),
});

export type SnapshotInput = z.input<typeof SnapshotSchema>;
export type Snapshot = z.output<typeof SnapshotSchema>;

export function stateToSnapshot(
  state: RegistryState,
  payouts: Iterable<[Address, bigint]> = [],
): SnapshotInput {
  const attestations: SnapshotInput['attestations'] = [];
  for (const [assertionId, bySubject] of state.attestations) {
    for (const [subject, record] of bySubject) {
      attestations.push({ assertionId, subject, signedAt: record.signedAt, revoked: record.revoked });
    }
  }
  const payoutEntries: Record<string, string> = {};
  for (const [address, amount] of payouts) {
    payoutEntries[address] = amount.toString();
  }

  return {
    schemaVersion: SNAPSHOT_VERSION,
    domain: { ...state.domain },
    roles: { ...state.roles },
    tipAmount: state.tipAmount.toString(),
    balance: state.balance.toString(),
    assertions: state.assertionList.map((id) => {
      const record = state.assertions.get(id);
      if (!record) throw new Error(`Assertion list entry ${id} has no record`);
      return { id, ...record };
    }),
    lastAssertionListUpdate: state.lastAssertionListUpdate,
    attestations,
    blocked: [...state.blocked],
    payouts: payoutEntries,
  };
}

export interface RestoredSnapshot {
  state: RegistryState;
  payouts: Array<[Address, bigint]>;
}

export function snapshotToState(snapshot: Snapshot): RestoredSnapshot {
  const assertions = new Map<Hex, Omit<Snapshot['assertions'][number], 'id'>>();
  const assertionList: Hex[] = [];
  for (const { id, ...record } of snapshot.assertions) {
    if (assertions.has(id)) throw new Error(`Duplicate assertion ${id} in snapshot`);
    assertions.set(id, record);
    assertionList.push(id);
  }

  const attestations = new Map<Hex, Map<Address, AttestationRecord>>();
  for (const entry of snapshot.attestations) {
    if (!assertions.has(entry.assertionId)) {
      throw new Error(`Attestation references unknown assertion ${entry.assertionId}`);
    }
    let bySubject = attestations.get(entry.assertionId);
    if (!bySubject) {
      bySubject = new Map();
      attestations.set(entry.assertionId, bySubject);
    }
    bySubject.set(entry.subject, { signedAt: entry.signedAt, revoked: entry.revoked });
  }

  const payouts: Array<[Address, bigint]> = [];
  for (const [address, amount] of Object.entries(snapshot.payouts ?? {})) {
    payouts.push([AddressSchema.parse(address), amount]);
  }

  return {
    state: {
      domain: { ...snapshot.domain },
      roles: { ...snapshot.roles },
      tipAmount: snapshot.tipAmount,
      balance: snapshot.balance,
      assertions,
      assertionList,
      lastAssertionListUpdate: snapshot.lastAssertionListUpdate,
      attestations,
      blocked: new Set(snapshot.blocked),
    },
    payouts,
  };
}
