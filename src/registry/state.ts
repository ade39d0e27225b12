import type { Address } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';
import type { TypedDataDomain } from '../lib/typed-data.js';

export interface AssertionRecord {
  text: string;
  revokeId: Hex;
  /** Max age in seconds of a signature at attest time */
  freshnessWindow: number;
  /** Age in seconds after which an attestation is stale */
  expiryWindow: number;
  /** Gates who may attest, and whether expiry is enforced by isAttested */
  requiresGateway: boolean;
  gateway: Address;
  controller: Address;
  stopped: boolean;
}

export interface AttestationRecord {
  /** Zero means never attested */
  signedAt: number;
  revoked: boolean;
}

export interface RoleState {
  owner: Address;
  overrider: Address;
  tipCollector: Address;
}

export interface RegistryDomain extends TypedDataDomain {
  chainId: number;
}

/**
 * Everything the registry owns. Addresses are stored checksummed and
 * assertion ids as lowercase hex, so map lookups need no further normalising.
 */
export interface RegistryState {
  domain: RegistryDomain;
  roles: RoleState;
  /** Minimum value in wei required with addAssertion and deposits */
  tipAmount: bigint;
  /** Wei held and not yet forwarded to the tip collector */
  balance: bigint;
  assertions: Map<Hex, AssertionRecord>;
  /** Append-only, creation order */
  assertionList: Hex[];
  lastAssertionListUpdate: number;
  attestations: Map<Hex, Map<Address, AttestationRecord>>;
  blocked: Set<Address>;
}

export function createState(domain: RegistryDomain, owner: Address, overrider: Address): RegistryState {
  return {
    domain: { ...domain },
    roles: { owner, overrider, tipCollector: owner },
    tipAmount: 0n,
    balance: 0n,
    assertions: new Map(),
    assertionList: [],
    lastAssertionListUpdate: 0,
    attestations: new Map(),
    blocked: new Set(),
  };
}

export function cloneState(state: RegistryState): RegistryState {
  return structuredClone(state);
}

/** Overwrite `target` in place so references held by in-flight calls see the restored data */
export function restoreState(target: RegistryState, source: RegistryState): void {
  Object.assign(target, source);
}
