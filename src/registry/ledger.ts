import { sameAddress, type Address } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';
import { ErrorCode, NotAuthorizedError, NotTransferableError, StateError } from '../lib/errors.js';
import { revocationText } from '../lib/hashing.js';
import { verifyAttestationSignature } from '../lib/signing.js';
import { isPastWindow, validateFreshness } from '../lib/timestamp.js';
import { requireAssertion } from './assertions.js';
import type { CallContext, ExecutionEnv } from './context.js';
import { requireOverrider } from './roles.js';
import type { AttestationRecord, RegistryState } from './state.js';

export function getAttestation(state: RegistryState, id: Hex, subject: Address): AttestationRecord | undefined {
  return state.attestations.get(id)?.get(subject);
}

function writeRecord(state: RegistryState, id: Hex, subject: Address, record: AttestationRecord): void {
  let bySubject = state.attestations.get(id);
  if (!bySubject) {
    bySubject = new Map();
    state.attestations.set(id, bySubject);
  }
  bySubject.set(subject, record);
}

function recordAttestation(env: ExecutionEnv, id: Hex, subject: Address, signedAt: number): void {
  writeRecord(env.state, id, subject, { signedAt, revoked: false });
  env.emit({ type: 'Attested', assertionId: id, subject, signedAt });
}

/** Marks the tuple revoked; a tuple that was never attested is stored as revoked with signedAt 0 */
function recordRevocation(env: ExecutionEnv, id: Hex, subject: Address): void {
  const existing = getAttestation(env.state, id, subject);
  writeRecord(env.state, id, subject, { signedAt: existing?.signedAt ?? 0, revoked: true });
  env.emit({ type: 'Revoked', assertionId: id, subject });
}

export function isBlocked(state: RegistryState, address: Address): boolean {
  return state.blocked.has(address);
}

/**
 * Record that `subject` signed the assertion at `signedAt`.
 * Checks run in a fixed order: exists, not stopped, subject not blocked,
 * gateway, freshness, signature.
 */
export function attest(
  env: ExecutionEnv,
  ctx: CallContext,
  id: Hex,
  subject: Address,
  signedAt: number,
  signature: string,
): void {
  const { state } = env;
  const assertion = requireAssertion(state, id);
  if (assertion.stopped) {
    throw new StateError(ErrorCode.ASSERTION_STOPPED, 'Assertion has been stopped');
  }
  if (isBlocked(state, subject)) {
    throw new StateError(ErrorCode.ADDRESS_BLOCKED, 'Address is blocked');
  }
  if (assertion.requiresGateway && !sameAddress(ctx.caller, assertion.gateway)) {
    throw new NotAuthorizedError('Attestation can only be created by gateway', ErrorCode.GATEWAY_REQUIRED);
  }
  validateFreshness(signedAt, env.now, assertion.freshnessWindow);
  verifyAttestationSignature(state.domain, assertion.text, signedAt, subject, signature);
  recordAttestation(env, id, subject, signedAt);
}

/** Subject-signed revocation. Deliberately not gated by stop, block or freshness. */
export function revoke(
  env: ExecutionEnv,
  _ctx: CallContext,
  id: Hex,
  subject: Address,
  signedAt: number,
  signature: string,
): void {
  const assertion = requireAssertion(env.state, id);
  verifyAttestationSignature(env.state.domain, revocationText(assertion.text), signedAt, subject, signature);
  recordRevocation(env, id, subject);
}

export function forceAttest(env: ExecutionEnv, ctx: CallContext, id: Hex, subject: Address, signedAt: number): void {
  requireOverrider(env.state.roles, ctx.caller);
  requireAssertion(env.state, id);
  recordAttestation(env, id, subject, signedAt);
}

export function forceRevoke(env: ExecutionEnv, ctx: CallContext, id: Hex, subject: Address): void {
  requireOverrider(env.state.roles, ctx.caller);
  requireAssertion(env.state, id);
  recordRevocation(env, id, subject);
}

export function isAttested(state: RegistryState, now: number, id: Hex, subject: Address): boolean {
  const assertion = state.assertions.get(id);
  const record = getAttestation(state, id, subject);
  if (!assertion || !record || record.signedAt === 0 || record.revoked) return false;
  if (isBlocked(state, subject)) return false;
  if (assertion.requiresGateway && isPastWindow(record.signedAt, now, assertion.expiryWindow)) return false;
  return true;
}

/** Pure staleness signal: ignores revocation, blocking and the gateway flag */
export function isExpired(state: RegistryState, now: number, id: Hex, subject: Address): boolean {
  const assertion = state.assertions.get(id);
  const record = getAttestation(state, id, subject);
  if (!assertion || !record || record.signedAt === 0) return false;
  return isPastWindow(record.signedAt, now, assertion.expiryWindow);
}

export function blockAddress(env: ExecutionEnv, ctx: CallContext, address: Address): void {
  requireOverrider(env.state.roles, ctx.caller);
  if (env.state.blocked.has(address)) {
    throw new StateError(ErrorCode.ALREADY_BLOCKED, 'Address already blocked');
  }
  env.state.blocked.add(address);
  env.emit({ type: 'Blocked', address });
}

export function unBlockAddress(env: ExecutionEnv, ctx: CallContext, address: Address): void {
  requireOverrider(env.state.roles, ctx.caller);
  if (!env.state.blocked.has(address)) {
    throw new StateError(ErrorCode.NOT_BLOCKED, 'Address not blocked');
  }
  env.state.blocked.delete(address);
  env.emit({ type: 'UnBlocked', address });
}

/** Attestations are badges bound to one subject; every transfer-style call fails */
export function rejectTransfer(): never {
  throw new NotTransferableError();
}
