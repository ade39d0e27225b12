/**
 * The attestation registry.
 *
 * Each mutating entry point is one atomic call: it runs against the live state,
 * and on any failure the state is restored from a snapshot taken at entry and
 * no events are delivered. Events of a successful call are delivered to
 * subscribers after the call has finished. A call made while another is running
 * (from inside the payment rail) hands its events to the enclosing call, so they
 * are delivered or dropped together with it.
 */
import { isAddress, toChecksumAddress, ZERO_ADDRESS, type Address } from '../lib/address.js';
import { DEFAULT_CHAIN_ID, DOMAIN_NAME, DOMAIN_VERSION } from '../lib/config.js';
import type { Hex } from '../lib/encoding.js';
import { ErrorCode, EventDeliveryError, ValidationError } from '../lib/errors.js';
import { systemClock, type Clock } from '../lib/timestamp.js';
import * as assertions from './assertions.js';
import type { CallContext, ExecutionEnv } from './context.js';
import type { RegistryEvent, RegistryListener } from './events.js';
import * as ledger from './ledger.js';
import { InMemoryRail, type PaymentRail } from './rail.js';
import * as roles from './roles.js';
import {
  cloneState,
  createState,
  restoreState,
  type AssertionRecord,
  type AttestationRecord,
  type RegistryDomain,
  type RegistryState,
} from './state.js';
import * as tips from './tips.js';

export interface RegistryOptions {
  /** Deploying address; becomes owner and initial tip collector */
  owner: string;
  /** This instance's own address, bound into the signing domain */
  address: string;
  chainId?: number;
  domainName?: string;
  domainVersion?: string;
  clock?: Clock;
  rail?: PaymentRail;
}

export interface RuntimeOptions {
  clock?: Clock;
  rail?: PaymentRail;
}

export interface AssertionInput {
  text: string;
  freshnessWindow: number;
  expiryWindow: number;
  requiresGateway: boolean;
  gateway: string;
  controller: string;
}

export interface AssertionView extends AssertionRecord {
  assertionId: Hex;
}

function toAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, `${field} is not an address: '${value}'`);
  }
  return toChecksumAddress(value);
}

function toAssertionId(value: string): Hex {
  if (!/^0x[0-9a-fA-F]{64}$/.test(value)) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, `Assertion id must be 32 bytes of hex: '${value}'`);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

function toSeconds(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, `${field} must be a non-negative integer`);
  }
  return value;
}

function toCallContext(ctx: CallContext): CallContext {
  return { caller: toAddress(ctx.caller, 'caller'), value: ctx.value };
}

export class AttestationRegistry {
  private readonly state: RegistryState;
  private readonly clock: Clock;
  private readonly rail: PaymentRail;
  private readonly listeners = new Set<RegistryListener>();
  /** Event buffer of the call in progress, if any */
  private pending: RegistryEvent[] | undefined;

  constructor(options: RegistryOptions) {
    const domain: RegistryDomain = {
      name: options.domainName ?? DOMAIN_NAME,
      version: options.domainVersion ?? DOMAIN_VERSION,
      chainId: toSeconds(options.chainId ?? DEFAULT_CHAIN_ID, 'chainId'),
      verifyingContract: toAddress(options.address, 'address'),
    };
    this.state = createState(domain, toAddress(options.owner, 'owner'), ZERO_ADDRESS);
    this.clock = options.clock ?? systemClock;
    this.rail = options.rail ?? new InMemoryRail();
  }

  /** Rebuild a registry around previously persisted state */
  static fromState(state: RegistryState, runtime: RuntimeOptions = {}): AttestationRegistry {
    const registry = new AttestationRegistry({
      owner: ZERO_ADDRESS,
      address: state.domain.verifyingContract,
      chainId: state.domain.chainId,
      clock: runtime.clock,
      rail: runtime.rail,
    });
    restoreState(registry.state, cloneState(state));
    return registry;
  }

  /** Deep copy of the current state */
  exportState(): RegistryState {
    return cloneState(this.state);
  }

  get domain(): RegistryDomain {
    return { ...this.state.domain };
  }

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transact<T>(run: (env: ExecutionEnv) => T): T {
    const snapshot = cloneState(this.state);
    const enclosing = this.pending;
    const pending: RegistryEvent[] = [];
    this.pending = pending;
    const env: ExecutionEnv = {
      state: this.state,
      now: this.clock(),
      emit: (event) => pending.push(event),
      rail: this.rail,
    };
    let result: T;
    try {
      result = run(env);
    } catch (e) {
      restoreState(this.state, snapshot);
      throw e;
    } finally {
      this.pending = enclosing;
    }
    if (enclosing) {
      enclosing.push(...pending);
    } else {
      this.deliver(pending);
    }
    return result;
  }

  /**
   * Hand every event to every listener.
   * @throws EventDeliveryError after delivery when any listener threw; the call itself has committed
   */
  private deliver(events: RegistryEvent[]): void {
    const failures: unknown[] = [];
    for (const event of events) {
      for (const listener of [...this.listeners]) {
        try {
          listener(event);
        } catch (e) {
          failures.push(e);
        }
      }
    }
    if (failures.length > 0) throw new EventDeliveryError(failures);
  }

  // ── Roles ──────────────────────────────────────────────────────────

  owner(): Address {
    return this.state.roles.owner;
  }

  overrider(): Address {
    return this.state.roles.overrider;
  }

  tipCollector(): Address {
    return this.state.roles.tipCollector;
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    const next = toAddress(newOwner, 'newOwner');
    this.transact((env) => roles.transferOwnership(env, toCallContext(ctx), next));
  }

  renounceOwnership(ctx: CallContext): void {
    this.transact((env) => roles.renounceOwnership(env, toCallContext(ctx)));
  }

  setOverrider(ctx: CallContext, newOverrider: string): void {
    const next = toAddress(newOverrider, 'overrider');
    this.transact((env) => roles.setOverrider(env, toCallContext(ctx), next));
  }

  setTipCollector(ctx: CallContext, newTipCollector: string): void {
    const next = toAddress(newTipCollector, 'tipCollector');
    this.transact((env) => roles.setTipCollector(env, toCallContext(ctx), next));
  }

  // ── Assertions ─────────────────────────────────────────────────────

  addAssertion(ctx: CallContext, input: AssertionInput): Hex {
    const normalized: assertions.NewAssertion = {
      text: input.text,
      freshnessWindow: toSeconds(input.freshnessWindow, 'freshnessWindow'),
      expiryWindow: toSeconds(input.expiryWindow, 'expiryWindow'),
      requiresGateway: input.requiresGateway,
      gateway: toAddress(input.gateway, 'gateway'),
      controller: toAddress(input.controller, 'controller'),
    };
    return this.transact((env) => assertions.addAssertion(env, toCallContext(ctx), normalized));
  }

  setController(ctx: CallContext, assertionId: string, newController: string): void {
    const id = toAssertionId(assertionId);
    const next = toAddress(newController, 'controller');
    this.transact((env) => assertions.setController(env, toCallContext(ctx), id, next));
  }

  setGateway(ctx: CallContext, assertionId: string, newGateway: string): void {
    const id = toAssertionId(assertionId);
    const next = toAddress(newGateway, 'gateway');
    this.transact((env) => assertions.setGateway(env, toCallContext(ctx), id, next));
  }

  stopAssertion(ctx: CallContext, assertionId: string): void {
    const id = toAssertionId(assertionId);
    this.transact((env) => assertions.stopAssertion(env, toCallContext(ctx), id));
  }

  unStopAssertion(ctx: CallContext, assertionId: string): void {
    const id = toAssertionId(assertionId);
    this.transact((env) => assertions.unStopAssertion(env, toCallContext(ctx), id));
  }

  getAssertion(assertionId: string): AssertionView | undefined {
    const id = toAssertionId(assertionId);
    const record = assertions.getAssertion(this.state, id);
    return record ? { assertionId: id, ...record } : undefined;
  }

  /** Entry `index` of the append-only assertion list */
  assertionAt(index: number): Hex {
    const id = this.state.assertionList[index];
    if (id === undefined) {
      throw new ValidationError(ErrorCode.INVALID_INPUT, `No assertion at index ${index}`);
    }
    return id;
  }

  assertionCount(): number {
    return this.state.assertionList.length;
  }

  listAssertions(): AssertionView[] {
    return this.state.assertionList.map((id) => {
      const record = assertions.requireAssertion(this.state, id);
      return { assertionId: id, ...record };
    });
  }

  lastAssertionListUpdate(): number {
    return this.state.lastAssertionListUpdate;
  }

  isStopped(assertionId: string): boolean {
    return assertions.isStopped(this.state, toAssertionId(assertionId));
  }

  // ── Attestations ───────────────────────────────────────────────────

  attest(ctx: CallContext, assertionId: string, subject: string, signedAt: number, signature: string): void {
    const id = toAssertionId(assertionId);
    const who = toAddress(subject, 'subject');
    const ts = toSeconds(signedAt, 'signedAt');
    this.transact((env) => ledger.attest(env, toCallContext(ctx), id, who, ts, signature));
  }

  revoke(ctx: CallContext, assertionId: string, subject: string, signedAt: number, signature: string): void {
    const id = toAssertionId(assertionId);
    const who = toAddress(subject, 'subject');
    const ts = toSeconds(signedAt, 'signedAt');
    this.transact((env) => ledger.revoke(env, toCallContext(ctx), id, who, ts, signature));
  }

  forceAttest(ctx: CallContext, assertionId: string, subject: string, signedAt: number): void {
    const id = toAssertionId(assertionId);
    const who = toAddress(subject, 'subject');
    const ts = toSeconds(signedAt, 'signedAt');
    this.transact((env) => ledger.forceAttest(env, toCallContext(ctx), id, who, ts));
  }

  forceRevoke(ctx: CallContext, assertionId: string, subject: string): void {
    const id = toAssertionId(assertionId);
    const who = toAddress(subject, 'subject');
    this.transact((env) => ledger.forceRevoke(env, toCallContext(ctx), id, who));
  }

  isAttested(assertionId: string, subject: string): boolean {
    return ledger.isAttested(this.state, this.clock(), toAssertionId(assertionId), toAddress(subject, 'subject'));
  }

  isExpired(assertionId: string, subject: string): boolean {
    return ledger.isExpired(this.state, this.clock(), toAssertionId(assertionId), toAddress(subject, 'subject'));
  }

  getAttestation(assertionId: string, subject: string): AttestationRecord | undefined {
    const record = ledger.getAttestation(this.state, toAssertionId(assertionId), toAddress(subject, 'subject'));
    return record ? { ...record } : undefined;
  }

  // ── Blocklist ──────────────────────────────────────────────────────

  isBlocked(address: string): boolean {
    return ledger.isBlocked(this.state, toAddress(address, 'address'));
  }

  blockAddress(ctx: CallContext, address: string): void {
    const who = toAddress(address, 'address');
    this.transact((env) => ledger.blockAddress(env, toCallContext(ctx), who));
  }

  unBlockAddress(ctx: CallContext, address: string): void {
    const who = toAddress(address, 'address');
    this.transact((env) => ledger.unBlockAddress(env, toCallContext(ctx), who));
  }

  // ── Tips ───────────────────────────────────────────────────────────

  tipAmount(): bigint {
    return this.state.tipAmount;
  }

  balance(): bigint {
    return this.state.balance;
  }

  setTipAmount(ctx: CallContext, amount: bigint): void {
    this.transact((env) => tips.setTipAmount(env, toCallContext(ctx), amount));
  }

  deposit(ctx: CallContext): void {
    this.transact((env) => tips.deposit(env, toCallContext(ctx)));
  }

  /** Public: anyone may push the balance out to the tip collector */
  tipOut(): bigint {
    return this.transact((env) => tips.tipOut(env));
  }

  // ── Badge surface ──────────────────────────────────────────────────

  safeTransferFrom(_from: string, _to: string, _id: bigint, _amount: bigint, _data: string): never {
    return ledger.rejectTransfer();
  }

  safeBatchTransferFrom(_from: string, _to: string, _ids: bigint[], _amounts: bigint[], _data: string): never {
    return ledger.rejectTransfer();
  }

  setApprovalForAll(_operator: string, _approved: boolean): never {
    return ledger.rejectTransfer();
  }

  isApprovedForAll(_account: string, _operator: string): never {
    return ledger.rejectTransfer();
  }
}
