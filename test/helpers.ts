import { ZERO_ADDRESS, type Address } from '../src/lib/address.js';
import { RegistryError, type ErrorCode } from '../src/lib/errors.js';
import { keyFromPrivate, type KeyData } from '../src/lib/keys.js';
import { signAttestation } from '../src/lib/signing.js';
import { revocationText } from '../src/lib/hashing.js';
import type { RegistryEvent } from '../src/registry/events.js';
import { InMemoryRail, type PaymentRail } from '../src/registry/rail.js';
import { AttestationRegistry, type AssertionInput } from '../src/registry/registry.js';

export const START = 1_700_000_000;
export const DAY = 86_400;

/** Deterministic test key: the scalar `n` as a 32-byte private key */
export function testKey(n: number): KeyData {
  const bytes = new Uint8Array(32);
  bytes[31] = n;
  return keyFromPrivate(bytes);
}

export const OWNER = testKey(1);
export const SUBJECT = testKey(2);
export const OVERRIDER = testKey(3);
export const GATEWAY = testKey(4);
export const STRANGER = testKey(5);

export const REGISTRY_ADDRESS: Address = '0x1111111111111111111111111111111111111111';

export class TestClock {
  constructor(public now: number = START) {}

  readonly read = (): number => this.now;

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export interface Deployed {
  registry: AttestationRegistry;
  clock: TestClock;
  rail: InMemoryRail;
  events: RegistryEvent[];
}

/** Fresh registry owned by OWNER. With `customRail`, payouts go there instead of the returned `rail`. */
export function deploy(customRail?: PaymentRail): Deployed {
  const clock = new TestClock();
  const rail = new InMemoryRail();
  const registry = new AttestationRegistry({
    owner: OWNER.address,
    address: REGISTRY_ADDRESS,
    clock: clock.read,
    rail: customRail ?? rail,
  });
  const events: RegistryEvent[] = [];
  registry.subscribe((event) => events.push(event));
  return { registry, clock, rail, events };
}

export function callBy(key: KeyData, value?: bigint): { caller: Address; value?: bigint } {
  return value === undefined ? { caller: key.address } : { caller: key.address, value };
}

export function assertionInput(text: string, overrides: Partial<AssertionInput> = {}): AssertionInput {
  return {
    text,
    freshnessWindow: DAY,
    expiryWindow: 100 * DAY,
    requiresGateway: false,
    gateway: ZERO_ADDRESS,
    controller: OWNER.address,
    ...overrides,
  };
}

export function signFor(registry: AttestationRegistry, key: KeyData, text: string, signedAt: number): string {
  return signAttestation(key.privateKey, registry.domain, text, signedAt);
}

export function signRevocation(registry: AttestationRegistry, key: KeyData, text: string, signedAt: number): string {
  return signAttestation(key.privateKey, registry.domain, revocationText(text), signedAt);
}

/** Error code thrown by `fn`, or undefined if it returned */
export function codeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof RegistryError) return e.code;
    throw e;
  }
  return undefined;
}
