import { describe, it, expect } from 'vitest';
import type { Address } from '../src/lib/address.js';
import { ErrorCode, EventDeliveryError, RegistryError } from '../src/lib/errors.js';
import { formatEvent, type RegistryEvent } from '../src/registry/events.js';
import { InMemoryRail, type PaymentRail } from '../src/registry/rail.js';
import { AttestationRegistry } from '../src/registry/registry.js';
import { assertionInput, callBy, codeOf, deploy, OWNER, REGISTRY_ADDRESS, STRANGER, SUBJECT } from './helpers.js';

class FailingRail implements PaymentRail {
  transfer(): void {
    throw new Error('rail unavailable');
  }
}

/** A recipient that calls straight back into the registry when paid */
class ReentrantRail implements PaymentRail {
  readonly inner = new InMemoryRail();
  registry: AttestationRegistry | undefined;
  nested: bigint[] = [];

  transfer(to: Address, amount: bigint): void {
    if (this.registry) this.nested.push(this.registry.tipOut());
    this.inner.transfer(to, amount);
  }
}

/** A recipient that deposits back into the registry while being paid, then optionally fails */
class DepositingRail implements PaymentRail {
  readonly inner = new InMemoryRail();
  registry: AttestationRegistry | undefined;

  constructor(private readonly fail: boolean) {}

  transfer(to: Address, amount: bigint): void {
    this.registry?.deposit(callBy(STRANGER, 7n));
    if (this.fail) throw new Error('rail unavailable');
    this.inner.transfer(to, amount);
  }
}

describe('AttestationRegistry', () => {
  it('binds its own address and chain into the signing domain', () => {
    const { registry } = deploy();
    expect(registry.domain).toEqual({
      name: 'attestation-registry',
      version: '1.0',
      chainId: 31337,
      verifyingContract: REGISTRY_ADDRESS,
    });
    const custom = new AttestationRegistry({ owner: OWNER.address, address: REGISTRY_ADDRESS, chainId: 5 });
    expect(custom.domain.chainId).toBe(5);
  });

  it('rejects malformed deployment parameters', () => {
    expect(codeOf(() => new AttestationRegistry({ owner: 'nobody', address: REGISTRY_ADDRESS }))).toBe(
      ErrorCode.INVALID_INPUT,
    );
  });

  describe('atomic calls', () => {
    it('leaves state untouched and delivers no events when the payout fails', () => {
      const { registry, events } = deploy(new FailingRail());
      registry.deposit(callBy(STRANGER, 40n));
      events.length = 0;
      expect(() => registry.tipOut()).toThrow('rail unavailable');
      expect(registry.balance()).toBe(40n);
      expect(events).toEqual([]);
    });

    it('takes no tip from a rejected call', () => {
      const { registry, events } = deploy();
      registry.addAssertion(callBy(STRANGER), assertionInput('taken'));
      events.length = 0;
      expect(codeOf(() => registry.addAssertion(callBy(STRANGER, 50n), assertionInput('taken')))).toBe(
        ErrorCode.DUPLICATE_ASSERTION,
      );
      expect(registry.balance()).toBe(0n);
      expect(events).toEqual([]);
    });

    it('keeps working after a rolled-back call', () => {
      const { registry } = deploy(new FailingRail());
      registry.deposit(callBy(STRANGER, 40n));
      expect(() => registry.tipOut()).toThrow('rail unavailable');
      registry.addAssertion(callBy(STRANGER), assertionInput('after'));
      expect(registry.assertionCount()).toBe(1);
    });
  });

  describe('reentrancy', () => {
    it('pays out once when the recipient calls back in', () => {
      const rail = new ReentrantRail();
      const { registry } = deploy(rail);
      rail.registry = registry;
      registry.deposit(callBy(STRANGER, 90n));
      expect(registry.tipOut()).toBe(90n);
      expect(rail.nested).toEqual([0n]);
      expect(rail.inner.entries()).toEqual([[OWNER.address, 90n]]);
      expect(registry.balance()).toBe(0n);
    });

    it('drops the events of a nested call when the enclosing call fails', () => {
      const rail = new DepositingRail(true);
      const { registry, events } = deploy(rail);
      rail.registry = registry;
      registry.deposit(callBy(STRANGER, 40n));
      events.length = 0;
      expect(() => registry.tipOut()).toThrow('rail unavailable');
      expect(registry.balance()).toBe(40n);
      expect(events).toEqual([]);
    });

    it('delivers the events of a nested call after the enclosing call succeeds', () => {
      const rail = new DepositingRail(false);
      const { registry, events } = deploy(rail);
      rail.registry = registry;
      registry.deposit(callBy(STRANGER, 40n));
      events.length = 0;
      const seenDuringPayout: number[] = [];
      const unsubscribe = registry.subscribe(() => seenDuringPayout.push(rail.inner.entries().length));
      expect(registry.tipOut()).toBe(40n);
      unsubscribe();
      expect(events).toEqual([
        { type: 'TipOut', amount: 40n },
        { type: 'TipReceived', sender: STRANGER.address, amount: 7n },
      ]);
      expect(seenDuringPayout).toEqual([1, 1]);
      expect(registry.balance()).toBe(7n);
    });
  });

  describe('events', () => {
    it('are delivered after the call, in order, and stop after unsubscribe', () => {
      const { registry } = deploy();
      const seen: RegistryEvent[] = [];
      const unsubscribe = registry.subscribe((event) => {
        seen.push(event);
        expect(registry.balance()).toBe(5n);
      });
      registry.addAssertion(callBy(STRANGER, 5n), assertionInput('x'));
      expect(seen.map((e) => e.type)).toEqual(['TipReceived', 'AssertionAdded']);
      unsubscribe();
      registry.deposit(callBy(STRANGER, 1n));
      expect(seen).toHaveLength(2);
    });

    it('reach every listener when one throws, and the call stays applied', () => {
      const { registry } = deploy();
      const seen: string[] = [];
      registry.subscribe(() => {
        throw new Error('listener down');
      });
      registry.subscribe((event) => seen.push(event.type));
      let thrown: unknown;
      try {
        registry.addAssertion(callBy(STRANGER), assertionInput('still added'));
      } catch (e) {
        thrown = e;
      }
      expect(thrown).toBeInstanceOf(EventDeliveryError);
      expect(thrown).not.toBeInstanceOf(RegistryError);
      expect(thrown instanceof EventDeliveryError && thrown.committed).toBe(true);
      expect(thrown instanceof EventDeliveryError && thrown.errors).toHaveLength(1);
      expect(seen).toEqual(['AssertionAdded']);
      expect(registry.assertionCount()).toBe(1);
    });

    it('format as one line each', () => {
      expect(formatEvent({ type: 'Blocked', address: SUBJECT.address })).toBe(`Event Blocked address="${SUBJECT.address}"`);
      expect(formatEvent({ type: 'TipOut', amount: 70n })).toBe('Event TipOut amount=70');
      expect(formatEvent({ type: 'Attested', assertionId: '0xab', subject: SUBJECT.address, signedAt: 12 })).toBe(
        `Event Attested assertionId="0xab" subject="${SUBJECT.address}" signedAt=12`,
      );
    });
  });

  describe('state export', () => {
    it('is a copy', () => {
      const { registry } = deploy();
      const state = registry.exportState();
      state.roles.owner = STRANGER.address;
      state.tipAmount = 99n;
      expect(registry.owner()).toBe(OWNER.address);
      expect(registry.tipAmount()).toBe(0n);
    });
  });
});
