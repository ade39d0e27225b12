import type { Address } from '../lib/address.js';

/** The external value rail tips are forwarded over */
export interface PaymentRail {
  transfer(to: Address, amount: bigint): void;
}

/** Records payouts per recipient; stands in for a real value transfer */
export class InMemoryRail implements PaymentRail {
  private payouts = new Map<Address, bigint>();

  constructor(initial: Iterable<[Address, bigint]> = []) {
    for (const [to, amount] of initial) {
      this.payouts.set(to, amount);
    }
  }

  transfer(to: Address, amount: bigint): void {
    if (amount < 0n) throw new Error(`Cannot transfer a negative amount: ${amount}`);
    this.payouts.set(to, (this.payouts.get(to) ?? 0n) + amount);
  }

  balanceOf(address: Address): bigint {
    return this.payouts.get(address) ?? 0n;
  }

  entries(): Array<[Address, bigint]> {
    return [...this.payouts.entries()];
  }
}
