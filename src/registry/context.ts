import type { Address } from '../lib/address.js';
import type { RegistryEvent } from './events.js';
import type { PaymentRail } from './rail.js';
import type { RegistryState } from './state.js';

/** Who is calling, and how much value travels with the call */
export interface CallContext {
  caller: Address;
  value?: bigint;
}

/** What one atomic call runs against */
export interface ExecutionEnv {
  state: RegistryState;
  now: number;
  emit: (event: RegistryEvent) => void;
  rail: PaymentRail;
}
