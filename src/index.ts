// Library entry point; the `attreg` binary lives in cli.ts

export { AttestationRegistry } from './registry/registry.js';
export type { AssertionInput, AssertionView, RegistryOptions, RuntimeOptions } from './registry/registry.js';
export type { CallContext } from './registry/context.js';
export { formatEvent } from './registry/events.js';
export type { RegistryEvent, RegistryEventType, RegistryListener } from './registry/events.js';
export { InMemoryRail } from './registry/rail.js';
export type { PaymentRail } from './registry/rail.js';
export type { AssertionRecord, AttestationRecord, RegistryDomain, RegistryState, RoleState } from './registry/state.js';

export type { Hex } from './lib/encoding.js';
export * from './lib/address.js';
export * from './lib/errors.js';
export * from './lib/hashing.js';
export * from './lib/typed-data.js';
export * from './lib/signing.js';
export * from './lib/keys.js';
export * from './lib/timestamp.js';
export { loadState, saveState, encodeSnapshot, decodeSnapshot } from './lib/store.js';
export { DEFAULT_CHAIN_ID, DOMAIN_NAME, DOMAIN_VERSION } from './lib/config.js';

// Re-export schemas for library consumers
export * from './schemas/index.js';
