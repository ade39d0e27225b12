export * from './common.js';
export * from './assertion.js';
export * from './attestation.js';
export * from './state.js';
