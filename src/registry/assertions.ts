import type { Address } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';
import {
  ErrorCode,
  NotAuthorizedError,
  StateError,
  UnknownAssertionError,
  ValidationError,
} from '../lib/errors.js';
import { assertionIdOf, revokeIdOf } from '../lib/hashing.js';
import type { CallContext, ExecutionEnv } from './context.js';
import { isControllerOrOverrider, isControllerOrOwner } from './roles.js';
import type { AssertionRecord, RegistryState } from './state.js';
import { collectTip } from './tips.js';

export interface NewAssertion {
  text: string;
  freshnessWindow: number;
  expiryWindow: number;
  requiresGateway: boolean;
  gateway: Address;
  controller: Address;
}

export function getAssertion(state: RegistryState, id: Hex): AssertionRecord | undefined {
  return state.assertions.get(id);
}

export function requireAssertion(state: RegistryState, id: Hex): AssertionRecord {
  const assertion = state.assertions.get(id);
  if (!assertion) throw new UnknownAssertionError();
  return assertion;
}

export function isStopped(state: RegistryState, id: Hex): boolean {
  return state.assertions.get(id)?.stopped ?? false;
}

/** Register a new assertion. Anyone may call; the attached value goes to the tip collector. */
export function addAssertion(env: ExecutionEnv, ctx: CallContext, input: NewAssertion): Hex {
  const { state } = env;
  if (input.text.length === 0) {
    throw new ValidationError(ErrorCode.EMPTY_ASSERTION, 'Assertion must not be empty');
  }
  const assertionId = assertionIdOf(input.text);
  if (state.assertions.has(assertionId)) {
    throw new ValidationError(ErrorCode.DUPLICATE_ASSERTION, 'Assertion already exists');
  }

  collectTip(env, ctx.caller, ctx.value ?? 0n);

  const revokeId = revokeIdOf(input.text);
  state.assertions.set(assertionId, {
    text: input.text,
    revokeId,
    freshnessWindow: input.freshnessWindow,
    expiryWindow: input.expiryWindow,
    requiresGateway: input.requiresGateway,
    gateway: input.gateway,
    controller: input.controller,
    stopped: false,
  });
  state.assertionList.push(assertionId);
  state.lastAssertionListUpdate = env.now;

  env.emit({ type: 'AssertionAdded', ...input, assertionId, revokeId });
  return assertionId;
}

export function setController(env: ExecutionEnv, ctx: CallContext, id: Hex, newController: Address): void {
  const assertion = requireAssertion(env.state, id);
  if (!isControllerOrOwner(env.state.roles, assertion, ctx.caller)) {
    throw new NotAuthorizedError('Not authorized to set controller');
  }
  const oldController = assertion.controller;
  assertion.controller = newController;
  env.emit({ type: 'NewController', assertionId: id, oldController, newController });
}

export function setGateway(env: ExecutionEnv, ctx: CallContext, id: Hex, newGateway: Address): void {
  const assertion = requireAssertion(env.state, id);
  if (!isControllerOrOwner(env.state.roles, assertion, ctx.caller)) {
    throw new NotAuthorizedError('Not authorized to set gateway');
  }
  const oldGateway = assertion.gateway;
  assertion.gateway = newGateway;
  env.emit({ type: 'NewGateway', assertionId: id, oldGateway, newGateway });
}

/** Stopping blocks new attestations; revocations still go through */
export function stopAssertion(env: ExecutionEnv, ctx: CallContext, id: Hex): void {
  const assertion = env.state.assertions.get(id);
  if (!assertion || assertion.stopped) {
    throw new StateError(ErrorCode.ALREADY_STOPPED_OR_UNKNOWN, 'Assertion is stopped or does not exist');
  }
  if (!isControllerOrOverrider(env.state.roles, assertion, ctx.caller)) {
    throw new NotAuthorizedError('Not authorized to stop');
  }
  assertion.stopped = true;
  env.emit({ type: 'AssertionStopped', assertionId: id });
}

export function unStopAssertion(env: ExecutionEnv, ctx: CallContext, id: Hex): void {
  const assertion = env.state.assertions.get(id);
  if (!assertion || !assertion.stopped) {
    throw new StateError(ErrorCode.NOT_STOPPED, 'Assertion is not stopped');
  }
  if (!isControllerOrOverrider(env.state.roles, assertion, ctx.caller)) {
    throw new NotAuthorizedError('Not authorized to unstop');
  }
  assertion.stopped = false;
  env.emit({ type: 'AssertionUnStopped', assertionId: id });
}
