import { isZeroAddress, sameAddress, ZERO_ADDRESS, type Address } from '../lib/address.js';
import { ErrorCode, NotAuthorizedError, ValidationError } from '../lib/errors.js';
import type { CallContext, ExecutionEnv } from './context.js';
import type { AssertionRecord, RoleState } from './state.js';

/** A role held by the zero address is vacant and matches nobody */
function holds(role: Address, caller: Address): boolean {
  return !isZeroAddress(role) && sameAddress(role, caller);
}

export function isOwner(roles: RoleState, caller: Address): boolean {
  return holds(roles.owner, caller);
}

export function isOverrider(roles: RoleState, caller: Address): boolean {
  return holds(roles.overrider, caller);
}

export function isOwnerOrOverrider(roles: RoleState, caller: Address): boolean {
  return isOwner(roles, caller) || isOverrider(roles, caller);
}

export function isOwnerOrTipCollector(roles: RoleState, caller: Address): boolean {
  return isOwner(roles, caller) || holds(roles.tipCollector, caller);
}

export function isControllerOrOwner(roles: RoleState, assertion: AssertionRecord, caller: Address): boolean {
  return holds(assertion.controller, caller) || isOwner(roles, caller);
}

export function isControllerOrOverrider(roles: RoleState, assertion: AssertionRecord, caller: Address): boolean {
  return holds(assertion.controller, caller) || isOverrider(roles, caller);
}

export function requireOwner(roles: RoleState, caller: Address): void {
  if (!isOwner(roles, caller)) {
    throw new NotAuthorizedError('Caller is not the owner');
  }
}

export function requireOverrider(roles: RoleState, caller: Address): void {
  if (!isOverrider(roles, caller)) {
    throw new NotAuthorizedError('Must be override address', ErrorCode.NOT_OVERRIDER);
  }
}

function requireNonZero(address: Address, role: string): void {
  if (isZeroAddress(address)) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, `New ${role} is the zero address`);
  }
}

export function transferOwnership(env: ExecutionEnv, ctx: CallContext, newOwner: Address): void {
  const { roles } = env.state;
  requireOwner(roles, ctx.caller);
  requireNonZero(newOwner, 'owner');
  const previousOwner = roles.owner;
  roles.owner = newOwner;
  env.emit({ type: 'OwnershipTransferred', previousOwner, newOwner });
}

/** Leaves the registry without an owner; owner-only operations fail from then on */
export function renounceOwnership(env: ExecutionEnv, ctx: CallContext): void {
  const { roles } = env.state;
  requireOwner(roles, ctx.caller);
  const previousOwner = roles.owner;
  roles.owner = ZERO_ADDRESS;
  env.emit({ type: 'OwnershipTransferred', previousOwner, newOwner: ZERO_ADDRESS });
}

export function setOverrider(env: ExecutionEnv, ctx: CallContext, newOverrider: Address): void {
  const { roles } = env.state;
  if (!isOwnerOrOverrider(roles, ctx.caller)) {
    throw new NotAuthorizedError('Must be owner or override address');
  }
  requireNonZero(newOverrider, 'overrider');
  const oldOverrider = roles.overrider;
  roles.overrider = newOverrider;
  env.emit({ type: 'NewOverrider', oldOverrider, newOverrider });
}

export function setTipCollector(env: ExecutionEnv, ctx: CallContext, newTipCollector: Address): void {
  const { roles } = env.state;
  if (!isOwnerOrTipCollector(roles, ctx.caller)) {
    throw new NotAuthorizedError('Must be owner or tip collector');
  }
  requireNonZero(newTipCollector, 'tip collector');
  const oldTipCollector = roles.tipCollector;
  roles.tipCollector = newTipCollector;
  env.emit({ type: 'NewTipCollector', oldTipCollector, newTipCollector });
}
