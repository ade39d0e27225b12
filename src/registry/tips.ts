import type { Address } from '../lib/address.js';
import { ErrorCode, InsufficientTipError, NotAuthorizedError, ValidationError } from '../lib/errors.js';
import type { CallContext, ExecutionEnv } from './context.js';
import { isOwnerOrTipCollector } from './roles.js';

export function setTipAmount(env: ExecutionEnv, ctx: CallContext, amount: bigint): void {
  const { state } = env;
  if (!isOwnerOrTipCollector(state.roles, ctx.caller)) {
    throw new NotAuthorizedError('Must be owner or tip collector');
  }
  if (amount < 0n) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, 'Tip amount must not be negative');
  }
  const oldAmount = state.tipAmount;
  state.tipAmount = amount;
  env.emit({ type: 'NewTipAmount', oldAmount, newAmount: amount });
}

/**
 * Take value sent with a call. The whole amount is kept, including anything over the tip amount.
 * @throws InsufficientTipError when `value` is below the configured tip amount
 */
export function collectTip(env: ExecutionEnv, sender: Address, value: bigint): void {
  const { state } = env;
  if (value < 0n) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, 'Value must not be negative');
  }
  if (value < state.tipAmount) {
    throw new InsufficientTipError();
  }
  if (value === 0n) return;
  state.balance += value;
  env.emit({ type: 'TipReceived', sender, amount: value });
}

/** Accept a plain value deposit */
export function deposit(env: ExecutionEnv, ctx: CallContext): void {
  collectTip(env, ctx.caller, ctx.value ?? 0n);
}

/**
 * Forward the whole balance to the tip collector.
 * The balance is zeroed before the rail is called, so a recipient that calls back in sees nothing left.
 */
export function tipOut(env: ExecutionEnv): bigint {
  const { state } = env;
  const amount = state.balance;
  if (amount === 0n) return 0n;
  state.balance = 0n;
  env.emit({ type: 'TipOut', amount });
  env.rail.transfer(state.roles.tipCollector, amount);
  return amount;
}
