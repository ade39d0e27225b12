/**
 * Registry error taxonomy.
 * Every rejected call throws one of these; state is left as it was.
 */
import { ZodError } from 'zod';

export enum ErrorCode {
  // Validation
  EMPTY_ASSERTION = 'EMPTY_ASSERTION',
  DUPLICATE_ASSERTION = 'DUPLICATE_ASSERTION',
  INVALID_INPUT = 'INVALID_INPUT',

  // Lookup
  UNKNOWN_ASSERTION = 'UNKNOWN_ASSERTION',

  // Authorization
  NOT_AUTHORIZED = 'NOT_AUTHORIZED',
  NOT_OVERRIDER = 'NOT_OVERRIDER',
  GATEWAY_REQUIRED = 'GATEWAY_REQUIRED',

  // State
  ALREADY_STOPPED_OR_UNKNOWN = 'ALREADY_STOPPED_OR_UNKNOWN',
  NOT_STOPPED = 'NOT_STOPPED',
  ASSERTION_STOPPED = 'ASSERTION_STOPPED',
  ADDRESS_BLOCKED = 'ADDRESS_BLOCKED',
  ALREADY_BLOCKED = 'ALREADY_BLOCKED',
  NOT_BLOCKED = 'NOT_BLOCKED',

  // Signature
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  SIGNATURE_EXPIRED = 'SIGNATURE_EXPIRED',

  // Value
  INSUFFICIENT_TIP = 'INSUFFICIENT_TIP',

  // Badges
  NOT_TRANSFERABLE = 'NOT_TRANSFERABLE',
}

export class RegistryError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export class ValidationError extends RegistryError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'ValidationError';
  }
}

export class UnknownAssertionError extends RegistryError {
  constructor(message = 'Assertion does not exist') {
    super(ErrorCode.UNKNOWN_ASSERTION, message);
    this.name = 'UnknownAssertionError';
  }
}

export class NotAuthorizedError extends RegistryError {
  constructor(message: string, code: ErrorCode = ErrorCode.NOT_AUTHORIZED) {
    super(code, message);
    this.name = 'NotAuthorizedError';
  }
}

export class StateError extends RegistryError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'StateError';
  }
}

export class SignatureError extends RegistryError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'SignatureError';
  }
}

export class InsufficientTipError extends RegistryError {
  constructor(message = 'Must send tipAmount()') {
    super(ErrorCode.INSUFFICIENT_TIP, message);
    this.name = 'InsufficientTipError';
  }
}

export class NotTransferableError extends RegistryError {
  constructor() {
    super(ErrorCode.NOT_TRANSFERABLE, 'Attestations are not transferable');
    this.name = 'NotTransferableError';
  }
}

/**
 * One or more event listeners threw while events were delivered.
 * Not a rejection: the call that emitted the events has been applied.
 */
export class EventDeliveryError extends AggregateError {
  readonly committed = true;

  constructor(failures: unknown[]) {
    super(failures, `Call committed, but ${failures.length} event listener(s) failed`);
    this.name = 'EventDeliveryError';
  }
}

/** Render any thrown value as a one-line CLI diagnostic. */
export function describeError(e: unknown): string {
  if (e instanceof RegistryError) return `Error [${e.code}]: ${e.message}`;
  if (e instanceof ZodError) {
    const detail = e.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return `Error [${ErrorCode.INVALID_INPUT}]: ${detail}`;
  }
  if (e instanceof Error) return `Error: ${e.message}`;
  return `Error: ${String(e)}`;
}
