import { ErrorCode, SignatureError } from './errors.js';

export type Clock = () => number;

/** Unix time in whole seconds */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Validate that a signature timestamp is neither in the future nor older than `window` seconds.
 * @param signedAt - Unix timestamp in seconds claimed by the signer
 * @param now - Current unix time in seconds
 * @param window - Freshness window in seconds
 * @throws SignatureError when `now - window <= signedAt <= now` does not hold
 */
export function validateFreshness(signedAt: number, now: number, window: number): void {
  if (signedAt > now || signedAt < now - window) {
    throw new SignatureError(ErrorCode.SIGNATURE_EXPIRED, 'Signature expired');
  }
}

/** True when more than `window` seconds have elapsed since `signedAt` */
export function isPastWindow(signedAt: number, now: number, window: number): boolean {
  return now - signedAt > window;
}

/** ISO-8601 form of `ts`, or the bare number when it lies beyond the range of `Date` */
export function formatTimestamp(ts: number): string {
  if (ts === 0) return 'never';
  const date = new Date(ts * 1000);
  return Number.isNaN(date.getTime()) ? String(ts) : date.toISOString();
}
