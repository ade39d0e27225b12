import { z } from 'zod';
import { isAddress, toChecksumAddress } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';

/** Document format version */
export const VersionSchema = z.literal('1.0');

/** 20-byte address, normalised to its EIP-55 checksum form */
export const AddressSchema = z
  .string()
  .refine(isAddress, 'Invalid address (expected 0x followed by 40 hex characters)')
  .transform((value) => toChecksumAddress(value));

/** 32-byte identifier (keccak-256 digest), normalised to lowercase */
export const Bytes32Schema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Expected 0x followed by 64 hex characters')
  .transform((value): Hex => `0x${value.slice(2).toLowerCase()}`);

/** 65-byte `r ‖ s ‖ v` signature */
export const SignatureSchema = z.string().regex(/^0x[0-9a-fA-F]{130}$/, 'Expected a 65-byte hex signature');

/** Unix timestamp in seconds; zero is allowed and means "never" */
export const TimestampSchema = z.number().int().nonnegative();

/** Window length in seconds */
export const WindowSchema = z.number().int().nonnegative();

export const ChainIdSchema = z.number().int().positive();

/** Wei amount, carried as a decimal string */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer amount in wei')
  .transform((value) => BigInt(value));

/** Coerce a CLI argument into a whole number of seconds */
export const SecondsArgSchema = z.coerce.number().int().nonnegative();
