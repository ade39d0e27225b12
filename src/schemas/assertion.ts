import { z } from 'zod';
import { ZERO_ADDRESS } from '../lib/address.js';
import { AddressSchema, WindowSchema } from './common.js';

/** Parameters of a new assertion, as accepted from the CLI or library callers */
export const AssertionInputSchema = z.object({
  text: z.string(),
  freshnessWindow: WindowSchema,
  expiryWindow: WindowSchema,
  requiresGateway: z.boolean().default(false),
  gateway: AddressSchema.default(ZERO_ADDRESS),
  controller: AddressSchema,
});

export type AssertionInputData = z.output<typeof AssertionInputSchema>;
