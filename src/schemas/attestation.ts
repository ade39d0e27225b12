import { z } from "zod";
import { assertionIdOf } from "../lib/hashing.js";
import { AddressSchema, Bytes32Schema, SignatureSchema, TimestampSchema, VersionSchema } from "./common.js";
import { DomainSchema } from "./state.js";

/**
 * A signed attestation or revocation, as produced by `attreg sign` and
 * submitted by whoever relays it (the subject itself or a gateway).
 */
export const SignedAttestationSchema = z
    .object({
        v: VersionSchema,
        t: z.enum(["attest", "revoke"]),
        assertion: z.string().min(1),
        assertionId: Bytes32Schema,
        signer: AddressSchema,
        signedAt: TimestampSchema,
        signature: SignatureSchema,
        domain: DomainSchema,
    })
    .refine((doc) => doc.assertionId === assertionIdOf(doc.assertion), {
        message: "assertionId does not match assertion text",
        path: ["assertionId"],
    });

export type SignedAttestation = z.output<typeof SignedAttestationSchema>;
export type SignedAttestationInput = z.input<typeof SignedAttestationSchema>;
