import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { encodeDocument } from "../lib/encoding.js";
import { assertionIdOf, revocationText } from "../lib/hashing.js";
import { loadKeyFromFile } from "../lib/keys.js";
import { signAttestation } from "../lib/signing.js";
import { systemClock } from "../lib/timestamp.js";
import { SecondsArgSchema, SignedAttestationSchema, type SignedAttestationInput } from "../schemas/index.js";
import { query, stateOption } from "./shared.js";

interface SignOpts {
    state: string;
    key: string;
    revoke?: boolean;
    signedAt?: string;
    output?: string;
}

export function createSignCommand(): Command {
    return new Command("sign")
        .description("Sign an assertion (or its revocation) for this registry's domain")
        .argument("<assertion>", "Assertion text, exactly as registered")
        .requiredOption("--key <file>", "Key file of the attesting address")
        .option("--revoke", "Sign the revocation message instead")
        .option("--signed-at <ts>", "Unix timestamp to sign (default: now)")
        .option("--output <file>", "Output file (default: stdout)")
        .addOption(stateOption())
        .action(async (assertion: string, opts: SignOpts) => {
            const domain = await query(opts, (registry) => registry.domain);
            const key = await loadKeyFromFile(opts.key);
            const signedAt = opts.signedAt === undefined ? systemClock() : SecondsArgSchema.parse(opts.signedAt);
            const message = opts.revoke ? revocationText(assertion) : assertion;

            const doc: SignedAttestationInput = {
                v: "1.0",
                t: opts.revoke ? "revoke" : "attest",
                assertion,
                assertionId: assertionIdOf(assertion),
                signer: key.address,
                signedAt,
                signature: signAttestation(key.privateKey, domain, message, signedAt),
                domain,
            };
            // Validate before writing
            SignedAttestationSchema.parse(doc);

            const output = encodeDocument(doc);
            if (opts.output) {
                await writeFile(opts.output, output);
                console.error(`Signed ${doc.t} written to: ${opts.output}`);
            } else {
                console.log(output.toString("utf8").trimEnd());
            }
        });
}
