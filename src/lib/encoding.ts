import { Encoder, decode as cborDecode } from "cbor-x";

const cborEncoder = new Encoder({ mapsAsObjects: true, useRecords: false });

export type Hex = `0x${string}`;

export function toHex(bytes: Uint8Array): Hex {
    return `0x${Buffer.from(bytes).toString("hex")}`;
}

export function fromHex(hex: string): Uint8Array {
    const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
    if (body.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(body)) {
        throw new Error(`Invalid hex string: '${hex}'`);
    }
    return new Uint8Array(Buffer.from(body, "hex"));
}

export function utf8Bytes(text: string): Uint8Array {
    return new Uint8Array(Buffer.from(text, "utf8"));
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
    return new Uint8Array(Buffer.concat(parts));
}

/** Big-endian, left-padded 32-byte word */
export function uint256Word(value: bigint): Uint8Array {
    if (value < 0n || value >= 1n << 256n) {
        throw new Error(`Value out of uint256 range: ${value}`);
    }
    return fromHex(value.toString(16).padStart(64, "0"));
}

/** Left-pad to a 32-byte word */
export function leftPadWord(bytes: Uint8Array): Uint8Array {
    if (bytes.length > 32) {
        throw new Error(`Cannot pad ${bytes.length} bytes into a 32-byte word`);
    }
    const word = new Uint8Array(32);
    word.set(bytes, 32 - bytes.length);
    return word;
}

function sortKeys(val: unknown): unknown {
    if (val === null || typeof val !== "object") {
        return val;
    }
    if (Array.isArray(val)) {
        return val.map(sortKeys);
    }
    const sorted: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = sortKeys(v);
    }
    return sorted;
}

/** Deterministic CBOR encoding */
export function cborEncode(obj: unknown): Buffer {
    return Buffer.from(cborEncoder.encode(obj));
}

export { cborDecode };

export type DocumentFormat = "json" | "cbor";

/** Maximum encoded document size (64 MB) */
const MAX_DOCUMENT_SIZE = 64 * 1024 * 1024;

/** Encode complete document: pretty sorted JSON or CBOR */
export function encodeDocument(doc: unknown, format: DocumentFormat = "json"): Buffer {
    const output =
        format === "cbor"
            ? cborEncode(doc)
            : Buffer.from(`${JSON.stringify(sortKeys(doc), null, 2)}\n`, "utf8");
    if (output.length > MAX_DOCUMENT_SIZE) {
        throw new Error(`Document exceeds maximum size: ${output.length} bytes (limit: ${MAX_DOCUMENT_SIZE})`);
    }
    return output;
}

/** JSON documents start with `{` (after optional whitespace); anything else is CBOR */
export function detectFormat(data: Uint8Array): DocumentFormat {
    for (const byte of data) {
        if (byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09) continue;
        return byte === 0x7b ? "json" : "cbor";
    }
    return "json";
}

export function decodeDocument(data: Uint8Array): unknown {
    if (detectFormat(data) === "cbor") {
        return cborDecode(Buffer.from(data));
    }
    return JSON.parse(Buffer.from(data).toString("utf8"));
}
