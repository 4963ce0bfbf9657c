import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { canonicalize } from './Crypto.js';
import type { Canonical } from './Crypto.js';
import type { Payload } from './Ontology.js';

/**
 * Payload helpers. The kernel treats payloads as opaque bytes; these helpers
 * exist for callers and for the few payloads the kernel produces itself
 * (error reports, aggregated child results).
 */

export const EMPTY_PAYLOAD: Payload = new Uint8Array(0);

export function encode(value: Canonical): Payload {
    return new Uint8Array(Buffer.from(canonicalize(value), 'utf8'));
}

export function decode(payload: Payload): unknown {
    try {
        return JSON.parse(Buffer.from(payload).toString('utf8'));
    } catch (e) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_PAYLOAD, `Payload is not canonical JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
}

export function decodeNumber(payload: Payload): number {
    const value = decode(payload);
    if (typeof value !== 'number') {
        throw new PromiseKernelError(ErrorCode.MALFORMED_PAYLOAD, `Expected a number payload, got ${typeof value}`);
    }
    return value;
}

export function encodeError(code: string, message: string): Payload {
    return encode({ error: code, message });
}

export interface DecodedError {
    error: string;
    message: string;
}

export function decodeError(payload: Payload): DecodedError | undefined {
    let value: unknown;
    try {
        value = decode(payload);
    } catch {
        return undefined;
    }
    if (typeof value !== 'object' || value === null) return undefined;
    if (!('error' in value) || !('message' in value)) return undefined;
    const { error, message } = value;
    if (typeof error !== 'string' || typeof message !== 'string') return undefined;
    return { error, message };
}

// --- Hex ---

export function toHex(payload: Payload): string {
    return Buffer.from(payload).toString('hex');
}

export function fromHex(hex: string): Payload {
    if (!/^([0-9a-fA-F]{2})*$/.test(hex)) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_PAYLOAD, 'Invalid hex payload');
    }
    return new Uint8Array(Buffer.from(hex, 'hex'));
}

// --- Lists (u32 count, then u32 length + bytes per item, big-endian) ---

export function encodeList(items: Payload[]): Payload {
    const size = 4 + items.reduce((n, item) => n + 4 + item.length, 0);
    const out = Buffer.alloc(size);
    let offset = out.writeUInt32BE(items.length, 0);
    for (const item of items) {
        offset = out.writeUInt32BE(item.length, offset);
        out.set(item, offset);
        offset += item.length;
    }
    return new Uint8Array(out);
}

export function decodeList(payload: Payload): Payload[] {
    const buf = Buffer.from(payload);
    const fail = () => new PromiseKernelError(ErrorCode.MALFORMED_PAYLOAD, 'Truncated list payload');
    if (buf.length < 4) throw fail();

    const count = buf.readUInt32BE(0);
    const items: Payload[] = [];
    let offset = 4;
    for (let i = 0; i < count; i++) {
        if (offset + 4 > buf.length) throw fail();
        const length = buf.readUInt32BE(offset);
        offset += 4;
        if (offset + length > buf.length) throw fail();
        items.push(new Uint8Array(buf.subarray(offset, offset + length)));
        offset += length;
    }
    if (offset !== buf.length) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_PAYLOAD, 'Trailing bytes after list payload');
    }
    return items;
}

export function samePayload(a: Payload, b: Payload): boolean {
    return Buffer.from(a).equals(Buffer.from(b));
}
