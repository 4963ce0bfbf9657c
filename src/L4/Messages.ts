import { z } from 'zod';
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { encode, decode, fromHex, toHex } from '../L0/Codec.js';
import type { Address, ChainID, Payload, PromiseID, TerminalStatus } from '../L0/Ontology.js';

/**
 * Cross-chain wire messages exchanged between promise kernels.
 *
 * A forwarded registration travels as SETUP followed by EXECUTE on the same
 * (source, destination) pair; the result comes back as RETURN. SHARE copies a
 * terminal promise to another chain.
 */

export interface SetupMessage {
    kind: 'SETUP';
    remoteId: PromiseID;
    parentId: PromiseID;
    nonce: number;
    destination: ChainID;
    target: Address;
    successSelector: string;
    errorSelector?: string;
    registrant: Address;
    sourceChain: ChainID;
}

export interface ExecuteMessage {
    kind: 'EXECUTE';
    remoteId: PromiseID;
    status: TerminalStatus;
    value: Payload;
}

export interface ReturnMessage {
    kind: 'RETURN';
    proxyId: PromiseID;
    status: TerminalStatus;
    value: Payload;
}

export interface ShareMessage {
    kind: 'SHARE';
    id: PromiseID;
    status: TerminalStatus;
    value: Payload;
    creator: Address;
}

export type InteropMessage = SetupMessage | ExecuteMessage | ReturnMessage | ShareMessage;

// --- Wire schema ---

const hex32 = z.string().regex(/^0x[0-9a-f]{64}$/, 'expected a 32-byte id');
const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 20-byte address');
const chainId = z.number().int().nonnegative();
const status = z.enum(['RESOLVED', 'REJECTED']);
const bytes = z.string().regex(/^([0-9a-f]{2})*$/, 'expected hex bytes').transform(fromHex);

// The part of a SETUP fixed at registration time on the source chain.
const registrationSchema = z.object({
    registrant: address,
    target: address,
    successSelector: z.string().min(1),
    errorSelector: z.string().min(1).optional()
});

const wireSchema = z.discriminatedUnion('kind', [
    registrationSchema.extend({
        kind: z.literal('SETUP'),
        remoteId: hex32,
        parentId: hex32,
        nonce: z.number().int().nonnegative(),
        destination: chainId,
        sourceChain: chainId
    }),
    z.object({ kind: z.literal('EXECUTE'), remoteId: hex32, status, value: bytes }),
    z.object({ kind: z.literal('RETURN'), proxyId: hex32, status, value: bytes }),
    z.object({ kind: z.literal('SHARE'), id: hex32, status, value: bytes, creator: address })
]);

function describeIssues(error: z.ZodError): string {
    return error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/**
 * Refuses a forwarded registration the destination would reject as a
 * malformed SETUP.
 */
export function validateRegistration(registration: z.input<typeof registrationSchema>): void {
    const parsed = registrationSchema.safeParse(registration);
    if (!parsed.success) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_MESSAGE, `Invalid registration: ${describeIssues(parsed.error)}`);
    }
}

export function encodeMessage(message: InteropMessage): Payload {
    switch (message.kind) {
        case 'SETUP': {
            const { errorSelector, ...rest } = message;
            return encode(errorSelector ? { ...rest, errorSelector } : rest);
        }
        case 'EXECUTE':
        case 'RETURN':
        case 'SHARE':
            return encode({ ...message, value: toHex(message.value) });
    }
}

export function decodeMessage(payload: Payload): InteropMessage {
    let raw: unknown;
    try {
        raw = decode(payload);
    } catch (e) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_MESSAGE, 'Message is not canonical JSON', { cause: String(e) });
    }

    const parsed = wireSchema.safeParse(raw);
    if (!parsed.success) {
        throw new PromiseKernelError(ErrorCode.MALFORMED_MESSAGE, `Invalid message: ${describeIssues(parsed.error)}`);
    }

    return parsed.data;
}
