/**
 * Interop Kernel Error Taxonomy
 * Centralized error codes for authorization, lifecycle and cross-chain failures.
 */

import type { Payload } from './L0/Ontology.js';

export enum ErrorCode {
    // I. Authority
    UNAUTHORIZED = 'UNAUTHORIZED',

    // II. Promise Lifecycle
    ALREADY_TERMINAL = 'ALREADY_TERMINAL',
    NOT_READY = 'NOT_READY',
    UNKNOWN_PROMISE = 'UNKNOWN_PROMISE',
    PROMISE_EXISTS = 'PROMISE_EXISTS',

    // III. Callback Execution
    REENTRANT_CALL = 'REENTRANT_CALL',
    NO_ACTIVE_CALLBACK = 'NO_ACTIVE_CALLBACK',
    TARGET_NOT_FOUND = 'TARGET_NOT_FOUND',
    CALLBACK_FAILED = 'CALLBACK_FAILED',

    // IV. Cross-Chain
    UNORDERED = 'UNORDERED',
    INVALID_REMOTE_ID = 'INVALID_REMOTE_ID',
    INVALID_DESTINATION = 'INVALID_DESTINATION',
    MESSENGER_UNAVAILABLE = 'MESSENGER_UNAVAILABLE',
    MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',

    // V. Codec & Configuration
    MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class PromiseKernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Interop:${code}] ${reason}`);
        this.name = 'PromiseKernelError';
    }
}

/**
 * Thrown by a callback handler to reject its continuation with an exact payload.
 */
export class CallbackRevert extends Error {
    constructor(public readonly payload: Payload, message: string = 'Callback reverted') {
        super(message);
        this.name = 'CallbackRevert';
    }
}

export function isKernelError(error: unknown, code?: ErrorCode): error is PromiseKernelError {
    if (!(error instanceof PromiseKernelError)) return false;
    return code === undefined || error.code === code;
}
