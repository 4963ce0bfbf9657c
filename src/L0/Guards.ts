// src/L0/Guards.ts
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import type { Address, PromiseRecord } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

/**
 * Throws the failed guard as a kernel error.
 */
export function enforce(result: GuardResult, metadata?: Record<string, unknown>): void {
    if (!result.ok) {
        throw new PromiseKernelError(result.code, result.violation, metadata);
    }
}

// --- Concrete Guards ---

// 1. Creator (resolution authority)
export const CreatorGuard: Guard<{ record: PromiseRecord; caller: Address }> = ({ record, caller }) => {
    if (record.creator !== caller) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Only the creator ${record.creator} may settle ${record.id}`);
    }
    return OK;
};

// 2. Single assignment
export const PendingGuard: Guard<{ record: PromiseRecord }> = ({ record }) => {
    if (record.status !== 'PENDING') {
        return FAIL(ErrorCode.ALREADY_TERMINAL, `Promise ${record.id} is already ${record.status}`);
    }
    return OK;
};

// 3. Readiness (callbacks only run against terminal promises)
export const TerminalGuard: Guard<{ record: PromiseRecord }> = ({ record }) => {
    if (record.status === 'PENDING') {
        return FAIL(ErrorCode.NOT_READY, `Promise ${record.id} is still PENDING`);
    }
    return OK;
};

// 4. Messenger-only entrypoints
export const MessengerGuard: Guard<{
    caller: Address;
    messenger: Address;
    sender: Address;
    kernel: Address;
}> = ({ caller, messenger, sender, kernel }) => {
    if (caller !== messenger) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Caller ${caller} is not the messenger`);
    }
    if (sender !== kernel) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Cross-chain sender ${sender} is not the promise kernel`);
    }
    return OK;
};

// 5. Timeouts
export const DeadlineGuard: Guard<{ deadline: number; now: number }> = ({ deadline, now }) => {
    if (now < deadline) {
        return FAIL(ErrorCode.NOT_READY, `Deadline ${deadline} not reached (now ${now})`);
    }
    return OK;
};
