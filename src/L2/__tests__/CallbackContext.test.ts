import { describe, test, expect, beforeEach } from '@jest/globals';
import { CallbackContext } from '../CallbackContext.js';
import type { CallbackFrame } from '../CallbackContext.js';
import { PromiseKernel } from '../../Kernel.js';
import { decodeError, encode, EMPTY_PAYLOAD } from '../../L0/Codec.js';
import { ErrorCode, isKernelError } from '../../Errors.js';
import type { Address, PromiseID } from '../../L0/Ontology.js';

const ALICE = `0x${'a'.repeat(40)}`;
const BOB = `0x${'b'.repeat(40)}`;

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

const FRAME: CallbackFrame = {
    registrant: BOB,
    sourceChain: 7,
    promiseId: `0x${'1'.repeat(64)}`,
    continuationId: `0x${'2'.repeat(64)}`,
    target: `0x${'c'.repeat(40)}`
};

describe('Callback Context', () => {
    test('queries fail outside an invocation', () => {
        const context = new CallbackContext();
        expect(context.active).toBe(false);
        expect(codeOf(() => context.registrant())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
        expect(codeOf(() => context.sourceChain())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
        expect(codeOf(() => context.context())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
    });

    test('exposes the frame during the body and clears it after a throw', () => {
        const context = new CallbackContext();
        let observed: CallbackFrame | undefined;
        const result = context.invoke(FRAME, () => {
            observed = context.context();
            throw new Error('late failure');
        });

        expect(observed).toEqual(FRAME);

        expect(result.ok).toBe(false);
        expect(result.reentered).toBe(false);
        expect(context.active).toBe(false);
        expect(codeOf(() => context.registrant())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
    });

    test('nested invocation is flagged even when the body swallows it', () => {
        const context = new CallbackContext();
        const result = context.invoke(FRAME, () => {
            const inner = codeOf(() => context.invoke(FRAME, () => 1));
            expect(inner).toBe(ErrorCode.REENTRANT_CALL);
            return 2;
        });

        expect(result).toEqual({ ok: true, value: 2, reentered: true });
    });
});

describe('Callback Authentication (kernel)', () => {
    let kernel: PromiseKernel;
    let inspector: Address;
    let seen: { registrant: Address; sourceChain: number; continuationId: PromiseID }[];
    let swallowed: (ErrorCode | undefined)[];

    beforeEach(() => {
        kernel = new PromiseKernel({ chainId: 100 });
        seen = [];
        swallowed = [];
        inspector = kernel.deploy('Inspector', {
            whoami: () => {
                const { registrant, sourceChain, continuationId } = kernel.callbackContext();
                expect(kernel.callbackRegistrant()).toBe(registrant);
                expect(kernel.callbackSourceChain()).toBe(sourceChain);
                seen.push({ registrant, sourceChain, continuationId });
                return EMPTY_PAYLOAD;
            },
            explode: () => {
                throw new Error('explode');
            },
            reenter: (_value, invocation) => {
                swallowed.push(codeOf(() => kernel.executePromiseCallbacks(invocation.promiseId)));
                return encode(1);
            },
            reenterLoudly: (_value, invocation) => {
                kernel.flushChain(invocation.continuationId);
                return encode(1);
            },
            recover: () => encode('recovered')
        });
    });

    test('registrant and source chain of the registration are visible during the callback', () => {
        const p = kernel.create(ALICE);
        const c = kernel.then(BOB, p, inspector, 'whoami');
        kernel.resolve(ALICE, p, encode(1));

        expect(codeOf(() => kernel.callbackRegistrant())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
        kernel.executePromiseCallbacks(p);
        expect(seen).toEqual([{ registrant: BOB, sourceChain: 100, continuationId: c }]);
        expect(codeOf(() => kernel.callbackRegistrant())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
    });

    test('a failing callback leaves no context behind', () => {
        const p = kernel.create(ALICE);
        kernel.then(BOB, p, inspector, 'explode');
        kernel.then(ALICE, p, inspector, 'whoami');
        kernel.resolve(ALICE, p, encode(1));
        kernel.executePromiseCallbacks(p);

        expect(seen.map(s => s.registrant)).toEqual([ALICE]);
        expect(codeOf(() => kernel.callbackContext())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
    });

    test('a swallowed reentrant call still rejects the outer continuation', () => {
        const p = kernel.create(ALICE);
        const c = kernel.then(ALICE, p, inspector, 'reenter', 'recover');
        kernel.resolve(ALICE, p, encode(1));
        kernel.executePromiseCallbacks(p);

        expect(swallowed).toEqual([ErrorCode.REENTRANT_CALL]);
        expect(kernel.status(c)).toBe('REJECTED');
        expect(decodeError(kernel.value(c) ?? EMPTY_PAYLOAD)).toEqual({
            error: 'REENTRANT_CALL',
            message: 'Reentrant call from reenter'
        });
    });

    test('an uncaught reentrant call rejects the outer continuation', () => {
        const p = kernel.create(ALICE);
        const c = kernel.then(ALICE, p, inspector, 'reenterLoudly');
        kernel.resolve(ALICE, p, encode(1));
        kernel.executePromiseCallbacks(p);

        expect(kernel.status(c)).toBe('REJECTED');
        expect(decodeError(kernel.value(c) ?? EMPTY_PAYLOAD)?.error).toBe('REENTRANT_CALL');
        expect(codeOf(() => kernel.callbackRegistrant())).toBe(ErrorCode.NO_ACTIVE_CALLBACK);
    });
});
