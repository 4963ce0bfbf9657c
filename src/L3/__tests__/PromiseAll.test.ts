import { describe, test, expect, beforeEach } from '@jest/globals';
import { PromiseKernel } from '../../Kernel.js';
import { encode, encodeList } from '../../L0/Codec.js';
import { ErrorCode, isKernelError } from '../../Errors.js';
import type { PromiseID } from '../../L0/Ontology.js';

const ALICE = `0x${'a'.repeat(40)}`;

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

describe('Promise.all Aggregator', () => {
    let kernel: PromiseKernel;
    let a: PromiseID;
    let b: PromiseID;
    let c: PromiseID;

    beforeEach(() => {
        kernel = new PromiseKernel({ chainId: 100 });
        a = kernel.create(ALICE);
        b = kernel.create(ALICE);
        c = kernel.create(ALICE);
    });

    test('not ready while members are pending', () => {
        const all = kernel.createAll(ALICE, [a, b, c]);
        kernel.resolve(ALICE, a, encode(1));

        expect(kernel.checkAll(all)).toEqual({ ready: false, failed: false, results: [encode(1), undefined, undefined] });
        expect(kernel.status(all)).toBe('PENDING');
    });

    test('state handed out is frozen and detached from the group', () => {
        const all = kernel.createAll(ALICE, [a, b]);
        const initial = kernel.allState(all);
        if (!initial) throw new Error('expected a group');
        expect(Object.isFrozen(initial)).toBe(true);
        expect(() => { initial.failed = true; }).toThrow(TypeError);

        kernel.resolve(ALICE, a, encode(1));
        kernel.checkAll(all).results[0]?.fill(0);
        kernel.allState(all)?.results[0]?.fill(0);

        expect(kernel.allState(all)?.results).toEqual([encode(1), undefined]);
        expect(kernel.allState(all)?.failed).toBe(false);
    });

    test('fails fast on the first rejection', () => {
        const all = kernel.createAll(ALICE, [a, b, c]);
        kernel.reject(ALICE, b, encode('no'));

        expect(kernel.checkAll(all)).toEqual({ ready: true, failed: true, results: [undefined, encode('no'), undefined] });
        expect(kernel.status(a)).toBe('PENDING');
        expect(kernel.status(c)).toBe('PENDING');
        expect(kernel.status(all)).toBe('REJECTED');
        expect(kernel.value(all)).toEqual(encode('no'));
        expect(kernel.allState(all)?.failed).toBe(true);
    });

    test('resolves once every member resolved', () => {
        const all = kernel.createAll(ALICE, [a, b, c]);
        kernel.resolve(ALICE, c, encode(3));
        kernel.resolve(ALICE, a, encode(1));
        kernel.resolve(ALICE, b, encode(2));

        const check = kernel.checkAll(all);
        expect(check.ready).toBe(true);
        expect(check.failed).toBe(false);
        expect(check.results).toEqual([encode(1), encode(2), encode(3)]);
        expect(kernel.value(all)).toEqual(encodeList([encode(1), encode(2), encode(3)]));
    });

    test('empty set is immediately ready', () => {
        const all = kernel.createAll(ALICE, []);
        expect(kernel.checkAll(all)).toEqual({ ready: true, failed: false, results: [] });
        expect(kernel.value(all)).toEqual(encodeList([]));
    });

    test('singleton tracks its member', () => {
        const all = kernel.createAll(ALICE, [a]);
        expect(kernel.checkAll(all).ready).toBe(false);
        kernel.reject(ALICE, a, encode('x'));
        expect(kernel.checkAll(all)).toEqual({ ready: true, failed: true, results: [encode('x')] });
    });

    test('checking again after settling is stable', () => {
        const all = kernel.createAll(ALICE, [a]);
        kernel.resolve(ALICE, a, encode(1));
        kernel.checkAll(all);
        expect(kernel.checkAll(all)).toEqual({ ready: true, failed: false, results: [encode(1)] });
        expect(kernel.status(all)).toBe('RESOLVED');
    });

    test('groups get distinct ids', () => {
        expect(kernel.createAll(ALICE, [a])).not.toBe(kernel.createAll(ALICE, [a]));
    });

    test('unknown members and groups', () => {
        const ghost = `0x${'0'.repeat(64)}`;
        expect(codeOf(() => kernel.createAll(ALICE, [a, ghost]))).toBe(ErrorCode.UNKNOWN_PROMISE);
        expect(codeOf(() => kernel.checkAll(ghost))).toBe(ErrorCode.UNKNOWN_PROMISE);
    });

    test('the aggregate promise is chainable', () => {
        const sink = kernel.deploy('Sink', { pass: value => value });
        const all = kernel.createAll(ALICE, [a, b]);
        const next = kernel.then(ALICE, all, sink, 'pass');

        kernel.resolve(ALICE, a, encode(1));
        kernel.resolve(ALICE, b, encode(2));
        kernel.checkAll(all);
        expect(kernel.flushChain(all)).toBe(1);
        expect(kernel.value(next)).toEqual(encodeList([encode(1), encode(2)]));
    });
});
