import { describe, test, expect, beforeEach } from '@jest/globals';
import { PromiseKernel } from '../../Kernel.js';
import { decodeError, encode, encodeList, EMPTY_PAYLOAD } from '../../L0/Codec.js';
import { awaitChildren } from '../../L2/Outcome.js';
import type { Address, PromiseID } from '../../L0/Ontology.js';

const ALICE = `0x${'a'.repeat(40)}`;

describe('Atomic Fan-Out', () => {
    let kernel: PromiseKernel;
    let service: Address;
    let children: PromiseID[];
    let preset: PromiseID[];

    beforeEach(() => {
        kernel = new PromiseKernel({ chainId: 100 });
        children = [];
        preset = [];
        service = kernel.deploy('Service', {
            fanOut: (_value, invocation) => {
                children = [0, 1, 2].map(() => kernel.create(invocation.self));
                return awaitChildren(children);
            },
            awaitPreset: () => awaitChildren(preset),
            nothing: () => awaitChildren([])
        });
    });

    function run(selector: string): PromiseID {
        const p = kernel.create(ALICE);
        const c = kernel.then(ALICE, p, service, selector);
        kernel.resolve(ALICE, p, encode(0));
        kernel.executePromiseCallbacks(p);
        return c;
    }

    function child(i: number): PromiseID {
        const id = children[i];
        if (!id) throw new Error(`no child ${i}`);
        return id;
    }

    test('tracking state is frozen from the start', () => {
        const c = run('fanOut');
        const state = kernel.atomicState(c);
        if (!state) throw new Error('expected tracking state');

        expect(Object.isFrozen(state)).toBe(true);
        expect(() => { state.resolvedChildren = 3; }).toThrow(TypeError);
        expect(kernel.atomicState(c)?.resolvedChildren).toBe(0);
    });

    test('waits for every child, then resolves once in child order', () => {
        const c = run('fanOut');
        expect(kernel.status(c)).toBe('PENDING');
        expect(kernel.atomicState(c)).toEqual({
            parentId: c,
            children,
            totalChildren: 3,
            resolvedChildren: 0,
            settled: false
        });

        kernel.resolve(service, child(0), encode('a'));
        kernel.resolve(service, child(2), encode('c'));
        expect(kernel.status(c)).toBe('PENDING');
        expect(kernel.atomicState(c)?.resolvedChildren).toBe(2);

        kernel.resolve(service, child(1), encode('b'));
        expect(kernel.status(c)).toBe('RESOLVED');
        expect(kernel.value(c)).toEqual(encodeList([encode('a'), encode('b'), encode('c')]));
        expect(kernel.atomicState(c)?.settled).toBe(true);
    });

    test('the first child rejection rejects the continuation', () => {
        const c = run('fanOut');
        kernel.resolve(service, child(0), encode('a'));
        kernel.reject(service, child(1), encode('child failed'));

        expect(kernel.status(c)).toBe('REJECTED');
        expect(kernel.value(c)).toEqual(encode('child failed'));

        kernel.resolve(service, child(2), encode('c'));
        expect(kernel.value(c)).toEqual(encode('child failed'));
    });

    test('no children resolves immediately with an empty list', () => {
        const c = run('nothing');
        expect(kernel.status(c)).toBe('RESOLVED');
        expect(kernel.value(c)).toEqual(encodeList([]));
    });

    test('children already resolved complete the continuation at once', () => {
        const x = kernel.create(ALICE);
        kernel.resolve(ALICE, x, encode(1));
        preset = [x, x];

        const c = run('awaitPreset');
        expect(kernel.value(c)).toEqual(encodeList([encode(1), encode(1)]));
    });

    test('a repeated pending child counts for each occurrence', () => {
        const x = kernel.create(ALICE);
        preset = [x, x];

        const c = run('awaitPreset');
        expect(kernel.status(c)).toBe('PENDING');
        kernel.resolve(ALICE, x, encode(9));
        expect(kernel.value(c)).toEqual(encodeList([encode(9), encode(9)]));
    });

    test('an unknown child rejects the continuation', () => {
        preset = [`0x${'0'.repeat(64)}`];
        const c = run('awaitPreset');
        expect(kernel.status(c)).toBe('REJECTED');
        expect(decodeError(kernel.value(c) ?? EMPTY_PAYLOAD)?.error).toBe('UNKNOWN_PROMISE');
    });
});
