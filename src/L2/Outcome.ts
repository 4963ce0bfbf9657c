import type { Address, ChainID, Payload, PromiseID } from '../L0/Ontology.js';

/**
 * What a callback hands back to the executor: a value to resolve its
 * continuation with now, or a set of child promises the continuation
 * must wait for.
 */
export type CallbackOutcome =
    | { kind: 'IMMEDIATE'; value: Payload }
    | { kind: 'AWAIT'; children: PromiseID[] };

export interface CallbackInvocation {
    self: Address;
    chainId: ChainID;
    promiseId: PromiseID;
    continuationId: PromiseID;
    registrant: Address;
    sourceChain: ChainID;
}

export type CallbackHandler = (value: Payload, invocation: CallbackInvocation) => CallbackOutcome | Payload;

/**
 * A deployed component: selector name to handler.
 */
export type CallbackTarget = Readonly<Record<string, CallbackHandler>>;

export function immediate(value: Payload): CallbackOutcome {
    return { kind: 'IMMEDIATE', value };
}

export function awaitChildren(children: PromiseID[]): CallbackOutcome {
    return { kind: 'AWAIT', children: [...children] };
}

export function toOutcome(result: CallbackOutcome | Payload): CallbackOutcome {
    return result instanceof Uint8Array ? immediate(result) : result;
}
