import { produce } from 'immer';
import { CallbackRevert, ErrorCode, PromiseKernelError, isKernelError } from '../Errors.js';
import { continuationId as deriveContinuationId } from '../L0/Crypto.js';
import { encodeError } from '../L0/Codec.js';
import { TerminalGuard, enforce } from '../L0/Guards.js';
import type {
    Address,
    CallbackDescriptor,
    ChainID,
    ForwardCallback,
    LocalCallback,
    Payload,
    PromiseID,
    PromiseRecord
} from '../L0/Ontology.js';
import type { PromiseStore } from '../L1/PromiseStore.js';
import type { Journal } from '../L5/Journal.js';
import type { CallbackContext } from './CallbackContext.js';
import { toOutcome } from './Outcome.js';
import type { CallbackOutcome } from './Outcome.js';
import type { TargetRegistry } from './TargetRegistry.js';

/**
 * Receives continuations whose callback returned child promises.
 */
export interface ChildTracker {
    track(parentId: PromiseID, children: PromiseID[]): void;
}

/**
 * Emits the cross-chain messages of a forwarded registration.
 */
export interface ForwardDispatcher {
    dispatch(callback: ForwardCallback, parent: PromiseRecord): void;
}

export interface ExecutorIdentity {
    chainId: ChainID;
    address: Address; // owner of every continuation
}

export interface LocalRegistration {
    registrant: Address;
    sourceChain: ChainID;
    parentId: PromiseID;
    target: Address;
    kind: LocalCallback['kind'];
    successSelector?: string;
    errorSelector?: string;
}

type HandlerRun =
    | { ok: true; outcome: CallbackOutcome }
    | { ok: false; failure: Payload; reentrant: boolean };

/**
 * Callback registry and executor.
 *
 * Registration never runs anything: callbacks are queued against their
 * parent and only run when someone calls executePromiseCallbacks (or
 * flushChain) on a terminal parent. Each descriptor runs at most once.
 */
export class CallbackRegistry {
    private callbacks: Map<PromiseID, CallbackDescriptor[]> = new Map();
    private forwarder?: ForwardDispatcher;

    constructor(
        private identity: ExecutorIdentity,
        private store: PromiseStore,
        private context: CallbackContext,
        private targets: TargetRegistry,
        private children: ChildTracker,
        private journal?: Journal
    ) { }

    public attachForwarder(forwarder: ForwardDispatcher) {
        this.forwarder = forwarder;
    }

    // --- Registration ---

    public register(registration: LocalRegistration): PromiseID {
        const { parentId } = registration;
        this.store.require(parentId);

        const nonce = this.store.nextRegistration(parentId);
        const continuationId = deriveContinuationId(parentId, nonce);
        this.store.createAt(continuationId, this.identity.address, { kind: 'LOCAL' }, parentId);

        const descriptor: LocalCallback = {
            route: 'LOCAL',
            kind: registration.kind,
            parentId,
            continuationId,
            target: registration.target,
            registrant: registration.registrant,
            sourceChain: registration.sourceChain,
            executed: false,
            ...(registration.successSelector ? { successSelector: registration.successSelector } : {}),
            ...(registration.errorSelector ? { errorSelector: registration.errorSelector } : {})
        };
        this.push(descriptor);
        return continuationId;
    }

    /**
     * Queues a forwarded registration. The proxy promise at
     * `callback.continuationId` is created by the forwarder.
     */
    public registerForward(callback: ForwardCallback) {
        this.push(callback);
    }

    public descriptors(parentId: PromiseID): CallbackDescriptor[] {
        return [...(this.callbacks.get(parentId) ?? [])];
    }

    public pendingCount(parentId: PromiseID): number {
        return (this.callbacks.get(parentId) ?? []).filter(d => !d.executed).length;
    }

    // --- Execution ---

    /**
     * Runs, in registration order, every not-yet-executed callback of a
     * terminal promise. Returns how many ran.
     */
    public executePromiseCallbacks(id: PromiseID): number {
        this.context.assertNotReentrant('executePromiseCallbacks');

        const parent = this.store.require(id);
        enforce(TerminalGuard({ record: parent }), { promiseId: id });

        let executed = 0;
        const list = this.callbacks.get(id) ?? [];
        // Callbacks registered while this runs wait for the next call.
        const count = list.length;
        for (let i = 0; i < count; i++) {
            const descriptor = list[i];
            if (!descriptor || descriptor.executed) continue;

            // Marked before running so nothing can run it twice.
            list[i] = produce(descriptor, draft => {
                draft.executed = true;
            });
            this.run(descriptor, parent);
            executed++;
        }
        return executed;
    }

    /**
     * Walks the continuations reachable from `startId`, breadth first,
     * executing each terminal promise with queued callbacks. A continuation
     * still PENDING ends its own branch only; the walk stops after
     * `maxSteps` executions or when nothing is left to visit.
     */
    public flushChain(startId: PromiseID, maxSteps: number): number {
        this.context.assertNotReentrant('flushChain');
        enforce(TerminalGuard({ record: this.store.require(startId) }), { promiseId: startId });

        const queue: PromiseID[] = [startId];
        let steps = 0;

        while (steps < maxSteps) {
            const id = queue.shift();
            if (id === undefined) break;

            if (this.store.status(id) === 'PENDING') continue;

            if (this.pendingCount(id) > 0) {
                this.executePromiseCallbacks(id);
                steps++;
            }
            for (const d of this.callbacks.get(id) ?? []) {
                queue.push(d.continuationId);
            }
        }
        return steps;
    }

    private run(descriptor: CallbackDescriptor, parent: PromiseRecord) {
        this.journal?.append('EXECUTED', descriptor.continuationId, descriptor.registrant, {
            route: descriptor.route,
            parent: parent.status
        });

        if (descriptor.route === 'FORWARD') {
            if (!this.forwarder) {
                throw new PromiseKernelError(ErrorCode.MESSENGER_UNAVAILABLE, 'No cross-chain forwarder attached');
            }
            this.forwarder.dispatch(descriptor, parent);
            return;
        }

        const value = parent.value ?? new Uint8Array(0);

        if (parent.status === 'RESOLVED') {
            if (descriptor.kind === 'CATCH' || descriptor.successSelector === undefined) {
                this.settle(descriptor, { ok: true, outcome: { kind: 'IMMEDIATE', value } });
                return;
            }
            const first = this.invoke(descriptor, descriptor.successSelector, value, parent.id);
            if (first.ok || first.reentrant || !descriptor.errorSelector) {
                this.settle(descriptor, first);
                return;
            }
            this.settle(descriptor, this.invoke(descriptor, descriptor.errorSelector, first.failure, parent.id));
            return;
        }

        // Parent REJECTED: only the error handler may react.
        if (!descriptor.errorSelector) {
            this.settle(descriptor, { ok: false, failure: value, reentrant: false });
            return;
        }
        this.settle(descriptor, this.invoke(descriptor, descriptor.errorSelector, value, parent.id));
    }

    private invoke(descriptor: LocalCallback, selector: string, value: Payload, promiseId: PromiseID): HandlerRun {
        const frame = {
            registrant: descriptor.registrant,
            sourceChain: descriptor.sourceChain,
            promiseId,
            continuationId: descriptor.continuationId,
            target: descriptor.target
        };
        const result = this.context.invoke(frame, () => {
            const handler = this.targets.handler(descriptor.target, selector);
            return handler(Uint8Array.from(value), { ...frame, self: descriptor.target, chainId: this.identity.chainId });
        });

        if (result.reentered) {
            console.warn(`[Executor] Reentrant call from ${descriptor.target}.${selector}; rejecting ${descriptor.continuationId}`);
            return {
                ok: false,
                failure: encodeError(ErrorCode.REENTRANT_CALL, `Reentrant call from ${selector}`),
                reentrant: true
            };
        }
        if (!result.ok) {
            console.warn(`[Executor] Callback ${selector} on ${descriptor.target} failed:`, result.error);
            return { ok: false, failure: this.failurePayload(result.error), reentrant: false };
        }
        return { ok: true, outcome: toOutcome(result.value) };
    }

    private settle(descriptor: LocalCallback, run: HandlerRun) {
        const owner = this.identity.address;
        if (!run.ok) {
            this.store.reject(owner, descriptor.continuationId, run.failure);
            return;
        }
        if (run.outcome.kind === 'IMMEDIATE') {
            this.store.resolve(owner, descriptor.continuationId, run.outcome.value);
            return;
        }
        try {
            this.children.track(descriptor.continuationId, run.outcome.children);
        } catch (e) {
            if (!isKernelError(e, ErrorCode.UNKNOWN_PROMISE)) throw e;
            this.store.reject(owner, descriptor.continuationId, this.failurePayload(e));
        }
    }

    private failurePayload(error: unknown): Payload {
        if (error instanceof CallbackRevert) return Uint8Array.from(error.payload);
        if (error instanceof PromiseKernelError) return encodeError(error.code, error.reason);
        if (error instanceof Error) return encodeError(ErrorCode.CALLBACK_FAILED, error.message);
        return encodeError(ErrorCode.CALLBACK_FAILED, String(error));
    }

    private push(descriptor: CallbackDescriptor) {
        const list = this.callbacks.get(descriptor.parentId) ?? [];
        list.push(descriptor);
        this.callbacks.set(descriptor.parentId, list);
        this.journal?.append('REGISTERED', descriptor.continuationId, descriptor.registrant, {
            parent: descriptor.parentId,
            route: descriptor.route,
            target: descriptor.target
        });
    }
}
