import { freeze, produce } from 'immer';
import { encodeList } from '../L0/Codec.js';
import type { Address, AtomicState, Payload, PromiseID, PromiseRecord } from '../L0/Ontology.js';
import type { PromiseStore } from '../L1/PromiseStore.js';
import type { ChildTracker } from '../L2/CallbackRegistry.js';

/**
 * Atomic fan-out.
 *
 * A continuation whose callback handed back N child promises waits here
 * until every child resolved, then resolves once with the children's values
 * in the order they were given. The first child rejection rejects it with
 * that child's value.
 */
export class AtomicCoordinator implements ChildTracker {
    private states: Map<PromiseID, AtomicState> = new Map();
    private waiting: Map<PromiseID, PromiseID[]> = new Map(); // child -> parents

    constructor(private store: PromiseStore, private owner: Address) {
        store.onSettle(record => this.onChildSettled(record));
    }

    public track(parentId: PromiseID, children: PromiseID[]): void {
        const records = children.map(id => this.store.require(id));

        const initial = freeze<AtomicState>({
            parentId,
            children: [...children],
            totalChildren: children.length,
            resolvedChildren: records.filter(r => r.status === 'RESOLVED').length,
            settled: false
        }, true);
        this.states.set(parentId, initial);

        const rejected = records.find(r => r.status === 'REJECTED');
        if (rejected) {
            this.fail(initial, rejected);
            return;
        }
        if (initial.resolvedChildren === initial.totalChildren) {
            this.complete(initial);
            return;
        }

        for (const child of new Set(children)) {
            if (this.store.status(child) !== 'PENDING') continue;
            const parents = this.waiting.get(child) ?? [];
            parents.push(parentId);
            this.waiting.set(child, parents);
        }
    }

    public state(parentId: PromiseID): AtomicState | undefined {
        return this.states.get(parentId);
    }

    private onChildSettled(child: PromiseRecord) {
        const parents = this.waiting.get(child.id);
        if (!parents) return;
        this.waiting.delete(child.id);

        for (const parentId of parents) {
            const state = this.states.get(parentId);
            if (!state || state.settled) continue;

            if (child.status === 'REJECTED') {
                this.fail(state, child);
                continue;
            }

            const occurrences = state.children.filter(id => id === child.id).length;
            const next = produce(state, draft => {
                draft.resolvedChildren += occurrences;
            });
            this.states.set(parentId, next);

            if (next.resolvedChildren === next.totalChildren) {
                this.complete(next);
            }
        }
    }

    private complete(state: AtomicState) {
        const values: Payload[] = state.children.map(id => this.store.value(id) ?? new Uint8Array(0));
        this.markSettled(state);
        this.store.resolve(this.owner, state.parentId, encodeList(values));
    }

    private fail(state: AtomicState, child: PromiseRecord) {
        console.warn(`[Atomic] Child ${child.id} rejected; rejecting ${state.parentId}`);
        this.markSettled(state);
        this.store.reject(this.owner, state.parentId, child.value ?? new Uint8Array(0));
    }

    private markSettled(state: AtomicState) {
        this.states.set(state.parentId, produce(state, draft => {
            draft.settled = true;
        }));
    }
}
