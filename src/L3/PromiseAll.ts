import { freeze, produce } from 'immer';
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { deriveId } from '../L0/Crypto.js';
import { encodeList } from '../L0/Codec.js';
import type { Address, AllCheck, AllState, ChainID, Payload, PromiseID } from '../L0/Ontology.js';
import type { PromiseStore } from '../L1/PromiseStore.js';

/**
 * Promise.all over a fixed member set.
 *
 * Readiness is fail-fast: ready once every member resolved, or as soon as
 * any member rejected. Each group also owns an aggregate promise at its id,
 * settled the first time checkAll observes readiness, so the group can be
 * chained like any other promise.
 */
export class PromiseAllAggregator {
    private groups: Map<PromiseID, AllState> = new Map();
    private sequence = 0;

    constructor(private chainId: ChainID, private store: PromiseStore, private owner: Address) { }

    public createAll(caller: Address, memberIds: PromiseID[]): PromiseID {
        for (const id of memberIds) this.store.require(id);

        const allId = deriveId('all', this.chainId, caller, ++this.sequence);
        this.store.createAt(allId, this.owner);
        this.groups.set(allId, freeze<AllState>({
            allId,
            memberIds: [...memberIds],
            results: memberIds.map(() => undefined),
            failed: false
        }, true));
        return allId;
    }

    public checkAll(allId: PromiseID): AllCheck {
        const group = this.require(allId);

        const records = group.memberIds.map(id => this.store.require(id));
        const results = records.map(r => (r.value ? Uint8Array.from(r.value) : undefined));
        const firstRejected = records.find(r => r.status === 'REJECTED');
        const failed = firstRejected !== undefined;
        const ready = failed || records.every(r => r.status === 'RESOLVED');

        this.groups.set(allId, produce(group, draft => {
            draft.failed = failed;
            draft.results = results;
        }));

        if (ready && this.store.status(allId) === 'PENDING') {
            if (firstRejected) {
                this.store.reject(this.owner, allId, firstRejected.value ?? new Uint8Array(0));
            } else {
                const values: Payload[] = results.map(r => r ?? new Uint8Array(0));
                this.store.resolve(this.owner, allId, encodeList(values));
            }
        }

        return { ready, failed, results: results.map(copy) };
    }

    public state(allId: PromiseID): AllState | undefined {
        const group = this.groups.get(allId);
        // Payload bytes stay writable under freeze.
        return group ? freeze<AllState>({ ...group, results: group.results.map(copy) }, true) : undefined;
    }

    private require(allId: PromiseID): AllState {
        const group = this.groups.get(allId);
        if (!group) throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `Unknown Promise.all group ${allId}`);
        return group;
    }
}

function copy(value: Payload | undefined): Payload | undefined {
    return value ? Uint8Array.from(value) : undefined;
}
