import { freeze, produce } from 'immer';
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { deriveId } from '../L0/Crypto.js';
import { samePayload } from '../L0/Codec.js';
import { CreatorGuard, PendingGuard, enforce } from '../L0/Guards.js';
import type {
    Address,
    ChainID,
    Payload,
    PromiseID,
    PromiseOrigin,
    PromiseRecord,
    PromiseSnapshot,
    PromiseStatus,
    TerminalStatus
} from '../L0/Ontology.js';
import type { Journal } from '../L5/Journal.js';

export type SettleListener = (record: PromiseRecord) => void;

const LOCAL: PromiseOrigin = { kind: 'LOCAL' };

/**
 * Ground truth for every promise on one chain.
 *
 * Each promise is a single-assignment cell: PENDING moves to RESOLVED or
 * REJECTED exactly once, and only its creator may make that move. Records
 * are replaced (never mutated) through immer, so anything handed out is a
 * frozen snapshot.
 */
export class PromiseStore {
    private records: Map<PromiseID, PromiseRecord> = new Map();
    private sequence = 0;
    private listeners: SettleListener[] = [];

    constructor(private chainId: ChainID, private journal?: Journal) { }

    public get ChainId() { return this.chainId; }

    /**
     * New PENDING promise owned by `creator`, at a fresh id.
     */
    public create(creator: Address, origin: PromiseOrigin = LOCAL): PromiseRecord {
        const id = deriveId('promise', this.chainId, creator, ++this.sequence);
        return this.createAt(id, creator, origin);
    }

    /**
     * New PENDING promise at a caller-computed (deterministic) id.
     */
    public createAt(id: PromiseID, creator: Address, origin: PromiseOrigin = LOCAL, parentId?: PromiseID): PromiseRecord {
        if (this.records.has(id)) {
            throw new PromiseKernelError(ErrorCode.PROMISE_EXISTS, `Promise ${id} already exists`);
        }
        const record = freeze<PromiseRecord>({
            id,
            status: 'PENDING',
            creator,
            origin,
            registrations: 0,
            ...(parentId ? { parentId } : {})
        }, true);

        this.records.set(id, record);
        this.journal?.append('CREATED', id, creator, { origin: origin.kind });
        return record;
    }

    public resolve(caller: Address, id: PromiseID, value: Payload): PromiseRecord {
        return this.settle(caller, id, 'RESOLVED', value);
    }

    public reject(caller: Address, id: PromiseID, value: Payload): PromiseRecord {
        return this.settle(caller, id, 'REJECTED', value);
    }

    public settle(caller: Address, id: PromiseID, status: TerminalStatus, value: Payload): PromiseRecord {
        const record = this.require(id);
        enforce(CreatorGuard({ record, caller }), { promiseId: id, caller });
        enforce(PendingGuard({ record }), { promiseId: id });
        return this.commit(record, status, value, caller);
    }

    /**
     * Copies a terminal snapshot from another chain under the same id.
     * Re-importing an identical snapshot is a no-op. A snapshot never
     * settles a local pending promise: proxies only settle through the
     * return trip of their own forwarding.
     */
    public importSnapshot(snapshot: PromiseSnapshot, sourceChain: ChainID): PromiseRecord {
        const existing = this.records.get(snapshot.id);
        if (!existing) {
            const record = this.createAt(snapshot.id, snapshot.creator, { kind: 'MIRROR', sourceChain });
            return this.commit(record, snapshot.status, snapshot.value, snapshot.creator);
        }
        if (existing.status === 'PENDING') {
            throw new PromiseKernelError(ErrorCode.PROMISE_EXISTS, `Promise ${snapshot.id} is pending locally`);
        }
        if (this.matches(existing, snapshot.status, snapshot.value)) {
            return existing;
        }
        throw new PromiseKernelError(ErrorCode.ALREADY_TERMINAL, `Promise ${snapshot.id} already settled with a different outcome`);
    }

    /**
     * Claims the next registration nonce of a promise.
     */
    public nextRegistration(id: PromiseID): number {
        const record = this.require(id);
        const nonce = record.registrations;
        this.records.set(id, produce(record, draft => {
            draft.registrations++;
        }));
        return nonce;
    }

    public matches(record: PromiseRecord, status: TerminalStatus, value: Payload): boolean {
        return record.status === status && record.value !== undefined && samePayload(record.value, value);
    }

    public onSettle(listener: SettleListener) {
        this.listeners.push(listener);
    }

    // --- Reads ---

    public has(id: PromiseID): boolean {
        return this.records.has(id);
    }

    public get(id: PromiseID): PromiseRecord | undefined {
        return this.records.get(id);
    }

    public require(id: PromiseID): PromiseRecord {
        const record = this.records.get(id);
        if (!record) throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `Unknown promise ${id}`);
        return record;
    }

    /**
     * Detached copy of a record; the payload bytes are not shared.
     */
    public read(id: PromiseID): PromiseRecord {
        const record = this.require(id);
        if (record.value === undefined) return record;
        return { ...record, value: Uint8Array.from(record.value) };
    }

    public status(id: PromiseID): PromiseStatus {
        return this.require(id).status;
    }

    public value(id: PromiseID): Payload | undefined {
        const value = this.require(id).value;
        return value ? Uint8Array.from(value) : undefined;
    }

    public snapshot(id: PromiseID): PromiseSnapshot {
        const record = this.require(id);
        if (record.status === 'PENDING' || record.value === undefined) {
            throw new PromiseKernelError(ErrorCode.NOT_READY, `Promise ${id} is still PENDING`);
        }
        return { id, status: record.status, value: Uint8Array.from(record.value), creator: record.creator };
    }

    public get size() { return this.records.size; }

    private commit(record: PromiseRecord, status: TerminalStatus, value: Payload, actor: Address): PromiseRecord {
        const next = produce(record, draft => {
            draft.status = status;
            draft.value = Uint8Array.from(value);
        });
        this.records.set(record.id, next);
        this.journal?.append(status, record.id, actor, { bytes: value.length });

        for (const listener of this.listeners) {
            listener(next);
        }
        return next;
    }
}
