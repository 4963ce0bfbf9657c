// src/L5/Journal.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { Address, ChainID, PromiseID } from '../L0/Ontology.js';
import type { IJournalStore } from '../Ports.js';

export const JOURNAL_EVENTS = [
    'CREATED',
    'RESOLVED',
    'REJECTED',
    'REGISTERED',
    'EXECUTED',
    'SENT',
    'RECEIVED'
] as const;

export type JournalEvent = (typeof JOURNAL_EVENTS)[number];

export type JournalDetail = Record<string, string | number | boolean>;

// --- Journal Entry (hash-chained transition record) ---
export interface JournalEntry {
    entryId: string; // The identifying hash
    previousEntryId: string; // Chain linkage
    sequence: number;
    chainId: ChainID;
    event: JournalEvent;
    promiseId: PromiseID;
    actor: Address;
    detail?: JournalDetail;
}

const GENESIS = '0000000000000000000000000000000000000000000000000000000000000000';

export class Journal {
    private localChain: JournalEntry[] = [];

    constructor(private chainId: ChainID, private store?: IJournalStore) { }

    public append(event: JournalEvent, promiseId: PromiseID, actor: Address, detail?: JournalDetail): JournalEntry {
        const latest = this.getTip();
        const previousEntryId = latest ? latest.entryId : GENESIS;
        const sequence = latest ? latest.sequence + 1 : 0;

        const entry: JournalEntry = {
            entryId: this.calculateHash(previousEntryId, sequence, event, promiseId, actor, detail),
            previousEntryId,
            sequence,
            chainId: this.chainId,
            event,
            promiseId,
            actor,
            ...(detail ? { detail } : {})
        };

        Object.freeze(entry);

        this.store?.append(entry);
        this.localChain.push(entry);
        return entry;
    }

    public getHistory(): JournalEntry[] {
        if (this.store) return this.store.getHistory();
        return [...this.localChain];
    }

    public forPromise(promiseId: PromiseID): JournalEntry[] {
        return this.getHistory().filter(e => e.promiseId === promiseId);
    }

    public verifyChain(): boolean {
        let prev = GENESIS;
        let sequence = 0;

        for (const entry of this.getHistory()) {
            if (entry.previousEntryId !== prev || entry.sequence !== sequence) return false;

            const h = this.calculateHash(prev, entry.sequence, entry.event, entry.promiseId, entry.actor, entry.detail);
            if (h !== entry.entryId) return false;

            prev = entry.entryId;
            sequence++;
        }
        return true;
    }

    public getTip(): JournalEntry | null {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        return this.store?.getLatest() ?? null;
    }

    private calculateHash(
        prevHash: string,
        sequence: number,
        event: JournalEvent,
        promiseId: PromiseID,
        actor: Address,
        detail?: JournalDetail
    ): string {
        // [PreviousHash, Sequence, ChainID, Event, PromiseID, Actor, DetailHash]
        const detailHash = hash(canonicalize(detail ?? {}));
        return hash(canonicalize([prevHash, sequence, this.chainId, event, promiseId, actor, detailHash]));
    }
}
