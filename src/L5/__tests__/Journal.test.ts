import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { Journal } from '../Journal.js';
import type { JournalEntry } from '../Journal.js';
import { SQLiteJournalStore } from '../../infrastructure/persistence/SQLiteJournalStore.js';
import { PromiseKernel } from '../../Kernel.js';
import { encode } from '../../L0/Codec.js';
import type { IJournalStore } from '../../Ports.js';

const ALICE = `0x${'a'.repeat(40)}`;
const P1 = `0x${'1'.repeat(64)}`;
const P2 = `0x${'2'.repeat(64)}`;

class ArrayStore implements IJournalStore {
    public entries: JournalEntry[] = [];
    append(entry: JournalEntry) { this.entries.push(entry); }
    getHistory() { return [...this.entries]; }
    getLatest() { return this.entries[this.entries.length - 1] ?? null; }
}

describe('Journal', () => {
    test('links entries by hash from a zero genesis', () => {
        const journal = new Journal(100);
        const first = journal.append('CREATED', P1, ALICE, { origin: 'LOCAL' });
        const second = journal.append('RESOLVED', P1, ALICE);

        expect(first.previousEntryId).toBe('0'.repeat(64));
        expect(first.sequence).toBe(0);
        expect(second.previousEntryId).toBe(first.entryId);
        expect(second.sequence).toBe(1);
        expect(second.detail).toBeUndefined();
        expect(Object.isFrozen(first)).toBe(true);
        expect(journal.verifyChain()).toBe(true);
    });

    test('the chain id is part of the hash', () => {
        const a = new Journal(100).append('CREATED', P1, ALICE);
        const b = new Journal(200).append('CREATED', P1, ALICE);
        expect(a.entryId).not.toBe(b.entryId);
    });

    test('filters by promise', () => {
        const journal = new Journal(100);
        journal.append('CREATED', P1, ALICE);
        journal.append('CREATED', P2, ALICE);
        journal.append('REJECTED', P1, ALICE);
        expect(journal.forPromise(P1).map(e => e.event)).toEqual(['CREATED', 'REJECTED']);
    });

    test('detects a rewritten entry', () => {
        const store = new ArrayStore();
        const journal = new Journal(100, store);
        journal.append('CREATED', P1, ALICE);
        journal.append('RESOLVED', P1, ALICE, { bytes: 3 });

        const original = store.entries[1];
        if (!original) throw new Error('expected two entries');
        store.entries[1] = { ...original, detail: { bytes: 4 } };
        expect(journal.verifyChain()).toBe(false);
    });
});

describe('SQLite Journal Store', () => {
    let store: SQLiteJournalStore;

    beforeEach(async () => {
        store = await SQLiteJournalStore.open();
    });

    afterEach(() => {
        store.close();
    });

    test('persists entries with their detail', () => {
        const journal = new Journal(100, store);
        journal.append('CREATED', P1, ALICE, { origin: 'LOCAL' });
        journal.append('SENT', P1, ALICE, { kind: 'SETUP', destination: 200 });

        const history = store.getHistory();
        expect(history.map(e => e.event)).toEqual(['CREATED', 'SENT']);
        expect(history[1]?.detail).toEqual({ kind: 'SETUP', destination: 200 });
        expect(store.getLatest()?.sequence).toBe(1);
        expect(journal.verifyChain()).toBe(true);
    });

    test('a fresh journal continues from the stored tip', () => {
        const first = new Journal(100, store);
        first.append('CREATED', P1, ALICE);
        const tip = first.append('RESOLVED', P1, ALICE);

        const resumed = new Journal(100, store);
        const next = resumed.append('CREATED', P2, ALICE);
        expect(next.sequence).toBe(2);
        expect(next.previousEntryId).toBe(tip.entryId);
        expect(resumed.verifyChain()).toBe(true);
    });

    test('an exported image reopens with its history', async () => {
        const journal = new Journal(100, store);
        journal.append('CREATED', P1, ALICE);
        const tip = journal.append('SENT', P1, ALICE, { kind: 'SETUP', destination: 200 });

        const reopened = await SQLiteJournalStore.open({ data: store.export() });
        try {
            expect(reopened.getHistory()).toEqual(store.getHistory());
            const next = new Journal(100, reopened).append('CREATED', P2, ALICE);
            expect(next.previousEntryId).toBe(tip.entryId);
            expect(reopened.getHistory()).toHaveLength(3);
            expect(store.getHistory()).toHaveLength(2);
        } finally {
            reopened.close();
        }
    });

    test('backs a kernel', () => {
        const kernel = new PromiseKernel({ chainId: 100, journalStore: store });
        const id = kernel.create(ALICE);
        kernel.resolve(ALICE, id, encode(1));

        expect(store.getHistory().map(e => [e.event, e.promiseId])).toEqual([['CREATED', id], ['RESOLVED', id]]);
        expect(kernel.journal.verifyChain()).toBe(true);
    });
});
