import type { Address, ChainID, MessageID, Payload } from './L0/Ontology.js';
import type { JournalEntry } from './L5/Journal.js';

/**
 * Persistence Port: Journal Store
 * Append-only storage for the hash-chained transition journal.
 * Synchronous, since every kernel transition is.
 */
export interface IJournalStore {
    append(entry: JournalEntry): void;
    getHistory(): JournalEntry[];
    getLatest(): JournalEntry | null;
}

/**
 * Environment Port: Monotonic Clock
 * Only consulted when a timeout promise is polled.
 */
export interface Clock {
    now(): number; // seconds
}

export const SystemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000)
};

/**
 * Transport Port: Cross-Chain Messenger
 * Point-to-point, at-least-once delivery of opaque payloads. Preserves send
 * order per (source, destination) pair and nothing more.
 */
export interface Messenger {
    send(destination: ChainID, target: Address, payload: Payload): MessageID;
}

/**
 * Who a delivered message claims to come from, as attested by the messenger.
 */
export interface MessengerOrigin {
    sourceChain: ChainID;
    sender: Address;
}
