/**
 * INTEROP ONTOLOGY
 * Primitive types shared by every layer of the promise kernel.
 */

// --- 1. Identity ---
export type ChainID = number;
export type Address = string; // 0x-prefixed, 20 bytes hex
export type PromiseID = string; // 0x-prefixed, 32 bytes hex
export type MessageID = string;

// --- 2. Payload ---
// Opaque, self-describing binary blob. The kernel never interprets it.
export type Payload = Uint8Array;

// --- 3. Promise ---
export type PromiseStatus = 'PENDING' | 'RESOLVED' | 'REJECTED';
export type TerminalStatus = Exclude<PromiseStatus, 'PENDING'>;

/**
 * Where a promise came from. Cross-chain nature is explicit rather than
 * inferred from missing bookkeeping.
 */
export type PromiseOrigin =
    | { kind: 'LOCAL' }
    | { kind: 'PROXY'; remoteChain: ChainID; remoteId: PromiseID }
    | { kind: 'MIRROR'; sourceChain: ChainID }
    | { kind: 'TIMEOUT'; deadline: number };

export interface PromiseRecord {
    id: PromiseID;
    status: PromiseStatus;
    value?: Payload; // undefined iff PENDING
    creator: Address;
    origin: PromiseOrigin;
    registrations: number; // per-promise registration nonce
    parentId?: PromiseID;
}

/**
 * Terminal state copied between chains under the same id.
 */
export interface PromiseSnapshot {
    id: PromiseID;
    status: TerminalStatus;
    value: Payload;
    creator: Address;
}

// --- 4. Callbacks ---
export type CallbackKind = 'THEN' | 'CATCH';

interface CallbackBase {
    parentId: PromiseID;
    continuationId: PromiseID;
    target: Address;
    registrant: Address;
    sourceChain: ChainID;
    executed: boolean;
}

export interface LocalCallback extends CallbackBase {
    route: 'LOCAL';
    kind: CallbackKind;
    successSelector?: string;
    errorSelector?: string;
}

export interface ForwardCallback extends CallbackBase {
    route: 'FORWARD';
    destination: ChainID;
    nonce: number;
    successSelector: string;
    errorSelector?: string;
}

export type CallbackDescriptor = LocalCallback | ForwardCallback;

// --- 5. Cross-Chain Forwarding ---
export interface ForwardingRecord {
    sourcePromiseId: PromiseID;
    destination: ChainID;
    remotePromiseId: PromiseID;
    localProxyId: PromiseID;
    active: boolean;
}

// --- 6. Coordination ---
export interface AtomicState {
    parentId: PromiseID;
    children: PromiseID[];
    totalChildren: number;
    resolvedChildren: number;
    settled: boolean;
}

export interface AllState {
    allId: PromiseID;
    memberIds: PromiseID[];
    results: (Payload | undefined)[];
    failed: boolean;
}

export interface AllCheck {
    ready: boolean;
    failed: boolean;
    results: (Payload | undefined)[];
}

// --- 7. Callback Authentication ---
export interface AuthContext {
    registrant: Address;
    sourceChain: ChainID;
}
