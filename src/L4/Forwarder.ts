import { freeze, produce } from 'immer';
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { remotePromiseId } from '../L0/Crypto.js';
import { samePayload } from '../L0/Codec.js';
import { MessengerGuard, enforce } from '../L0/Guards.js';
import type {
    Address,
    ChainID,
    ForwardCallback,
    ForwardingRecord,
    MessageID,
    Payload,
    PromiseID,
    PromiseRecord
} from '../L0/Ontology.js';
import type { PromiseStore } from '../L1/PromiseStore.js';
import type { CallbackContext } from '../L2/CallbackContext.js';
import type { CallbackRegistry, ForwardDispatcher } from '../L2/CallbackRegistry.js';
import type { Journal } from '../L5/Journal.js';
import type { Messenger, MessengerOrigin } from '../Ports.js';
import { decodeMessage, encodeMessage, validateRegistration } from './Messages.js';
import type { ExecuteMessage, InteropMessage, ReturnMessage, SetupMessage, ShareMessage } from './Messages.js';

export interface ForwarderIdentity {
    chainId: ChainID;
    address: Address; // the kernel, identical on every chain
    messenger: Address;
}

interface ReturnRoute {
    chain: ChainID;
    proxyId: PromiseID;
}

/**
 * Cross-chain forwarding.
 *
 * Source side: `then` towards another chain creates a local proxy at the
 * deterministic remote id and queues a FORWARD descriptor. Executing it
 * sends SETUP then EXECUTE; the proxy settles when RETURN comes back.
 *
 * Destination side: SETUP materializes a mirror promise at the same id with
 * the bound callback, EXECUTE settles the mirror and runs it, and the
 * callback's continuation is routed back as RETURN once it settles.
 */
export class CrossChainForwarder implements ForwardDispatcher {
    private records: Map<PromiseID, ForwardingRecord> = new Map(); // proxyId -> record
    private bindings: Map<PromiseID, SetupMessage> = new Map(); // mirrorId -> setup
    private returnRoutes: Map<PromiseID, ReturnRoute> = new Map(); // continuationId -> route
    private messenger?: Messenger;

    constructor(
        private identity: ForwarderIdentity,
        private store: PromiseStore,
        private registry: CallbackRegistry,
        private context: CallbackContext,
        private journal?: Journal
    ) {
        store.onSettle(record => this.onSettled(record));
    }

    public attachMessenger(messenger: Messenger) {
        this.messenger = messenger;
    }

    // --- Source side ---

    public then(
        registrant: Address,
        parentId: PromiseID,
        destination: ChainID,
        target: Address,
        successSelector: string,
        errorSelector?: string
    ): PromiseID {
        if (destination === this.identity.chainId) {
            throw new PromiseKernelError(ErrorCode.INVALID_DESTINATION, `Chain ${destination} is the local chain`);
        }
        this.requireMessenger();
        this.store.require(parentId);
        validateRegistration({
            registrant,
            target,
            successSelector,
            ...(errorSelector ? { errorSelector } : {})
        });

        const nonce = this.store.nextRegistration(parentId);
        const remoteId = remotePromiseId(parentId, destination, nonce);
        this.store.createAt(remoteId, this.identity.address, { kind: 'PROXY', remoteChain: destination, remoteId }, parentId);

        const callback: ForwardCallback = {
            route: 'FORWARD',
            parentId,
            continuationId: remoteId,
            target,
            registrant,
            sourceChain: this.identity.chainId,
            executed: false,
            destination,
            nonce,
            successSelector,
            ...(errorSelector ? { errorSelector } : {})
        };
        this.registry.registerForward(callback);

        this.records.set(remoteId, freeze<ForwardingRecord>({
            sourcePromiseId: parentId,
            destination,
            remotePromiseId: remoteId,
            localProxyId: remoteId,
            active: true
        }, true));
        return remoteId;
    }

    public dispatch(callback: ForwardCallback, parent: PromiseRecord) {
        if (parent.status === 'PENDING' || parent.value === undefined) {
            throw new PromiseKernelError(ErrorCode.NOT_READY, `Promise ${parent.id} is still PENDING`);
        }

        // Same (source, destination) pair, so SETUP lands first.
        this.send(callback.destination, {
            kind: 'SETUP',
            remoteId: callback.continuationId,
            parentId: callback.parentId,
            nonce: callback.nonce,
            destination: callback.destination,
            target: callback.target,
            successSelector: callback.successSelector,
            ...(callback.errorSelector ? { errorSelector: callback.errorSelector } : {}),
            registrant: callback.registrant,
            sourceChain: callback.sourceChain
        }, callback.registrant);
        this.send(callback.destination, {
            kind: 'EXECUTE',
            remoteId: callback.continuationId,
            status: parent.status,
            value: parent.value
        }, callback.registrant);
    }

    /**
     * Copies a terminal promise to another chain under the same id.
     */
    public share(caller: Address, id: PromiseID, destination: ChainID): MessageID {
        if (destination === this.identity.chainId) {
            throw new PromiseKernelError(ErrorCode.INVALID_DESTINATION, `Chain ${destination} is the local chain`);
        }
        const snapshot = this.store.snapshot(id);
        return this.send(destination, { kind: 'SHARE', ...snapshot }, caller);
    }

    public forwarding(proxyId: PromiseID): ForwardingRecord | undefined {
        return this.records.get(proxyId);
    }

    // --- Messenger-only entrypoints ---

    public receiveMessage(caller: Address, origin: MessengerOrigin, payload: Payload): void {
        this.authorize(caller, origin);
        const message = decodeMessage(payload);
        this.journal?.append('RECEIVED', idOf(message), origin.sender, {
            kind: message.kind,
            sourceChain: origin.sourceChain
        });

        switch (message.kind) {
            case 'SETUP':
                this.setupRemotePromise(caller, origin, message);
                return;
            case 'EXECUTE':
                this.executeRemoteCallback(caller, origin, message);
                return;
            case 'RETURN':
                this.completeRemotePromise(caller, origin, message);
                return;
            case 'SHARE':
                this.shareResolvedPromise(caller, origin, message);
                return;
        }
    }

    /**
     * Binds a mirror promise at the remote id to the forwarded callback.
     * Returns the callback's continuation id.
     */
    public setupRemotePromise(caller: Address, origin: MessengerOrigin, message: SetupMessage): PromiseID {
        this.authorize(caller, origin);

        if (message.destination !== this.identity.chainId) {
            throw new PromiseKernelError(ErrorCode.INVALID_REMOTE_ID, `Setup addressed to chain ${message.destination}`);
        }
        if (remotePromiseId(message.parentId, message.destination, message.nonce) !== message.remoteId) {
            throw new PromiseKernelError(ErrorCode.INVALID_REMOTE_ID, `Remote id ${message.remoteId} does not match its inputs`);
        }
        if (message.sourceChain !== origin.sourceChain) {
            throw new PromiseKernelError(ErrorCode.UNAUTHORIZED, `Setup claims chain ${message.sourceChain} but came from ${origin.sourceChain}`);
        }

        const existing = this.bindings.get(message.remoteId);
        if (existing) {
            if (samePayload(encodeMessage(existing), encodeMessage(message))) {
                console.warn(`[Forwarder] Duplicate setup for ${message.remoteId} ignored`);
                return this.continuationOf(message.remoteId);
            }
            throw new PromiseKernelError(ErrorCode.PROMISE_EXISTS, `Promise ${message.remoteId} is already bound`);
        }

        this.store.createAt(message.remoteId, this.identity.address, { kind: 'MIRROR', sourceChain: origin.sourceChain });
        const continuationId = this.registry.register({
            registrant: message.registrant,
            sourceChain: message.sourceChain,
            parentId: message.remoteId,
            target: message.target,
            kind: 'THEN',
            successSelector: message.successSelector,
            ...(message.errorSelector ? { errorSelector: message.errorSelector } : {})
        });
        this.bindings.set(message.remoteId, message);
        this.returnRoutes.set(continuationId, { chain: origin.sourceChain, proxyId: message.remoteId });
        return continuationId;
    }

    /**
     * Settles a bound mirror promise and runs its callback.
     */
    public executeRemoteCallback(caller: Address, origin: MessengerOrigin, message: ExecuteMessage): number {
        this.context.assertNotReentrant('executeRemoteCallback');
        this.authorize(caller, origin);

        const mirror = this.store.get(message.remoteId);
        if (!mirror || !this.bindings.has(message.remoteId)) {
            throw new PromiseKernelError(ErrorCode.UNORDERED, `Execute for ${message.remoteId} arrived before its setup`);
        }
        if (mirror.status !== 'PENDING') {
            if (this.store.matches(mirror, message.status, message.value)) {
                console.warn(`[Forwarder] Duplicate execute for ${message.remoteId} ignored`);
                return 0;
            }
            throw new PromiseKernelError(ErrorCode.ALREADY_TERMINAL, `Mirror ${message.remoteId} already settled with a different outcome`);
        }

        this.store.settle(this.identity.address, message.remoteId, message.status, message.value);
        return this.registry.executePromiseCallbacks(message.remoteId);
    }

    /**
     * Settles the local proxy with the remote callback's outcome.
     */
    public completeRemotePromise(caller: Address, origin: MessengerOrigin, message: ReturnMessage): void {
        this.authorize(caller, origin);

        const record = this.records.get(message.proxyId);
        if (!record) {
            throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `No forwarding for proxy ${message.proxyId}`);
        }
        if (record.destination !== origin.sourceChain) {
            throw new PromiseKernelError(ErrorCode.UNAUTHORIZED, `Proxy ${message.proxyId} was forwarded to chain ${record.destination}, not ${origin.sourceChain}`);
        }
        if (!record.active) {
            if (this.store.matches(this.store.require(message.proxyId), message.status, message.value)) {
                console.warn(`[Forwarder] Duplicate return for ${message.proxyId} ignored`);
                return;
            }
            throw new PromiseKernelError(ErrorCode.ALREADY_TERMINAL, `Proxy ${message.proxyId} already settled with a different outcome`);
        }

        this.records.set(message.proxyId, produce(record, draft => {
            draft.active = false;
        }));
        this.store.settle(this.identity.address, message.proxyId, message.status, message.value);
    }

    public shareResolvedPromise(caller: Address, origin: MessengerOrigin, message: ShareMessage): void {
        this.authorize(caller, origin);
        const { id, status, value, creator } = message;
        this.store.importSnapshot({ id, status, value, creator }, origin.sourceChain);
    }

    // --- Internals ---

    private onSettled(record: PromiseRecord) {
        const route = this.returnRoutes.get(record.id);
        if (!route || record.status === 'PENDING' || record.value === undefined) return;
        this.returnRoutes.delete(record.id);

        this.send(route.chain, {
            kind: 'RETURN',
            proxyId: route.proxyId,
            status: record.status,
            value: record.value
        }, this.identity.address);
    }

    private continuationOf(mirrorId: PromiseID): PromiseID {
        const [descriptor] = this.registry.descriptors(mirrorId);
        if (!descriptor) {
            throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `Mirror ${mirrorId} has no bound callback`);
        }
        return descriptor.continuationId;
    }

    private authorize(caller: Address, origin: MessengerOrigin) {
        enforce(MessengerGuard({
            caller,
            messenger: this.identity.messenger,
            sender: origin.sender,
            kernel: this.identity.address
        }), { caller, sourceChain: origin.sourceChain });
    }

    private requireMessenger(): Messenger {
        if (!this.messenger) {
            throw new PromiseKernelError(ErrorCode.MESSENGER_UNAVAILABLE, 'No cross-chain messenger attached');
        }
        return this.messenger;
    }

    private send(destination: ChainID, message: InteropMessage, actor: Address): MessageID {
        const messageId = this.requireMessenger().send(destination, this.identity.address, encodeMessage(message));
        this.journal?.append('SENT', idOf(message), actor, { kind: message.kind, destination, messageId });
        return messageId;
    }
}

function idOf(message: InteropMessage): PromiseID {
    switch (message.kind) {
        case 'SETUP':
        case 'EXECUTE':
            return message.remoteId;
        case 'RETURN':
            return message.proxyId;
        case 'SHARE':
            return message.id;
    }
}
