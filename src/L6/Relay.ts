import { DEFAULT_MESSENGER } from '../Config.js';
import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { deriveId, generateKeyPair, signData, verifySignature } from '../L0/Crypto.js';
import type { Ed25519PublicKey, KeyPair } from '../L0/Crypto.js';
import { encode, toHex } from '../L0/Codec.js';
import type { Address, ChainID, MessageID, Payload } from '../L0/Ontology.js';
import type { Messenger, MessengerOrigin } from '../Ports.js';

/**
 * Anything the relay can hand a delivered message to.
 */
export interface MessageReceiver {
    receiveMessage(caller: Address, origin: MessengerOrigin, payload: Payload): void;
}

export interface Envelope {
    messageId: MessageID;
    sourceChain: ChainID;
    destination: ChainID;
    sender: Address;
    target: Address;
    payload: Payload;
    signature: string;
}

interface Endpoint {
    receiver: MessageReceiver;
    sender: Address; // attested as the origin of everything this chain sends
    key: KeyPair;
}

/**
 * In-process cross-chain messenger.
 *
 * Each connected chain signs what it sends with its own ed25519 key;
 * delivery verifies the envelope against the sending chain's registered
 * key and drops anything that does not verify. Nothing moves until someone
 * calls a deliver method, in send order unless a message is picked
 * explicitly.
 */
export class Relay {
    private endpoints: Map<ChainID, Endpoint> = new Map();
    private partners: Map<ChainID, Ed25519PublicKey> = new Map();
    private queue: Envelope[] = [];
    private delivered: Map<MessageID, Envelope> = new Map();
    private sequence = 0;

    constructor(private messengerAddress: Address = DEFAULT_MESSENGER) { }

    public connect(chainId: ChainID, receiver: MessageReceiver, sender: Address, key: KeyPair = generateKeyPair()): Messenger {
        if (this.endpoints.has(chainId)) {
            throw new PromiseKernelError(ErrorCode.INVALID_CONFIG, `Chain ${chainId} already connected`);
        }
        this.endpoints.set(chainId, { receiver, sender, key });
        this.registerPartner(chainId, key.publicKey);

        return {
            send: (destination, target, payload) => this.send(chainId, destination, target, payload)
        };
    }

    public registerPartner(chainId: ChainID, publicKey: Ed25519PublicKey) {
        this.partners.set(chainId, publicKey);
    }

    public pending(destination?: ChainID): Envelope[] {
        return this.queue.filter(e => destination === undefined || e.destination === destination);
    }

    /**
     * Puts an envelope on the wire as-is. It is still verified on delivery.
     */
    public inject(envelope: Envelope) {
        this.queue.push({ ...envelope, payload: Uint8Array.from(envelope.payload) });
    }

    public deliverNext(destination?: ChainID): boolean {
        const next = this.queue.find(e => destination === undefined || e.destination === destination);
        if (!next) return false;
        return this.deliver(next.messageId);
    }

    /**
     * Delivers one queued message, regardless of its position.
     * Returns false if it was dropped.
     */
    public deliver(messageId: MessageID): boolean {
        const index = this.queue.findIndex(e => e.messageId === messageId);
        const envelope = this.queue[index];
        if (index < 0 || !envelope) {
            throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `No queued message ${messageId}`);
        }
        this.queue.splice(index, 1);

        const publicKey = this.partners.get(envelope.sourceChain);
        if (!publicKey) {
            console.warn(`[Relay] Dropped ${messageId}: unknown source chain ${envelope.sourceChain}`);
            return false;
        }
        if (!verifySignature(signable(envelope), envelope.signature, publicKey)) {
            console.warn(`[Relay] Dropped ${messageId}: invalid signature from chain ${envelope.sourceChain}`);
            return false;
        }
        const endpoint = this.endpoints.get(envelope.destination);
        if (!endpoint) {
            console.warn(`[Relay] Dropped ${messageId}: chain ${envelope.destination} not connected`);
            return false;
        }

        this.delivered.set(messageId, envelope);
        endpoint.receiver.receiveMessage(
            this.messengerAddress,
            { sourceChain: envelope.sourceChain, sender: envelope.sender },
            Uint8Array.from(envelope.payload)
        );
        return true;
    }

    /**
     * Delivers until the wire is empty or `limit` messages went through,
     * including messages sent while delivering.
     */
    public deliverAll(limit = 1000): number {
        let count = 0;
        while (count < limit && this.deliverNext()) {
            count++;
        }
        return count;
    }

    /**
     * Queues an already delivered message again (at-least-once delivery).
     */
    public replay(messageId: MessageID) {
        const envelope = this.delivered.get(messageId);
        if (!envelope) {
            throw new PromiseKernelError(ErrorCode.UNKNOWN_PROMISE, `Message ${messageId} was never delivered`);
        }
        this.inject(envelope);
    }

    private send(sourceChain: ChainID, destination: ChainID, target: Address, payload: Payload): MessageID {
        const endpoint = this.endpoints.get(sourceChain);
        if (!endpoint) {
            throw new PromiseKernelError(ErrorCode.MESSENGER_UNAVAILABLE, `Chain ${sourceChain} not connected`);
        }

        const unsigned = {
            messageId: deriveId('message', sourceChain, destination, ++this.sequence),
            sourceChain,
            destination,
            sender: endpoint.sender,
            target,
            payload: Uint8Array.from(payload)
        };
        const signature = signData(signable(unsigned), endpoint.key.privateKey);
        this.queue.push({ ...unsigned, signature });
        return unsigned.messageId;
    }
}

function signable(envelope: Omit<Envelope, 'signature'>): Uint8Array {
    return encode([
        envelope.messageId,
        envelope.sourceChain,
        envelope.destination,
        envelope.sender,
        envelope.target,
        toHex(envelope.payload)
    ]);
}
