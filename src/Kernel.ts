import { resolveConfig } from './Config.js';
import type { InteropConfig } from './Config.js';
import { ErrorCode, PromiseKernelError } from './Errors.js';
import { deployedAddress } from './L0/Crypto.js';
import { encode } from './L0/Codec.js';
import { DeadlineGuard, enforce } from './L0/Guards.js';
import type {
    Address,
    AllCheck,
    AllState,
    AtomicState,
    ChainID,
    ForwardingRecord,
    MessageID,
    Payload,
    PromiseID,
    PromiseRecord,
    PromiseStatus
} from './L0/Ontology.js';
import { PromiseStore } from './L1/PromiseStore.js';
import { CallbackContext } from './L2/CallbackContext.js';
import type { CallbackFrame } from './L2/CallbackContext.js';
import { CallbackRegistry } from './L2/CallbackRegistry.js';
import type { CallbackTarget } from './L2/Outcome.js';
import { TargetRegistry } from './L2/TargetRegistry.js';
import { AtomicCoordinator } from './L3/AtomicCoordinator.js';
import { PromiseAllAggregator } from './L3/PromiseAll.js';
import { CrossChainForwarder } from './L4/Forwarder.js';
import type { ExecuteMessage, ReturnMessage, SetupMessage, ShareMessage } from './L4/Messages.js';
import { Journal } from './L5/Journal.js';
import type { MessageReceiver } from './L6/Relay.js';
import { SystemClock } from './Ports.js';
import type { Clock, IJournalStore, Messenger, MessengerOrigin } from './Ports.js';

export interface KernelOptions {
    chainId: ChainID;
    config?: Partial<InteropConfig>;
    clock?: Clock;
    journalStore?: IJournalStore;
    messenger?: Messenger;
}

/**
 * The promise kernel of one chain.
 *
 * Every caller-sensitive operation takes the calling principal first.
 * Nothing advances on its own: settling a promise only records the
 * outcome, and callbacks run when someone executes or flushes them.
 */
export class PromiseKernel implements MessageReceiver {
    public static readonly ADDRESS: Address = deployedAddress('PromiseKernel');

    public readonly chainId: ChainID;
    public readonly config: InteropConfig;
    public readonly journal: Journal;

    private clock: Clock;
    private store: PromiseStore;
    private context: CallbackContext;
    private targets: TargetRegistry;
    private atomic: AtomicCoordinator;
    private registry: CallbackRegistry;
    private aggregator: PromiseAllAggregator;
    private forwarder: CrossChainForwarder;

    constructor(options: KernelOptions) {
        this.chainId = options.chainId;
        this.config = resolveConfig(options.config);
        this.clock = options.clock ?? SystemClock;
        this.journal = new Journal(this.chainId, options.journalStore);

        const self = PromiseKernel.ADDRESS;
        this.store = new PromiseStore(this.chainId, this.journal);
        this.context = new CallbackContext();
        this.targets = new TargetRegistry();
        this.atomic = new AtomicCoordinator(this.store, self);
        this.registry = new CallbackRegistry(
            { chainId: this.chainId, address: self },
            this.store,
            this.context,
            this.targets,
            this.atomic,
            this.journal
        );
        this.aggregator = new PromiseAllAggregator(this.chainId, this.store, self);
        this.forwarder = new CrossChainForwarder(
            { chainId: this.chainId, address: self, messenger: this.config.messenger },
            this.store,
            this.registry,
            this.context,
            this.journal
        );
        this.registry.attachForwarder(this.forwarder);

        if (options.messenger) this.attachMessenger(options.messenger);
    }

    public attachMessenger(messenger: Messenger) {
        this.forwarder.attachMessenger(messenger);
    }

    /**
     * Makes a callback target available at its deterministic address.
     */
    public deploy(name: string, target: CallbackTarget): Address {
        return this.targets.deploy(name, target);
    }

    // --- Promise Store ---

    public create(caller: Address): PromiseID {
        return this.store.create(caller).id;
    }

    /**
     * A promise anyone may resolve once the clock passes `deadline` (seconds).
     */
    public createTimeout(deadline: number): PromiseID {
        return this.store.create(PromiseKernel.ADDRESS, { kind: 'TIMEOUT', deadline }).id;
    }

    public resolveTimeout(id: PromiseID): void {
        const record = this.store.require(id);
        if (record.origin.kind !== 'TIMEOUT') {
            throw new PromiseKernelError(ErrorCode.UNAUTHORIZED, `Promise ${id} is not a timeout`);
        }
        const { deadline } = record.origin;
        enforce(DeadlineGuard({ deadline, now: this.clock.now() }), { promiseId: id });
        this.store.resolve(PromiseKernel.ADDRESS, id, encode(deadline));
    }

    public resolve(caller: Address, id: PromiseID, value: Payload): void {
        this.store.resolve(caller, id, value);
    }

    public reject(caller: Address, id: PromiseID, value: Payload): void {
        this.store.reject(caller, id, value);
    }

    public status(id: PromiseID): PromiseStatus {
        return this.store.status(id);
    }

    public value(id: PromiseID): Payload | undefined {
        return this.store.value(id);
    }

    public get(id: PromiseID): PromiseRecord {
        return this.store.read(id);
    }

    // --- Callbacks ---

    public then(caller: Address, parentId: PromiseID, target: Address, successSelector: string, errorSelector?: string): PromiseID;
    public then(caller: Address, parentId: PromiseID, destination: ChainID, target: Address, successSelector: string, errorSelector?: string): PromiseID;
    public then(
        caller: Address,
        parentId: PromiseID,
        targetOrDestination: Address | ChainID,
        selectorOrTarget: string,
        selector?: string,
        errorSelector?: string
    ): PromiseID {
        if (typeof targetOrDestination === 'number') {
            if (selector === undefined) {
                throw new PromiseKernelError(ErrorCode.TARGET_NOT_FOUND, 'Cross-chain registration needs a success selector');
            }
            return this.forwarder.then(caller, parentId, targetOrDestination, selectorOrTarget, selector, errorSelector);
        }

        return this.registry.register({
            registrant: caller,
            sourceChain: this.chainId,
            parentId,
            target: targetOrDestination,
            kind: 'THEN',
            successSelector: selectorOrTarget,
            ...(selector ? { errorSelector: selector } : {})
        });
    }

    /**
     * Error-only registration. A resolved parent passes its value through.
     */
    public onReject(caller: Address, parentId: PromiseID, target: Address, errorSelector: string): PromiseID {
        return this.registry.register({
            registrant: caller,
            sourceChain: this.chainId,
            parentId,
            target,
            kind: 'CATCH',
            errorSelector
        });
    }

    public executePromiseCallbacks(id: PromiseID): number {
        return this.registry.executePromiseCallbacks(id);
    }

    public flushChain(id: PromiseID, maxSteps: number = this.config.maxFlushSteps): number {
        return this.registry.flushChain(id, maxSteps);
    }

    // --- Promise.all ---

    public createAll(caller: Address, memberIds: PromiseID[]): PromiseID {
        return this.aggregator.createAll(caller, memberIds);
    }

    public checkAll(allId: PromiseID): AllCheck {
        return this.aggregator.checkAll(allId);
    }

    // --- Callback authentication ---

    public callbackRegistrant(): Address {
        return this.context.registrant();
    }

    public callbackSourceChain(): ChainID {
        return this.context.sourceChain();
    }

    public callbackContext(): CallbackFrame {
        return this.context.context();
    }

    // --- Cross-chain ---

    public share(caller: Address, id: PromiseID, destination: ChainID): MessageID {
        return this.forwarder.share(caller, id, destination);
    }

    public receiveMessage(caller: Address, origin: MessengerOrigin, payload: Payload): void {
        this.forwarder.receiveMessage(caller, origin, payload);
    }

    public setupRemotePromise(caller: Address, origin: MessengerOrigin, message: SetupMessage): PromiseID {
        return this.forwarder.setupRemotePromise(caller, origin, message);
    }

    public executeRemoteCallback(caller: Address, origin: MessengerOrigin, message: ExecuteMessage): number {
        return this.forwarder.executeRemoteCallback(caller, origin, message);
    }

    public completeRemotePromise(caller: Address, origin: MessengerOrigin, message: ReturnMessage): void {
        this.forwarder.completeRemotePromise(caller, origin, message);
    }

    public shareResolvedPromise(caller: Address, origin: MessengerOrigin, message: ShareMessage): void {
        this.forwarder.shareResolvedPromise(caller, origin, message);
    }

    // --- Inspection ---

    public forwarding(proxyId: PromiseID): ForwardingRecord | undefined {
        return this.forwarder.forwarding(proxyId);
    }

    public atomicState(continuationId: PromiseID): AtomicState | undefined {
        return this.atomic.state(continuationId);
    }

    public allState(allId: PromiseID): AllState | undefined {
        return this.aggregator.state(allId);
    }

    public pendingCallbacks(id: PromiseID): number {
        return this.registry.pendingCount(id);
    }
}
