export { PromiseKernel } from './Kernel.js';
export type { KernelOptions } from './Kernel.js';
export { DEFAULT_CONFIG, DEFAULT_MESSENGER, loadConfig, resolveConfig } from './Config.js';
export type { InteropConfig } from './Config.js';
export { CallbackRevert, ErrorCode, PromiseKernelError, isKernelError } from './Errors.js';
export * from './L0/Ontology.js';
export { deployedAddress, remotePromiseId, continuationId, generateKeyPair } from './L0/Crypto.js';
export type { KeyPair } from './L0/Crypto.js';
export {
    EMPTY_PAYLOAD,
    encode,
    decode,
    decodeNumber,
    encodeError,
    decodeError,
    encodeList,
    decodeList,
    samePayload
} from './L0/Codec.js';
export { immediate, awaitChildren } from './L2/Outcome.js';
export type { CallbackHandler, CallbackInvocation, CallbackOutcome, CallbackTarget } from './L2/Outcome.js';
export type { CallbackFrame } from './L2/CallbackContext.js';
export { encodeMessage, decodeMessage, validateRegistration } from './L4/Messages.js';
export type { InteropMessage, SetupMessage, ExecuteMessage, ReturnMessage, ShareMessage } from './L4/Messages.js';
export { Journal } from './L5/Journal.js';
export type { JournalEntry, JournalEvent } from './L5/Journal.js';
export { Relay } from './L6/Relay.js';
export type { Envelope, MessageReceiver } from './L6/Relay.js';
export { SQLiteJournalStore } from './infrastructure/persistence/SQLiteJournalStore.js';
export type { SQLiteJournalStoreOptions } from './infrastructure/persistence/SQLiteJournalStore.js';
export { SystemClock } from './Ports.js';
export type { Clock, IJournalStore, Messenger, MessengerOrigin } from './Ports.js';
