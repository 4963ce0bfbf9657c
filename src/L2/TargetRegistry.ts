import { ErrorCode, PromiseKernelError } from '../Errors.js';
import { deployedAddress } from '../L0/Crypto.js';
import type { Address } from '../L0/Ontology.js';
import type { CallbackHandler, CallbackTarget } from './Outcome.js';

/**
 * Components callbacks can be bound to, at deterministic addresses so the
 * same name resolves to the same address on every chain.
 */
export class TargetRegistry {
    private targets: Map<Address, { name: string; target: CallbackTarget }> = new Map();

    public deploy(name: string, target: CallbackTarget): Address {
        const address = deployedAddress(name);
        if (this.targets.has(address)) {
            throw new PromiseKernelError(ErrorCode.PROMISE_EXISTS, `Component ${name} already deployed at ${address}`);
        }
        this.targets.set(address, { name, target });
        return address;
    }

    public has(address: Address): boolean {
        return this.targets.has(address);
    }

    public nameOf(address: Address): string | undefined {
        return this.targets.get(address)?.name;
    }

    public handler(address: Address, selector: string): CallbackHandler {
        const entry = this.targets.get(address);
        if (!entry) {
            throw new PromiseKernelError(ErrorCode.TARGET_NOT_FOUND, `No component deployed at ${address}`);
        }
        const handler = Object.prototype.hasOwnProperty.call(entry.target, selector) ? entry.target[selector] : undefined;
        if (!handler) {
            throw new PromiseKernelError(ErrorCode.TARGET_NOT_FOUND, `${entry.name} has no handler ${selector}`);
        }
        return handler;
    }
}
