import { ErrorCode, PromiseKernelError } from '../Errors.js';
import type { Address, AuthContext, ChainID, PromiseID } from '../L0/Ontology.js';

export interface CallbackFrame extends AuthContext {
    promiseId: PromiseID;
    continuationId: PromiseID;
    target: Address;
}

export type InvocationResult<T> =
    | { ok: true; value: T; reentered: boolean }
    | { ok: false; error: unknown; reentered: boolean };

interface ActiveFrame extends CallbackFrame {
    reentered: boolean;
}

/**
 * Transient authentication context of the callback currently running.
 *
 * Set right before a target is invoked and cleared right after, whether the
 * target returned or threw. While a frame is active the executor entrypoints
 * refuse to run (reentrancy guard) and flag the frame, so the executor can
 * reject the outer continuation even if the target swallowed the error.
 */
export class CallbackContext {
    private frame: ActiveFrame | null = null;

    public invoke<T>(frame: CallbackFrame, body: () => T): InvocationResult<T> {
        if (this.frame) {
            this.frame.reentered = true;
            throw new PromiseKernelError(ErrorCode.REENTRANT_CALL, `Callback ${frame.target} invoked while ${this.frame.target} is running`);
        }

        const active: ActiveFrame = { ...frame, reentered: false };
        this.frame = active;
        try {
            const value = body();
            return { ok: true, value, reentered: active.reentered };
        } catch (error) {
            return { ok: false, error, reentered: active.reentered };
        } finally {
            this.frame = null;
        }
    }

    /**
     * Called at the top of every executor entrypoint.
     */
    public assertNotReentrant(entrypoint: string): void {
        if (this.frame) {
            this.frame.reentered = true;
            throw new PromiseKernelError(ErrorCode.REENTRANT_CALL, `${entrypoint} called from inside callback ${this.frame.target}`);
        }
    }

    public get active(): boolean {
        return this.frame !== null;
    }

    public registrant(): Address {
        return this.current().registrant;
    }

    public sourceChain(): ChainID {
        return this.current().sourceChain;
    }

    public context(): CallbackFrame {
        const { registrant, sourceChain, promiseId, continuationId, target } = this.current();
        return { registrant, sourceChain, promiseId, continuationId, target };
    }

    private current(): ActiveFrame {
        if (!this.frame) {
            throw new PromiseKernelError(ErrorCode.NO_ACTIVE_CALLBACK, 'No callback is executing');
        }
        return this.frame;
    }
}
