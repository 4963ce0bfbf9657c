import { z } from 'zod';
import { ErrorCode, PromiseKernelError } from './Errors.js';
import type { Address, ChainID } from './L0/Ontology.js';

export interface InteropConfig {
    messenger: Address; // sole caller allowed into the messenger-only entrypoints
    maxFlushSteps: number;
    chainIds: ChainID[];
}

export const DEFAULT_MESSENGER: Address = '0x4200000000000000000000000000000000000023';

export const DEFAULT_CONFIG: Readonly<InteropConfig> = Object.freeze({
    messenger: DEFAULT_MESSENGER,
    maxFlushSteps: 32,
    chainIds: []
});

const envSchema = z.object({
    CROSS_DOMAIN_MESSENGER: z.string()
        .regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 20-byte hex address')
        .default(DEFAULT_MESSENGER),
    MAX_FLUSH_STEPS: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxFlushSteps),
    CHAIN_IDS: z.string()
        .default('')
        .transform(raw => raw.split(',').map(s => s.trim()).filter(s => s.length > 0))
        .pipe(z.array(z.coerce.number().int().nonnegative()))
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): InteropConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const fields = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new PromiseKernelError(ErrorCode.INVALID_CONFIG, `Invalid configuration: ${fields.join('; ')}`);
    }

    return {
        messenger: parsed.data.CROSS_DOMAIN_MESSENGER,
        maxFlushSteps: parsed.data.MAX_FLUSH_STEPS,
        chainIds: parsed.data.CHAIN_IDS
    };
}

export function resolveConfig(overrides: Partial<InteropConfig> = {}): InteropConfig {
    return {
        messenger: overrides.messenger ?? DEFAULT_CONFIG.messenger,
        maxFlushSteps: overrides.maxFlushSteps ?? DEFAULT_CONFIG.maxFlushSteps,
        chainIds: [...(overrides.chainIds ?? DEFAULT_CONFIG.chainIds)]
    };
}
