import { z } from 'zod';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export const DEFAULT_MAX_RANDOM_BYTES = 65536;

const runtimeSchema = z.object({
    logLevel: z.enum(LOG_LEVELS),
    pretty: z.boolean(),
    maxRandomBytes: z.number().int().positive(),
}).strict();

export type Runtime = z.infer<typeof runtimeSchema>;

function envFlag(value: string | undefined): boolean {
    return value === 'true' || value === '1';
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const maxRandomBytes = env.EXACT_INT_MAX_RANDOM_BYTES;
    return runtimeSchema.parse({
        logLevel: (env.EXACT_INT_LOG_LEVEL || env.LOG_LEVEL || 'info').trim().toLowerCase(),
        pretty: envFlag(env.EXACT_INT_PRETTY_LOGS),
        maxRandomBytes: maxRandomBytes === undefined ? DEFAULT_MAX_RANDOM_BYTES : Number(maxRandomBytes),
    });
}

let runtime: Runtime | null = null;

export function getRuntime(): Runtime {
    if (!runtime) runtime = resolveRuntime();
    return runtime;
}

// For testing: reset the cache
export function resetRuntimeCache() {
    runtime = null;
}
