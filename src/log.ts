import pino, { type Logger } from 'pino';
import pretty from 'pino-pretty';
import { getRuntime, type Runtime } from './config/runtime.js';

type Data = Record<string, unknown>;

// pino cannot serialise bigint fields; BigInteger already has toJSON.
// Objects seen before are passed through so pino's own stringify marks cycles.
function stringifyBigints(value: unknown, seen: WeakSet<object>): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (value === null || typeof value !== 'object' || seen.has(value)) return value;
    seen.add(value);
    if (Array.isArray(value)) return value.map((v) => stringifyBigints(v, seen));
    if (Object.getPrototypeOf(value) !== Object.prototype) return value;
    const out: Data = {};
    for (const [k, v] of Object.entries(value)) out[k] = stringifyBigints(v, seen);
    return out;
}

export function bigintSafe(obj: Data): Data {
    const seen = new WeakSet<object>([obj]);
    const out: Data = {};
    for (const [k, v] of Object.entries(obj)) out[k] = stringifyBigints(v, seen);
    return out;
}

export function createLogger(runtime: Runtime = getRuntime()): Logger {
    const options = {
        base: undefined,
        level: runtime.logLevel,
        formatters: {
            level: (label: string) => ({ level: label }),
            log: bigintSafe,
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (!runtime.pretty) return pino(options);
    return pino(options, pretty({
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        colorize: false,
        ignore: 'pid,hostname',
    }));
}

let root: Logger | null = null;

function logger(): Logger {
    if (!root) root = createLogger();
    return root;
}

function info(msg: string, scope?: string, data?: Data) {
    logger().info({ scope, ...data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
    logger().warn({ scope, ...data }, msg);
}
function error(msg: string, scope?: string, data?: Data) {
    logger().error({ scope, ...data }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
    logger().debug({ scope, ...data }, msg);
}

function withScope(scope: string) {
    return {
        info: (msg: string, data?: Data) => info(msg, scope, data),
        warn: (msg: string, data?: Data) => warn(msg, scope, data),
        error: (msg: string, data?: Data) => error(msg, scope, data),
        debug: (msg: string, data?: Data) => debug(msg, scope, data),
    };
}

// For testing: rebuild the logger after the runtime changes
export function resetLogger() {
    root = null;
}

export const log = { info, warn, error, debug, withScope };
export default log;
