import { setTimeout as delay } from 'node:timers/promises';
import { Exporter, Factory, Logger as Reggol } from 'reggol';

const factory = new Factory();

factory.addExporter(new Exporter.Console({
    showDiff: false,
    showTime: 'dd hh:mm:ss',
    label: {
        align: 'right',
        width: 9,
        margin: 1,
    },
    timestamp: Date.now(),
    levels: { default: 2 },
}));

export type Logger = Reggol;

export function createLogger(name: string): Logger {
    return factory.createLogger(name);
}

/**
 * Resolves after `timeout` ms. Rejects with the platform `AbortError`
 * as soon as `signal` fires.
 */
export async function sleep(timeout: number, signal?: AbortSignal) {
    await delay(timeout, undefined, { signal });
}

export function isAbortError(e: unknown): boolean {
    return e instanceof Error && (e.name === 'AbortError' || ('code' in e && e.code === 'ABORT_ERR'));
}

export namespace Time {
    export const second = 1000;
    export const minute = second * 60;
    export const hour = minute * 60;
    export const day = hour * 24;
}

export namespace Size {
    export const KiB = 1024;
    export const MiB = KiB * 1024;
}

const TIME_RE = /(\d+)\s*ms\b/i;
const MEMORY_RE = /(\d+(?:\.\d+)?)\s*(kb|mb|gb)\b/i;
const MEMORY_UNITS: Record<string, number> = { kb: Size.KiB, mb: Size.MiB, gb: Size.MiB * 1024 };

/** `"46 ms"` → 46. Anything not in milliseconds yields 0. */
export function parseTimeMS(str: string) {
    const match = TIME_RE.exec(str);
    return match ? +match[1] : 0;
}

/** `"256 KB"` → 262144. Text without a recognizable unit yields 0. */
export function parseMemoryBytes(str: string) {
    const match = MEMORY_RE.exec(str);
    if (!match) return 0;
    return Math.floor(parseFloat(match[1]) * MEMORY_UNITS[match[2].toLowerCase()]);
}
