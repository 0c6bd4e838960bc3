import PQueue from 'p-queue';
import { isAbortError } from '@cfkit/utils';
import { CancelledError } from './error';

export interface RateLimiterOptions {
    /** Admissions per second. */
    rate: number;
}

/**
 * Token bucket with a burst of one: admissions are spaced at least
 * `1000 / rate` ms apart. Callers over the rate wait in FIFO order.
 */
export class RateLimiter {
    readonly rate: number;
    private queue: PQueue;

    constructor(options: RateLimiterOptions) {
        if (!(options.rate > 0)) throw new RangeError(`Invalid rate: ${options.rate}`);
        this.rate = options.rate;
        this.queue = new PQueue({
            concurrency: 1,
            intervalCap: 1,
            interval: Math.ceil(1000 / options.rate),
        });
    }

    /**
     * Resolves once the caller may send. An abort rejects at once with
     * `CancelledError`; the abandoned slot still passes in turn.
     */
    async acquire(signal?: AbortSignal) {
        if (signal?.aborted) throw new CancelledError();
        const admitted = this.queue.add(async () => { });
        if (!signal) {
            await admitted;
            return;
        }
        let onAbort = () => { };
        const aborted = new Promise<never>((_, reject) => {
            onAbort = () => reject(new CancelledError());
        });
        signal.addEventListener('abort', onAbort, { once: true });
        try {
            await Promise.race([admitted, aborted]);
        } catch (e) {
            if (isAbortError(e) || signal.aborted) throw new CancelledError();
            throw e;
        } finally {
            signal.removeEventListener('abort', onAbort);
        }
    }

    /** Callers currently waiting for an admission. */
    get pending() {
        return this.queue.size + this.queue.pending;
    }
}
