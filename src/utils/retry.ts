import { setTimeout as delay } from 'node:timers/promises';
import { OperationCancelledError } from '../logic/summaries/errors';

export interface RetryClock {
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
    random(): number;
}

export const systemClock: RetryClock = {
    async sleep(ms, signal) {
        try {
            await delay(ms, undefined, { signal });
        } catch (error) {
            if (signal?.aborted) {
                throw new OperationCancelledError();
            }
            throw error;
        }
    },
    random: () => Math.random(),
};

export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    backoffFactor?: number;
    /** Fraction of each delay applied as +/- jitter. 0 disables jitter. */
    jitterRatio?: number;
    /** Retrying stops once the next sleep would push total waiting past this. */
    maxTotalDelayMs?: number;
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
    signal?: AbortSignal;
    clock?: RetryClock;
}

export class RetryExhaustedError extends Error {
    constructor(readonly lastError: unknown, readonly attempts: number) {
        super(`Operation failed after ${attempts} attempts`, { cause: lastError });
        this.name = 'RetryExhaustedError';
    }
}

export function backoffDelay(
    attempt: number,
    options: Pick<RetryOptions, 'initialDelayMs' | 'backoffFactor' | 'jitterRatio'>,
    random: () => number
): number {
    const { initialDelayMs = 2000, backoffFactor = 2, jitterRatio = 0 } = options;
    const base = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
    const jitter = base * jitterRatio * (2 * random() - 1);
    return Math.max(0, Math.round(base + jitter));
}

function throwIfAborted(signal?: AbortSignal) {
    if (signal?.aborted) {
        throw new OperationCancelledError();
    }
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or the
 * attempt/delay budget is spent. Non-retryable errors are rethrown as-is after
 * a single attempt; a spent budget throws RetryExhaustedError carrying the last
 * error and the number of attempts made.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { maxAttempts = 3, maxTotalDelayMs = Infinity, shouldRetry, onRetry, signal } = options;
    const clock = options.clock ?? systemClock;
    let waited = 0;

    for (let attempt = 1; ; attempt++) {
        throwIfAborted(signal);
        try {
            return await operation(attempt);
        } catch (error) {
            // an abort mid-call surfaces as whatever the transport throws
            throwIfAborted(signal);
            if (!shouldRetry(error)) {
                throw error;
            }
            if (attempt >= maxAttempts) {
                throw new RetryExhaustedError(error, attempt);
            }
            const delayMs = backoffDelay(attempt, options, clock.random);
            if (waited + delayMs > maxTotalDelayMs) {
                throw new RetryExhaustedError(error, attempt);
            }
            onRetry?.({ attempt, delayMs, error });
            await clock.sleep(delayMs, signal);
            waited += delayMs;
        }
    }
}
