import { checkArgument } from '@declarest/core-util';
import { HttpError, TransportError } from '@declarest/http-api';

/**
 * What to do after attempt `n` failed:
 * - retry: wait `delayMs`, then build a fresh request and send it again
 * - propagate: throw the failure as it is
 * - exhausted: the failure was retryable but no attempts are left
 */
export type RetryDecision =
    | { kind: 'retry'; delayMs: number }
    | { kind: 'propagate' }
    | { kind: 'exhausted' };

/**
 * Consulted with every TransportError and HttpError. Attempts are numbered from 1.
 * Implementations keep no per-call state; one instance serves every call.
 */
export interface Retryer {
    continueOrPropagate(error: Error, attempt: number): RetryDecision;
}

const RETRYABLE_STATUS: ReadonlySet<number> = new Set([408, 429, 502, 503, 504, 598]);

/**
 * Exponential backoff: `period * 1.5^(attempt-1)`, capped at `maxPeriod`.
 * A server's Retry-After wins over the computed delay but is capped the same way.
 */
export class DefaultRetryer implements Retryer {
    constructor(
        readonly period = 100,
        readonly maxPeriod = 1000,
        readonly maxAttempts = 5,
    ) {
        checkArgument(period >= 0, 'period must be >= 0 but was %s', period);
        checkArgument(maxPeriod >= period, 'maxPeriod %s must be >= period %s', maxPeriod, period);
        checkArgument(maxAttempts >= 1, 'maxAttempts must be >= 1 but was %s', maxAttempts);
    }

    continueOrPropagate(error: Error, attempt: number): RetryDecision {
        if (!this.isRetryable(error)) {
            return { kind: 'propagate' };
        }
        if (attempt >= this.maxAttempts) {
            return { kind: 'exhausted' };
        }
        const retryAfterMs = error instanceof HttpError ? error.retryAfterMs : undefined;
        const delayMs = retryAfterMs ?? this.period * Math.pow(1.5, attempt - 1);
        return { kind: 'retry', delayMs: Math.min(Math.round(delayMs), this.maxPeriod) };
    }

    private isRetryable(error: Error): boolean {
        if (error instanceof TransportError) {
            return true;
        }
        if (error instanceof HttpError) {
            return error.retryAfterMs !== undefined || RETRYABLE_STATUS.has(error.code);
        }
        return false;
    }
}

/**
 * Every failure goes straight to the caller.
 */
export class NeverRetry implements Retryer {
    continueOrPropagate(): RetryDecision {
        return { kind: 'propagate' };
    }
}
