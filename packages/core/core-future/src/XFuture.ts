import { Context } from '@declarest/core-context';
import { toError } from '@declarest/core-util';

/**
 * Rejection reason of a future that was cancelled before it completed.
 */
export class CancellationError extends Error {
    constructor(message = 'Future was cancelled') {
        super(message);
        this.name = 'CancellationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

type Resolve<T> = (value: T | PromiseLike<T>) => void;
type Reject = (reason?: unknown) => void;

interface Cancellable {
    cancel(reason?: string): boolean;
}

/**
 * XFuture - Context-preserving, cancellable Promise.
 *
 * Callbacks run in the call context captured when they were registered, so
 * values put into Context stay visible across the chain. Every future owns an
 * AbortSignal that is handed to the work it runs; `cancel()` aborts that signal,
 * rejects the future with CancellationError and cancels the future it was
 * derived from. A value produced after cancellation is dropped, and no
 * fulfilment callback sees it.
 *
 * ```typescript
 * const future = XFuture.supplyAsync((signal) => transport.execute(request, { signal }))
 *     .thenApply((response) => response.status);
 *
 * future.cancel(); // aborts the in-flight request
 * ```
 */
export class XFuture<T> implements Promise<T> {
    readonly [Symbol.toStringTag]: string = 'XFuture';

    private readonly promise: Promise<T>;
    private readonly controller = new AbortController();
    private readonly rejectPending: Reject;
    private state: 'pending' | 'done' | 'cancelled' = 'pending';

    constructor(
        executor: (resolve: Resolve<T>, reject: Reject, signal: AbortSignal) => void,
        private readonly upstream?: Cancellable,
    ) {
        const savedContext = Context.copyContext();
        let rejectOuter: Reject = () => undefined;

        this.promise = new Promise<T>((resolve, reject) => {
            rejectOuter = reject;
            const settleResolve: Resolve<T> = (value) => {
                if (this.state === 'pending') {
                    this.state = 'done';
                    resolve(value);
                }
            };
            const settleReject: Reject = (reason) => {
                if (this.state === 'pending') {
                    this.state = 'done';
                    reject(reason);
                }
            };
            Context.runWithContext(savedContext, () => {
                executor(settleResolve, settleReject, this.controller.signal);
            });
        });
        this.rejectPending = rejectOuter;
    }

    /**
     * Runs `work` on a later turn of the event loop; the caller is never blocked
     * and a synchronous throw inside `work` becomes a rejection.
     */
    static supplyAsync<T>(work: (signal: AbortSignal) => T | PromiseLike<T>): XFuture<T> {
        return new XFuture<T>((resolve, reject, signal) => {
            setImmediate(() => {
                if (signal.aborted) {
                    return;
                }
                try {
                    Promise.resolve(work(signal)).then(resolve, reject);
                } catch (err: unknown) {
                    reject(toError(err));
                }
            });
        });
    }

    static resolve<T>(value: T | PromiseLike<T>): XFuture<T> {
        return new XFuture<T>((resolve) => resolve(value));
    }

    static reject<T = never>(reason?: unknown): XFuture<T> {
        return new XFuture<T>((_, reject) => reject(reason));
    }

    /**
     * Cancels this future (and the one it was derived from). Returns false when
     * it had already completed.
     */
    cancel(reason?: string): boolean {
        if (this.state !== 'pending') {
            return false;
        }
        this.state = 'cancelled';
        const error = new CancellationError(reason);
        // the caller asked for this rejection; it is not an unobserved failure
        this.promise.catch(() => undefined);
        this.controller.abort(error);
        this.rejectPending(error);
        this.upstream?.cancel(reason);
        return true;
    }

    isCancelled(): boolean {
        return this.state === 'cancelled';
    }

    isDone(): boolean {
        return this.state !== 'pending';
    }

    /**
     * Transform the result.
     */
    thenApply<U>(fn: (value: T) => U | PromiseLike<U>): XFuture<U> {
        return this.then(fn);
    }

    then<TResult1 = T, TResult2 = never>(
        onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): XFuture<TResult1 | TResult2> {
        const savedContext = Context.copyContext();

        const wrappedFulfilled = onfulfilled
            ? (value: T) => Context.runWithContext(savedContext, () => onfulfilled(value))
            : undefined;
        const wrappedRejected = onrejected
            ? (reason: unknown) => Context.runWithContext(savedContext, () => onrejected(reason))
            : undefined;

        return new XFuture<TResult1 | TResult2>((resolve, reject) => {
            this.promise.then(wrappedFulfilled, wrappedRejected).then(resolve, reject);
        }, this);
    }

    catch<TResult = never>(
        onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null,
    ): XFuture<T | TResult> {
        return this.then(undefined, onrejected);
    }

    finally(onfinally?: (() => void) | null): XFuture<T> {
        const savedContext = Context.copyContext();

        const wrappedFinally = onfinally
            ? () => Context.runWithContext(savedContext, () => onfinally())
            : undefined;

        return new XFuture<T>((resolve, reject) => {
            this.promise.finally(wrappedFinally).then(resolve, reject);
        }, this);
    }
}
