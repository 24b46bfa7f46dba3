import { AsyncLocalStorage } from 'async_hooks';

/**
 * Typed key into the call context. The guard checks values read back out of
 * the store, so `Context.get()` needs no casts.
 *
 * ```typescript
 * const CALL_SIGNAL = new ContextKey('call-signal', (v): v is AbortSignal => v instanceof AbortSignal);
 * ```
 */
export class ContextKey<T> {
    readonly id: symbol;

    constructor(
        readonly name: string,
        private readonly guard: (value: unknown) => value is T,
    ) {
        this.id = Symbol(name);
    }

    accepts(value: unknown): value is T {
        return this.guard(value);
    }

    toString(): string {
        return `ContextKey(${this.name})`;
    }
}

export type ContextStore = Map<symbol, unknown>;

/**
 * Call-scoped storage over AsyncLocalStorage, similar to an MDC.
 *
 * Values put inside `run()` stay visible across every await in that call chain,
 * which is how an asynchronous client call hands its cancellation signal down to
 * the transport without threading it through every method signature.
 *
 * ```typescript
 * await Context.run(async () => {
 *     Context.put(CALL_SIGNAL, controller.signal);
 *     await client.getUser('42'); // MethodHandler reads CALL_SIGNAL
 * });
 * ```
 */
class ContextManager {
    private readonly storage = new AsyncLocalStorage<ContextStore>();

    /**
     * Run `fn` with a fresh, empty context.
     */
    run<T>(fn: () => T): T {
        return this.storage.run(new Map(), fn);
    }

    /**
     * Run `fn` with a copy of the current context, so puts inside do not leak out.
     */
    fork<T>(fn: () => T): T {
        return this.storage.run(this.copyContext(), fn);
    }

    /**
     * Run `fn` with a specific context.
     */
    runWithContext<T>(context: ContextStore, fn: () => T): T {
        return this.storage.run(context, fn);
    }

    put<T>(key: ContextKey<T>, value: T): void {
        const store = this.storage.getStore();
        if (!store) {
            throw new Error('No context available. Did you call Context.run() first?');
        }
        store.set(key.id, value);
    }

    get<T>(key: ContextKey<T>): T | undefined {
        const value = this.storage.getStore()?.get(key.id);
        return key.accepts(value) ? value : undefined;
    }

    has(key: ContextKey<unknown>): boolean {
        return this.storage.getStore()?.has(key.id) ?? false;
    }

    remove(key: ContextKey<unknown>): void {
        this.storage.getStore()?.delete(key.id);
    }

    /**
     * Snapshot of the current context; empty outside of run().
     */
    copyContext(): ContextStore {
        const store = this.storage.getStore();
        return store ? new Map(store) : new Map();
    }

    isActive(): boolean {
        return this.storage.getStore() !== undefined;
    }
}

/**
 * Global singleton instance of ContextManager.
 */
export const Context = new ContextManager();
