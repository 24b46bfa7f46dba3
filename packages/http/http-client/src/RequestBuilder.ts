import { Context } from '@declarest/core-context';
import { checkNotNull } from '@declarest/core-util';
import { XFuture } from '@declarest/core-future';
import { ClientBuilder } from './ClientBuilder';
import { Client } from './ClientFactory';
import { HeaderInput, HeaderSupplier, StaticHeaderSupplier } from './HeaderSupplier';
import { CALL_SIGNAL } from './MethodHandler';
import { RequestInterceptor } from './RequestInterceptor';

/**
 * Per-call overrides, seeded from the owner's config. Never changes the config.
 */
abstract class CallOptionsBuilder<T extends object> {
    protected readonly headerSuppliers: HeaderSupplier[];
    protected readonly interceptors: RequestInterceptor[];
    protected key: unknown;

    constructor(protected readonly owner: ClientBuilder<T>) {
        this.headerSuppliers = [...owner.config.headerSuppliers];
        this.interceptors = [...owner.config.interceptors];
        this.key = owner.config.routingKey;
    }

    addHeaderSupplier(supplier: HeaderSupplier): this {
        this.headerSuppliers.push(checkNotNull(supplier, 'headerSupplier'));
        return this;
    }

    addHeaders(headers: HeaderInput): this {
        return this.addHeaderSupplier(new StaticHeaderSupplier(headers));
    }

    addInterceptor(interceptor: RequestInterceptor): this {
        this.interceptors.push(checkNotNull(interceptor, 'interceptor'));
        return this;
    }

    routingKey(key: unknown): this {
        this.key = key;
        return this;
    }

    protected buildClient(): Client<T> {
        return this.owner.build(this.headerSuppliers, this.interceptors, this.key);
    }
}

export class RequestBuilder<T extends object> extends CallOptionsBuilder<T> {
    client(): Client<T> {
        return this.buildClient();
    }
}

/**
 * `execute(fn)` builds the client and runs `fn` on a later turn of the event
 * loop. Transport calls made inside `fn` get the future's AbortSignal, so
 * `future.cancel()` aborts them.
 *
 * ```typescript
 * const future = users.asyncRequest()
 *     .addHeaders({ 'x-request-id': 'req-1' })
 *     .execute((client) => client.getUser('42'));
 * future.cancel();
 * ```
 */
export class AsyncRequestBuilder<T extends object> extends CallOptionsBuilder<T> {
    execute<U>(fn: (client: Client<T>) => U | PromiseLike<U>): XFuture<U> {
        return XFuture.supplyAsync((signal) =>
            Context.fork(() => {
                Context.put(CALL_SIGNAL, signal);
                return fn(this.buildClient());
            }),
        );
    }
}
