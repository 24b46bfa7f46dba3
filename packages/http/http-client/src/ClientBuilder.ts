import { listEquals, valueEquals } from '@declarest/core-util';
import { ApiType, MethodMetadata } from '@declarest/http-api';
import { ClientConfig } from './ClientConfig';
import { Client, ClientBuilders } from './ClientFactory';
import { buildDispatchTable } from './DispatchTable';
import { HeaderSupplier, mergeHeaderSuppliers } from './HeaderSupplier';
import { AsyncRequestBuilder, RequestBuilder } from './RequestBuilder';
import { HeadersInterceptor, RequestInterceptor } from './RequestInterceptor';
import { HardCodedTarget, isRoutingKeyAware, Target } from './Target';
import { buildTemplateFactories, RequestTemplateFactory } from './TemplateFactory';

/**
 * Holds at most one client: the one built with no header suppliers, the base
 * interceptors and the default routing key. Filled once, never replaced.
 */
export class DefaultClientSlot<T extends object> {
    private instance?: Client<T>;

    get(): Client<T> | undefined {
        return this.instance;
    }

    /**
     * Keeps the first client stored; later ones are ignored.
     */
    fill(client: Client<T>): Client<T> {
        if (!this.instance) {
            this.instance = client;
        }
        return this.instance;
    }

    isFilled(): boolean {
        return this.instance !== undefined;
    }
}

/**
 * ClientBuilder - Turns one Target and one ClientConfig into generated clients.
 *
 * The API is parsed and the template factories are created once, here. Each
 * build assembles a full dispatch table for its interceptors, header suppliers
 * and routing key; the default combination is cached in a single slot.
 *
 * ```typescript
 * const users = new ClientBuilder(new HardCodedTarget(UserApiPrototype, 'http://users:8080'), config);
 * const client = users.client();                       // cached default
 * const traced = users.request().addHeaders({ 'x-request-id': 'req-1' }).client();
 * ```
 *
 * The check, build and store of the default client happen in one synchronous
 * turn, so concurrent callers on the event loop all see the same instance.
 */
export class ClientBuilder<T extends object> implements ClientBuilders<T> {
    private readonly metadata: readonly MethodMetadata[];
    private readonly factories: ReadonlyMap<string, RequestTemplateFactory>;
    private readonly slot = new DefaultClientSlot<T>();

    constructor(
        readonly target: Target<T>,
        readonly config: ClientConfig,
    ) {
        this.metadata = Object.freeze(config.contract.parse(target.type()));
        this.factories = buildTemplateFactories(this.metadata, config.encoder);
    }

    static forUrl<T extends object>(apiType: ApiType<T>, url: string, config: ClientConfig): ClientBuilder<T> {
        return new ClientBuilder(new HardCodedTarget(apiType, url), config);
    }

    /**
     * Client with the config's own header suppliers, interceptors and key.
     * Cached when the config has no header suppliers.
     */
    client(): Client<T> {
        return this.build(this.config.headerSuppliers, this.config.interceptors, this.config.routingKey);
    }

    build(
        headerSuppliers: readonly HeaderSupplier[],
        interceptors: readonly RequestInterceptor[],
        routingKey: unknown,
    ): Client<T> {
        const sameKey = valueEquals(routingKey, this.config.routingKey);
        const isDefault =
            headerSuppliers.length === 0 && listEquals(interceptors, this.config.interceptors) && sameKey;

        const cached = this.slot.get();
        if (isDefault && cached) {
            return cached;
        }

        const effective = [...interceptors];
        if (headerSuppliers.length > 0) {
            effective.push(new HeadersInterceptor(mergeHeaderSuppliers(headerSuppliers)));
        }

        let target = this.target;
        if (!sameKey && isRoutingKeyAware(target)) {
            target = target.withRoutingKey(routingKey);
        }

        const table = buildDispatchTable(target, this.metadata, this.factories, this.config, effective);
        const client = this.config.clientFactory.create(target, table, this);
        return isDefault ? this.slot.fill(client) : client;
    }

    /**
     * The cached default client, if one has been built.
     */
    cachedDefault(): Client<T> | undefined {
        return this.slot.get();
    }

    request(): RequestBuilder<T> {
        return new RequestBuilder(this);
    }

    asyncRequest(): AsyncRequestBuilder<T> {
        return new AsyncRequestBuilder(this);
    }
}
