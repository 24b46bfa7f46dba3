import { checkNotNull, Equatable, hashString, PreconditionError, valueEquals } from '@declarest/core-util';
import { ApiType, HttpRequest, RequestTemplate } from '@declarest/http-api';

/**
 * Where the calls of one API go. Immutable; equality decides whether two
 * generated clients are equal.
 */
export interface Target<T> extends Equatable {
    type(): ApiType<T>;
    name(): string;
    url(): string;
    /**
     * Turns a resolved template into the request to send, prefixing the base url.
     */
    apply(template: RequestTemplate): HttpRequest;
    hashCode(): number;
    toString(): string;
}

/**
 * A Target whose base url depends on a routing key (a shard, a region, a tenant).
 */
export interface RoutingKeyAwareTarget<T> extends Target<T> {
    routingKey(): unknown;
    /**
     * A new Target bound to `key`; this one is left as it is.
     */
    withRoutingKey(key: unknown): RoutingKeyAwareTarget<T>;
}

export function isRoutingKeyAware<T>(target: Target<T>): target is RoutingKeyAwareTarget<T> {
    return 'withRoutingKey' in target && typeof target.withRoutingKey === 'function';
}

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function prefixBaseUrl(template: RequestTemplate, baseUrl: string): HttpRequest {
    if (!ABSOLUTE_URL.test(template.url())) {
        template.insert(0, baseUrl);
    }
    return template.request();
}

function combineHash(...parts: string[]): number {
    let result = 17;
    for (const part of parts) {
        result = (Math.imul(31, result) + hashString(part)) | 0;
    }
    return result;
}

/**
 * A fixed base url, e.g. `new HardCodedTarget(UserApiPrototype, 'http://users:8080')`.
 * A template whose url is already absolute (see `@Url()`) is sent as is.
 */
export class HardCodedTarget<T> implements Target<T> {
    private readonly targetName: string;

    constructor(
        private readonly apiType: ApiType<T>,
        private readonly baseUrl: string,
        name?: string,
    ) {
        checkNotNull(apiType, 'apiType');
        checkNotNull(baseUrl, 'url');
        this.targetName = name ?? baseUrl;
    }

    type(): ApiType<T> {
        return this.apiType;
    }

    name(): string {
        return this.targetName;
    }

    url(): string {
        return this.baseUrl;
    }

    apply(template: RequestTemplate): HttpRequest {
        return prefixBaseUrl(template, this.baseUrl);
    }

    equals(other: unknown): boolean {
        return (
            other instanceof HardCodedTarget &&
            other.apiType === this.apiType &&
            other.targetName === this.targetName &&
            other.baseUrl === this.baseUrl
        );
    }

    hashCode(): number {
        return combineHash(this.apiType.name, this.targetName, this.baseUrl);
    }

    toString(): string {
        return `HardCodedTarget(type=${this.apiType.name}, name=${this.targetName}, url=${this.baseUrl})`;
    }
}

export type UrlSelector = (routingKey: unknown) => string;

/**
 * Picks the base url from the routing key on every request.
 *
 * ```typescript
 * const target = RoutingKeyTarget.fromUrls(OrderApiPrototype, 'orders', new Map([
 *     ['shard-1', 'http://orders-1:8080'],
 *     ['shard-2', 'http://orders-2:8080'],
 * ]), 'shard-1');
 * ```
 */
export class RoutingKeyTarget<T> implements RoutingKeyAwareTarget<T> {
    constructor(
        private readonly apiType: ApiType<T>,
        private readonly targetName: string,
        private readonly selector: UrlSelector,
        private readonly key?: unknown,
    ) {
        checkNotNull(apiType, 'apiType');
    }

    static fromUrls<T>(
        apiType: ApiType<T>,
        name: string,
        urls: ReadonlyMap<string, string>,
        key?: string,
    ): RoutingKeyTarget<T> {
        const snapshot = new Map(urls);
        const selector: UrlSelector = (routingKey) => {
            const url = snapshot.get(String(routingKey));
            if (url === undefined) {
                throw new PreconditionError(`No url for routing key '${String(routingKey)}' on target ${name}`);
            }
            return url;
        };
        return new RoutingKeyTarget(apiType, name, selector, key);
    }

    type(): ApiType<T> {
        return this.apiType;
    }

    name(): string {
        return this.targetName;
    }

    url(): string {
        return this.selector(this.key);
    }

    routingKey(): unknown {
        return this.key;
    }

    withRoutingKey(key: unknown): RoutingKeyTarget<T> {
        return new RoutingKeyTarget(this.apiType, this.targetName, this.selector, key);
    }

    apply(template: RequestTemplate): HttpRequest {
        return prefixBaseUrl(template, this.url());
    }

    equals(other: unknown): boolean {
        return (
            other instanceof RoutingKeyTarget &&
            other.apiType === this.apiType &&
            other.targetName === this.targetName &&
            other.selector === this.selector &&
            valueEquals(this.key, other.key)
        );
    }

    hashCode(): number {
        return combineHash(this.apiType.name, this.targetName, String(this.key));
    }

    toString(): string {
        return `RoutingKeyTarget(type=${this.apiType.name}, name=${this.targetName}, routingKey=${String(this.key)})`;
    }
}
