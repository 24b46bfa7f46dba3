import { checkNotNull } from '@declarest/core-util';
import { DispatchTable } from './DispatchTable';
import { AsyncRequestBuilder, RequestBuilder } from './RequestBuilder';
import { Target } from './Target';

/**
 * Members every generated client has besides the API's own methods. Equality,
 * hash and string form all come from the Target.
 */
export interface ClientIdentity<T extends object> {
    target(): Target<T>;
    /**
     * True only for another generated client whose Target equals this one's.
     */
    equals(other: unknown): boolean;
    hashCode(): number;
    toString(): string;
    /**
     * Per-call headers, interceptors or routing key, then `.client()`.
     */
    request(): RequestBuilder<T>;
    /**
     * Same as request(), but the work runs later and can be cancelled.
     */
    asyncRequest(): AsyncRequestBuilder<T>;
}

export type Client<T extends object> = T & ClientIdentity<T>;

/**
 * Where a generated client sends request()/asyncRequest(); the ClientBuilder.
 */
export interface ClientBuilders<T extends object> {
    request(): RequestBuilder<T>;
    asyncRequest(): AsyncRequestBuilder<T>;
}

/**
 * Creates the object callers hold, given a finished dispatch table.
 */
export interface ClientFactory {
    create<T extends object>(target: Target<T>, table: DispatchTable, builders: ClientBuilders<T>): Client<T>;
}

const CLIENT_TARGETS = new WeakMap<object, Target<unknown>>();

/**
 * The Target of a generated client, or undefined for any other value.
 */
export function targetOf(value: unknown): Target<unknown> | undefined {
    if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
        return undefined;
    }
    return CLIENT_TARGETS.get(value);
}

export function isGeneratedClient(value: unknown): boolean {
    return targetOf(value) !== undefined;
}

/**
 * One plain function per method name in the table, each calling straight into
 * its MethodHandler; the identity members sit next to them. The result is frozen.
 */
export class DefaultClientFactory implements ClientFactory {
    create<T extends object>(target: Target<T>, table: DispatchTable, builders: ClientBuilders<T>): Client<T> {
        const methods: Record<string, (...args: unknown[]) => Promise<unknown>> = {};
        for (const methodName of table.methodNames()) {
            const handler = checkNotNull(table.handlerForMethod(methodName), 'No handler for method %s', methodName);
            methods[methodName] = (...args: unknown[]) => handler.invoke(args);
        }

        const identity: ClientIdentity<T> = {
            target: () => target,
            equals: (other: unknown) => {
                const otherTarget = targetOf(other);
                return otherTarget !== undefined && target.equals(otherTarget);
            },
            hashCode: () => target.hashCode(),
            toString: () => target.toString(),
            request: () => builders.request(),
            asyncRequest: () => builders.asyncRequest(),
        };

        // the API methods of T are assigned here at runtime
        const client: Client<T> = Object.assign({} as T, methods, identity);
        Object.freeze(client);
        CLIENT_TARGETS.set(client, target);
        return client;
    }
}
