import { ContextReader, HeaderMethods, PlatformHeader } from '@declarest/http-api';

/**
 * Produces extra headers for a client. Called again each time a client is built
 * with it, so values can change between builds.
 */
export interface HeaderSupplier {
    get(): ReadonlyMap<string, readonly string[]>;
}

/**
 * Headers as a Map of values, or as a plain object: `{ 'x-tenant': 'acme' }`.
 */
export type HeaderInput =
    | ReadonlyMap<string, readonly string[]>
    | Readonly<Record<string, string | readonly string[]>>;

function isHeaderMap(headers: HeaderInput): headers is ReadonlyMap<string, readonly string[]> {
    return headers instanceof Map;
}

/**
 * The same headers every time.
 */
export class StaticHeaderSupplier implements HeaderSupplier {
    private readonly headers: ReadonlyMap<string, readonly string[]>;

    constructor(headers: HeaderInput) {
        const copy = new Map<string, readonly string[]>();
        const entries = isHeaderMap(headers) ? [...headers.entries()] : Object.entries(headers);
        for (const [name, value] of entries) {
            copy.set(name, typeof value === 'string' ? [value] : [...value]);
        }
        this.headers = copy;
    }

    get(): ReadonlyMap<string, readonly string[]> {
        return this.headers;
    }
}

/**
 * Forwards platform headers found by a ContextReader, typically the ones of the
 * inbound request being served. Only transferred headers with a non-empty value
 * are produced.
 *
 * ```typescript
 * const supplier = new ContextHeaderSupplier(new RequestContextReader(), [REQUEST_ID, AUTHORIZATION]);
 * const client = ClientBuilder.forUrl(UserApiPrototype, 'http://users:8080', config)
 *     .request()
 *     .addHeaderSupplier(supplier)
 *     .client();
 * ```
 */
export class ContextHeaderSupplier implements HeaderSupplier {
    private readonly transferHeaders: PlatformHeader[];

    constructor(
        private readonly contextReader: ContextReader,
        headerSet: readonly PlatformHeader[],
    ) {
        this.transferHeaders = new HeaderMethods().findTransferHeaders(headerSet);
    }

    get(): ReadonlyMap<string, readonly string[]> {
        const headers = new Map<string, string[]>();
        for (const header of this.transferHeaders) {
            const value = this.contextReader.read(header);
            if (value !== undefined && value !== '') {
                headers.set(header.headerName, [value]);
            }
        }
        return headers;
    }
}

/**
 * Calls every supplier once, in order. Values for a name several suppliers
 * produce are appended in supplier order.
 */
export function mergeHeaderSuppliers(suppliers: readonly HeaderSupplier[]): Map<string, string[]> {
    const merged = new Map<string, string[]>();
    for (const supplier of suppliers) {
        for (const [name, values] of supplier.get()) {
            merged.set(name, [...(merged.get(name) ?? []), ...values]);
        }
    }
    return merged;
}
