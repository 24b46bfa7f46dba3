import { Header } from '@declarest/core-util';
import { Context, ContextKey } from './Context';

const isString = (value: unknown): value is string => typeof value === 'string';

/**
 * Header values carried in the call context.
 *
 * A service handling an inbound request stores the headers it wants forwarded;
 * RequestContextReader (http-client) reads them back when an outbound client
 * call assembles its headers.
 */
class RequestContextImpl {
    private readonly headerKeys = new Map<string, ContextKey<string>>();

    private keyFor(header: Header): ContextKey<string> {
        const name = header.getHeaderName();
        let key = this.headerKeys.get(name);
        if (!key) {
            key = new ContextKey(`HEADER_${name}`, isString);
            this.headerKeys.set(name, key);
        }
        return key;
    }

    putHeader(header: Header, value: string): void {
        Context.put(this.keyFor(header), value);
    }

    getHeader(header: Header): string | undefined {
        return Context.get(this.keyFor(header));
    }

    hasHeader(header: Header): boolean {
        return Context.has(this.keyFor(header));
    }

    /**
     * All header values set in the current context, by header name.
     */
    getAllHeaders(): Map<string, string> {
        const headers = new Map<string, string>();
        for (const [name, key] of this.headerKeys) {
            const value = Context.get(key);
            if (value !== undefined) {
                headers.set(name, value);
            }
        }
        return headers;
    }
}

export const RequestContext = new RequestContextImpl();
