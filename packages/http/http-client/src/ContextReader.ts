import { RequestContext } from '@declarest/core-context';
import { ContextReader, PlatformHeader } from '@declarest/http-api';

/**
 * Fixed header values from a Map; for scripts, tests and processes without a
 * request context.
 *
 * ```typescript
 * const reader = new StaticContextReader(new Map([['x-api-version', 'v1']]));
 * ```
 */
export class StaticContextReader implements ContextReader {
    constructor(private readonly headers: ReadonlyMap<string, string>) {}

    read(header: PlatformHeader): string | undefined {
        return this.headers.get(header.headerName);
    }
}

/**
 * Values put into RequestContext by the code serving the current request.
 * Outside of `Context.run()` nothing is found.
 */
export class RequestContextReader implements ContextReader {
    read(header: PlatformHeader): string | undefined {
        return RequestContext.getHeader(header);
    }
}

/**
 * Asks several readers; later readers override earlier ones.
 *
 * ```typescript
 * const reader = new CompositeContextReader([
 *     new RequestContextReader(),
 *     new StaticContextReader(defaults),
 * ]);
 * ```
 */
export class CompositeContextReader implements ContextReader {
    constructor(private readonly readers: readonly ContextReader[]) {}

    read(header: PlatformHeader): string | undefined {
        for (let i = this.readers.length - 1; i >= 0; i--) {
            const value = this.readers[i].read(header);
            if (value !== undefined) {
                return value;
            }
        }
        return undefined;
    }
}
