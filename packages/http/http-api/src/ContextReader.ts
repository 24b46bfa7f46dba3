import { PlatformHeader } from './PlatformHeader';

/**
 * ContextReader - Where a client finds the value of a platform header.
 *
 * Implementations live in @declarest/http-client: StaticContextReader,
 * RequestContextReader (AsyncLocalStorage) and CompositeContextReader.
 */
export interface ContextReader {
    /**
     * The header value, or undefined when not available.
     */
    read(header: PlatformHeader): string | undefined;
}
