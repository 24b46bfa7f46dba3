import { Header } from '@declarest/core-util';

/**
 * PlatformHeader - A header a client may forward from the current request context.
 *
 * Data-only class. `headerName` is both the wire name and the RequestContext key.
 */
export class PlatformHeader implements Header {
    /**
     * Only transferred headers are copied onto outgoing requests.
     */
    readonly isWantTransferred: boolean;

    /**
     * Masked in logs: tokens, passwords, API keys.
     */
    readonly isSecured: boolean;

    constructor(
        readonly headerName: string,
        isWantTransferred = true,
        isSecured = false,
    ) {
        this.isWantTransferred = isWantTransferred;
        this.isSecured = isSecured;
    }

    getHeaderName(): string {
        return this.headerName;
    }
}
