/**
 * Per-request transport settings. The core never enforces them; it hands them
 * to the Transport unchanged, adding the call's AbortSignal when there is one.
 */
export class RequestOptions {
    constructor(
        readonly connectTimeoutMs = 10000,
        readonly readTimeoutMs = 60000,
        readonly signal?: AbortSignal,
    ) {}

    withSignal(signal: AbortSignal | undefined): RequestOptions {
        return new RequestOptions(this.connectTimeoutMs, this.readTimeoutMs, signal);
    }
}
