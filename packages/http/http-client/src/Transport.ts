import { toError } from '@declarest/core-util';
import { HttpRequest, HttpResponse, TransportError } from '@declarest/http-api';
import { RequestOptions } from './RequestOptions';

/**
 * One HTTP round trip. Connection handling, TLS and pooling live behind this
 * interface; failures to complete the round trip reject with TransportError.
 */
export interface Transport {
    execute(request: HttpRequest, options: RequestOptions): Promise<HttpResponse>;
}

/**
 * Transport over the global `fetch`.
 *
 * `readTimeoutMs` bounds the whole exchange through `AbortSignal.timeout`; the
 * call's own signal (from an async request) is combined with it. fetch has no
 * separate connect phase, so `connectTimeoutMs` is not applied here.
 */
export class FetchTransport implements Transport {
    async execute(request: HttpRequest, options: RequestOptions): Promise<HttpResponse> {
        const timeout = AbortSignal.timeout(options.readTimeoutMs);
        const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

        const headers = new Headers();
        for (const [name, values] of request.headers) {
            for (const value of values) {
                headers.append(name, value);
            }
        }

        try {
            const response = await fetch(request.url, {
                method: request.method,
                headers,
                body: request.body,
                signal,
            });
            const body = await response.text();

            const responseHeaders = new Map<string, string[]>();
            response.headers.forEach((value, name) => {
                responseHeaders.set(name, [...(responseHeaders.get(name) ?? []), value]);
            });
            return new HttpResponse(response.status, response.statusText, responseHeaders, body, request);
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportError(
                `${request.method} ${request.url} failed: ${error.message}`,
                request.method,
                request.url,
                error,
            );
        }
    }
}
