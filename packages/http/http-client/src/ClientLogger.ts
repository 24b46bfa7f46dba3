import {
    HeaderMethods,
    HttpBadRequestError,
    HttpBody,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpRequest,
    HttpResponse,
    HttpUnauthorizedError,
    HttpUserError,
    PlatformHeader,
} from '@declarest/http-api';

/**
 * - NONE: nothing
 * - BASIC: request line, outcome and timing
 * - HEADERS: BASIC plus headers (secured ones masked)
 * - FULL: HEADERS plus bodies
 */
export type LogLevel = 'NONE' | 'BASIC' | 'HEADERS' | 'FULL';

const LEVEL_ORDER: Record<LogLevel, number> = { NONE: 0, BASIC: 1, HEADERS: 2, FULL: 3 };

function describeBody(body: HttpBody | undefined): string {
    if (body === undefined) {
        return '';
    }
    return typeof body === 'string' ? body : `<${body.byteLength} bytes>`;
}

/**
 * ClientLogger - Tagged console lines for every client call.
 *
 * - [API-CLIENT-req] UserApi#getUser(String) GET http://users/users/42 headers={...}
 * - [API-CLIENT-retry] UserApi#getUser(String) attempt=1 delayMs=100 errorType=TransportError
 * - [API-CLIENT-resp-SUCCESS] UserApi#getUser(String) status=200 elapsedMs=12
 * - [API-CLIENT-resp-OTHER] UserApi#getUser(String) errorType=HttpNotFoundError  (user errors)
 * - [API-CLIENT-resp-FAIL] UserApi#getUser(String) errorType=... error=...  (everything else, on console.error)
 */
export class ClientLogger {
    private readonly headerMethods = new HeaderMethods();

    /**
     * @param securedHeaders - headers whose values are masked in HEADERS and FULL logs
     */
    constructor(private readonly securedHeaders: readonly PlatformHeader[] = []) {}

    /**
     * User errors are the caller's mistake, not a failure of either side.
     */
    static isUserError(error: unknown): boolean {
        return (
            error instanceof HttpBadRequestError ||
            error instanceof HttpUnauthorizedError ||
            error instanceof HttpForbiddenError ||
            error instanceof HttpNotFoundError ||
            error instanceof HttpUserError
        );
    }

    logRequest(configKey: string, level: LogLevel, request: HttpRequest): void {
        if (!this.enabled(level, 'BASIC')) {
            return;
        }
        let line = `[API-CLIENT-req] ${configKey} ${request.method} ${request.url}`;
        if (this.enabled(level, 'HEADERS')) {
            line += ` headers=${JSON.stringify(this.headerMethods.formatHeadersForLogging(this.securedHeaders, request.headers))}`;
        }
        if (this.enabled(level, 'FULL') && request.body !== undefined) {
            line += ` body=${describeBody(request.body)}`;
        }
        console.log(line);
    }

    logRetry(configKey: string, level: LogLevel, attempt: number, delayMs: number, error: Error): void {
        if (!this.enabled(level, 'BASIC')) {
            return;
        }
        console.log(
            `[API-CLIENT-retry] ${configKey} attempt=${attempt} delayMs=${delayMs} errorType=${error.constructor.name}`,
        );
    }

    logResponse(configKey: string, level: LogLevel, response: HttpResponse, elapsedMs: number): void {
        if (!this.enabled(level, 'BASIC')) {
            return;
        }
        let line = `[API-CLIENT-resp-SUCCESS] ${configKey} status=${response.status} elapsedMs=${elapsedMs}`;
        if (this.enabled(level, 'HEADERS')) {
            line += ` headers=${JSON.stringify(this.headerMethods.formatHeadersForLogging(this.securedHeaders, response.headers))}`;
        }
        if (this.enabled(level, 'FULL') && response.body.length > 0) {
            line += ` body=${response.body}`;
        }
        console.log(line);
    }

    logFailure(configKey: string, level: LogLevel, error: Error, elapsedMs: number): void {
        if (!this.enabled(level, 'BASIC')) {
            return;
        }
        const errorType = error.constructor.name;
        if (ClientLogger.isUserError(error)) {
            console.log(`[API-CLIENT-resp-OTHER] ${configKey} errorType=${errorType} elapsedMs=${elapsedMs}`);
        } else {
            console.error(
                `[API-CLIENT-resp-FAIL] ${configKey} errorType=${errorType} error=${error.message} elapsedMs=${elapsedMs}`,
            );
        }
    }

    private enabled(level: LogLevel, needed: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[needed];
    }
}
