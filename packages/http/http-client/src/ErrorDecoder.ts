import { toError } from '@declarest/core-util';
import {
    HttpBadGatewayError,
    HttpBadRequestError,
    HttpError,
    HttpForbiddenError,
    HttpGatewayTimeoutError,
    HttpInternalServerError,
    HttpNotFoundError,
    HttpResponse,
    HttpServiceUnavailableError,
    HttpTimeoutError,
    HttpTooManyRequestsError,
    HttpUnauthorizedError,
    HttpUserError,
    HttpVendorError,
    ProtocolError,
} from '@declarest/http-api';

/**
 * Classifies a non-2xx response. The returned error is offered to the retryer,
 * then thrown to the caller.
 */
export interface ErrorDecoder {
    decode(configKey: string, response: HttpResponse): Error;
}

interface ReadResult {
    protocolError: ProtocolError;
    parseFailure?: Error;
}

function stringField(fields: Map<string, unknown>, name: string): string | undefined {
    const value = fields.get(name);
    return typeof value === 'string' ? value : undefined;
}

function numberField(fields: Map<string, unknown>, name: string): number | undefined {
    const value = fields.get(name);
    return typeof value === 'number' ? value : undefined;
}

/**
 * Milliseconds to wait from a Retry-After header: delta seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
    if (value === undefined || value.trim().length === 0) {
        return undefined;
    }
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        return Number(trimmed) * 1000;
    }
    const at = Date.parse(trimmed);
    if (Number.isNaN(at)) {
        return undefined;
    }
    return Math.max(0, at - now);
}

/**
 * DefaultErrorDecoder - Rebuilds typed HttpErrors from error responses.
 *
 * Reads the ProtocolError JSON body when the server sent one and maps the status:
 * - 400 → HttpBadRequestError (field, guiAlertMessage)
 * - 266 → HttpUserError (errorCode), a 2xx code used for user validation
 * - 401 → HttpUnauthorizedError, 403 → HttpForbiddenError, 404 → HttpNotFoundError
 * - 408 → HttpTimeoutError, 429 → HttpTooManyRequestsError
 * - 500 → HttpInternalServerError, 502 → HttpBadGatewayError
 * - 503 → HttpServiceUnavailableError, 504 → HttpGatewayTimeoutError
 * - 598 → HttpVendorError (waitSeconds)
 * - other → HttpError
 *
 * A Retry-After header (or a vendor error's waitSeconds) becomes `retryAfterMs`.
 */
export class DefaultErrorDecoder implements ErrorDecoder {
    constructor(private readonly clock: () => number = Date.now) {}

    decode(configKey: string, response: HttpResponse): Error {
        const read = this.readProtocolError(response);
        const protocolError = read.protocolError;
        const message = protocolError.message || response.reason || `status ${response.status}`;
        const error = this.translate(configKey, response.status, message, protocolError, read.parseFailure);

        const retryAfterMs = parseRetryAfter(response.header('Retry-After'), this.clock());
        if (retryAfterMs !== undefined) {
            error.retryAfterMs = retryAfterMs;
        } else if (error instanceof HttpVendorError && protocolError.waitSeconds !== undefined) {
            error.retryAfterMs = protocolError.waitSeconds * 1000;
        }
        return error;
    }

    private translate(
        configKey: string,
        statusCode: number,
        message: string,
        protocolError: ProtocolError,
        cause?: Error,
    ): HttpError {
        switch (statusCode) {
            case 400:
                return new HttpBadRequestError(message, protocolError.field, protocolError.guiAlertMessage, cause);
            case 266:
                return new HttpUserError(message, protocolError.errorCode, cause);
            case 401:
                return new HttpUnauthorizedError(message, protocolError.subType, cause);
            case 403:
                return new HttpForbiddenError(message, cause);
            case 404:
                return new HttpNotFoundError(message, cause);
            case 408:
                return new HttpTimeoutError(message, cause);
            case 429:
                return new HttpTooManyRequestsError(message, cause);
            case 500:
                return new HttpInternalServerError(message, cause);
            case 502:
                return new HttpBadGatewayError(message, cause);
            case 503:
                return new HttpServiceUnavailableError(message, cause);
            case 504:
                return new HttpGatewayTimeoutError(message, cause);
            case 598:
                return new HttpVendorError(message, protocolError.waitSeconds, cause);
            default:
                return new HttpError(
                    `${configKey} could not translate statusCode=${statusCode}: ${message}`,
                    statusCode,
                    protocolError.subType,
                    cause,
                );
        }
    }

    /**
     * Load balancers answer with HTML or nothing; only a JSON object counts.
     * A body that claims JSON but does not parse is kept as the cause.
     */
    private readProtocolError(response: HttpResponse): ReadResult {
        const result = new ProtocolError();
        const contentType = response.header('Content-Type') ?? '';
        if (response.body.length === 0 || !contentType.includes('json')) {
            return { protocolError: result };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(response.body);
        } catch (err: unknown) {
            return { protocolError: result, parseFailure: toError(err) };
        }
        if (typeof parsed !== 'object' || parsed === null) {
            return { protocolError: result };
        }

        const fields = new Map<string, unknown>(Object.entries(parsed));
        result.message = stringField(fields, 'message');
        result.subType = stringField(fields, 'subType');
        result.field = stringField(fields, 'field');
        result.waitSeconds = numberField(fields, 'waitSeconds');
        result.name = stringField(fields, 'name');
        result.guiAlertMessage = stringField(fields, 'guiAlertMessage');
        result.errorCode = stringField(fields, 'errorCode');
        return { protocolError: result };
    }
}
