/**
 * Error classes for declarest clients.
 *
 * Every class keeps the original failure as the standard `cause` and restores
 * its prototype so `instanceof` works after down-levelled `extends Error`.
 */

export { PreconditionError } from '@declarest/core-util';

/**
 * ProtocolError - Shape of the JSON error body a server may send along with a
 * non-2xx status. The error decoder reads it when present.
 */
export class ProtocolError {
    public message?: string;
    public subType?: string;
    public field?: string;
    public waitSeconds?: number;
    public name?: string;
    public guiAlertMessage?: string;
    public errorCode?: string;
}

/**
 * An API prototype could not be turned into method metadata.
 */
export class ContractError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The encoder could not write a body or form onto the request template.
 * The call is abandoned before anything is sent.
 */
export class EncodeError extends Error {
    constructor(message: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'EncodeError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A successful response body could not be decoded.
 */
export class DecodeError extends Error {
    constructor(message: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'DecodeError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The transport failed to complete a round trip (connection refused, reset,
 * timeout, abort). Offered to the retryer.
 */
export class TransportError extends Error {
    constructor(
        message: string,
        public readonly method: string,
        public readonly url: string,
        cause?: Error,
    ) {
        super(message, cause ? { cause } : undefined);
        this.name = 'TransportError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The retryer declined another attempt after a retryable failure.
 * `cause` is the last failure.
 */
export class RetryExhaustedError extends Error {
    constructor(
        message: string,
        public readonly attempts: number,
        cause: Error,
    ) {
        super(message, { cause });
        this.name = 'RetryExhaustedError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpError - A non-2xx response, classified by the error decoder.
 * All specific HTTP errors extend this class.
 */
export class HttpError extends Error {
    public code: number;
    public subType?: string;
    /**
     * Delay the server asked for through Retry-After, in milliseconds.
     */
    public retryAfterMs?: number;

    constructor(message: string, code: number, subType?: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'HttpError';
        this.code = code;
        this.subType = subType;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadRequestError - 400 Bad Request, with the offending field when the server named one.
 */
export class HttpBadRequestError extends HttpError {
    public field?: string;
    public guiMessage?: string;

    constructor(message: string, field?: string, guiMessage?: string, cause?: Error) {
        super(message, 400, undefined, cause);
        this.name = 'BadRequest';
        this.field = field;
        this.guiMessage = guiMessage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpUnauthorizedError - 401 Unauthorized.
 */
export class HttpUnauthorizedError extends HttpError {
    constructor(message: string, subType?: string, cause?: Error) {
        super(message, 401, subType, cause);
        this.name = 'Unauthorized';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpForbiddenError - 403 Forbidden.
 */
export class HttpForbiddenError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 403, undefined, cause);
        this.name = 'Forbidden';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpNotFoundError - 404 Not Found.
 */
export class HttpNotFoundError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 404, undefined, cause);
        this.name = 'NotFound';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpTimeoutError - 408 Request Timeout.
 */
export class HttpTimeoutError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 408, undefined, cause);
        this.name = 'Timeout';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpTooManyRequestsError - 429 Too Many Requests.
 */
export class HttpTooManyRequestsError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 429, undefined, cause);
        this.name = 'TooManyRequests';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpInternalServerError - 500 Internal Server Error.
 */
export class HttpInternalServerError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 500, undefined, cause);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadGatewayError - 502 Bad Gateway.
 */
export class HttpBadGatewayError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 502, undefined, cause);
        this.name = 'HttpBadGatewayError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpServiceUnavailableError - 503 Service Unavailable.
 */
export class HttpServiceUnavailableError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 503, undefined, cause);
        this.name = 'ServiceUnavailable';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpGatewayTimeoutError - 504 Gateway Timeout. Load balancers send these
 * without a ProtocolError body.
 */
export class HttpGatewayTimeoutError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 504, undefined, cause);
        this.name = 'HttpGatewayTimeoutError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpVendorError - 598, a failure in a vendor behind the server. Carries a
 * wait hint that the default retryer honours.
 */
export class HttpVendorError extends HttpError {
    constructor(
        message: string,
        public waitSeconds = 30,
        cause?: Error,
    ) {
        super(message, 598, undefined, cause);
        this.name = 'VendorError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpUserError - 266, a user validation failure reported with a 2xx code so it
 * does not show up as a server failure. Never retried.
 */
export class HttpUserError extends HttpError {
    public errorCode?: string;

    constructor(message: string, errorCode?: string, cause?: Error) {
        super(message, 266, 'USER_ERROR', cause);
        this.name = 'UserError';
        this.errorCode = errorCode;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
