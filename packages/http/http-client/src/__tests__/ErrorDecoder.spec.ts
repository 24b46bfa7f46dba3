import {
    HttpBadGatewayError,
    HttpBadRequestError,
    HttpError,
    HttpNotFoundError,
    HttpRequest,
    HttpServiceUnavailableError,
    HttpUnauthorizedError,
    HttpUserError,
    HttpVendorError,
} from '@declarest/http-api';
import { DefaultErrorDecoder, parseRetryAfter } from '../ErrorDecoder';
import { responseFor } from './fakes';

const KEY = 'ItemApi#getItem(String)';
const JSON_TYPE = { 'Content-Type': 'application/json; charset=utf-8' };

describe('DefaultErrorDecoder', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    const decoder = new DefaultErrorDecoder(() => now);
    const request = new HttpRequest('GET', 'http://h/items/1', new Map());

    it('should read field details from a 400 body', () => {
        const body = JSON.stringify({ message: 'bad name', field: 'name', guiAlertMessage: 'Name is required' });

        const error = decoder.decode(KEY, responseFor(request, 400, body, JSON_TYPE));

        expect(error).toBeInstanceOf(HttpBadRequestError);
        expect(error instanceof HttpBadRequestError && error.field).toBe('name');
        expect(error instanceof HttpBadRequestError && error.guiMessage).toBe('Name is required');
        expect(error.message).toBe('bad name');
    });

    it('should map well known statuses', () => {
        expect(decoder.decode(KEY, responseFor(request, 404, '', {}, 'Not Found'))).toBeInstanceOf(HttpNotFoundError);
        const unauthorized = decoder.decode(
            KEY,
            responseFor(request, 401, JSON.stringify({ subType: 'EXPIRED' }), JSON_TYPE),
        );
        expect(unauthorized).toBeInstanceOf(HttpUnauthorizedError);
        expect(unauthorized instanceof HttpError && unauthorized.subType).toBe('EXPIRED');
    });

    it('should read the errorCode of a 266 user error', () => {
        const body = JSON.stringify({ message: 'email taken', errorCode: 'EMAIL_TAKEN' });

        const error = decoder.decode(KEY, responseFor(request, 266, body, JSON_TYPE));

        expect(error).toBeInstanceOf(HttpUserError);
        expect(error instanceof HttpUserError && error.errorCode).toBe('EMAIL_TAKEN');
        expect(error instanceof HttpUserError && error.code).toBe(266);
    });

    it('should describe statuses it does not know', () => {
        const error = decoder.decode(KEY, responseFor(request, 418));

        expect(error.constructor).toBe(HttpError);
        expect(error.message).toBe('ItemApi#getItem(String) could not translate statusCode=418: status 418');
        expect(error instanceof HttpError && error.code).toBe(418);
    });

    it('should turn Retry-After seconds into retryAfterMs', () => {
        const error = decoder.decode(
            KEY,
            responseFor(request, 503, '', { 'retry-after': '2' }, 'Service Unavailable'),
        );

        expect(error).toBeInstanceOf(HttpServiceUnavailableError);
        expect(error.message).toBe('Service Unavailable');
        expect(error instanceof HttpError && error.retryAfterMs).toBe(2000);
    });

    it('should turn a Retry-After date into a delay from the clock', () => {
        const error = decoder.decode(
            KEY,
            responseFor(request, 503, '', { 'Retry-After': 'Wed, 21 Oct 2026 07:28:05 GMT' }),
        );

        expect(error instanceof HttpError && error.retryAfterMs).toBe(5000);
    });

    it('should use waitSeconds of a vendor error', () => {
        const body = JSON.stringify({ message: 'vendor down', waitSeconds: 3 });

        const error = decoder.decode(KEY, responseFor(request, 598, body, JSON_TYPE));

        expect(error).toBeInstanceOf(HttpVendorError);
        expect(error instanceof HttpVendorError && error.waitSeconds).toBe(3);
        expect(error instanceof HttpVendorError && error.retryAfterMs).toBe(3000);
    });

    it('should ignore bodies that are not JSON', () => {
        const error = decoder.decode(
            KEY,
            responseFor(request, 502, '<html>bad gateway</html>', { 'Content-Type': 'text/html' }, 'Bad Gateway'),
        );

        expect(error).toBeInstanceOf(HttpBadGatewayError);
        expect(error.message).toBe('Bad Gateway');
        expect(error.cause).toBeUndefined();
    });

    it('should keep a JSON parse failure as the cause', () => {
        const error = decoder.decode(KEY, responseFor(request, 500, '{broken', JSON_TYPE, 'Internal Server Error'));

        expect(error.message).toBe('Internal Server Error');
        expect(error.cause).toBeInstanceOf(SyntaxError);
    });
});

describe('parseRetryAfter', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    it('should read delta seconds', () => {
        expect(parseRetryAfter(' 10 ', now)).toBe(10000);
    });

    it('should never go below zero for past dates', () => {
        expect(parseRetryAfter('Wed, 21 Oct 2026 07:00:00 GMT', now)).toBe(0);
    });

    it('should ignore missing and unreadable values', () => {
        expect(parseRetryAfter(undefined, now)).toBeUndefined();
        expect(parseRetryAfter('', now)).toBeUndefined();
        expect(parseRetryAfter('soon', now)).toBeUndefined();
    });
});
