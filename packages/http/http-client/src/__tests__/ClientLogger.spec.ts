import {
    HttpInternalServerError,
    HttpNotFoundError,
    HttpRequest,
    HttpUserError,
    PlatformHeader,
    TransportError,
} from '@declarest/http-api';
import { ClientLogger } from '../ClientLogger';
import { responseFor } from './fakes';

const KEY = 'ItemApi#createItem(Item)';
const AUTHORIZATION = new PlatformHeader('Authorization', true, true);

describe('ClientLogger', () => {
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;
    const logger = new ClientLogger([AUTHORIZATION]);
    const request = new HttpRequest(
        'POST',
        'http://h/items',
        new Map([
            ['authorization', ['Bearer test-token-value']],
            ['Accept', ['application/json']],
        ]),
        '{"name":"lamp"}',
    );

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should log nothing at NONE', () => {
        logger.logRequest(KEY, 'NONE', request);
        logger.logFailure(KEY, 'NONE', new HttpInternalServerError('boom'), 5);

        expect(logSpy).not.toHaveBeenCalled();
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log only the request line at BASIC', () => {
        logger.logRequest(KEY, 'BASIC', request);

        expect(logSpy).toHaveBeenCalledWith('[API-CLIENT-req] ItemApi#createItem(Item) POST http://h/items');
    });

    it('should mask secured headers at HEADERS', () => {
        logger.logRequest(KEY, 'HEADERS', request);

        expect(logSpy).toHaveBeenCalledWith(
            '[API-CLIENT-req] ItemApi#createItem(Item) POST http://h/items ' +
                'headers={"authorization":"Bea...lue","Accept":"application/json"}',
        );
    });

    it('should add the body at FULL', () => {
        logger.logRequest(KEY, 'FULL', request);

        expect(logSpy.mock.calls[0][0]).toMatch(/ body=\{"name":"lamp"\}$/);
    });

    it('should describe byte bodies by size', () => {
        const bytes = new HttpRequest('PUT', 'http://h/blob', new Map(), new Uint8Array(4));

        logger.logRequest(KEY, 'FULL', bytes);

        expect(logSpy).toHaveBeenCalledWith('[API-CLIENT-req] ItemApi#createItem(Item) PUT http://h/blob headers={} body=<4 bytes>');
    });

    it('should log successful responses with timing', () => {
        logger.logResponse(KEY, 'BASIC', responseFor(request, 201, '{"id":"1"}'), 12);

        expect(logSpy).toHaveBeenCalledWith('[API-CLIENT-resp-SUCCESS] ItemApi#createItem(Item) status=201 elapsedMs=12');
    });

    it('should log retries', () => {
        logger.logRetry(KEY, 'BASIC', 2, 150, new TransportError('reset', 'POST', 'http://h/items'));

        expect(logSpy).toHaveBeenCalledWith(
            '[API-CLIENT-retry] ItemApi#createItem(Item) attempt=2 delayMs=150 errorType=TransportError',
        );
    });

    it('should log user errors as OTHER on console.log', () => {
        logger.logFailure(KEY, 'BASIC', new HttpNotFoundError('no such item'), 7);

        expect(logSpy).toHaveBeenCalledWith(
            '[API-CLIENT-resp-OTHER] ItemApi#createItem(Item) errorType=HttpNotFoundError elapsedMs=7',
        );
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log server failures as FAIL on console.error', () => {
        logger.logFailure(KEY, 'BASIC', new HttpInternalServerError('boom'), 30);

        expect(errorSpy).toHaveBeenCalledWith(
            '[API-CLIENT-resp-FAIL] ItemApi#createItem(Item) errorType=HttpInternalServerError error=boom elapsedMs=30',
        );
        expect(logSpy).not.toHaveBeenCalled();
    });

    it('should classify user errors', () => {
        expect(ClientLogger.isUserError(new HttpUserError('taken'))).toBe(true);
        expect(ClientLogger.isUserError(new HttpInternalServerError('boom'))).toBe(false);
        expect(ClientLogger.isUserError('not an error')).toBe(false);
    });
});
