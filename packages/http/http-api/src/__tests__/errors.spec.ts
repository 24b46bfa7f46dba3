import { PreconditionError } from '@declarest/core-util';
import {
    ContractError,
    EncodeError,
    HttpBadRequestError,
    HttpError,
    HttpNotFoundError,
    HttpUserError,
    HttpVendorError,
    RetryExhaustedError,
    TransportError,
} from '../errors';
import * as api from '../index';

describe('errors', () => {
    it('should keep instanceof across the hierarchy', () => {
        const error = new HttpNotFoundError('missing');
        expect(error).toBeInstanceOf(HttpNotFoundError);
        expect(error).toBeInstanceOf(HttpError);
        expect(error).toBeInstanceOf(Error);
        expect(error.code).toBe(404);
        expect(error.name).toBe('NotFound');
    });

    it('should keep the cause', () => {
        const cause = new Error('socket hang up');
        const error = new TransportError('GET http://x failed', 'GET', 'http://x', cause);
        expect(error.cause).toBe(cause);
        expect(error.method).toBe('GET');

        const exhausted = new RetryExhaustedError('gave up', 5, error);
        expect(exhausted.cause).toBe(error);
        expect(exhausted.attempts).toBe(5);
    });

    it('should leave cause unset when none is given', () => {
        expect(new EncodeError('bad body').cause).toBeUndefined();
    });

    it('should carry the extra fields of specific errors', () => {
        const badRequest = new HttpBadRequestError('invalid', 'email', 'Email is invalid');
        expect(badRequest.field).toBe('email');
        expect(badRequest.guiMessage).toBe('Email is invalid');

        expect(new HttpVendorError('vendor down').waitSeconds).toBe(30);

        const userError = new HttpUserError('nope', 'E42');
        expect(userError.code).toBe(266);
        expect(userError.subType).toBe('USER_ERROR');
        expect(userError.errorCode).toBe('E42');
    });

    it('should re-export the precondition error from core-util', () => {
        expect(api.PreconditionError).toBe(PreconditionError);
        expect(new ContractError('x').name).toBe('ContractError');
    });
});
