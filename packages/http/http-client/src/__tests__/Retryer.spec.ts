import { PreconditionError } from '@declarest/core-util';
import {
    HttpError,
    HttpNotFoundError,
    HttpServiceUnavailableError,
    HttpUserError,
    TransportError,
} from '@declarest/http-api';
import { DefaultRetryer, NeverRetry, Retryer } from '../Retryer';

describe('DefaultRetryer', () => {
    const transportError = new TransportError('GET http://h/x failed: reset', 'GET', 'http://h/x');

    it('should back off by 1.5 per attempt', () => {
        const retryer = new DefaultRetryer();

        expect(retryer.continueOrPropagate(transportError, 1)).toEqual({ kind: 'retry', delayMs: 100 });
        expect(retryer.continueOrPropagate(transportError, 2)).toEqual({ kind: 'retry', delayMs: 150 });
        expect(retryer.continueOrPropagate(transportError, 3)).toEqual({ kind: 'retry', delayMs: 225 });
        expect(retryer.continueOrPropagate(transportError, 4)).toEqual({ kind: 'retry', delayMs: 338 });
    });

    it('should be exhausted at maxAttempts', () => {
        expect(new DefaultRetryer().continueOrPropagate(transportError, 5)).toEqual({ kind: 'exhausted' });
        expect(new DefaultRetryer(10, 10, 1).continueOrPropagate(transportError, 1)).toEqual({ kind: 'exhausted' });
    });

    it('should cap the delay at maxPeriod', () => {
        const retryer = new DefaultRetryer(100, 200, 10);
        expect(retryer.continueOrPropagate(transportError, 3)).toEqual({ kind: 'retry', delayMs: 200 });
    });

    it('should prefer Retry-After and cap it too', () => {
        const retryer = new DefaultRetryer();
        const soon = new HttpServiceUnavailableError('busy');
        soon.retryAfterMs = 700;
        const late = new HttpServiceUnavailableError('busy');
        late.retryAfterMs = 5000;

        expect(retryer.continueOrPropagate(soon, 1)).toEqual({ kind: 'retry', delayMs: 700 });
        expect(retryer.continueOrPropagate(late, 1)).toEqual({ kind: 'retry', delayMs: 1000 });
    });

    it('should retry any status that carries Retry-After', () => {
        const teapot = new HttpError('teapot', 418);
        teapot.retryAfterMs = 0;
        expect(new DefaultRetryer().continueOrPropagate(teapot, 1)).toEqual({ kind: 'retry', delayMs: 0 });
    });

    it('should propagate errors that are not retryable', () => {
        const retryer = new DefaultRetryer();

        expect(retryer.continueOrPropagate(new HttpNotFoundError('gone'), 1)).toEqual({ kind: 'propagate' });
        expect(retryer.continueOrPropagate(new HttpUserError('bad input'), 1)).toEqual({ kind: 'propagate' });
        expect(retryer.continueOrPropagate(new Error('boom'), 1)).toEqual({ kind: 'propagate' });
    });

    it('should propagate a non-retryable error even when attempts are used up', () => {
        expect(new DefaultRetryer().continueOrPropagate(new HttpNotFoundError('gone'), 9)).toEqual({
            kind: 'propagate',
        });
    });

    it('should reject invalid settings', () => {
        expect(() => new DefaultRetryer(-1)).toThrow(new PreconditionError('period must be >= 0 but was -1'));
        expect(() => new DefaultRetryer(100, 50)).toThrow('maxPeriod 50 must be >= period 100');
        expect(() => new DefaultRetryer(100, 1000, 0)).toThrow('maxAttempts must be >= 1 but was 0');
    });
});

describe('NeverRetry', () => {
    it('should always propagate', () => {
        const retryer: Retryer = new NeverRetry();
        const error = new TransportError('failed', 'GET', 'http://h/x');
        expect(retryer.continueOrPropagate(error, 1)).toEqual({ kind: 'propagate' });
    });
});
