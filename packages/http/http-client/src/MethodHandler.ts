import { setTimeout as delay } from 'timers/promises';
import { Context, ContextKey } from '@declarest/core-context';
import { toError } from '@declarest/core-util';
import {
    DecodeError,
    HttpError,
    HttpRequest,
    HttpResponse,
    MethodMetadata,
    RetryExhaustedError,
    TransportError,
} from '@declarest/http-api';
import { ClientConfig } from './ClientConfig';
import { RequestInterceptor } from './RequestInterceptor';
import { RequestOptions } from './RequestOptions';
import { Target } from './Target';
import { RequestTemplateFactory } from './TemplateFactory';

/**
 * Cancellation signal of the asynchronous call running in the current context.
 * Every transport call made from that context receives it.
 */
export const CALL_SIGNAL = new ContextKey<AbortSignal>(
    'declarest.call-signal',
    (value): value is AbortSignal => value instanceof AbortSignal,
);

/**
 * MethodHandler - Executes one API method: resolve, intercept, send, decode,
 * retry. One per method per generated client.
 */
export class MethodHandler {
    constructor(
        readonly metadata: MethodMetadata,
        private readonly target: Target<unknown>,
        private readonly factory: RequestTemplateFactory,
        private readonly config: ClientConfig,
        private readonly interceptors: readonly RequestInterceptor[],
    ) {}

    async invoke(args: readonly unknown[]): Promise<unknown> {
        const options = this.config.options.withSignal(Context.get(CALL_SIGNAL));

        for (let attempt = 1; ; attempt++) {
            // precondition and encode failures reject here and are never retried
            const template = this.factory.create(args);
            for (const interceptor of this.interceptors) {
                interceptor.apply(template);
            }
            const request = this.target.apply(template);

            try {
                return await this.executeAndDecode(request, options);
            } catch (err: unknown) {
                const error = toError(err);
                if (!(error instanceof TransportError || error instanceof HttpError) || options.signal?.aborted) {
                    throw error;
                }

                const decision = this.config.retryer.continueOrPropagate(error, attempt);
                if (decision.kind === 'propagate') {
                    throw error;
                }
                if (decision.kind === 'exhausted') {
                    throw new RetryExhaustedError(
                        `${this.metadata.configKey} gave up after ${attempt} attempts: ${error.message}`,
                        attempt,
                        error,
                    );
                }
                this.config.logger.logRetry(this.metadata.configKey, this.config.logLevel, attempt, decision.delayMs, error);
                await delay(decision.delayMs, undefined, { signal: options.signal });
            }
        }
    }

    private async executeAndDecode(request: HttpRequest, options: RequestOptions): Promise<unknown> {
        const configKey = this.metadata.configKey;
        const logger = this.config.logger;
        const logLevel = this.config.logLevel;
        const start = Date.now();
        logger.logRequest(configKey, logLevel, request);

        let response: HttpResponse;
        try {
            response = await this.config.transport.execute(request, options);
        } catch (err: unknown) {
            const error = toError(err);
            const failure =
                error instanceof TransportError
                    ? error
                    : new TransportError(`${request.method} ${request.url} failed: ${error.message}`, request.method, request.url, error);
            logger.logFailure(configKey, logLevel, failure, Date.now() - start);
            throw failure;
        }

        if (!response.ok) {
            const error = this.config.errorDecoder.decode(configKey, response);
            logger.logFailure(configKey, logLevel, error, Date.now() - start);
            throw error;
        }

        logger.logResponse(configKey, logLevel, response, Date.now() - start);
        try {
            return this.config.decoder.decode(response, this.metadata.returnType);
        } catch (err: unknown) {
            const error = toError(err);
            if (error instanceof DecodeError) {
                throw error;
            }
            throw new DecodeError(`Could not decode the response of ${configKey}: ${error.message}`, error);
        }
    }
}
