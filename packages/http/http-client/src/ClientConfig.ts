import { checkNotNull } from '@declarest/core-util';
import { Contract, DecoratorContract } from '@declarest/http-api';
import { ClientFactory, DefaultClientFactory } from './ClientFactory';
import { ClientLogger, LogLevel } from './ClientLogger';
import { Decoder, JsonDecoder } from './Decoder';
import { DefaultEncoder, Encoder } from './Encoder';
import { DefaultErrorDecoder, ErrorDecoder } from './ErrorDecoder';
import { HeaderSupplier } from './HeaderSupplier';
import { RequestInterceptor } from './RequestInterceptor';
import { RequestOptions } from './RequestOptions';
import { DefaultRetryer, Retryer } from './Retryer';
import { FetchTransport, Transport } from './Transport';

export interface ClientConfigInit {
    contract: Contract;
    encoder: Encoder;
    decoder: Decoder;
    errorDecoder: ErrorDecoder;
    retryer: Retryer;
    logger: ClientLogger;
    logLevel: LogLevel;
    transport: Transport;
    options: RequestOptions;
    interceptors: readonly RequestInterceptor[];
    headerSuppliers: readonly HeaderSupplier[];
    routingKey: unknown;
    clientFactory: ClientFactory;
}

/**
 * ClientConfig - Everything a ClientBuilder needs, frozen.
 *
 * The interceptors, header suppliers and routing key here are the base every
 * per-call request builder starts from.
 *
 * ```typescript
 * const config = ClientConfig.builder()
 *     .retryer(new DefaultRetryer(50, 500, 3))
 *     .logLevel('HEADERS')
 *     .addInterceptor(new HeadersInterceptor(new Map([['Accept', ['application/json']]])))
 *     .build();
 * ```
 */
export class ClientConfig {
    readonly contract: Contract;
    readonly encoder: Encoder;
    readonly decoder: Decoder;
    readonly errorDecoder: ErrorDecoder;
    readonly retryer: Retryer;
    readonly logger: ClientLogger;
    readonly logLevel: LogLevel;
    readonly transport: Transport;
    readonly options: RequestOptions;
    readonly interceptors: readonly RequestInterceptor[];
    readonly headerSuppliers: readonly HeaderSupplier[];
    readonly routingKey: unknown;
    readonly clientFactory: ClientFactory;

    constructor(init: ClientConfigInit) {
        this.contract = init.contract;
        this.encoder = init.encoder;
        this.decoder = init.decoder;
        this.errorDecoder = init.errorDecoder;
        this.retryer = init.retryer;
        this.logger = init.logger;
        this.logLevel = init.logLevel;
        this.transport = init.transport;
        this.options = init.options;
        this.interceptors = Object.freeze([...init.interceptors]);
        this.headerSuppliers = Object.freeze([...init.headerSuppliers]);
        this.routingKey = init.routingKey;
        this.clientFactory = init.clientFactory;
        Object.freeze(this);
    }

    static builder(): ClientConfigBuilder {
        return new ClientConfigBuilder();
    }
}

/**
 * Mutable, fluent; every setter returns the builder. Defaults: DecoratorContract,
 * DefaultEncoder, JsonDecoder, DefaultErrorDecoder, DefaultRetryer, FetchTransport,
 * 10s connect / 60s read, log level BASIC.
 */
export class ClientConfigBuilder {
    private contractValue: Contract = new DecoratorContract();
    private encoderValue: Encoder = new DefaultEncoder();
    private decoderValue: Decoder = new JsonDecoder();
    private errorDecoderValue: ErrorDecoder = new DefaultErrorDecoder();
    private retryerValue: Retryer = new DefaultRetryer();
    private loggerValue = new ClientLogger();
    private logLevelValue: LogLevel = 'BASIC';
    private transportValue: Transport = new FetchTransport();
    private optionsValue = new RequestOptions();
    private readonly interceptors: RequestInterceptor[] = [];
    private readonly headerSuppliers: HeaderSupplier[] = [];
    private routingKeyValue: unknown = undefined;
    private clientFactoryValue: ClientFactory = new DefaultClientFactory();

    contract(contract: Contract): this {
        this.contractValue = checkNotNull(contract, 'contract');
        return this;
    }

    encoder(encoder: Encoder): this {
        this.encoderValue = checkNotNull(encoder, 'encoder');
        return this;
    }

    decoder(decoder: Decoder): this {
        this.decoderValue = checkNotNull(decoder, 'decoder');
        return this;
    }

    errorDecoder(errorDecoder: ErrorDecoder): this {
        this.errorDecoderValue = checkNotNull(errorDecoder, 'errorDecoder');
        return this;
    }

    retryer(retryer: Retryer): this {
        this.retryerValue = checkNotNull(retryer, 'retryer');
        return this;
    }

    logger(logger: ClientLogger): this {
        this.loggerValue = checkNotNull(logger, 'logger');
        return this;
    }

    logLevel(logLevel: LogLevel): this {
        this.logLevelValue = logLevel;
        return this;
    }

    transport(transport: Transport): this {
        this.transportValue = checkNotNull(transport, 'transport');
        return this;
    }

    options(options: RequestOptions): this {
        this.optionsValue = checkNotNull(options, 'options');
        return this;
    }

    addInterceptor(interceptor: RequestInterceptor): this {
        this.interceptors.push(checkNotNull(interceptor, 'interceptor'));
        return this;
    }

    addHeaderSupplier(supplier: HeaderSupplier): this {
        this.headerSuppliers.push(checkNotNull(supplier, 'headerSupplier'));
        return this;
    }

    routingKey(key: unknown): this {
        this.routingKeyValue = key;
        return this;
    }

    clientFactory(clientFactory: ClientFactory): this {
        this.clientFactoryValue = checkNotNull(clientFactory, 'clientFactory');
        return this;
    }

    build(): ClientConfig {
        return new ClientConfig({
            contract: this.contractValue,
            encoder: this.encoderValue,
            decoder: this.decoderValue,
            errorDecoder: this.errorDecoderValue,
            retryer: this.retryerValue,
            logger: this.loggerValue,
            logLevel: this.logLevelValue,
            transport: this.transportValue,
            options: this.optionsValue,
            interceptors: this.interceptors,
            headerSuppliers: this.headerSuppliers,
            routingKey: this.routingKeyValue,
            clientFactory: this.clientFactoryValue,
        });
    }
}
