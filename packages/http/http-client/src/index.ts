/**
 * @declarest/http-client
 *
 * Generates clients from API prototypes declared with @declarest/http-api.
 *
 * ```
 * Contract.parse(Api) → MethodMetadata[] → RequestTemplateFactory per method
 *    → DispatchTable per configuration → generated client
 * client.method(args) → MethodHandler → Transport
 * ```
 *
 * ```typescript
 * import { createClient } from '@declarest/http-client';
 *
 * const client = createClient(UserApiPrototype, 'http://localhost:3000');
 * const user = await client.getUser('42');
 * ```
 */

export { createClient } from './createClient';
export { ClientBuilder, DefaultClientSlot } from './ClientBuilder';
export { ClientConfig, ClientConfigBuilder, ClientConfigInit } from './ClientConfig';
export {
    Client,
    ClientBuilders,
    ClientFactory,
    ClientIdentity,
    DefaultClientFactory,
    isGeneratedClient,
    targetOf,
} from './ClientFactory';
export { RequestBuilder, AsyncRequestBuilder } from './RequestBuilder';
export { DispatchTable, buildDispatchTable } from './DispatchTable';
export { MethodHandler, CALL_SIGNAL } from './MethodHandler';
export {
    RequestTemplateFactory,
    PlainTemplateFactory,
    FormEncodedTemplateFactory,
    BodyEncodedTemplateFactory,
    createTemplateFactory,
    buildTemplateFactories,
} from './TemplateFactory';
export {
    Target,
    RoutingKeyAwareTarget,
    HardCodedTarget,
    RoutingKeyTarget,
    UrlSelector,
    isRoutingKeyAware,
} from './Target';
export { RequestOptions } from './RequestOptions';
export { Transport, FetchTransport } from './Transport';
export { Encoder, DefaultEncoder } from './Encoder';
export { Decoder, JsonDecoder } from './Decoder';
export { ErrorDecoder, DefaultErrorDecoder, parseRetryAfter } from './ErrorDecoder';
export { Retryer, RetryDecision, DefaultRetryer, NeverRetry } from './Retryer';
export { RequestInterceptor, HeadersInterceptor } from './RequestInterceptor';
export {
    HeaderSupplier,
    HeaderInput,
    StaticHeaderSupplier,
    ContextHeaderSupplier,
    mergeHeaderSuppliers,
} from './HeaderSupplier';
export { StaticContextReader, RequestContextReader, CompositeContextReader } from './ContextReader';
export { ClientLogger, LogLevel } from './ClientLogger';

export { CancellationError, XFuture } from '@declarest/core-future';

// contract side, for one-package imports
export {
    ApiInterface,
    Get,
    Post,
    Put,
    Delete,
    Patch,
    Path,
    RequestHeaders,
    BodyTemplate,
    ResponseType,
    Param,
    Url,
    ContextReader,
    PlatformHeader,
} from '@declarest/http-api';
