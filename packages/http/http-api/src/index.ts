/**
 * @declarest/http-api
 *
 * The contract side of declarest: decorators describing an API, the parser that
 * turns them into MethodMetadata, the RequestTemplate that metadata resolves into,
 * and the errors every layer throws.
 *
 * ```
 * http-api (contract, template, errors)
 *    ↑
 *    └── http-client (contract → dispatch table → generated client)
 * ```
 */

export {
    ApiInterface,
    ApiInterfaceOptions,
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
    getRoutes,
    isApiInterface,
    getApiInterfaceOptions,
    RouteMetadata,
    ParamMetadata,
    METADATA_KEYS,
} from './decorators';

export { Contract, DecoratorContract, RESERVED_METHOD_NAMES } from './Contract';

export {
    ApiType,
    BodyType,
    Expander,
    ExpanderClass,
    FORM_MAP_TYPE,
    MethodMetadata,
    MethodMetadataInit,
    configKey,
} from './MethodMetadata';

export { ToStringExpander, InstantExpander, IsoDateExpander, CsvExpander } from './expanders';

export { RequestTemplate, expand } from './RequestTemplate';
export { HttpBody, HttpRequest, HttpResponse } from './HttpMessages';

export { PlatformHeader } from './PlatformHeader';
export { ContextReader } from './ContextReader';
export { HeaderMethods } from './HeaderMethods';


export {
    PreconditionError,
    ProtocolError,
    ContractError,
    EncodeError,
    DecodeError,
    TransportError,
    RetryExhaustedError,
    HttpError,
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpTimeoutError,
    HttpTooManyRequestsError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpServiceUnavailableError,
    HttpGatewayTimeoutError,
    HttpVendorError,
    HttpUserError,
} from './errors';
