import 'reflect-metadata';
import { BodyType, ExpanderClass } from './MethodMetadata';

/**
 * Metadata keys for the raw declarations the decorators record. DecoratorContract
 * reads them back to build MethodMetadata.
 */
export const METADATA_KEYS = {
    API_INTERFACE: 'declarest:api-interface',
    ROUTES: 'declarest:routes',
    PARAM_TYPES: 'design:paramtypes',
};

/**
 * A decorated parameter: a named template variable or the raw url.
 */
export class ParamMetadata {
    constructor(
        readonly index: number,
        readonly kind: 'param' | 'url',
        readonly name?: string,
        readonly expander?: ExpanderClass,
    ) {}
}

/**
 * Route metadata stored per method, exactly as declared.
 */
export class RouteMetadata {
    httpMethod = '';
    path = '';
    headers: string[] = [];
    bodyTemplate?: string;
    returnType?: BodyType;
    parameterTypes: BodyType[] = [];
    params = new Map<number, ParamMetadata>();

    constructor(readonly methodName: string) {}
}

/**
 * Options of `@ApiInterface()`.
 */
export class ApiInterfaceOptions {
    /**
     * `Name: value` headers added to every method of the API.
     */
    headers: string[] = [];
}

function routesOf(apiClass: Function): Map<string, RouteMetadata> {
    const existing: unknown = Reflect.getOwnMetadata(METADATA_KEYS.ROUTES, apiClass);
    if (existing instanceof Map) {
        return existing;
    }
    const routes = new Map<string, RouteMetadata>();
    Reflect.defineMetadata(METADATA_KEYS.ROUTES, routes, apiClass);
    return routes;
}

/**
 * Find or create the route for a decorated member. For static members the
 * target is the constructor itself, for instance members the prototype.
 */
function routeFor(target: Object, propertyKey: string | symbol): RouteMetadata {
    const apiClass: Function = target instanceof Function ? target : target.constructor;
    const methodName = String(propertyKey);
    const routes = routesOf(apiClass);

    let route = routes.get(methodName);
    if (!route) {
        route = new RouteMetadata(methodName);
        routes.set(methodName, route);
    }
    return route;
}

/**
 * Mark a class as an API prototype. Methods stay concrete and throw; only their
 * decorators matter.
 *
 * ```typescript
 * @ApiInterface({ headers: ['Accept: application/json'] })
 * abstract class UserApiPrototype {
 *     @Get()
 *     @Path('/users/{id}')
 *     getUser(@Param('id') id: string): Promise<User> {
 *         throw new Error('Must be implemented');
 *     }
 * }
 * ```
 */
export function ApiInterface(options?: Partial<ApiInterfaceOptions>): ClassDecorator {
    return (target) => {
        const resolved = new ApiInterfaceOptions();
        resolved.headers = [...(options?.headers ?? [])];
        Reflect.defineMetadata(METADATA_KEYS.API_INTERFACE, resolved, target);
        routesOf(target);
    };
}

function httpMethod(method: string): MethodDecorator {
    return (target, propertyKey) => {
        const route = routeFor(target, propertyKey);
        route.httpMethod = method;

        const paramTypes: unknown = Reflect.getMetadata(METADATA_KEYS.PARAM_TYPES, target, propertyKey);
        if (Array.isArray(paramTypes)) {
            route.parameterTypes = paramTypes.filter((t): t is BodyType => typeof t === 'function');
        }
    };
}

export function Get(): MethodDecorator {
    return httpMethod('GET');
}

export function Post(): MethodDecorator {
    return httpMethod('POST');
}

export function Put(): MethodDecorator {
    return httpMethod('PUT');
}

export function Delete(): MethodDecorator {
    return httpMethod('DELETE');
}

export function Patch(): MethodDecorator {
    return httpMethod('PATCH');
}

/**
 * Path and optional query of the request, with `{name}` placeholders:
 * `@Path('/users/{id}/orders?status={status}')`.
 */
export function Path(path: string): MethodDecorator {
    return (target, propertyKey) => {
        routeFor(target, propertyKey).path = path;
    };
}

/**
 * `Name: value` headers for one method; values may hold placeholders.
 * A method header replaces an API-level header of the same name.
 */
export function RequestHeaders(...headers: string[]): MethodDecorator {
    return (target, propertyKey) => {
        routeFor(target, propertyKey).headers.push(...headers);
    };
}

/**
 * Literal body with placeholders; `{{` writes a brace:
 * `@BodyTemplate('{{"name":"{name}"}')` gives `{"name":"Bob"}`.
 * Parameters used only here are still bound by name; no form encoding happens.
 */
export function BodyTemplate(template: string): MethodDecorator {
    return (target, propertyKey) => {
        routeFor(target, propertyKey).bodyTemplate = template;
    };
}

/**
 * What the decoder should produce from a successful response. `String` keeps
 * the raw text; anything else, or no declaration, is parsed as JSON.
 */
export function ResponseType(type: BodyType): MethodDecorator {
    return (target, propertyKey) => {
        routeFor(target, propertyKey).returnType = type;
    };
}

/**
 * Bind a parameter to the `{name}` placeholder(s). When no url, query or header
 * uses the name the parameter becomes a form field.
 */
export function Param(name: string, expander?: ExpanderClass): ParameterDecorator {
    return (target, propertyKey, parameterIndex) => {
        if (propertyKey === undefined) {
            return;
        }
        const route = routeFor(target, propertyKey);
        route.params.set(parameterIndex, new ParamMetadata(parameterIndex, 'param', name, expander));
    };
}

/**
 * The parameter holds a raw base url, prefixed onto the path before resolution.
 */
export function Url(): ParameterDecorator {
    return (target, propertyKey, parameterIndex) => {
        if (propertyKey === undefined) {
            return;
        }
        const route = routeFor(target, propertyKey);
        route.params.set(parameterIndex, new ParamMetadata(parameterIndex, 'url'));
    };
}

/**
 * All routes declared on an API class, in declaration order.
 */
export function getRoutes(apiClass: Function): RouteMetadata[] {
    return [...routesOf(apiClass).values()];
}

export function isApiInterface(apiClass: Function): boolean {
    return Reflect.getOwnMetadata(METADATA_KEYS.API_INTERFACE, apiClass) instanceof ApiInterfaceOptions;
}

export function getApiInterfaceOptions(apiClass: Function): ApiInterfaceOptions {
    const options: unknown = Reflect.getOwnMetadata(METADATA_KEYS.API_INTERFACE, apiClass);
    return options instanceof ApiInterfaceOptions ? options : new ApiInterfaceOptions();
}
