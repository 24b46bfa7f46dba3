import { getApiInterfaceOptions, getRoutes, isApiInterface, RouteMetadata } from './decorators';
import { ContractError } from './errors';
import { ApiType, BodyType, configKey, ExpanderClass, MethodMetadata } from './MethodMetadata';
import { RequestTemplate } from './RequestTemplate';

/**
 * Member names every generated client defines itself.
 */
export const RESERVED_METHOD_NAMES: ReadonlySet<string> = new Set([
    'equals',
    'hashCode',
    'toString',
    'target',
    'request',
    'asyncRequest',
]);

/**
 * Turns an API prototype into one MethodMetadata per callable method, in
 * declaration order. Must be deterministic for a given type.
 */
export interface Contract {
    parse<T>(apiType: ApiType<T>): MethodMetadata[];
}

interface HeaderLine {
    name: string;
    value: string;
}

function parseHeaderLine(line: string, where: string): HeaderLine {
    const colon = line.indexOf(':');
    if (colon <= 0) {
        throw new ContractError(`Header '${line}' on ${where} must be formatted as 'Name: value'`);
    }
    return { name: line.substring(0, colon).trim(), value: line.substring(colon + 1).trim() };
}

/**
 * Reads the declarations left by @ApiInterface, @Get/@Post/..., @Path,
 * @RequestHeaders, @BodyTemplate, @ResponseType, @Param and @Url.
 *
 * Parameter rules:
 * - @Url(): raw base url (one per method)
 * - @Param(name): bound to `{name}`; a form field when no url, query or header uses it
 * - undecorated: the body (one per method, never together with form fields)
 */
export class DecoratorContract implements Contract {
    parse<T>(apiType: ApiType<T>): MethodMetadata[] {
        const apiName = apiType.name || 'Unknown';
        if (!isApiInterface(apiType)) {
            throw new ContractError(`Class ${apiName} must be decorated with @ApiInterface()`);
        }

        const apiHeaders = getApiInterfaceOptions(apiType).headers;
        const routes = getRoutes(apiType);
        this.checkEveryMethodRouted(apiName, apiType, routes);

        const result: MethodMetadata[] = [];
        const seenKeys = new Set<string>();

        for (const route of routes) {
            const metadata = this.parseRoute(apiName, apiType, route, apiHeaders);
            if (seenKeys.has(metadata.configKey)) {
                throw new ContractError(`Duplicate method ${metadata.configKey}`);
            }
            seenKeys.add(metadata.configKey);
            result.push(metadata);
        }
        return result;
    }

    /**
     * A prototype method without decorators would exist on the API type but not
     * on the generated client.
     */
    private checkEveryMethodRouted<T>(apiName: string, apiType: ApiType<T>, routes: readonly RouteMetadata[]): void {
        const prototype: unknown = apiType.prototype;
        if (typeof prototype !== 'object' || prototype === null) {
            return;
        }
        const routed = new Set(routes.map((route) => route.methodName));
        for (const name of Object.getOwnPropertyNames(prototype)) {
            if (name === 'constructor' || routed.has(name)) {
                continue;
            }
            const descriptor = Object.getOwnPropertyDescriptor(prototype, name);
            if (descriptor && typeof descriptor.value === 'function') {
                throw new ContractError(
                    `Method ${apiName}.${name} is missing an HTTP method decorator such as @Get() or @Post()`,
                );
            }
        }
    }

    private parseRoute<T>(apiName: string, apiType: ApiType<T>, route: RouteMetadata, apiHeaders: readonly string[]): MethodMetadata {
        const where = `${apiName}.${route.methodName}`;
        if (RESERVED_METHOD_NAMES.has(route.methodName)) {
            throw new ContractError(`Method name '${route.methodName}' on ${apiName} is reserved by generated clients`);
        }
        if (!route.httpMethod) {
            throw new ContractError(`Method ${where} is missing an HTTP method decorator such as @Get() or @Post()`);
        }

        const template = new RequestTemplate().method(route.httpMethod).append(route.path);
        const headers = new Map<string, string[]>();
        for (const line of apiHeaders) {
            const header = parseHeaderLine(line, apiName);
            headers.set(header.name, [...(headers.get(header.name) ?? []), header.value]);
        }
        const methodHeaders = new Map<string, string[]>();
        for (const line of route.headers) {
            const header = parseHeaderLine(line, where);
            methodHeaders.set(header.name, [...(methodHeaders.get(header.name) ?? []), header.value]);
        }
        for (const [name, values] of methodHeaders) {
            headers.set(name, values);
        }
        for (const [name, values] of headers) {
            template.header(name, ...values);
        }
        if (route.bodyTemplate !== undefined) {
            template.bodyTemplate(route.bodyTemplate);
        }

        const indexToName = new Map<number, string[]>();
        const indexToExpanderClass = new Map<number, ExpanderClass>();
        const formParams: string[] = [];
        let urlIndex: number | undefined;
        let bodyIndex: number | undefined;
        let bodyType: BodyType | undefined;

        const prototype: unknown = apiType.prototype;
        const method: unknown =
            typeof prototype === 'object' && prototype !== null ? Reflect.get(prototype, route.methodName) : undefined;
        const declaredCount = typeof method === 'function' ? method.length : 0;
        const parameterCount = Math.max(route.parameterTypes.length, declaredCount);

        for (let i = 0; i < parameterCount; i++) {
            const param = route.params.get(i);
            if (!param) {
                if (bodyIndex !== undefined) {
                    throw new ContractError(`Method ${where} has too many body parameters`);
                }
                bodyIndex = i;
                bodyType = route.parameterTypes[i] ?? Object;
                continue;
            }
            if (param.kind === 'url') {
                if (urlIndex !== undefined) {
                    throw new ContractError(`Method ${where} has more than one @Url() parameter`);
                }
                urlIndex = i;
                continue;
            }
            const name = param.name ?? '';
            indexToName.set(i, [...(indexToName.get(i) ?? []), name]);
            if (param.expander) {
                indexToExpanderClass.set(i, param.expander);
            }
            if (!template.hasRequestVariable(name) && !formParams.includes(name)) {
                formParams.push(name);
            }
        }

        if (bodyIndex !== undefined && formParams.length > 0) {
            throw new ContractError(
                `Method ${where} mixes a body parameter with form parameters [${formParams.join(', ')}]`,
            );
        }

        return new MethodMetadata({
            configKey: configKey(apiName, route.methodName, route.parameterTypes),
            methodName: route.methodName,
            template,
            indexToName,
            indexToExpanderClass,
            formParams,
            urlIndex,
            bodyIndex,
            bodyType,
            returnType: route.returnType,
        });
    }
}
