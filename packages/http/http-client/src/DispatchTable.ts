import { checkNotNull } from '@declarest/core-util';
import { MethodMetadata } from '@declarest/http-api';
import { ClientConfig } from './ClientConfig';
import { MethodHandler } from './MethodHandler';
import { RequestInterceptor } from './RequestInterceptor';
import { Target } from './Target';
import { RequestTemplateFactory } from './TemplateFactory';

/**
 * configKey → MethodHandler for one generated client, plus the method-name
 * index the client's functions dispatch through. Built in one pass and never
 * changed afterwards.
 */
export class DispatchTable {
    private readonly byConfigKey = new Map<string, MethodHandler>();
    private readonly configKeyByMethod = new Map<string, string>();

    constructor(handlers: readonly MethodHandler[]) {
        for (const handler of handlers) {
            this.byConfigKey.set(handler.metadata.configKey, handler);
            this.configKeyByMethod.set(handler.metadata.methodName, handler.metadata.configKey);
        }
    }

    handler(configKey: string): MethodHandler | undefined {
        return this.byConfigKey.get(configKey);
    }

    handlerForMethod(methodName: string): MethodHandler | undefined {
        const configKey = this.configKeyByMethod.get(methodName);
        return configKey === undefined ? undefined : this.handler(configKey);
    }

    /**
     * Names the generated client defines, in declaration order.
     */
    methodNames(): string[] {
        return [...this.configKeyByMethod.keys()];
    }
}

/**
 * One MethodHandler per method, all sharing the target, config and interceptors.
 */
export function buildDispatchTable<T>(
    target: Target<T>,
    metadata: readonly MethodMetadata[],
    factories: ReadonlyMap<string, RequestTemplateFactory>,
    config: ClientConfig,
    interceptors: readonly RequestInterceptor[],
): DispatchTable {
    const frozenInterceptors = Object.freeze([...interceptors]);
    const handlers = metadata.map((md) => {
        const factory = checkNotNull(factories.get(md.configKey), 'No template factory for %s', md.configKey);
        return new MethodHandler(md, target, factory, config, frozenInterceptors);
    });
    return new DispatchTable(handlers);
}
