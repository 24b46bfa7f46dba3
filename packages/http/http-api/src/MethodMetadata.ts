import { RequestTemplate } from './RequestTemplate';

/**
 * Turns one argument into its string form before it is bound, e.g. a Date into
 * an ISO day. Instantiated once per method through its no-arg constructor.
 */
export interface Expander {
    expand(value: unknown): string;
}

export type ExpanderClass = new () => Expander;

/**
 * An API prototype class, e.g. `abstract class UserApiPrototype`.
 */
export type ApiType<T> = Function & { prototype: T };

/**
 * Declared type of a body argument, from `design:paramtypes`.
 */
export type BodyType = Function;

/**
 * Body type handed to the encoder for form-encoded methods; the value is a
 * `Map<string, unknown>` of the form fields.
 */
export const FORM_MAP_TYPE: BodyType = Map;

/**
 * `UserApi#getUser(String,Number)`: unique within one API as long as
 * method names are.
 */
export function configKey(apiName: string, methodName: string, parameterTypes: readonly BodyType[]): string {
    const params = parameterTypes.map((type) => type.name || 'Object').join(',');
    return `${apiName}#${methodName}(${params})`;
}

export interface MethodMetadataInit {
    configKey: string;
    methodName: string;
    template: RequestTemplate;
    indexToName?: ReadonlyMap<number, readonly string[]>;
    indexToExpanderClass?: ReadonlyMap<number, ExpanderClass>;
    formParams?: readonly string[];
    urlIndex?: number;
    bodyIndex?: number;
    bodyType?: BodyType;
    returnType?: BodyType;
}

/**
 * MethodMetadata - Everything needed to turn one method's arguments into a request.
 *
 * Produced once per API by a Contract and frozen. `template` is the unresolved
 * skeleton; template factories always work on a copy of it.
 */
export class MethodMetadata {
    readonly configKey: string;
    readonly methodName: string;
    readonly template: RequestTemplate;
    readonly indexToName: ReadonlyMap<number, readonly string[]>;
    readonly indexToExpanderClass: ReadonlyMap<number, ExpanderClass>;
    readonly formParams: readonly string[];
    readonly urlIndex?: number;
    readonly bodyIndex?: number;
    readonly bodyType?: BodyType;
    /**
     * Declared with `@ResponseType()`; `design:returntype` is always Promise.
     */
    readonly returnType?: BodyType;

    constructor(init: MethodMetadataInit) {
        this.configKey = init.configKey;
        this.methodName = init.methodName;
        this.template = init.template;
        this.indexToName = init.indexToName ?? new Map();
        this.indexToExpanderClass = init.indexToExpanderClass ?? new Map();
        this.formParams = Object.freeze([...(init.formParams ?? [])]);
        this.urlIndex = init.urlIndex;
        this.bodyIndex = init.bodyIndex;
        this.bodyType = init.bodyType;
        this.returnType = init.returnType;
        Object.freeze(this);
    }
}
