import { checkNotNull, toError } from '@declarest/core-util';
import {
    BodyType,
    EncodeError,
    Expander,
    FORM_MAP_TYPE,
    MethodMetadata,
    RequestTemplate,
} from '@declarest/http-api';
import { Encoder } from './Encoder';

/**
 * Builds the resolved template for one call of one method. Never modifies the
 * method's own template.
 */
export interface RequestTemplateFactory {
    create(args: readonly unknown[]): RequestTemplate;
}

function encodeOrThrow(encoder: Encoder, value: unknown, bodyType: BodyType, template: RequestTemplate, configKey: string): void {
    try {
        encoder.encode(value, bodyType, template);
    } catch (err: unknown) {
        const error = toError(err);
        if (error instanceof EncodeError) {
            throw error;
        }
        throw new EncodeError(`Could not encode the body of ${configKey}: ${error.message}`, error);
    }
}

/**
 * Positional binding shared by every variant:
 * - null and undefined arguments are skipped, so their placeholders stay absent
 * - an expander turns the whole argument into a string, arrays included
 * - one argument may fill several names
 * - the `@Url()` argument must be present and is prefixed onto the url
 */
export class PlainTemplateFactory implements RequestTemplateFactory {
    private readonly expanders = new Map<number, Expander>();

    constructor(protected readonly metadata: MethodMetadata) {
        for (const [index, expanderClass] of metadata.indexToExpanderClass) {
            this.expanders.set(index, new expanderClass());
        }
    }

    create(args: readonly unknown[]): RequestTemplate {
        const template = new RequestTemplate(this.metadata.template);

        if (this.metadata.urlIndex !== undefined) {
            const url = checkNotNull(args[this.metadata.urlIndex], 'URI parameter %s was null', this.metadata.urlIndex);
            template.insert(0, String(url));
        }

        const variables = new Map<string, unknown>();
        for (const [index, names] of this.metadata.indexToName) {
            const raw = args[index];
            if (raw === null || raw === undefined) {
                continue;
            }
            const value = this.expandArgument(index, raw);
            for (const name of names) {
                variables.set(name, value);
            }
        }
        return this.resolve(args, template, variables);
    }

    protected resolve(args: readonly unknown[], template: RequestTemplate, variables: Map<string, unknown>): RequestTemplate {
        return template.resolve(variables);
    }

    private expandArgument(index: number, raw: unknown): unknown {
        const expander = this.expanders.get(index);
        return expander ? expander.expand(raw) : raw;
    }
}

/**
 * Form fields are handed to the encoder as a Map; every variable still resolves
 * the url, queries and headers.
 */
export class FormEncodedTemplateFactory extends PlainTemplateFactory {
    constructor(
        metadata: MethodMetadata,
        private readonly encoder: Encoder,
    ) {
        super(metadata);
    }

    protected resolve(args: readonly unknown[], template: RequestTemplate, variables: Map<string, unknown>): RequestTemplate {
        const formVariables = new Map<string, unknown>();
        for (const [name, value] of variables) {
            if (this.metadata.formParams.includes(name)) {
                formVariables.set(name, value);
            }
        }
        encodeOrThrow(this.encoder, formVariables, FORM_MAP_TYPE, template, this.metadata.configKey);
        return super.resolve(args, template, variables);
    }
}

/**
 * The body argument must be present and goes through the encoder with its
 * declared type. Form fields are never encoded here.
 */
export class BodyEncodedTemplateFactory extends PlainTemplateFactory {
    constructor(
        metadata: MethodMetadata,
        private readonly encoder: Encoder,
        private readonly bodyIndex: number,
    ) {
        super(metadata);
    }

    protected resolve(args: readonly unknown[], template: RequestTemplate, variables: Map<string, unknown>): RequestTemplate {
        const body = checkNotNull(args[this.bodyIndex], 'Body parameter %s was null', this.bodyIndex);
        encodeOrThrow(this.encoder, body, this.metadata.bodyType ?? Object, template, this.metadata.configKey);
        return super.resolve(args, template, variables);
    }
}

/**
 * Picks the variant once per method: a body index wins, then form fields
 * (unless a body template takes them), then plain.
 */
export function createTemplateFactory(metadata: MethodMetadata, encoder: Encoder): RequestTemplateFactory {
    if (metadata.bodyIndex !== undefined) {
        return new BodyEncodedTemplateFactory(metadata, encoder, metadata.bodyIndex);
    }
    if (metadata.formParams.length > 0 && metadata.template.getBodyTemplate() === undefined) {
        return new FormEncodedTemplateFactory(metadata, encoder);
    }
    return new PlainTemplateFactory(metadata);
}

export function buildTemplateFactories(
    metadata: readonly MethodMetadata[],
    encoder: Encoder,
): Map<string, RequestTemplateFactory> {
    const factories = new Map<string, RequestTemplateFactory>();
    for (const md of metadata) {
        factories.set(md.configKey, createTemplateFactory(md, encoder));
    }
    return factories;
}
