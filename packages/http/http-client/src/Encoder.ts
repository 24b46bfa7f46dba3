import { toError } from '@declarest/core-util';
import { BodyType, EncodeError, RequestTemplate } from '@declarest/http-api';

/**
 * Writes a body (or a form, as a `Map<string, unknown>` with FORM_MAP_TYPE)
 * onto the template. Errors abort the call before anything is sent.
 */
export interface Encoder {
    encode(value: unknown, bodyType: BodyType, template: RequestTemplate): void;
}

function hasHeader(template: RequestTemplate, name: string): boolean {
    const wanted = name.toLowerCase();
    return [...template.headers().keys()].some((key) => key.toLowerCase() === wanted);
}

/**
 * - Map: `application/x-www-form-urlencoded`, absent values skipped, arrays repeated
 * - string: written as is
 * - Uint8Array: raw bytes
 * - anything else: JSON with `Content-Type: application/json` unless one is set
 */
export class DefaultEncoder implements Encoder {
    encode(value: unknown, bodyType: BodyType, template: RequestTemplate): void {
        if (value instanceof Map) {
            this.encodeForm(value, template);
            return;
        }
        if (typeof value === 'string') {
            template.body(value);
            return;
        }
        if (value instanceof Uint8Array) {
            if (!hasHeader(template, 'Content-Type')) {
                template.header('Content-Type', 'application/octet-stream');
            }
            template.body(value);
            return;
        }

        let json: string | undefined;
        try {
            json = JSON.stringify(value);
        } catch (err: unknown) {
            const error = toError(err);
            throw new EncodeError(`Could not write ${bodyType.name || 'body'} as JSON: ${error.message}`, error);
        }
        if (json === undefined) {
            throw new EncodeError(`${bodyType.name || 'body'} value ${String(value)} has no JSON form`);
        }
        if (!hasHeader(template, 'Content-Type')) {
            template.header('Content-Type', 'application/json');
        }
        template.body(json);
    }

    private encodeForm(fields: Map<unknown, unknown>, template: RequestTemplate): void {
        const form = new URLSearchParams();
        for (const [name, value] of fields) {
            if (value === null || value === undefined) {
                continue;
            }
            const values: unknown[] = Array.isArray(value) ? value : [value];
            for (const item of values) {
                form.append(String(name), String(item));
            }
        }
        template.header('Content-Type', 'application/x-www-form-urlencoded; charset=UTF-8');
        template.body(form.toString());
    }
}
