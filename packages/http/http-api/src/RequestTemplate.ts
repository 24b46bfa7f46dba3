import { HttpBody, HttpRequest } from './HttpMessages';

/**
 * Expands `{name}` placeholders. `{{` writes a literal brace; placeholders with
 * no value are left as written.
 */
export function expand(template: string, variables: ReadonlyMap<string, string>): string {
    if (template.length < 3) {
        return template;
    }
    let inVar = false;
    let name = '';
    let out = '';
    for (const c of template) {
        if (c === '{') {
            if (inVar && name.length === 0) {
                out += '{';
                inVar = false;
            } else {
                if (inVar) {
                    out += `{${name}`;
                }
                inVar = true;
                name = '';
            }
        } else if (c === '}' && inVar) {
            const value = variables.get(name);
            out += value !== undefined ? value : `{${name}}`;
            inVar = false;
        } else if (inVar) {
            name += c;
        } else {
            out += c;
        }
    }
    return inVar ? `${out}{${name}` : out;
}

/**
 * Name of the variable when `value` is exactly one placeholder, e.g. `{id}`.
 */
function soleVariable(value: string): string | undefined {
    if (value.length > 2 && value.startsWith('{') && value.endsWith('}') && value.indexOf('{', 1) === -1) {
        return value.substring(1, value.length - 1);
    }
    return undefined;
}

function stringify(value: unknown): string {
    return typeof value === 'string' ? value : String(value);
}

/**
 * RequestTemplate - An HTTP request under construction.
 *
 * Method metadata holds one unresolved template per method. Each call copies it,
 * lets the template factory, the encoder and the interceptors fill it in, resolves
 * placeholders against the call's arguments and finally turns it into an
 * immutable HttpRequest.
 *
 * Resolution rules:
 * - url: values are percent-encoded (`/` kept), unknown placeholders stay literal
 * - query: a value that is a lone placeholder is dropped when the variable is
 *   absent, arrays expand to repeated values, and a query left empty is removed
 * - headers: same dropping rule as query values, no encoding
 * - body template: raw values
 */
export class RequestTemplate {
    private httpMethod = '';
    private urlValue = '';
    private readonly queryMap = new Map<string, string[]>();
    private readonly headerMap = new Map<string, string[]>();
    private bodyValue?: HttpBody;
    private bodyTemplateValue?: string;
    private charsetValue = 'utf-8';
    private decodeSlashValue = true;
    private resolvedVariables?: ReadonlyMap<string, unknown>;

    constructor(toCopy?: RequestTemplate) {
        if (toCopy) {
            this.httpMethod = toCopy.httpMethod;
            this.urlValue = toCopy.urlValue;
            for (const [name, values] of toCopy.queryMap) {
                this.queryMap.set(name, [...values]);
            }
            for (const [name, values] of toCopy.headerMap) {
                this.headerMap.set(name, [...values]);
            }
            this.bodyValue = toCopy.bodyValue;
            this.bodyTemplateValue = toCopy.bodyTemplateValue;
            this.charsetValue = toCopy.charsetValue;
            this.decodeSlashValue = toCopy.decodeSlashValue;
            this.resolvedVariables = toCopy.resolvedVariables;
        }
    }

    method(method: string): this {
        this.httpMethod = method.toUpperCase();
        return this;
    }

    getMethod(): string {
        return this.httpMethod;
    }

    /**
     * Appends to the url; anything after `?` is parsed into queries.
     */
    append(value: string): this {
        const queryStart = value.indexOf('?');
        if (queryStart === -1) {
            this.urlValue += value;
            return this;
        }
        this.urlValue += value.substring(0, queryStart);
        this.parseQueryLine(value.substring(queryStart + 1));
        return this;
    }

    /**
     * Inserts a raw segment into the url, typically a base url at position 0.
     */
    insert(position: number, value: string): this {
        this.urlValue = this.urlValue.substring(0, position) + value + this.urlValue.substring(position);
        return this;
    }

    url(): string {
        return this.urlValue;
    }

    /**
     * Replaces the values of a query; no values removes it.
     */
    query(name: string, ...values: string[]): this {
        if (values.length === 0) {
            this.queryMap.delete(name);
        } else {
            this.queryMap.set(name, [...values]);
        }
        return this;
    }

    queries(): ReadonlyMap<string, readonly string[]> {
        return this.queryMap;
    }

    /**
     * Replaces the values of a header; no values removes it.
     */
    header(name: string, ...values: string[]): this {
        if (values.length === 0) {
            this.headerMap.delete(name);
        } else {
            this.headerMap.set(name, [...values]);
        }
        return this;
    }

    headers(): ReadonlyMap<string, readonly string[]> {
        return this.headerMap;
    }

    /**
     * Sets a literal body and clears any body template.
     */
    body(body: HttpBody | undefined, charset?: string): this {
        this.bodyValue = body;
        this.bodyTemplateValue = undefined;
        if (charset) {
            this.charsetValue = charset;
        }
        return this;
    }

    getBody(): HttpBody | undefined {
        return this.bodyValue;
    }

    /**
     * Sets a body template, expanded on resolve(), and clears any literal body.
     */
    bodyTemplate(template: string): this {
        this.bodyTemplateValue = template;
        this.bodyValue = undefined;
        return this;
    }

    getBodyTemplate(): string | undefined {
        return this.bodyTemplateValue;
    }

    charset(): string {
        return this.charsetValue;
    }

    decodeSlash(decodeSlash: boolean): this {
        this.decodeSlashValue = decodeSlash;
        return this;
    }

    /**
     * True when `{name}` appears in the url, a query value or a header value.
     * The body template does not count.
     */
    hasRequestVariable(name: string): boolean {
        const placeholder = `{${name}}`;
        if (this.urlValue.includes(placeholder)) {
            return true;
        }
        for (const values of [...this.queryMap.values(), ...this.headerMap.values()]) {
            if (values.some((v) => v.includes(placeholder))) {
                return true;
            }
        }
        return false;
    }

    /**
     * Expands placeholders against `variables`. The map is recorded and exposed
     * through variables(); absent entries stay absent.
     */
    resolve(variables: ReadonlyMap<string, unknown>): this {
        const encoded = new Map<string, string>();
        const raw = new Map<string, string>();
        for (const [name, value] of variables) {
            if (value === null || value === undefined) {
                continue;
            }
            raw.set(name, stringify(value));
            encoded.set(name, this.encode(stringify(value)));
        }

        this.urlValue = expand(this.urlValue, encoded);
        this.resolveQueries(variables, encoded);
        this.resolveHeaders(raw);
        if (this.bodyTemplateValue !== undefined) {
            this.bodyValue = expand(this.bodyTemplateValue, raw);
            this.bodyTemplateValue = undefined;
        }
        this.resolvedVariables = new Map(variables);
        return this;
    }

    resolved(): boolean {
        return this.resolvedVariables !== undefined;
    }

    variables(): ReadonlyMap<string, unknown> {
        return this.resolvedVariables ?? new Map();
    }

    /**
     * `?a=1&b=2`, or an empty string without queries.
     */
    queryLine(): string {
        const parts: string[] = [];
        for (const [name, values] of this.queryMap) {
            if (values.length === 0) {
                parts.push(name);
            }
            for (const value of values) {
                parts.push(`${name}=${value}`);
            }
        }
        return parts.length > 0 ? `?${parts.join('&')}` : '';
    }

    /**
     * The immutable request for the transport.
     */
    request(): HttpRequest {
        const headers = new Map<string, readonly string[]>();
        for (const [name, values] of this.headerMap) {
            headers.set(name, [...values]);
        }
        return new HttpRequest(this.httpMethod, this.urlValue + this.queryLine(), headers, this.bodyValue, this.charsetValue);
    }

    toString(): string {
        return `${this.httpMethod} ${this.urlValue}${this.queryLine()}`;
    }

    private encode(value: string): string {
        const encoded = encodeURIComponent(value);
        return this.decodeSlashValue ? encoded.replace(/%2F/gi, '/') : encoded;
    }

    private parseQueryLine(queryLine: string): void {
        for (const pair of queryLine.split('&')) {
            if (pair.length === 0) {
                continue;
            }
            const eq = pair.indexOf('=');
            const name = eq === -1 ? pair : pair.substring(0, eq);
            const existing = this.queryMap.get(name) ?? [];
            if (eq !== -1) {
                existing.push(pair.substring(eq + 1));
            }
            this.queryMap.set(name, existing);
        }
    }

    private resolveQueries(variables: ReadonlyMap<string, unknown>, encoded: ReadonlyMap<string, string>): void {
        for (const [name, values] of [...this.queryMap]) {
            if (values.length === 0) {
                continue;
            }
            const resolved: string[] = [];
            for (const value of values) {
                const variable = soleVariable(value);
                if (variable === undefined) {
                    resolved.push(expand(value, encoded));
                    continue;
                }
                const variableValue = variables.get(variable);
                if (variableValue === undefined || variableValue === null) {
                    continue;
                }
                const items: unknown[] = Array.isArray(variableValue) ? variableValue : [variableValue];
                for (const item of items) {
                    resolved.push(this.encode(stringify(item)));
                }
            }
            if (resolved.length === 0) {
                this.queryMap.delete(name);
            } else {
                this.queryMap.set(name, resolved);
            }
        }
    }

    private resolveHeaders(raw: ReadonlyMap<string, string>): void {
        for (const [name, values] of [...this.headerMap]) {
            const resolved: string[] = [];
            for (const value of values) {
                const variable = soleVariable(value);
                if (variable !== undefined && !raw.has(variable)) {
                    continue;
                }
                resolved.push(expand(value, raw));
            }
            if (resolved.length === 0) {
                this.headerMap.delete(name);
            } else {
                this.headerMap.set(name, resolved);
            }
        }
    }
}
