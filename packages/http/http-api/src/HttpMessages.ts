export type HttpBody = string | Uint8Array;

function findHeader(headers: ReadonlyMap<string, readonly string[]>, name: string): readonly string[] | undefined {
    const wanted = name.toLowerCase();
    for (const [key, values] of headers) {
        if (key.toLowerCase() === wanted) {
            return values;
        }
    }
    return undefined;
}

/**
 * A fully resolved, dispatch-ready request. Produced by RequestTemplate.request()
 * and never modified afterwards.
 */
export class HttpRequest {
    constructor(
        readonly method: string,
        readonly url: string,
        readonly headers: ReadonlyMap<string, readonly string[]>,
        readonly body?: HttpBody,
        readonly charset: string = 'utf-8',
    ) {}

    /**
     * First value of a header, matched case-insensitively.
     */
    header(name: string): string | undefined {
        return findHeader(this.headers, name)?.[0];
    }

    toString(): string {
        return `${this.method} ${this.url}`;
    }
}

/**
 * What a Transport hands back. Header names are kept as received.
 */
export class HttpResponse {
    constructor(
        readonly status: number,
        readonly reason: string,
        readonly headers: ReadonlyMap<string, readonly string[]>,
        readonly body: string,
        readonly request: HttpRequest,
    ) {}

    /**
     * 2xx, except 266 which carries a user error (see HttpUserError).
     */
    get ok(): boolean {
        return this.status >= 200 && this.status < 300 && this.status !== 266;
    }

    header(name: string): string | undefined {
        return findHeader(this.headers, name)?.[0];
    }
}
