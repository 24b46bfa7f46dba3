import { RequestTemplate } from '@declarest/http-api';

/**
 * Runs on the resolved template of every attempt, in registration order, right
 * before the target turns it into a request.
 */
export interface RequestInterceptor {
    apply(template: RequestTemplate): void;
}

/**
 * Appends fixed header values; what a client built with header suppliers gets
 * after its explicit interceptors.
 */
export class HeadersInterceptor implements RequestInterceptor {
    private readonly headers: ReadonlyMap<string, readonly string[]>;

    constructor(headers: ReadonlyMap<string, readonly string[]>) {
        this.headers = new Map(headers);
    }

    apply(template: RequestTemplate): void {
        for (const [name, values] of this.headers) {
            const existing = template.headers().get(name) ?? [];
            template.header(name, ...existing, ...values);
        }
    }

    toString(): string {
        return `HeadersInterceptor(${[...this.headers.keys()].join(', ')})`;
    }
}
