import { toError } from '@declarest/core-util';
import { BodyType, DecodeError, HttpResponse } from '@declarest/http-api';

/**
 * Turns a successful response into the value the API method returns.
 */
export interface Decoder {
    decode(response: HttpResponse, returnType?: BodyType): unknown;
}

/**
 * An empty body (or 204) is undefined, `@ResponseType(String)` gets the raw
 * text, everything else is parsed as JSON.
 */
export class JsonDecoder implements Decoder {
    decode(response: HttpResponse, returnType?: BodyType): unknown {
        if (response.status === 204 || response.body.length === 0) {
            return undefined;
        }
        if (returnType === String) {
            return response.body;
        }
        try {
            const parsed: unknown = JSON.parse(response.body);
            return parsed;
        } catch (err: unknown) {
            const error = toError(err);
            throw new DecodeError(
                `Could not read response of ${response.request.method} ${response.request.url} as JSON: ${error.message}`,
                error,
            );
        }
    }
}
