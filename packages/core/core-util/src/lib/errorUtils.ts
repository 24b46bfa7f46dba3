/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in declarest funnels the caught value through toError() so
 * that downstream code (retry decisions, logging, error wrapping) always sees an
 * Error instance:
 * ```typescript
 * try {
 *     encoder.encode(body, bodyType, template);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     throw new EncodeError(error.message, error);
 * }
 * ```
 *
 * Where an error is deliberately dropped, leave the conversion commented out so
 * the intent is visible:
 * ```typescript
 * } catch (err: unknown) {
 *     //const error = toError(err);
 * }
 * ```
 */

/**
 * Converts whatever was thrown into an Error.
 *
 * - Error instances (including subclasses) are returned unchanged.
 * - Objects with a `message` keep that message plus any string `name`/`stack`.
 * - Other objects are JSON-stringified into the message.
 * - Primitives become `String(value)`; null and undefined get a fixed message.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));
            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }
            return error;
        }

        try {
            return new Error(`Non-Error object thrown: ${JSON.stringify(err)}`);
        } catch (stringifyErr: unknown) {
            // toError() cannot recurse into itself here; a circular structure is the usual cause
            void stringifyErr;
            return new Error('Non-Error object thrown (unable to stringify)');
        }
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}
