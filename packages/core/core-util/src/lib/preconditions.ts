/**
 * PreconditionError - a caller broke a method's contract before any work started
 * (a required argument was null, a builder was given an invalid value).
 *
 * Never retried. Clients surface it to the caller before anything is sent.
 */
export class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Formats `%s` placeholders positionally.
 */
function format(template: string, args: unknown[]): string {
    let i = 0;
    return template.replace(/%s/g, (match) => (i < args.length ? String(args[i++]) : match));
}

/**
 * Throws PreconditionError with the formatted message when `condition` is false.
 */
export function checkArgument(condition: boolean, message: string, ...args: unknown[]): void {
    if (!condition) {
        throw new PreconditionError(format(message, args));
    }
}

/**
 * Returns `value` narrowed to non-nullable, or throws PreconditionError.
 */
export function checkNotNull<T>(value: T | null | undefined, message: string, ...args: unknown[]): T {
    if (value === null || value === undefined) {
        throw new PreconditionError(format(message, args));
    }
    return value;
}
