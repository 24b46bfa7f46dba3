import { Expander } from './MethodMetadata';

function toDate(value: unknown): Date {
    if (value instanceof Date) {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'string') {
        return new Date(value);
    }
    throw new TypeError(`Cannot expand ${typeof value} as a date`);
}

/**
 * `String(value)`; what happens to a parameter without an expander.
 */
export class ToStringExpander implements Expander {
    expand(value: unknown): string {
        return String(value);
    }
}

/**
 * An absolute point in time as ISO-8601 UTC, e.g. `2024-12-03T14:30:00.000Z`.
 * Accepts a Date, epoch millis or anything `new Date()` parses.
 */
export class InstantExpander implements Expander {
    expand(value: unknown): string {
        return toDate(value).toISOString();
    }
}

/**
 * The UTC calendar day, `YYYY-MM-DD`.
 */
export class IsoDateExpander implements Expander {
    expand(value: unknown): string {
        const date = toDate(value);
        const month = (date.getUTCMonth() + 1).toString().padStart(2, '0');
        const day = date.getUTCDate().toString().padStart(2, '0');
        return `${date.getUTCFullYear()}-${month}-${day}`;
    }
}

/**
 * Comma separated list, for servers that want `ids=1,2,3` rather than repeated queries.
 */
export class CsvExpander implements Expander {
    expand(value: unknown): string {
        return Array.isArray(value) ? value.map((item) => String(item)).join(',') : String(value);
    }
}
