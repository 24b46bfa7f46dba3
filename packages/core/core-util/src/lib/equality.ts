/**
 * Values that define their own equality, the way targets and routing keys can.
 */
export interface Equatable {
    equals(other: unknown): boolean;
}

function isEquatable(value: unknown): value is Equatable {
    return (
        value !== null &&
        typeof value === 'object' &&
        'equals' in value &&
        typeof value.equals === 'function'
    );
}

/**
 * Value equality: a self-defined `equals()` wins, everything else uses Object.is.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
    if (Object.is(a, b)) {
        return true;
    }
    if (isEquatable(a)) {
        return a.equals(b);
    }
    return false;
}

/**
 * Element-wise list equality, same length and same order.
 */
export function listEquals<T>(a: readonly T[], b: readonly T[]): boolean {
    if (a === b) {
        return true;
    }
    if (a.length !== b.length) {
        return false;
    }
    for (let i = 0; i < a.length; i++) {
        if (!valueEquals(a[i], b[i])) {
            return false;
        }
    }
    return true;
}

/**
 * 32-bit string hash (s[0]*31^(n-1) + ... + s[n-1]).
 */
export function hashString(value: string): number {
    let hash = 0;
    for (let i = 0; i < value.length; i++) {
        hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
    }
    return hash;
}
