/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Math utilities
// =============================================================================

/**
 * Clamp a value into [0, 1]; NaN and infinities become 0
 */
export function clampUnit(value: number): number {
    if (!Number.isFinite(value)) return 0;
    if (value < 0) return 0;
    if (value > 1) return 1;
    return value;
}

/**
 * Divide, resolving a zero or non-finite denominator to 0
 */
export function safeRatio(numerator: number, denominator: number): number {
    if (denominator === 0 || !Number.isFinite(denominator)) return 0;
    const ratio = numerator / denominator;
    return Number.isFinite(ratio) ? ratio : 0;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

// =============================================================================
// Collection utilities
// =============================================================================

/**
 * Frozen read-only view over a private copy of the values.
 * Unlike Object.freeze on a Set, the view exposes no mutators at runtime.
 */
export function readonlySet<T>(values: Iterable<T>): ReadonlySet<T> {
    const inner = new Set(values);
    const view: ReadonlySet<T> = {
        get size() {
            return inner.size;
        },
        has: (value: T) => inner.has(value),
        forEach(callbackfn: (value: T, value2: T, set: ReadonlySet<T>) => void, thisArg?: unknown): void {
            inner.forEach((value, key) => callbackfn.call(thisArg, value, key, view));
        },
        entries: () => inner.entries(),
        keys: () => inner.keys(),
        values: () => inner.values(),
        [Symbol.iterator]: () => inner.values(),
    };
    return Object.freeze(view);
}

/**
 * Frozen read-only view over a private copy of the entries
 */
export function readonlyMap<K, V>(entries: Iterable<readonly [K, V]>): ReadonlyMap<K, V> {
    const inner = new Map(entries);
    const view: ReadonlyMap<K, V> = {
        get size() {
            return inner.size;
        },
        get: (key: K) => inner.get(key),
        has: (key: K) => inner.has(key),
        forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
            inner.forEach((value, key) => callbackfn.call(thisArg, value, key, view));
        },
        entries: () => inner.entries(),
        keys: () => inner.keys(),
        values: () => inner.values(),
        [Symbol.iterator]: () => inner.entries(),
    };
    return Object.freeze(view);
}

// =============================================================================
// Sorting utilities
// =============================================================================

/**
 * Interface for items ranked by score with a corpus-wide ordinal tie-break
 */
export interface OrdinalScored {
    score: number;
    ordinalIndex: number;
    inputIndex: number;
}

/**
 * Sort by score descending, then ordinalIndex ascending, then input position ascending.
 * Returns a new sorted array (does not mutate input)
 */
export function sortByScoreThenOrdinal<T extends OrdinalScored>(items: readonly T[]): T[] {
    return [...items].sort((a, b) => {
        const scoreDiff = b.score - a.score;
        if (scoreDiff !== 0) return scoreDiff;
        const ordinalDiff = a.ordinalIndex - b.ordinalIndex;
        if (ordinalDiff !== 0) return ordinalDiff;
        return a.inputIndex - b.inputIndex;
    });
}
