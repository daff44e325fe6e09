/**
 * Shared enumeration utilities.
 * Used by: evidence deduplication, argument listing, CLI output limits.
 */

/**
 * Yield at most `limit` items.
 */
export function* take<T>(items: Iterable<T>, limit: number): Generator<T> {
    if (limit <= 0) return;
    let count = 0;
    for (const item of items) {
        yield item;
        if (++count >= limit) return;
    }
}

/**
 * Yield items whose key has not been seen before.
 */
export function* distinctBy<T>(items: Iterable<T>, keyOf: (item: T) => string): Generator<T> {
    const seen = new Set<string>();
    for (const item of items) {
        const key = keyOf(item);
        if (!seen.has(key)) {
            seen.add(key);
            yield item;
        }
    }
}
