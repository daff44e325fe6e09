/**
 * Ordering helpers shared by the statement renderers.
 */

export interface Keyed {
    readonly key: string;
}

export function compareKeys(a: Keyed, b: Keyed): number {
    if (a.key < b.key) return -1;
    if (a.key > b.key) return 1;
    return 0;
}

export function sortByKey<T extends Keyed>(items: Iterable<T>): T[] {
    return [...items].sort(compareKeys);
}

/**
 * Collect items into a map keyed by `key`, keeping the first of each.
 */
export function uniqueByKey<T extends Keyed>(items: Iterable<T>): Map<string, T> {
    const unique = new Map<string, T>();
    for (const item of items) {
        if (!unique.has(item.key)) {
            unique.set(item.key, item);
        }
    }
    return unique;
}
