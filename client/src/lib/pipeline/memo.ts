/**
 * Dependency-tracked memoization.
 *
 * A memo cell remembers the dependency values its cached result was computed
 * from and recomputes, lazily on `get`, only when one of them changed.
 * Async stages memoize the promise itself, so callers asking for the same
 * dependencies share one in-flight computation.
 */

export interface Memo<D extends readonly unknown[], T> {
    get(...deps: D): T;
    /** Drop the cached result; the next `get` recomputes. */
    invalidate(): void;
    /** Number of times `compute` has run. */
    readonly computations: number;
}

function sameValue(a: unknown, b: unknown): boolean {
    if (Object.is(a, b)) return true;
    if (a instanceof Date && b instanceof Date) return Object.is(a.getTime(), b.getTime());
    if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((item, index) => sameValue(item, b[index]));
    }
    return false;
}

export function depsEqual(a: readonly unknown[], b: readonly unknown[]): boolean {
    return a.length === b.length && a.every((dep, index) => sameValue(dep, b[index]));
}

export interface MemoOptions<D extends readonly unknown[]> {
    /**
     * Project the dependencies onto the values that decide freshness.
     * Defaults to the dependencies themselves.
     */
    key?: (...deps: D) => readonly unknown[];
}

export function memoize<D extends readonly unknown[], T>(
    compute: (...deps: D) => T,
    options: MemoOptions<D> = {}
): Memo<D, T> {
    const keyOf = options.key ?? ((...deps: D): readonly unknown[] => deps);
    let cache: { key: readonly unknown[]; value: T } | null = null;
    let computations = 0;

    return {
        get(...deps: D): T {
            const key = keyOf(...deps);
            if (cache && depsEqual(cache.key, key)) return cache.value;
            computations++;
            const value = compute(...deps);
            cache = { key, value };
            return value;
        },
        invalidate(): void {
            cache = null;
        },
        get computations(): number {
            return computations;
        }
    };
}
