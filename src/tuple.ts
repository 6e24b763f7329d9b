/**
 * @module tuple
 * @description
 * Immutable tuple and the binary search over it.
 *
 * * Features:
 * - `Tuple` is frozen on construction and hashed once.
 * - `binarySearch` and `Tuple#indexOf` take an optional comparator.
 * - `searchTrace` reports the indices compared, in order.
 */
import { compare, Comparable, Comparator, equals, hashValue, Structural } from './value';

/**
 * Immutable, fixed-size, random-access sequence.
 * The content hash is computed once upon construction.
 *
 * @template T - Element type
 */
export class Tuple<T> implements Structural, Iterable<T> {
    readonly #values: ReadonlyArray<T>;
    readonly hashCode: number;

    constructor(...values: T[]) {
        this.#values = Object.freeze(values.slice());
        let h = 0xDEF0;
        for (const v of this.#values) h = (Math.imul(31, h) + hashValue(v)) | 0;
        this.hashCode = h >>> 0;
    }

    static from<U>(values: Iterable<U>): Tuple<U> { return new Tuple(...values); }

    get raw(): ReadonlyArray<T> { return this.#values; }
    get length(): number { return this.#values.length; }

    /** Element at `index`, or `undefined` outside `0 <= index < length`. */
    at(index: number): T | undefined {
        return index >= 0 && index < this.#values.length ? this.#values[index] : undefined;
    }

    /**
     * Index of `el` in this (ascending) tuple, or -1.
     * @see binarySearch
     */
    indexOf(el: T, cmp: Comparator<T> = compare): number {
        return searchTrace(this, el, cmp).index;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple) || other.hashCode !== this.hashCode) return false;
        return equals(this.#values, other.raw);
    }

    *[Symbol.iterator](): Iterator<T> { yield* this.#values; }

    toString() { return `(${this.#values.join(', ')})`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** Result of {@link searchTrace}. */
export interface SearchTrace {
    /** Index of the element, or -1 when the search did not reach it. */
    readonly index: number;
    /** Every index compared against, in order. */
    readonly visited: readonly number[];
}

/**
 * Binary search with a collapsing step, reporting every index compared.
 *
 * The search starts at `floor(n / 2)`. When the value there is too large it
 * moves to `floor(i / 2)` (towards index 0, not the midpoint of the remaining
 * range); when it is too small it moves to `ceil((i + n) / 2)`.
 * It stops on a match. Without a match it gives up, returning -1, once it has
 * compared index 0 or `n - 1`, or when the next index was already compared.
 *
 * The collapsing step can skip a present element, so -1 means "not reached",
 * not "absent". A returned index always holds an element equal to `el`.
 */
export function searchTrace<T>(tuple: Tuple<T>, el: T, cmp: Comparator<T> = compare): SearchTrace {
    const values = tuple.raw;
    const n = values.length;
    const visited: number[] = [];
    if (n === 0) return { index: -1, visited };

    const seen = new Set<number>();
    let i = Math.floor(n / 2);

    while (true) {
        visited.push(i);
        seen.add(i);
        const c = cmp(values[i], el);
        if (c === 0) return { index: i, visited };
        if (i === 0 || i === n - 1) return { index: -1, visited };

        const next = c > 0 ? Math.floor(i / 2) : Math.ceil((i + n) / 2);
        if (seen.has(next)) return { index: -1, visited };
        i = next;
    }
}

/**
 * Returns the index of `el` in the ascending `tuple`, or -1 when the search
 * does not reach it. See {@link searchTrace} for the order indices are compared in.
 *
 * @example
 * binarySearch(new Tuple(1, 2, 3, 4, 5, 6), 3); // 2
 */
export function binarySearch<T extends Comparable>(tuple: Tuple<T>, el: T): number;
export function binarySearch<T>(tuple: Tuple<T>, el: T, cmp: Comparator<T>): number;
export function binarySearch<T>(tuple: Tuple<T>, el: T, cmp: Comparator<T> = compare): number {
    return searchTrace(tuple, el, cmp).index;
}
