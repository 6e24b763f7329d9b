/**
 * @module sort
 * Sorting over immutable arrays. Both functions return a new array.
 */
import { compare, Comparable, Comparator } from './value';

/** Pending work for {@link quicksort}: a partition still to sort, or a settled run. */
type Task<T> = { sort: readonly T[] } | { emit: readonly T[] };

/**
 * Returns a sorted copy of `list`.
 *
 * The head of the list is the pivot. The rest is split three ways (lesser,
 * equivalent, greater), so runs of duplicates do not degrade to quadratic time.
 * Partitions wait on an explicit stack, so already sorted input (one level per
 * element) does not exhaust the call stack.
 *
 * @example
 * quicksort([9, -9, 9, -9, 9]); // [-9, -9, 9, 9, 9]
 */
export function quicksort<T extends Comparable>(list: readonly T[]): T[];
export function quicksort<T>(list: readonly T[], cmp: Comparator<T>): T[];
export function quicksort<T>(list: readonly T[], cmp: Comparator<T> = compare): T[] {
    const res: T[] = [];
    const stack: Task<T>[] = [{ sort: list }];

    while (stack.length) {
        const task = stack.pop()!;
        if ('emit' in task || task.sort.length < 2) {
            for (const el of 'emit' in task ? task.emit : task.sort) res.push(el);
            continue;
        }

        const part = task.sort;
        const pivot = part[0];
        const lesser: T[] = [];
        const equivalent: T[] = [pivot];
        const greater: T[] = [];
        for (let i = 1; i < part.length; i++) {
            const c = cmp(part[i], pivot);
            if (c < 0) lesser.push(part[i]);
            else if (c > 0) greater.push(part[i]);
            else equivalent.push(part[i]);
        }

        // Popped in reverse: lesser, then the pivot run, then greater.
        stack.push({ sort: greater }, { emit: equivalent }, { sort: lesser });
    }
    return res;
}

/**
 * Returns a sorted copy of `list`.
 *
 * The list is split at `round(n / 2)`, so for odd lengths the first half is the
 * larger one. Each sorted half is reversed and the two are merged greatest-first.
 */
export function mergesort<T extends Comparable>(list: readonly T[]): T[];
export function mergesort<T>(list: readonly T[], cmp: Comparator<T>): T[];
export function mergesort<T>(list: readonly T[], cmp: Comparator<T> = compare): T[] {
    if (list.length < 2) return list.slice();

    const middle = Math.round(list.length / 2);
    const first = mergesort(list.slice(0, middle), cmp).reverse();
    const second = mergesort(list.slice(middle), cmp).reverse();
    return mergeDescending(first, second, cmp);
}

/**
 * Merges two descending arrays. The accumulator receives the greatest value
 * first and every later value goes in front of it, so the result ascends.
 * Equal heads are taken together.
 */
function mergeDescending<T>(l1: readonly T[], l2: readonly T[], cmp: Comparator<T>): T[] {
    // Filled back to front: index 0 of `acc` is the last (smallest) value placed.
    const acc = new Array<T>(l1.length + l2.length);
    let out = acc.length;
    let i = 0, j = 0;

    while (i < l1.length && j < l2.length) {
        const h1 = l1[i], h2 = l2[j];
        const c = cmp(h1, h2);
        if (c === 0) {
            acc[--out] = h2;
            acc[--out] = h1;
            i++; j++;
        } else if (c > 0) {
            acc[--out] = h1;
            i++;
        } else {
            acc[--out] = h2;
            j++;
        }
    }
    while (i < l1.length) acc[--out] = l1[i++];
    while (j < l2.length) acc[--out] = l2[j++];
    return acc;
}
