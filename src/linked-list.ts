/**
 * @module linked-list
 * @description
 * Persistent singly linked list.
 *
 * * Features:
 * - Structural sharing: `prepend` and `tail` reuse the existing cells.
 * - `size` is cached in every cell, so it is O(1).
 * - Content hash computed lazily and cached.
 */
import { equals, hashValue, Structural } from './value';

/**
 * Internal cons cell. Cells are never mutated after construction,
 * so tails are shared freely between lists.
 */
class Cell<T> {
    constructor(
        readonly head: T,
        readonly tail: Cell<T> | null,
        /** Number of cells from here to the end (including self). */
        readonly size: number
    ) {}
}

/**
 * Persistent singly-linked sequence.
 *
 * * Performance Characteristics:
 * - `head` / `tail` / `prepend` / `size`: **O(1)**
 * - `append`: **O(N)** (the spine is copied)
 * - `at`: **O(i)**
 */
export class LinkedList<T> implements Structural, Iterable<T> {
    readonly #first: Cell<T> | null;
    #hashCode: number | null = null;

    private constructor(first: Cell<T> | null) {
        this.#first = first;
    }

    static empty<U>(): LinkedList<U> { return new LinkedList<U>(null); }

    static of<U>(...items: U[]): LinkedList<U> { return LinkedList.from(items); }

    /** Builds a list with the iteration order of `items`. O(N). */
    static from<U>(items: Iterable<U>): LinkedList<U> {
        const buffer = Array.from(items);
        let cell: Cell<U> | null = null;
        for (let i = buffer.length - 1; i >= 0; i--) {
            cell = new Cell(buffer[i], cell, buffer.length - i);
        }
        return new LinkedList(cell);
    }

    get size(): number { return this.#first ? this.#first.size : 0; }
    isEmpty(): boolean { return this.#first === null; }

    /** First element, or `undefined` when empty. */
    get head(): T | undefined { return this.#first?.head; }

    /** Everything after the first element. The tail of an empty list is empty. */
    get tail(): LinkedList<T> {
        return this.#first ? new LinkedList(this.#first.tail) : this;
    }

    prepend(value: T): LinkedList<T> {
        return new LinkedList(new Cell(value, this.#first, this.size + 1));
    }

    /** Returns a list with `value` at the end. Walks and copies the whole spine. */
    append(value: T): LinkedList<T> {
        const items = this.toArray();
        items.push(value);
        return LinkedList.from(items);
    }

    at(index: number): T | undefined {
        if (index < 0) return undefined;
        let curr = this.#first;
        for (let i = 0; curr && i < index; i++) curr = curr.tail;
        return curr?.head;
    }

    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        let h = 0x1157;
        for (const v of this) h = (Math.imul(31, h) + hashValue(v)) | 0;
        this.#hashCode = h >>> 0;
        return this.#hashCode;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof LinkedList) || other.size !== this.size) return false;
        if (this.hashCode !== other.hashCode) return false;
        const itB: Iterator<unknown> = other[Symbol.iterator]();
        for (const a of this) {
            if (!equals(a, itB.next().value)) return false;
        }
        return true;
    }

    toArray(): T[] {
        const res: T[] = [];
        for (let curr = this.#first; curr; curr = curr.tail) res.push(curr.head);
        return res;
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let curr = this.#first; curr; curr = curr.tail) yield curr.head;
    }

    toString() { return `[${this.toArray().map(String).join(', ')}]`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
