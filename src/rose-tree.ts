/**
 * @module rose-tree
 * @description
 * Immutable N-ary ("rose") tree with a value, ordered children and a metadata mapping.
 *
 * * Features:
 * - Exclusive ownership: children belong to exactly one parent, and there is no
 *   parent pointer. Navigation is strictly top-down.
 * - Value semantics: edits return new trees; the receiver is never altered.
 * - Deterministic content hash, computed upon construction.
 *
 * * Contracts:
 * - `undefined` is the absent value. A tree with no value and no children is empty.
 * - `V` is a scalar (not an array) so that `RoseTree.from` can tell values and
 *   nested sequences apart.
 */
import { equals, hashValue, Structural } from './value';

export type Meta = Readonly<Record<string, unknown>>;

/** Nested sequence form: the head is the value, the rest become children. */
export type NestedInput<V> = readonly [] | readonly [V, ...TreeInput<V>[]];

/** Construction input: a bare value, or a nested sequence. */
export type TreeInput<V> = V | NestedInput<V>;

/**
 * Output of {@link RoseTree.values}: a bare value for a leaf child, a nested
 * array for a child with children of its own.
 */
export type Flattened<V> = V | undefined | Flattened<V>[];

const EMPTY_META: Meta = Object.freeze({});

function isNested<V>(input: TreeInput<V>): input is NestedInput<V> {
    return Array.isArray(input);
}

export class RoseTree<V> implements Structural, Iterable<V | undefined> {
    readonly value: V | undefined;
    readonly children: ReadonlyArray<RoseTree<V>>;
    readonly meta: Meta;
    readonly hashCode: number;

    constructor(value?: V, children: Iterable<RoseTree<V>> = [], meta: Meta = EMPTY_META) {
        this.value = value;
        this.children = Object.freeze(Array.from(children));
        this.meta = meta === EMPTY_META ? meta : Object.freeze({ ...meta });

        let h = hashValue(value);
        for (const child of this.children) h = (Math.imul(31, h) + child.hashCode) | 0;
        h = (Math.imul(31, h) + hashValue(this.meta)) | 0;
        this.hashCode = h >>> 0;
    }

    /**
     * Builds a tree from a value or a nested sequence.
     *
     * A bare value yields a leaf. An empty sequence yields the empty tree.
     * Otherwise the first element is the value and each remaining element is
     * built recursively into a child.
     *
     * @example
     * RoseTree.from<number>([1, [2, 3], 4]);
     * // 1
     * // ├── 2
     * // │   └── 3
     * // └── 4
     */
    static from<U>(input: TreeInput<U>): RoseTree<U> {
        if (!isNested(input)) return new RoseTree<U>(input);
        if (input.length === 0) return new RoseTree<U>();
        const [head, ...rest] = input;
        return new RoseTree<U>(head, rest.map((item) => RoseTree.from<U>(item)));
    }

    /** True if the tree has no value and no children. */
    isEmpty(): boolean {
        return this.value === undefined && this.children.length === 0;
    }

    /** True if the tree has no children, whatever its value. */
    isLeaf(): boolean {
        return this.children.length === 0;
    }

    /** Depth-first search for a node whose value equals `target`. */
    contains(target: V | undefined): boolean {
        const stack: RoseTree<V>[] = [this];
        while (stack.length) {
            const node = stack.pop()!;
            if (equals(node.value, target)) return true;
            for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
        }
        return false;
    }

    /** Number of elements in the fully unnested {@link values} sequence. */
    count(): number {
        let n = 0;
        for (const _ of this) n++;
        return n;
    }

    /** Left fold over the fully unnested {@link values} sequence. */
    reduce<A>(combine: (acc: A, value: V | undefined) => A, initial: A): A {
        let acc = initial;
        for (const v of this) acc = combine(acc, v);
        return acc;
    }

    /**
     * Lazily walks the fully unnested {@link values} sequence.
     *
     * Pre-order: a node contributes its value when present. An absent-valued leaf
     * below the root still contributes `undefined`, just as it appears as a bare
     * element in `values()`.
     */
    *[Symbol.iterator](): Iterator<V | undefined> {
        const stack: RoseTree<V>[] = [this];
        while (stack.length) {
            const node = stack.pop()!;
            if (node.value !== undefined || (node.isLeaf() && node !== this)) yield node.value;
            for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
        }
    }

    /**
     * Returns the tree as a nested array, the inverse of {@link RoseTree.from}.
     *
     * The first element is the value (omitted when absent), followed by one
     * element per child: a bare value for a leaf child, a nested array otherwise.
     *
     * @example
     * RoseTree.from<string>(['Drinks', ['Hot', 'Tea', 'Cocoa'], 'Water']).values();
     * // ['Drinks', ['Hot', 'Tea', 'Cocoa'], 'Water']
     */
    values(): Flattened<V>[] {
        const root: Flattened<V>[] = this.value === undefined ? [] : [this.value];
        // Each nested array is attached to its parent before it is filled.
        const stack: [RoseTree<V>, Flattened<V>[]][] = [[this, root]];
        while (stack.length) {
            const [node, out] = stack.pop()!;
            for (const child of node.children) {
                if (child.isLeaf()) {
                    out.push(child.value);
                    continue;
                }
                const nested: Flattened<V>[] = child.value === undefined ? [] : [child.value];
                out.push(nested);
                stack.push([child, nested]);
            }
        }
        return root;
    }

    /** Every descendant with no children, depth-first, left to right. */
    leaves(): RoseTree<V>[] {
        const res: RoseTree<V>[] = [];
        const stack: RoseTree<V>[] = [this];
        while (stack.length) {
            const node = stack.pop()!;
            if (node.isLeaf()) res.push(node);
            for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
        }
        return res;
    }

    leafValues(): (V | undefined)[] {
        return this.leaves().map((node) => node.value);
    }

    /**
     * Returns a new tree with `child` appended after the existing children.
     * A bare value is wrapped in a leaf first.
     */
    insertChild(child: RoseTree<V> | V): RoseTree<V> {
        const node = child instanceof RoseTree ? child : new RoseTree<V>(child);
        return new RoseTree<V>(this.value, [...this.children, node], this.meta);
    }

    /**
     * Returns a new tree without the first child structurally equal to `child`
     * (value, children and meta). Returns `this` when there is none.
     */
    removeChild(child: RoseTree<V>): RoseTree<V> {
        return this.#without(this.children.findIndex((c) => c.equals(child)));
    }

    /**
     * Returns a new tree without the first direct child whose value equals `value`.
     * Meta and grandchildren are ignored when matching. Returns `this` when there is none.
     */
    removeChildByValue(value: V | undefined): RoseTree<V> {
        return this.#without(this.children.findIndex((c) => equals(c.value, value)));
    }

    #without(index: number): RoseTree<V> {
        if (index < 0) return this;
        const children = this.children.filter((_, i) => i !== index);
        return new RoseTree<V>(this.value, children, this.meta);
    }

    withMeta(meta: Meta): RoseTree<V> {
        return new RoseTree<V>(this.value, this.children, meta);
    }

    /** Structural equality: value, meta and children, at every depth. */
    equals(other: unknown): boolean {
        if (!(other instanceof RoseTree)) return false;
        const stack: [RoseTree<unknown>, RoseTree<unknown>][] = [[this, other]];
        while (stack.length) {
            const [a, b] = stack.pop()!;
            if (a === b) continue;
            if (a.hashCode !== b.hashCode || a.children.length !== b.children.length) return false;
            if (!equals(a.value, b.value) || !equals(a.meta, b.meta)) return false;
            for (let i = 0; i < a.children.length; i++) stack.push([a.children[i], b.children[i]]);
        }
        return true;
    }

    toString(): string { return render(this.values()); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

function render(values: readonly unknown[]): string {
    const out: string[] = ['['];
    const stack: { items: readonly unknown[]; next: number }[] = [{ items: values, next: 0 }];
    while (stack.length) {
        const frame = stack[stack.length - 1];
        if (frame.next === frame.items.length) {
            out.push(']');
            stack.pop();
            continue;
        }
        const item = frame.items[frame.next++];
        if (frame.next > 1) out.push(', ');
        if (Array.isArray(item)) {
            out.push('[');
            stack.push({ items: item, next: 0 });
        } else {
            out.push(typeof item === 'string' ? JSON.stringify(item) : String(item));
        }
    }
    return out.join('');
}

export function emptyTree<V>(): RoseTree<V> { return new RoseTree<V>(); }
export function leaf<V>(value: V): RoseTree<V> { return new RoseTree(value); }
export function fromNested<V>(input: TreeInput<V>): RoseTree<V> { return RoseTree.from(input); }
