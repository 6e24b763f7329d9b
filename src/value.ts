/**
 * @module value
 * @description
 * Value engine shared by every collection in the library.
 *
 * * Provides:
 * - `compare`: a total order over comparable primitives and sequences.
 * - `equals`: deep value equality (primitives, arrays, maps, records, structural objects).
 * - `hashValue`: deterministic content hashing (FNV-1a).
 *
 * * Contracts:
 * - Numbers: no NaN (the order breaks); `compare` rejects it.
 * - No cycles: self-referential values overflow on hash/equals.
 */

export type Comparable = number | string | bigint | boolean;

/** Ordering callback: negative if a < b, positive if a > b, 0 if equal. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Objects that carry their own content hash and equality.
 * Trees, tuples and linked lists implement this.
 */
export interface Structural {
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

// ============================================================================
// 1. HASHING (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashNumber(val: number): number {
    if ((val | 0) === val) return val | 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

function hashSequence(seed: number, items: Iterable<unknown>): number {
    let h = seed;
    for (const item of items) h = (Math.imul(31, h) + hashValue(item)) | 0;
    return h >>> 0;
}

export function isStructural(v: unknown): v is Structural {
    return typeof v === 'object' && v !== null
        && 'hashCode' in v && typeof v.hashCode === 'number'
        && 'equals' in v && typeof v.equals === 'function';
}

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
    if (typeof v !== 'object' || v === null) return false;
    const proto: unknown = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}

/**
 * Computes a deterministic hash code for any value.
 * Delegates to `.hashCode` for structural objects and recurses for containers.
 * Plain records hash their keys in sorted order, so key insertion order is irrelevant.
 */
export function hashValue(v: unknown): number {
    switch (typeof v) {
        case 'number': return hashNumber(v);
        case 'string': return hashString(v);
        case 'boolean': return v ? 0x1231 : 0x1237;
        case 'bigint': return hashString(v.toString());
        case 'undefined': return 0x5F3;
    }
    if (v === null) return 0x5F7;
    if (isStructural(v)) return v.hashCode;
    if (Array.isArray(v)) return hashSequence(FNV_OFFSET, v);
    if (v instanceof Map) {
        // Entry order must not matter: combine commutatively.
        let h = 0x9ABC;
        for (const [k, val] of v) h = (h + (Math.imul(hashValue(k), 31) ^ hashValue(val))) | 0;
        return h >>> 0;
    }
    if (isRecord(v)) {
        let h = 0x7E57;
        for (const key of Object.keys(v).sort()) {
            const entryHash = (Math.imul(hashString(key), 31) ^ hashValue(v[key])) | 0;
            h = (Math.imul(31, h) + entryHash) | 0;
        }
        return h >>> 0;
    }
    return 0;
}

// ============================================================================
// 2. EQUALITY
// ============================================================================

function equalRecords(a: Readonly<Record<string, unknown>>, b: Readonly<Record<string, unknown>>): boolean {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    for (const key of keysA) {
        if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
        if (!equals(a[key], b[key])) return false;
    }
    return true;
}

function equalMaps(a: ReadonlyMap<unknown, unknown>, b: ReadonlyMap<unknown, unknown>): boolean {
    if (a.size !== b.size) return false;
    for (const [k, v] of a) {
        if (!b.has(k) || !equals(v, b.get(k))) return false;
    }
    return true;
}

/**
 * Deep value equality.
 * Primitives compare with `===` (NaN is never equal), structural objects via their own `equals`.
 */
export function equals(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

    if (isStructural(a)) return a.equals(b);
    if (Array.isArray(a)) {
        if (!Array.isArray(b) || a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!equals(a[i], b[i])) return false;
        }
        return true;
    }
    if (a instanceof Map) return b instanceof Map && equalMaps(a, b);
    if (isRecord(a) && isRecord(b)) return equalRecords(a, b);
    return false;
}

// ============================================================================
// 3. ORDERING
// ============================================================================

function isSequence(v: unknown): v is Iterable<unknown> {
    return Array.isArray(v)
        || (typeof v === 'object' && v !== null && Symbol.iterator in v && isStructural(v));
}

/**
 * Type rank used when comparing values of different kinds.
 * Order: booleans < numbers < bigints < strings < sequences.
 */
function rank(v: unknown): number {
    switch (typeof v) {
        case 'boolean': return 1;
        case 'number':
            if (Number.isNaN(v)) throw new TypeError('Cannot order NaN');
            return 2;
        case 'bigint': return 3;
        case 'string': return 4;
    }
    if (isSequence(v)) return 5;
    throw new TypeError(`Unsupported value in comparison: ${String(v)}`);
}

function compareSequences(a: Iterable<unknown>, b: Iterable<unknown>): number {
    const itA = a[Symbol.iterator]();
    const itB = b[Symbol.iterator]();
    while (true) {
        const x = itA.next();
        const y = itB.next();
        if (x.done && y.done) return 0;
        if (x.done) return -1;
        if (y.done) return 1;
        const diff = compare(x.value, y.value);
        if (diff !== 0) return diff;
    }
}

/**
 * Natural order over comparable primitives and sequences (arrays, tuples).
 * Sequences compare lexicographically; a proper prefix sorts first.
 *
 * @throws TypeError for NaN and for values that have no natural order.
 */
export function compare(a: unknown, b: unknown): number {
    const rankA = rank(a);
    const rankB = rank(b);
    if (rankA !== rankB) return rankA - rankB;
    if (a === b) return 0;

    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : 1;
    if (typeof a === 'boolean') return a ? 1 : -1;
    if (isSequence(a) && isSequence(b)) return compareSequences(a, b);
    return 0;
}
