import { RoseTree, LinkedList, Stack, Queue, Tuple, binarySearch, quicksort, mergesort } from './src/index';

// === Bench Utilities ===

function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

function check(condition: boolean, message: string) {
    if (!condition) {
        console.error(`❌ FAIL: ${message}`);
        process.exit(1);
    }
}

console.log('=== structured-collections Benchmarks ===\n');

// 1. Sorting
const numbers = Array.from({ length: 50000 }, (_, i) => (i * 7919) % 10007);
const expected = [...numbers].sort((a, b) => a - b);

const quick = measure('Scenario 1a: quicksort 50k', () => quicksort(numbers));
check(quick.every((v, i) => v === expected[i]), 'quicksort output sorted');

const merged = measure('Scenario 1b: mergesort 50k', () => mergesort(numbers));
check(merged.every((v, i) => v === expected[i]), 'mergesort output sorted');

const dupes = Array.from({ length: 50000 }, (_, i) => i % 3);
measure('Scenario 1c: quicksort 50k (3 distinct values)', () => quicksort(dupes));

// 2. Stack vs Queue (O(1) push vs O(N) enqueue)
const stack = measure('Scenario 2a: 100k push', () => {
    let s = LinkedList.empty<number>();
    for (let i = 0; i < 100000; i++) s = Stack.push(s, i);
    return s;
});
check(Stack.top(stack) === 99999, 'top is the last push');

const queue = measure('Scenario 2b: 2k enqueue', () => {
    let q = LinkedList.empty<number>();
    for (let i = 0; i < 2000; i++) q = Queue.enqueue(q, i);
    return q;
});
check(Queue.peek(queue)[0] === 0, 'peek is the first enqueue');

// 3. Binary search
const sortedTuple = Tuple.from(expected.filter((v, i) => i === 0 || v !== expected[i - 1]));
measure('Scenario 3: 10k searches', () => {
    for (let i = 0; i < 10000; i++) {
        const idx = binarySearch(sortedTuple, i);
        check(idx === -1 || sortedTuple.at(idx) === i, `search ${i}`);
    }
});

// 4. Wide and deep trees
const wide = measure('Scenario 4a: 10k children', () => {
    const children = Array.from({ length: 10000 }, (_, i) => new RoseTree(i));
    return new RoseTree(-1, children);
});
check(wide.count() === 10001, 'wide count');

const deep = measure('Scenario 4b: 100k levels', () => {
    let t = new RoseTree(0);
    for (let i = 1; i < 100000; i++) t = new RoseTree(i, [t]);
    return t;
});
measure('Scenario 4c: iterate 100k levels', () => check(deep.count() === 100000, 'deep count'));
measure('Scenario 4d: contains at depth 100k', () => check(deep.contains(0), 'deep contains'));

console.log('\n✅ All Benchmarks Completed');
