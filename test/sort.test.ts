import {test as tst, fc} from '@fast-check/jest';

import {quicksort, mergesort} from '../src/sort';

const byLength = (a: string, b: string) => a.length - b.length;

describe('testing `quicksort`', () => {
    test('fixed points', () => {
        expect(quicksort([])).toEqual([]);
        expect(quicksort([42])).toEqual([42]);
    });

    test('sorts', () => {
        expect(quicksort([3, 1, 2])).toEqual([1, 2, 3]);
        expect(quicksort([9, -9, 9, -9, 9, -9, 9, 9, 9])).toEqual([-9, -9, -9, 9, 9, 9, 9, 9, 9]);
        expect(quicksort(['pear', 'apple', 'fig'])).toEqual(['apple', 'fig', 'pear']);
    });

    test('does not touch its input', () => {
        const input = [3, 1, 2];
        quicksort(input);
        expect(input).toEqual([3, 1, 2]);
    });

    test('keeps elements equal to the pivot in input order', () => {
        expect(quicksort(['ccc', 'aa', 'bbb', 'd', 'eee'], byLength))
            .toEqual(['d', 'aa', 'ccc', 'bbb', 'eee']);
    });

    test('already sorted input does not exhaust the call stack', () => {
        const ascending = Array.from({length: 20000}, (_, i) => i);
        const descending = [...ascending].reverse();
        const byValue = (a: number, b: number) => a - b;

        expect(quicksort(ascending, byValue)).toEqual(ascending);
        expect(quicksort(descending, byValue)).toEqual(ascending);
    }, 30000);
});

describe('testing `mergesort`', () => {
    test('fixed points', () => {
        expect(mergesort([])).toEqual([]);
        expect(mergesort([42])).toEqual([42]);
    });

    test('sorts', () => {
        expect(mergesort([3, 1, 2])).toEqual([1, 2, 3]);
        expect(mergesort([9, -9, -9, 9, 9, -9])).toEqual([-9, -9, -9, 9, 9, 9]);
    });

    test('custom comparator', () => {
        const desc = (a: number, b: number) => b - a;
        expect(mergesort([1, 5, 3, 4, 2], desc)).toEqual([5, 4, 3, 2, 1]);
    });
});

tst.prop({nats: fc.array(fc.integer())})(
    'quicksort agrees with Array.prototype.sort',
    ({nats}) => {
        expect(quicksort(nats)).toEqual([...nats].sort((a, b) => a - b));
    }
);

tst.prop({nats: fc.array(fc.integer())})(
    'mergesort agrees with Array.prototype.sort',
    ({nats}) => {
        expect(mergesort(nats)).toEqual([...nats].sort((a, b) => a - b));
    }
);

tst.prop({words: fc.array(fc.string())})(
    'both sorts agree on strings',
    ({words}) => {
        expect(mergesort(words)).toEqual(quicksort(words));
    }
);
