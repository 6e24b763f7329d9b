import {test as tst, fc} from '@fast-check/jest';

import {LinkedList} from '../src/linked-list';
import {top, pop, push} from '../src/stack';

describe('testing `top`', () => {
    test('front of the list', () => {
        expect(top(LinkedList.of(6, 5, 4, 3, 2, 1))).toBe(6);
    });

    test('empty stack', () => {
        expect(top(LinkedList.empty<number>())).toBe(undefined);
        expect(top(LinkedList.empty<number>(), 'empty')).toBe('empty');
    });
});

describe('testing `pop`', () => {
    test('pop()', () => {
        const [value, rest] = pop(LinkedList.of(6, 5, 4, 3, 2, 1));
        expect(value).toBe(6);
        expect(rest.toArray()).toEqual([5, 4, 3, 2, 1]);
    });

    test('last element', () => {
        const [value, rest] = pop(LinkedList.of(1));
        expect(value).toBe(1);
        expect(rest.isEmpty()).toBe(true);
    });

    test('empty stack', () => {
        const [value, rest] = pop(LinkedList.empty<number>());
        expect(value).toBe(undefined);
        expect(rest.toArray()).toEqual([]);

        const [fallback, rest2] = pop(LinkedList.empty<number>(), 'empty');
        expect(fallback).toBe('empty');
        expect(rest2.toArray()).toEqual([]);
    });
});

describe('testing `push`', () => {
    test('push()', () => {
        expect(push(LinkedList.of(5, 4, 3, 2, 1), 6).toArray()).toEqual([6, 5, 4, 3, 2, 1]);
        expect(push(LinkedList.empty<number>(), 1).toArray()).toEqual([1]);
    });
});

tst.prop({items: fc.array(fc.integer()), x: fc.integer()})(
    'pop undoes push',
    ({items, x}) => {
        const stack = LinkedList.from(items);
        const [value, rest] = pop(push(stack, x));

        expect(value).toBe(x);
        expect(rest.equals(stack)).toBe(true);
    }
);

tst.prop({items: fc.array(fc.integer())})(
    'last in, first out',
    ({items}) => {
        let stack = LinkedList.empty<number>();
        for (const item of items) stack = push(stack, item);

        const popped: number[] = [];
        while (!stack.isEmpty()) {
            const [value, rest] = pop(stack, NaN);
            popped.push(value);
            stack = rest;
        }
        expect(popped).toEqual([...items].reverse());
    }
);
