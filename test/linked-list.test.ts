import {LinkedList} from '../src/linked-list';

describe('testing `LinkedList`', () => {
    test('construction & access', () => {
        const list = LinkedList.of('a', 'b', 'c');

        expect(list.size).toBe(3);
        expect(list.head).toBe('a');
        expect(list.at(2)).toBe('c');
        expect(list.at(3)).toBe(undefined);
        expect(list.at(-1)).toBe(undefined);
        expect(list.toArray()).toEqual(['a', 'b', 'c']);
        expect([...list]).toEqual(['a', 'b', 'c']);
    });

    test('empty', () => {
        const list = LinkedList.empty<number>();

        expect(list.isEmpty()).toBe(true);
        expect(list.size).toBe(0);
        expect(list.head).toBe(undefined);
        expect(list.tail).toBe(list);
    });

    test('prepend and append leave the original alone', () => {
        const list = LinkedList.of(2, 3);
        const front = list.prepend(1);
        const back = list.append(4);

        expect(list.toArray()).toEqual([2, 3]);
        expect(front.toArray()).toEqual([1, 2, 3]);
        expect(back.toArray()).toEqual([2, 3, 4]);
        expect(front.size).toBe(3);
    });

    test('tail shares cells', () => {
        const list = LinkedList.of(1, 2, 3);
        expect(list.tail.toArray()).toEqual([2, 3]);
        expect(list.tail.size).toBe(2);
    });

    test('value equality', () => {
        expect(LinkedList.of(1, 2).equals(LinkedList.empty<number>().prepend(2).prepend(1))).toBe(true);
        expect(LinkedList.of(1, 2).equals(LinkedList.of(2, 1))).toBe(false);
        expect(LinkedList.of([1], [2]).equals(LinkedList.of([1], [2]))).toBe(true);
        expect(LinkedList.of(1).hashCode).toBe(LinkedList.from([1]).hashCode);
    });

    test('toString()', () => {
        expect(LinkedList.of(1, 2, 3).toString()).toBe('[1, 2, 3]');
        expect(LinkedList.empty().toString()).toBe('[]');
    });
});
