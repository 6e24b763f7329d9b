/**
 * @module stack
 * Functions for treating a {@link LinkedList} as a stack.
 *
 * The front of the list is the top of the stack ("last-in first-out").
 * `top`, `pop` and `push` are all O(1).
 */
import { LinkedList } from './linked-list';

/**
 * Returns the value on top of the stack, or `defaultValue` when the stack is empty.
 */
export function top<T>(stack: LinkedList<T>): T | undefined;
export function top<T, D>(stack: LinkedList<T>, defaultValue: D): T | D;
export function top<T, D>(stack: LinkedList<T>, defaultValue?: D): T | D | undefined {
    return stack.isEmpty() ? defaultValue : stack.head;
}

/**
 * Returns a pair of the top of the stack (or `defaultValue`) and the stack without it.
 * Popping an empty stack yields the empty stack again.
 */
export function pop<T>(stack: LinkedList<T>): [T | undefined, LinkedList<T>];
export function pop<T, D>(stack: LinkedList<T>, defaultValue: D): [T | D, LinkedList<T>];
export function pop<T, D>(stack: LinkedList<T>, defaultValue?: D): [T | D | undefined, LinkedList<T>] {
    if (stack.isEmpty()) return [defaultValue, stack];
    return [stack.head, stack.tail];
}

export function push<T>(stack: LinkedList<T>, value: T): LinkedList<T> {
    return stack.prepend(value);
}
