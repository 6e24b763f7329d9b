/**
 * @module queue
 * Functions for treating a {@link LinkedList} as a queue ("first-in first-out").
 *
 * * Asymptotic Behavior:
 * - `peek` / `dequeue`: **O(1)**. The first cell of the list is the next item out.
 * - `enqueue`: **O(N)**. Items enter at the back, and reaching the back of a
 *   singly-linked list means walking (and copying) every cell.
 */
import { LinkedList } from './linked-list';

/** Returns the next item to be dequeued together with the unaltered queue. */
export function peek<T>(queue: LinkedList<T>): [T | undefined, LinkedList<T>] {
    return [queue.head, queue];
}

/** Returns the dequeued item and the queue without it. */
export function dequeue<T>(queue: LinkedList<T>): [T | undefined, LinkedList<T>] {
    return [queue.head, queue.tail];
}

export function enqueue<T>(queue: LinkedList<T>, value: T): LinkedList<T> {
    return queue.append(value);
}
