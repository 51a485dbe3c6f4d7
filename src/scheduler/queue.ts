/**
 * Scheduler Module - Priority Queue
 *
 * Binary min-heap ordered by (priority, sequence).
 */

export type Ordered = Readonly<{ priority: number; sequence: number }>;

export type TaskQueue<T extends Ordered> = Readonly<{
  size: () => number;
  push: (item: T) => void;
  /** Remove and return the smallest item */
  pop: () => T | undefined;
  peek: () => T | undefined;
  /** Empty the queue, returning what it held in dequeue order */
  clear: () => T[];
}>;

export function compareTasks(a: Ordered, b: Ordered): number {
  return a.priority - b.priority || a.sequence - b.sequence;
}

export function createTaskQueue<T extends Ordered>(): TaskQueue<T> {
  const heap: T[] = [];

  const swap = (i: number, j: number): void => {
    const a = heap[i];
    const b = heap[j];
    if (a === undefined || b === undefined) return;
    heap[i] = b;
    heap[j] = a;
  };

  const less = (i: number, j: number): boolean => {
    const a = heap[i];
    const b = heap[j];
    return a !== undefined && b !== undefined && compareTasks(a, b) < 0;
  };

  const siftUp = (start: number): void => {
    let index = start;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!less(index, parent)) break;
      swap(index, parent);
      index = parent;
    }
  };

  const siftDown = (start: number): void => {
    let index = start;
    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;
      if (left < heap.length && less(left, smallest)) smallest = left;
      if (right < heap.length && less(right, smallest)) smallest = right;
      if (smallest === index) return;
      swap(index, smallest);
      index = smallest;
    }
  };

  const pop = (): T | undefined => {
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      siftDown(0);
    }
    return top;
  };

  return {
    size: () => heap.length,

    push: (item) => {
      heap.push(item);
      siftUp(heap.length - 1);
    },

    pop,

    peek: () => heap[0],

    clear: () => {
      const drained: T[] = [];
      for (let item = pop(); item !== undefined; item = pop()) {
        drained.push(item);
      }
      return drained;
    },
  };
}
