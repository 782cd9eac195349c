import { describe, it, expect } from 'vitest';
import { MaxHeap } from './max-heap';

describe('MaxHeap', () => {
  it('pops items in priority order', () => {
    const heap = new MaxHeap<number>((a, b) => a - b);
    for (const value of [3, 1, 4, 1, 5, 9, 2, 6]) {
      heap.push(value);
    }

    const popped: number[] = [];
    while (!heap.isEmpty()) {
      const value = heap.pop();
      if (value !== undefined) popped.push(value);
    }
    expect(popped).toEqual([9, 6, 5, 4, 3, 2, 1, 1]);
  });

  it('peeks without removing', () => {
    const heap = new MaxHeap<number>((a, b) => a - b);
    heap.push(2);
    heap.push(7);
    expect(heap.peek()).toBe(7);
    expect(heap.size).toBe(2);
  });

  it('returns undefined when empty', () => {
    const heap = new MaxHeap<string>((a, b) => a.length - b.length);
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();
  });
});
