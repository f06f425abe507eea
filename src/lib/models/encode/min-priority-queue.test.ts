
import { describe, it, expect, beforeEach } from 'vitest';
import { MinPriorityQueue } from './min-priority-queue';

type WeightedItem = {
  weight: number;
  id: number;
};

describe('min-priority-queue tests', () => {
  let testNums: number[];
  beforeEach(() => {
    testNums = [ 5, 3, 8, 1, 9, 2, 7, 3 ];
  });

  it('tests extractMin() returns items in ascending order', () => {
    let queue: MinPriorityQueue<number>;
    let extracted: number[];
    queue = new MinPriorityQueue((a, b) => a - b);
    for(let i = 0; i < testNums.length; ++i) {
      queue.insert(testNums[i]);
    }
    extracted = [];
    while(queue.size() > 0) {
      extracted.push(queue.extractMin());
    }
    expect(extracted).toEqual([ 1, 2, 3, 3, 5, 7, 8, 9 ]);
  });

  it('tests size() and peek()', () => {
    let queue: MinPriorityQueue<number>;
    queue = new MinPriorityQueue((a, b) => a - b);
    expect(queue.size()).toBe(0);
    expect(queue.peek()).toBeUndefined();
    queue.insert(4);
    queue.insert(2);
    expect(queue.size()).toBe(2);
    expect(queue.peek()).toBe(2);
    queue.extractMin();
    expect(queue.size()).toBe(1);
  });

  it('tests interleaved insert() and extractMin()', () => {
    let queue: MinPriorityQueue<number>;
    queue = new MinPriorityQueue((a, b) => a - b);
    queue.insert(10);
    queue.insert(4);
    expect(queue.extractMin()).toBe(4);
    queue.insert(6);
    queue.insert(1);
    expect(queue.extractMin()).toBe(1);
    expect(queue.extractMin()).toBe(6);
    expect(queue.extractMin()).toBe(10);
  });

  it('tests a tie-breaking comparator gives a deterministic order', () => {
    let queue: MinPriorityQueue<WeightedItem>;
    let items: WeightedItem[];
    let extractedIds: number[];
    queue = new MinPriorityQueue((a, b) => {
      return (a.weight !== b.weight)
        ? a.weight - b.weight
        : a.id - b.id
      ;
    });
    items = [
      { weight: 2, id: 3 },
      { weight: 1, id: 4 },
      { weight: 2, id: 0 },
      { weight: 1, id: 1 },
      { weight: 2, id: 2 },
    ];
    for(let i = 0; i < items.length; ++i) {
      queue.insert(items[i]);
    }
    extractedIds = [];
    while(queue.size() > 0) {
      extractedIds.push(queue.extractMin().id);
    }
    expect(extractedIds).toEqual([ 1, 4, 0, 2, 3 ]);
  });

  it('tests extractMin() throws on an empty queue', () => {
    let queue: MinPriorityQueue<number>;
    queue = new MinPriorityQueue((a, b) => a - b);
    expect(() => queue.extractMin()).toThrowError('extractMin() called on empty queue');
  });
});
