
export type Comparator<T> = (a: T, b: T) => number;

/*
  Array backed binary min-heap. The comparator must be a total order for
    extraction order to be deterministic; equal items come out in
    unspecified order.
*/
export class MinPriorityQueue<T> {
  private heap: T[];

  constructor(
    private compare: Comparator<T>,
  ) {
    this.heap = [];
  }

  size(): number {
    return this.heap.length;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  insert(item: T) {
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
  }

  extractMin(): T {
    let minItem: T;
    let lastItem: T | undefined;
    if(this.heap.length < 1) {
      throw new Error('extractMin() called on empty queue');
    }
    minItem = this.heap[0];
    lastItem = this.heap.pop();
    if(
      (lastItem !== undefined)
      && (this.heap.length > 0)
    ) {
      this.heap[0] = lastItem;
      this.siftDown(0);
    }
    return minItem;
  }

  private siftUp(pos: number) {
    let parentPos: number;
    while(pos > 0) {
      parentPos = (pos - 1) >> 1;
      if(this.compare(this.heap[pos], this.heap[parentPos]) >= 0) {
        break;
      }
      this.swap(pos, parentPos);
      pos = parentPos;
    }
  }

  private siftDown(pos: number) {
    let leftPos: number;
    let rightPos: number;
    let minPos: number;
    while(true) {
      leftPos = (pos * 2) + 1;
      rightPos = leftPos + 1;
      minPos = pos;
      if(
        (leftPos < this.heap.length)
        && (this.compare(this.heap[leftPos], this.heap[minPos]) < 0)
      ) {
        minPos = leftPos;
      }
      if(
        (rightPos < this.heap.length)
        && (this.compare(this.heap[rightPos], this.heap[minPos]) < 0)
      ) {
        minPos = rightPos;
      }
      if(minPos === pos) {
        return;
      }
      this.swap(pos, minPos);
      pos = minPos;
    }
  }

  private swap(a: number, b: number) {
    let tmp: T;
    tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
