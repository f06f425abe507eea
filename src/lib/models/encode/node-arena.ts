
import assert from 'assert';

import { ArenaAllocator } from './allocator';
import { AllocationFailure } from './huff-errors';

export type NodeIdx = number;

export const NIL_NODE: NodeIdx = -1;

const NO_SYMBOL = -1;

/*
  bytes per node: weight (f64) + left (i32) + right (i32) + symbol (i16)
*/
const NODE_BYTES = 8 + 4 + 4 + 2;

/*
  All nodes of one run, stored struct-of-arrays in a single region taken
    from the allocator. Nodes are addressed by index and the whole region
    is handed back with release(); nothing is freed per node.
*/
export class NodeArena {
  private buf: ArrayBuffer;
  private weights: Float64Array;
  private lefts: Int32Array;
  private rights: Int32Array;
  private symbols: Int16Array;
  private _length: number;
  private _released: boolean;

  private constructor(
    public readonly capacity: number,
    private allocator: ArenaAllocator,
  ) {
    this.buf = allocator.alloc(capacity * NODE_BYTES);
    this.weights = new Float64Array(this.buf, 0, capacity);
    this.lefts = new Int32Array(this.buf, capacity * 8, capacity);
    this.rights = new Int32Array(this.buf, capacity * 12, capacity);
    this.symbols = new Int16Array(this.buf, capacity * 16, capacity);
    this._length = 0;
    this._released = false;
  }

  get length(): number {
    return this._length;
  }

  get released(): boolean {
    return this._released;
  }

  allocLeaf(symbol: number, weight: number): NodeIdx {
    let idx: NodeIdx;
    idx = this.nextIdx();
    this.weights[idx] = weight;
    this.lefts[idx] = NIL_NODE;
    this.rights[idx] = NIL_NODE;
    this.symbols[idx] = symbol;
    return idx;
  }

  allocInternal(left: NodeIdx, right: NodeIdx): NodeIdx {
    let idx: NodeIdx;
    this.checkIdx(left);
    this.checkIdx(right);
    idx = this.nextIdx();
    this.weights[idx] = this.weights[left] + this.weights[right];
    this.lefts[idx] = left;
    this.rights[idx] = right;
    this.symbols[idx] = NO_SYMBOL;
    return idx;
  }

  weight(idx: NodeIdx): number {
    this.checkIdx(idx);
    return this.weights[idx];
  }

  left(idx: NodeIdx): NodeIdx {
    this.checkIdx(idx);
    return this.lefts[idx];
  }

  right(idx: NodeIdx): NodeIdx {
    this.checkIdx(idx);
    return this.rights[idx];
  }

  /*
    undefined for internal nodes
  */
  symbol(idx: NodeIdx): number | undefined {
    let symbol: number;
    this.checkIdx(idx);
    symbol = this.symbols[idx];
    return (symbol === NO_SYMBOL)
      ? undefined
      : symbol
    ;
  }

  isLeaf(idx: NodeIdx): boolean {
    this.checkIdx(idx);
    return (this.lefts[idx] === NIL_NODE) && (this.rights[idx] === NIL_NODE);
  }

  release() {
    if(this._released) {
      return;
    }
    this._released = true;
    this._length = 0;
    this.allocator.free(this.buf);
  }

  private nextIdx(): NodeIdx {
    assert(!this._released, 'NodeArena used after release');
    if(this._length >= this.capacity) {
      throw new AllocationFailure(NODE_BYTES, `node arena exhausted (capacity ${this.capacity})`);
    }
    return this._length++;
  }

  private checkIdx(idx: NodeIdx) {
    assert(!this._released, 'NodeArena read after release');
    assert(
      Number.isInteger(idx) && (idx >= 0) && (idx < this._length),
      `Invalid node index: ${idx}`,
    );
  }

  static init(capacity: number, allocator: ArenaAllocator): NodeArena {
    if(!Number.isInteger(capacity) || (capacity < 1)) {
      throw new Error(`Invalid NodeArena capacity: ${capacity}`);
    }
    return new NodeArena(capacity, allocator);
  }
}
