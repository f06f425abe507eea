
import { ArenaAllocator } from './allocator';
import { FreqMap } from './freq-map';
import { EmptyInputError } from './huff-errors';
import { MinPriorityQueue } from './min-priority-queue';
import { NodeArena, NodeIdx } from './node-arena';

export type Bit = (0 | 1);

export class HuffTree {
  private constructor(
    public arena: NodeArena,
    public root: NodeIdx,
  ) {}

  get nodeCount(): number {
    return this.arena.length;
  }

  release() {
    this.arena.release();
  }

  static init(freqMap: FreqMap, allocator: ArenaAllocator): HuffTree {
    let symbols: number[];
    let arena: NodeArena;
    let queue: MinPriorityQueue<NodeIdx>;
    let root: NodeIdx;

    if(freqMap.size < 1) {
      throw new EmptyInputError();
    }
    symbols = [ ...freqMap.keys() ];
    symbols.sort((a, b) => a - b);
    for(let i = 0; i < symbols.length; ++i) {
      checkFreqEntry(symbols[i], freqMap.get(symbols[i]));
    }

    arena = NodeArena.init((symbols.length * 2) - 1, allocator);
    try {
      queue = new MinPriorityQueue((a, b) => nodeComparator(arena, a, b));
      /*
        leaves are allocated in ascending byte order, so the index
          tie-break ranks equal-weight leaves by byte value
      */
      for(let i = 0; i < symbols.length; ++i) {
        let currSymbol = symbols[i];
        let currCount = freqMap.get(currSymbol) ?? 0;
        queue.insert(arena.allocLeaf(currSymbol, currCount));
      }
      while(queue.size() > 1) {
        let left: NodeIdx;
        let right: NodeIdx;
        left = queue.extractMin();
        right = queue.extractMin();
        queue.insert(arena.allocInternal(left, right));
      }
      root = queue.extractMin();
    } catch(e) {
      arena.release();
      throw e;
    }
    return new HuffTree(arena, root);
  }
}

export function huffTreePreOrder(
  huffTree: HuffTree,
  visitCb: (nodeIdx: NodeIdx, code: Bit[]) => void,
) {
  let arena: NodeArena;
  let soFar: Bit[];
  arena = huffTree.arena;
  soFar = [];
  visit(huffTree.root);

  function visit(nodeIdx: NodeIdx) {
    visitCb(nodeIdx, soFar);
    if(arena.isLeaf(nodeIdx)) {
      return;
    }
    soFar.push(0);
    visit(arena.left(nodeIdx));
    soFar.pop();
    soFar.push(1);
    visit(arena.right(nodeIdx));
    soFar.pop();
  }
}

/*
  weight ascending, then arena index ascending
*/
function nodeComparator(arena: NodeArena, a: NodeIdx, b: NodeIdx): number {
  let aWeight: number;
  let bWeight: number;
  aWeight = arena.weight(a);
  bWeight = arena.weight(b);
  if(aWeight !== bWeight) {
    return aWeight - bWeight;
  }
  return a - b;
}

function checkFreqEntry(symbol: number, count: number | undefined) {
  if(!Number.isInteger(symbol) || (symbol < 0) || (symbol > 0xff)) {
    throw new Error(`Invalid symbol in frequency map: ${symbol}`);
  }
  if(
    (count === undefined)
    || !Number.isInteger(count)
    || (count < 1)
  ) {
    throw new Error(`Invalid count for symbol ${symbol}: ${count}`);
  }
}
