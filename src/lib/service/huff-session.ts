
import { config } from '../../config';
import { logger } from '../logger';
import { getBitStr } from '../cmd/encode/huff';
import { ArenaAllocator, getDefaultAllocator } from '../models/encode/allocator';
import { BitStr, CodeTable, buildCodeTable } from '../models/encode/code-table';
import { FreqMap, getFreqMap } from '../models/encode/freq-map';
import { EmptyInputError } from '../models/encode/huff-errors';
import { HuffTree } from '../models/encode/huff-tree';

export enum HUFF_SESSION_STATE {
  IDLE = 'IDLE',
  COUNTING_FREQUENCIES = 'COUNTING_FREQUENCIES',
  BUILDING_TREE = 'BUILDING_TREE',
  EXTRACTING_CODES = 'EXTRACTING_CODES',
  ENCODING = 'ENCODING',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

export type RunStats = {
  inputLength: number;
  distinctSymbols: number;
  nodeCount: number;
  outputLength: number;
};

export type HuffSessionOpts = {
  allocator?: ArenaAllocator;
};

let sessionIdCounter = 0;

/*
  Owns every region of one encoding run. Not safe to share between callers
    without external locking.
*/
export class HuffSession {
  readonly id: number;
  readonly allocator: ArenaAllocator;
  private _state: HUFF_SESSION_STATE;
  private huffTree: HuffTree | undefined;
  private _codeTable: CodeTable | undefined;
  private _stats: RunStats | undefined;

  constructor(opts: HuffSessionOpts = {}) {
    this.id = sessionIdCounter++;
    this.allocator = opts.allocator ?? getDefaultAllocator(config.HUFF_MAX_ALLOC_BYTES);
    this._state = HUFF_SESSION_STATE.IDLE;
  }

  get state(): HUFF_SESSION_STATE {
    return this._state;
  }

  /*
    The last successful run's table, readable until reset
  */
  get codeTable(): CodeTable | undefined {
    return this._codeTable;
  }

  get stats(): RunStats | undefined {
    return this._stats;
  }

  encode(bytes: Uint8Array): BitStr {
    let freqMap: FreqMap;
    let huffTree: HuffTree;
    let codeTable: CodeTable;
    let nodeCount: number;
    let bitStr: BitStr;

    if(this._state !== HUFF_SESSION_STATE.IDLE) {
      this.reset();
    }
    try {
      this.transition(HUFF_SESSION_STATE.COUNTING_FREQUENCIES);
      freqMap = getFreqMap(bytes);
      if(freqMap.size < 1) {
        throw new EmptyInputError();
      }

      this.transition(HUFF_SESSION_STATE.BUILDING_TREE);
      huffTree = HuffTree.init(freqMap, this.allocator);
      this.huffTree = huffTree;

      this.transition(HUFF_SESSION_STATE.EXTRACTING_CODES);
      codeTable = buildCodeTable(huffTree, this.allocator);
      this._codeTable = codeTable;
      nodeCount = huffTree.nodeCount;
      huffTree.release();
      this.huffTree = undefined;

      this.transition(HUFF_SESSION_STATE.ENCODING);
      bitStr = getBitStr(bytes, codeTable, this.allocator);

      this._stats = {
        inputLength: bytes.length,
        distinctSymbols: freqMap.size,
        nodeCount,
        outputLength: bitStr.length,
      };
      this.transition(HUFF_SESSION_STATE.DONE);
      return bitStr;
    } catch(e) {
      logger.warn(`huff session ${this.id} failed in state ${this._state}`);
      logger.warn(e);
      this.releaseRun();
      this.transition(HUFF_SESSION_STATE.FAILED);
      throw e;
    }
  }

  reset() {
    this.releaseRun();
    this._stats = undefined;
    this.transition(HUFF_SESSION_STATE.IDLE);
  }

  private releaseRun() {
    if(this.huffTree !== undefined) {
      this.huffTree.release();
      this.huffTree = undefined;
    }
    if(this._codeTable !== undefined) {
      this._codeTable.release();
      this._codeTable = undefined;
    }
  }

  private transition(nextState: HUFF_SESSION_STATE) {
    logger.debug(`huff session ${this.id}: ${this._state} -> ${nextState}`);
    this._state = nextState;
  }
}

export function createSession(opts?: HuffSessionOpts): HuffSession {
  return new HuffSession(opts);
}

export function encode(session: HuffSession, bytes: Uint8Array): BitStr {
  return session.encode(bytes);
}

export function resetOrDestroy(session: HuffSession) {
  session.reset();
}
