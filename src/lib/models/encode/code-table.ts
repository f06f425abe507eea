
import assert from 'assert';

import { ArenaAllocator } from './allocator';
import { Bit, HuffTree, huffTreePreOrder } from './huff-tree';

export type BitStr = string;

export type CodeEntry = [ number, Bit[] ];

const SYMBOL_COUNT = 256;
const BIT_CHAR_0 = 0x30;
const BIT_CHAR_1 = 0x31;

/*
  region layout:
    offsets  u32[256]
    lengths  u16[256]   (0 = no entry)
    codes    u8[total]  ('0' / '1' chars, one per bit)
*/
const OFFSETS_BYTE_OFFSET = 0;
const LENGTHS_BYTE_OFFSET = SYMBOL_COUNT * 4;
const CODES_BYTE_OFFSET = LENGTHS_BYTE_OFFSET + (SYMBOL_COUNT * 2);

/*
  A single-leaf tree has no path to record
*/
const SINGLE_SYMBOL_CODE: Bit[] = [ 1 ];

export class CodeTable {
  private buf: ArrayBuffer;
  private offsets: Uint32Array;
  private lengths: Uint16Array;
  private codes: Uint8Array;
  private _size: number;
  private _released: boolean;

  private constructor(
    entries: CodeEntry[],
    private allocator: ArenaAllocator,
  ) {
    let totalBits: number;
    let pos: number;
    totalBits = 0;
    for(let i = 0; i < entries.length; ++i) {
      totalBits += entries[i][1].length;
    }
    this.buf = allocator.alloc(CODES_BYTE_OFFSET + totalBits);
    this.offsets = new Uint32Array(this.buf, OFFSETS_BYTE_OFFSET, SYMBOL_COUNT);
    this.lengths = new Uint16Array(this.buf, LENGTHS_BYTE_OFFSET, SYMBOL_COUNT);
    this.codes = new Uint8Array(this.buf, CODES_BYTE_OFFSET, totalBits);
    this._size = 0;
    this._released = false;

    pos = 0;
    for(let i = 0; i < entries.length; ++i) {
      let [ symbol, code ] = entries[i];
      assert(this.lengths[symbol] === 0, `Duplicate code for symbol ${symbol}`);
      assert(code.length > 0, `Empty code for symbol ${symbol}`);
      this.offsets[symbol] = pos;
      this.lengths[symbol] = code.length;
      for(let k = 0; k < code.length; ++k) {
        this.codes[pos++] = (code[k] === 0) ? BIT_CHAR_0 : BIT_CHAR_1;
      }
      this._size++;
    }
  }

  get size(): number {
    this.checkLive();
    return this._size;
  }

  get released(): boolean {
    return this._released;
  }

  has(byte: number): boolean {
    return this.codeLength(byte) > 0;
  }

  /*
    0 when the byte has no entry
  */
  codeLength(byte: number): number {
    this.checkLive();
    return this.lengths[byte] ?? 0;
  }

  get(byte: number): BitStr | undefined {
    let len: number;
    let offset: number;
    len = this.codeLength(byte);
    if(len === 0) {
      return undefined;
    }
    offset = this.offsets[byte];
    return Buffer.from(this.buf, CODES_BYTE_OFFSET + offset, len).toString('binary');
  }

  /*
    Writes the code's bit chars into out at pos, returns the number written
  */
  copyCode(byte: number, out: Uint8Array, pos: number): number {
    let len: number;
    let offset: number;
    len = this.codeLength(byte);
    offset = this.offsets[byte];
    out.set(this.codes.subarray(offset, offset + len), pos);
    return len;
  }

  entries(): [ number, BitStr ][] {
    let entries: [ number, BitStr ][];
    let code: BitStr | undefined;
    entries = [];
    for(let byte = 0; byte < SYMBOL_COUNT; ++byte) {
      if((code = this.get(byte)) !== undefined) {
        entries.push([ byte, code ]);
      }
    }
    return entries;
  }

  release() {
    if(this._released) {
      return;
    }
    this._released = true;
    this.allocator.free(this.buf);
  }

  private checkLive() {
    assert(!this._released, 'CodeTable read after release');
  }

  static init(entries: CodeEntry[], allocator: ArenaAllocator): CodeTable {
    for(let i = 0; i < entries.length; ++i) {
      let symbol = entries[i][0];
      if(!Number.isInteger(symbol) || (symbol < 0) || (symbol >= SYMBOL_COUNT)) {
        throw new Error(`Invalid code table symbol: ${symbol}`);
      }
    }
    return new CodeTable(entries, allocator);
  }
}

export function buildCodeTable(huffTree: HuffTree, allocator: ArenaAllocator): CodeTable {
  let entries: CodeEntry[];
  entries = [];
  huffTreePreOrder(huffTree, (nodeIdx, code) => {
    let symbol: number | undefined;
    symbol = huffTree.arena.symbol(nodeIdx);
    if(symbol !== undefined) {
      entries.push([
        symbol,
        (code.length > 0)
          ? code.slice()
          : SINGLE_SYMBOL_CODE.slice(),
      ]);
    }
  });
  return CodeTable.init(entries, allocator);
}
