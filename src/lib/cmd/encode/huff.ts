
import { ArenaAllocator } from '../../models/encode/allocator';
import { BitStr, CodeTable } from '../../models/encode/code-table';
import { AllocationFailure, MissingCodeError } from '../../models/encode/huff-errors';

/*
  One '0'/'1' char per bit, codes concatenated in input order. The output
    carries no length prefix or delimiter.
*/
export function getBitStr(
  bytes: Uint8Array,
  codeTable: CodeTable,
  allocator: ArenaAllocator,
): BitStr {
  let outLen: number;
  let outBuf: ArrayBuffer;
  let out: Uint8Array;
  let pos: number;

  outLen = getBitStrLength(bytes, codeTable);
  outBuf = allocator.alloc(outLen);
  try {
    out = new Uint8Array(outBuf, 0, outLen);
    pos = 0;
    for(let i = 0; i < bytes.length; ++i) {
      pos += codeTable.copyCode(bytes[i], out, pos);
    }
    return toBinaryStr(out);
  } finally {
    allocator.free(outBuf);
  }
}

export function getBitStrLength(bytes: Uint8Array, codeTable: CodeTable): number {
  let outLen: number;
  outLen = 0;
  for(let i = 0; i < bytes.length; ++i) {
    let codeLen = codeTable.codeLength(bytes[i]);
    if(codeLen === 0) {
      throw new MissingCodeError(bytes[i], i);
    }
    outLen += codeLen;
  }
  return outLen;
}

/*
  Inverse of getBitStr() given the same table. Codes are prefix-free, so the
    first table match at any point is the only one.
*/
export function decodeBitStr(bitStr: BitStr, codeTable: CodeTable): Uint8Array {
  let codeLookupMap: Map<BitStr, number>;
  let decoded: number[];
  let currCode: string;
  let currSymbol: number | undefined;

  codeLookupMap = new Map();
  for(let [ byte, code ] of codeTable.entries()) {
    codeLookupMap.set(code, byte);
  }
  decoded = [];
  currCode = '';
  for(let i = 0; i < bitStr.length; ++i) {
    let currBit = bitStr[i];
    if(currBit !== '0' && currBit !== '1') {
      throw new Error(`Unexpected bit at position ${i}: '${currBit}'`);
    }
    currCode += currBit;
    if((currSymbol = codeLookupMap.get(currCode)) !== undefined) {
      decoded.push(currSymbol);
      currCode = '';
    }
  }
  if(currCode.length > 0) {
    throw new Error(`Trailing bits do not form a complete code: '${currCode}'`);
  }
  return Uint8Array.from(decoded);
}

function toBinaryStr(out: Uint8Array): string {
  try {
    return Buffer.from(out.buffer, out.byteOffset, out.length).toString('binary');
  } catch(e) {
    if(e instanceof RangeError) {
      throw new AllocationFailure(out.length * 2, e.message);
    }
    throw e;
  }
}
