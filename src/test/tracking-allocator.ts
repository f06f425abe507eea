
import type { ArenaAllocator } from '../lib/models/encode/allocator';

/*
  Counts every region handed out and back. Freeing a region twice, or one
    it never handed out, throws.
*/
export class TrackingAllocator implements ArenaAllocator {
  allocCount: number;
  freeCount: number;
  private live: Set<ArrayBuffer>;

  constructor() {
    this.allocCount = 0;
    this.freeCount = 0;
    this.live = new Set();
  }

  get outstanding(): number {
    return this.live.size;
  }

  alloc(byteLength: number): ArrayBuffer {
    let buf: ArrayBuffer;
    buf = new ArrayBuffer(byteLength);
    this.live.add(buf);
    this.allocCount++;
    return buf;
  }

  free(buf: ArrayBuffer) {
    if(!this.live.delete(buf)) {
      throw new Error('TrackingAllocator: free() of a region that is not live');
    }
    this.freeCount++;
  }
}

/*
  deterministic pseudo-random bytes drawn from the first alphabetSize values
*/
export function getTestBytes(length: number, alphabetSize: number, seed: number): Uint8Array {
  let bytes: Uint8Array;
  bytes = new Uint8Array(length);
  for(let i = 0; i < length; ++i) {
    seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
    bytes[i] = (seed >>> 16) % alphabetSize;
  }
  return bytes;
}

export function isPrefixFree(codes: string[]): boolean {
  for(let i = 0; i < codes.length; ++i) {
    for(let k = 0; k < codes.length; ++k) {
      if((i !== k) && codes[k].startsWith(codes[i])) {
        return false;
      }
    }
  }
  return true;
}
