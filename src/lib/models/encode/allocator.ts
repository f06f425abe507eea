
import { AllocationFailure } from './huff-errors';

/*
  Backing store for everything a run allocates: the node arena, the code
    table and the output buffer. Each of those takes exactly one region and
    hands it back with free() when released.
*/
export interface ArenaAllocator {
  alloc(byteLength: number): ArrayBuffer;
  free(buf: ArrayBuffer): void;
}

export class HeapAllocator implements ArenaAllocator {
  alloc(byteLength: number): ArrayBuffer {
    return allocBuffer(byteLength);
  }
  free(_buf: ArrayBuffer) {
    // GC owns the memory
  }
}

/*
  Refuses any request that would take the outstanding total over maxBytes.
*/
export class BoundedAllocator implements ArenaAllocator {
  private _outstandingBytes: number;
  private regions: Set<ArrayBuffer>;

  constructor(
    public readonly maxBytes: number,
  ) {
    this._outstandingBytes = 0;
    this.regions = new Set();
  }

  get outstandingBytes(): number {
    return this._outstandingBytes;
  }

  alloc(byteLength: number): ArrayBuffer {
    let buf: ArrayBuffer;
    if((this._outstandingBytes + byteLength) > this.maxBytes) {
      throw new AllocationFailure(
        byteLength,
        `budget of ${this.maxBytes} bytes exceeded (${this._outstandingBytes} outstanding)`,
      );
    }
    buf = allocBuffer(byteLength);
    this.regions.add(buf);
    this._outstandingBytes += byteLength;
    return buf;
  }

  free(buf: ArrayBuffer) {
    if(!this.regions.delete(buf)) {
      throw new Error('Attempt to free a region not owned by this allocator');
    }
    this._outstandingBytes -= buf.byteLength;
  }
}

export function getDefaultAllocator(maxBytes?: number): ArenaAllocator {
  if(maxBytes === undefined) {
    return new HeapAllocator();
  }
  return new BoundedAllocator(maxBytes);
}

function allocBuffer(byteLength: number): ArrayBuffer {
  if(!Number.isInteger(byteLength) || (byteLength < 0)) {
    throw new AllocationFailure(byteLength, 'invalid region size');
  }
  try {
    return new ArrayBuffer(byteLength);
  } catch(e) {
    if(e instanceof RangeError) {
      throw new AllocationFailure(byteLength, e.message);
    }
    throw e;
  }
}
