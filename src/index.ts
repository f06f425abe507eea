
export {
  HUFF_SESSION_STATE,
  HuffSession,
  createSession,
  encode,
  resetOrDestroy,
} from './lib/service/huff-session';
export type {
  HuffSessionOpts,
  RunStats,
} from './lib/service/huff-session';
export {
  getBitStr,
  getBitStrLength,
  decodeBitStr,
} from './lib/cmd/encode/huff';
export {
  BoundedAllocator,
  HeapAllocator,
  getDefaultAllocator,
} from './lib/models/encode/allocator';
export type {
  ArenaAllocator,
} from './lib/models/encode/allocator';
export {
  CodeTable,
  buildCodeTable,
} from './lib/models/encode/code-table';
export type {
  BitStr,
} from './lib/models/encode/code-table';
export {
  getFreqMap,
  getFreqTotal,
} from './lib/models/encode/freq-map';
export type {
  FreqMap,
} from './lib/models/encode/freq-map';
export {
  HuffTree,
  huffTreePreOrder,
} from './lib/models/encode/huff-tree';
export {
  MinPriorityQueue,
} from './lib/models/encode/min-priority-queue';
export {
  NodeArena,
} from './lib/models/encode/node-arena';
export type {
  NodeIdx,
} from './lib/models/encode/node-arena';
export {
  AllocationFailure,
  EmptyInputError,
  HuffError,
  MissingCodeError,
} from './lib/models/encode/huff-errors';
