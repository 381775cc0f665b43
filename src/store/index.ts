export type { RecordStore, HistoryStore, HistoryQuery } from './types.js';
export { KeyedMutex } from './keyed-mutex.js';
export { MemoryRecordStore, MemoryHistoryStore } from './memory-store.js';
export { withTimeout } from './timeout.js';
