// packages/store/src/index.ts
//
// Public exports for @persistmap/store.

export { PersistentMap, openPersistentMap } from './persistent_map.js';

export {
  PersistentMapError,
  StoreIOError,
  IOReadError,
  IOWriteError,
  CorruptStoreError,
  KeyNotFoundError,
  EmptyContainerError,
  SerializationError,
} from './errors.js';
export type { PersistentMapErrorCode } from './errors.js';

export { assertJsonValue, parseStore, serializeStore } from './codec.js';

export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  PersistentMapOptions,
  UpdateSource,
} from './types.js';
