// packages/store/src/types.ts

// bigint carries integers beyond Number.MAX_SAFE_INTEGER
export type JsonPrimitive = null | boolean | number | bigint | string;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type PersistentMapOptions = {
  /** Rewrite the backing file after every mutation (default true). */
  autosave?: boolean;
  /** Seeded only for keys the file does not already hold. */
  defaults?: JsonObject;
  /** Write `<path>.tmp` then rename over the target instead of overwriting in place. */
  atomic?: boolean;
  /** JSON indentation of the written file; 0 writes compact JSON. */
  indent?: number;
};

export type UpdateSource = JsonObject | ReadonlyMap<string, JsonValue> | Iterable<readonly [string, JsonValue]>;
