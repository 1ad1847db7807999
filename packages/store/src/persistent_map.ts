// packages/store/src/persistent_map.ts
import path from 'node:path';

import { isPlainObject, parseStore, serializeStore } from './codec.js';
import { debugLog } from './debug.js';
import { EmptyContainerError, KeyNotFoundError } from './errors.js';
import { ensureParentDir, fileExists, fileSize, readText, writeText } from './fsio.js';
import type { JsonObject, JsonValue, PersistentMapOptions, UpdateSource } from './types.js';

const EMPTY_DOCUMENT = '{}';

// A slot exists exactly when the key does, whatever value it holds.
type Slot = { value: JsonValue };

function isRecord(src: UpdateSource): src is JsonObject {
  return isPlainObject(src);
}

/**
 * A string-keyed map mirrored to one JSON file.
 *
 * Construction loads the file (creating it as `{}` when missing or zero-length),
 * seeds `defaults` for absent keys, then saves if `autosave` is on. With autosave,
 * every mutating call rewrites the whole file after updating memory. A failed write
 * does not roll the in-memory change back.
 *
 * Values are only checked when written: NaN, circular structures and the like are
 * accepted by `set` and rejected by the next save with SerializationError.
 *
 * Nothing coordinates two instances on the same path: the last full write wins.
 */
export class PersistentMap implements Iterable<[string, JsonValue]> {
  public readonly path: string;
  public autosave: boolean;

  private readonly atomic: boolean;
  private readonly indent: number;
  private readonly data = new Map<string, Slot>();

  constructor(filename: string, opts: PersistentMapOptions = {}) {
    this.path = path.resolve(filename);
    this.autosave = opts.autosave ?? true;
    this.atomic = opts.atomic ?? false;
    this.indent = opts.indent ?? 0;

    this.load();
    this.seed(opts.defaults ?? {});
    this.autosaveNow();
  }

  static open(filename: string, opts: PersistentMapOptions = {}): PersistentMap {
    return new PersistentMap(filename, opts);
  }

  private load(): void {
    ensureParentDir(this.path);

    if (!fileExists(this.path) || fileSize(this.path) === 0) {
      debugLog(`bootstrap ${this.path}`);
      writeText(this.path, EMPTY_DOCUMENT, { atomic: this.atomic });
      return;
    }

    for (const [k, v] of parseStore(readText(this.path), this.path)) this.data.set(k, { value: v });
    debugLog(`loaded ${this.data.size} key(s) from ${this.path}`);
  }

  private seed(defaults: JsonObject): number {
    let inserted = 0;
    for (const [k, v] of Object.entries(defaults)) {
      if (this.data.has(k)) continue;
      this.data.set(k, { value: v });
      inserted++;
    }
    return inserted;
  }

  private autosaveNow(): void {
    if (this.autosave) this.write();
  }

  private *pairs(): IterableIterator<[string, JsonValue]> {
    for (const [k, slot] of this.data) yield [k, slot.value];
  }

  private write(): void {
    const text = serializeStore(this.pairs(), this.indent);
    writeText(this.path, text, { atomic: this.atomic });
    debugLog(`saved ${this.data.size} key(s) to ${this.path}`);
  }

  // ---------------------------------------------------------------------------
  // read access (never touches the file)
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.data.size;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  get(key: string): JsonValue | undefined;
  get<F>(key: string, fallback: F): JsonValue | F;
  get<F>(key: string, ...rest: [] | [F]): JsonValue | F | undefined {
    const slot = this.data.get(key);
    if (slot) return slot.value;
    return rest.length === 1 ? rest[0] : undefined;
  }

  /** Lookup that throws KeyNotFoundError instead of returning undefined. */
  require(key: string): JsonValue {
    const slot = this.data.get(key);
    if (!slot) throw new KeyNotFoundError(key);
    return slot.value;
  }

  keys(): IterableIterator<string> {
    return this.data.keys();
  }

  *values(): IterableIterator<JsonValue> {
    for (const slot of this.data.values()) yield slot.value;
  }

  entries(): IterableIterator<[string, JsonValue]> {
    return this.pairs();
  }

  [Symbol.iterator](): IterableIterator<[string, JsonValue]> {
    return this.pairs();
  }

  forEach(fn: (value: JsonValue, key: string, map: this) => void): void {
    for (const [k, v] of this.pairs()) fn(v, k, this);
  }

  toObject(): JsonObject {
    return Object.fromEntries(this.pairs());
  }

  snapshot(): JsonObject {
    return structuredClone(this.toObject());
  }

  /** Plain-object view; JSON.stringify throws on the bigint values a large integer loads as. */
  toJSON(): JsonObject {
    return this.toObject();
  }

  toString(): string {
    return `PersistentMap(${serializeStore(this.pairs())})`;
  }

  // ---------------------------------------------------------------------------
  // mutation
  // ---------------------------------------------------------------------------

  set(key: string, value: JsonValue): this {
    this.data.set(key, { value });
    this.autosaveNow();
    return this;
  }

  /** Removes `key` and returns its value. Absent keys throw and nothing is written. */
  delete(key: string): JsonValue {
    const value = this.require(key);
    this.data.delete(key);
    this.autosaveNow();
    return value;
  }

  update(src: UpdateSource): void {
    if (isRecord(src)) {
      for (const [k, v] of Object.entries(src)) this.data.set(k, { value: v });
    } else {
      for (const [k, v] of src) this.data.set(k, { value: v });
    }
    this.autosaveNow();
  }

  clear(): void {
    this.data.clear();
    this.autosaveNow();
  }

  /**
   * Without a fallback, an absent key throws KeyNotFoundError (nothing is written).
   * With one (even `undefined`), an absent key returns it and the map is still saved.
   */
  pop(key: string): JsonValue;
  pop<F>(key: string, fallback: F): JsonValue | F;
  pop<F>(key: string, ...rest: [] | [F]): JsonValue | F {
    const slot = this.data.get(key);

    let result: JsonValue | F;
    if (slot) {
      this.data.delete(key);
      result = slot.value;
    } else if (rest.length === 1) {
      result = rest[0];
    } else {
      throw new KeyNotFoundError(key);
    }

    this.autosaveNow();
    return result;
  }

  /** Removes and returns the most recently inserted pair. */
  popItem(): [string, JsonValue] {
    let last: [string, JsonValue] | null = null;
    for (const entry of this.pairs()) last = entry;
    if (!last) throw new EmptyContainerError('popItem');

    this.data.delete(last[0]);
    this.autosaveNow();
    return last;
  }

  /** Returns the stored value on a hit (no write); inserts and saves on a miss. */
  setDefault(key: string, value: JsonValue): JsonValue {
    const existing = this.data.get(key);
    if (existing) return existing.value;

    this.data.set(key, { value });
    this.autosaveNow();
    return value;
  }

  /** Seeds every absent key; writes only when something was inserted. */
  setDefaults(defaults: JsonObject): number {
    const inserted = this.seed(defaults);
    if (inserted > 0) this.autosaveNow();
    return inserted;
  }

  // ---------------------------------------------------------------------------
  // persistence
  // ---------------------------------------------------------------------------

  /**
   * Applies `patch` through `set` (so each entry autosaves when enabled),
   * then writes the whole map regardless of `autosave`.
   */
  save(patch?: JsonObject | null): void {
    if (patch) {
      for (const [k, v] of Object.entries(patch)) this.set(k, v);
    }
    this.write();
  }

  /** Runs `fn` with this map and saves on every exit path, including a throw. */
  use<R>(fn: (map: this) => R): R {
    try {
      return fn(this);
    } finally {
      this.save();
    }
  }

  async useAsync<R>(fn: (map: this) => Promise<R>): Promise<R> {
    try {
      return await fn(this);
    } finally {
      this.save();
    }
  }
}

export function openPersistentMap(filename: string, opts: PersistentMapOptions = {}): PersistentMap {
  return PersistentMap.open(filename, opts);
}
