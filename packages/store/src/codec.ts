// packages/store/src/codec.ts
//
// JSON codec for the backing file. The whole map is one JSON object.

import { parse, stringify } from 'lossless-json';

import { CorruptStoreError, SerializationError } from './errors.js';
import type { JsonValue } from './types.js';

function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Throws SerializationError unless `value` survives a write and a reload unchanged.
 * The stringifier itself would silently drop undefined members and turn NaN into null.
 */
export function assertJsonValue(value: unknown, keyPath: string, seen: Set<object> = new Set()): asserts value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'bigint':
      return;
    case 'number':
      if (!Number.isFinite(value)) throw new SerializationError(keyPath, `non-finite number ${String(value)}`);
      return;
    case 'undefined':
    case 'function':
    case 'symbol':
      throw new SerializationError(keyPath, `${typeof value} is not a JSON value`);
  }

  if (value === null) return;
  if (typeof value !== 'object') throw new SerializationError(keyPath, `${typeof value} is not a JSON value`);

  if (seen.has(value)) throw new SerializationError(keyPath, 'circular reference');
  seen.add(value);

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) assertJsonValue(value[i], `${keyPath}[${i}]`, seen);
  } else {
    if (!isPlainObject(value)) {
      const name = value.constructor?.name ?? 'object';
      throw new SerializationError(keyPath, `${name} instance is not a JSON value`);
    }
    for (const [k, v] of Object.entries(value)) assertJsonValue(v, `${keyPath}.${k}`, seen);
  }

  // shared (non-circular) references are fine
  seen.delete(value);
}

// Integers beyond Number.MAX_SAFE_INTEGER come back as bigint, so a reload
// followed by a save writes the same digits.
function parseNumber(text: string): number | bigint {
  const n = Number(text);
  if (/^-?\d+$/.test(text) && !Number.isSafeInteger(n)) return BigInt(text);
  return n;
}

export function serializeStore(entries: Iterable<readonly [string, unknown]>, indent = 0): string {
  const pairs = [...entries];
  for (const [k, v] of pairs) assertJsonValue(v, k);

  // fromEntries defines own properties, so a "__proto__" key stays a key
  const doc = Object.fromEntries(pairs);
  const text = stringify(doc, undefined, indent > 0 ? indent : undefined);
  if (text === undefined) throw new SerializationError('(root)', 'nothing to serialize');
  return indent > 0 ? text + '\n' : text;
}

export function parseStore(text: string, filename: string): Map<string, JsonValue> {
  let parsed: unknown;
  try {
    parsed = parse(text, undefined, parseNumber);
  } catch (e) {
    throw new CorruptStoreError(filename, 'invalid JSON', e);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CorruptStoreError(filename, `expected a JSON object, got ${kindOf(parsed)}`);
  }

  const out = new Map<string, JsonValue>();
  for (const [k, v] of Object.entries(parsed)) {
    try {
      assertJsonValue(v, k);
    } catch (e) {
      // e.g. 1e400, which parses to Infinity
      throw new CorruptStoreError(filename, e instanceof Error ? e.message : String(e), e);
    }
    out.set(k, v);
  }
  return out;
}
