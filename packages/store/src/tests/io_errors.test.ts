// packages/store/src/tests/io_errors.test.ts
import test, { after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  IOWriteError,
  PersistentMapError,
  SerializationError,
  StoreIOError,
  openPersistentMap,
  type JsonObject,
} from '../index.js';

const ROOT = fs.mkdtempSync(path.join(os.tmpdir(), 'persistmap-io-'));
after(() => fs.rmSync(ROOT, { recursive: true, force: true }));

test('open: a directory at the store path surfaces as a StoreIOError', () => {
  const file = path.join(ROOT, 'is-a-dir.json');
  fs.mkdirSync(file);

  assert.throws(
    () => openPersistentMap(file),
    (err: unknown) => err instanceof StoreIOError && err.errno === 'EISDIR' && err.path === file
  );
});

test('open: a regular file where the parent dir should be is an IOWriteError', () => {
  const blocker = path.join(ROOT, 'blocker');
  fs.writeFileSync(blocker, 'not a dir');

  assert.throws(
    () => openPersistentMap(path.join(blocker, 'store.json')),
    (err: unknown) => err instanceof IOWriteError && err.code === 'IO_WRITE' && err instanceof PersistentMapError
  );
});

test('autosave write failure propagates and keeps the in-memory change', () => {
  const file = path.join(ROOT, 'replaced.json');
  const m = openPersistentMap(file);

  fs.rmSync(file);
  fs.mkdirSync(file);

  assert.throws(
    () => m.set('a', 1),
    (err: unknown) => err instanceof IOWriteError && err.errno === 'EISDIR' && err.cause instanceof Error
  );
  assert.equal(m.get('a'), 1);
});

test('non-serializable values are accepted in memory and rejected at save time', () => {
  const file = path.join(ROOT, 'lazy.json');
  const m = openPersistentMap(file, { defaults: { ok: true } });

  assert.throws(() => m.set('bad', Number.NaN), SerializationError);
  assert.equal(m.has('bad'), true);
  assert.equal(fs.readFileSync(file, 'utf8'), '{"ok":true}');

  m.autosave = false;
  const loop: JsonObject = {};
  loop.self = loop;
  m.delete('bad');
  m.set('loop', loop);

  assert.throws(
    () => m.save(),
    (err: unknown) => err instanceof SerializationError && err.keyPath === 'loop.self'
  );
  assert.equal(fs.readFileSync(file, 'utf8'), '{"ok":true}');
});
