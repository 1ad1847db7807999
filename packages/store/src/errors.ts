// packages/store/src/errors.ts

export type PersistentMapErrorCode =
  | 'IO_READ'
  | 'IO_WRITE'
  | 'CORRUPT_STORE'
  | 'KEY_NOT_FOUND'
  | 'EMPTY_CONTAINER'
  | 'SERIALIZATION';

/**
 * Base class for everything the store throws on purpose.
 * `code` is stable; messages are for humans.
 */
export class PersistentMapError extends Error {
  readonly code: PersistentMapErrorCode;

  constructor(code: PersistentMapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

function errnoOf(err: unknown): string | null {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
  return null;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A file-system primitive failed underneath the store. */
export class StoreIOError extends PersistentMapError {
  readonly path: string;
  /** errno code of the underlying failure (ENOENT, EACCES, EISDIR, ...) when there is one. */
  readonly errno: string | null;

  constructor(code: 'IO_READ' | 'IO_WRITE', path: string, action: string, cause: unknown) {
    super(code, `${action} ${path}: ${describe(cause)}`, { cause });
    this.path = path;
    this.errno = errnoOf(cause);
  }
}

export class IOReadError extends StoreIOError {
  constructor(path: string, action: string, cause: unknown) {
    super('IO_READ', path, action, cause);
  }
}

export class IOWriteError extends StoreIOError {
  constructor(path: string, action: string, cause: unknown) {
    super('IO_WRITE', path, action, cause);
  }
}

/** The backing file is non-empty but is not one JSON object. */
export class CorruptStoreError extends PersistentMapError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('CORRUPT_STORE', `corrupt store ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class KeyNotFoundError extends PersistentMapError {
  readonly key: string;

  constructor(key: string) {
    super('KEY_NOT_FOUND', `key not found: ${JSON.stringify(key)}`);
    this.key = key;
  }
}

export class EmptyContainerError extends PersistentMapError {
  constructor(op: string) {
    super('EMPTY_CONTAINER', `${op}: map is empty`);
  }
}

/** A stored value has no JSON representation. Raised at save time, never at assignment. */
export class SerializationError extends PersistentMapError {
  readonly keyPath: string;

  constructor(keyPath: string, reason: string) {
    super('SERIALIZATION', `cannot serialize ${keyPath}: ${reason}`);
    this.keyPath = keyPath;
  }
}
