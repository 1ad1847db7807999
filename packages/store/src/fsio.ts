// packages/store/src/fsio.ts
//
// Synchronous file primitives used by PersistentMap.
// Every failure leaves here as IOReadError / IOWriteError.

import fs from 'node:fs';
import path from 'node:path';

import { IOReadError, IOWriteError } from './errors.js';

export function fileExists(filename: string): boolean {
  return fs.existsSync(filename);
}

export function fileSize(filename: string): number {
  try {
    return fs.statSync(filename).size;
  } catch (e) {
    throw new IOReadError(filename, 'stat', e);
  }
}

export function ensureParentDir(filename: string): void {
  const dir = path.dirname(filename);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (e) {
    throw new IOWriteError(dir, 'mkdir', e);
  }
}

export function readText(filename: string): string {
  try {
    return fs.readFileSync(filename, 'utf8');
  } catch (e) {
    throw new IOReadError(filename, 'read', e);
  }
}

export function writeText(filename: string, text: string, opts: { atomic?: boolean } = {}): void {
  if (!opts.atomic) {
    try {
      fs.writeFileSync(filename, text, 'utf8');
    } catch (e) {
      throw new IOWriteError(filename, 'write', e);
    }
    return;
  }

  const tmp = `${filename}.tmp`;
  try {
    fs.writeFileSync(tmp, text, 'utf8');
  } catch (e) {
    throw new IOWriteError(tmp, 'write', e);
  }

  try {
    fs.renameSync(tmp, filename);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw new IOWriteError(filename, 'rename', e);
  }
}
