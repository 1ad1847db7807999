// packages/store/src/debug.ts

const DEBUG_ENV = 'PERSISTMAP_DEBUG';

function debugEnabled(): boolean {
  const v = String(process.env[DEBUG_ENV] ?? '').trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

// stderr, so it never mixes with the host program's stdout
export function debugLog(...args: unknown[]): void {
  if (debugEnabled()) console.error('[persistmap]', ...args);
}
