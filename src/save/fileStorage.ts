import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { StorageLike } from './progressStore.ts';

function readEntries(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      console.warn('Progress file is not an object, starting empty.', { path });
      return {};
    }
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        entries[key] = value;
      }
    }
    return entries;
  } catch (error) {
    console.warn('Failed to parse progress file, starting empty.', { path, error });
    return {};
  }
}

/**
 * JSON-file backed storage. Writes are synchronous so a value is on disk
 * before the next read; write errors propagate to the caller.
 */
export function createFileStorage(path: string): StorageLike {
  let entries = readEntries(path);

  const flush = (): void => {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
  };

  return {
    getItem: (key) => entries[key] ?? null,
    setItem: (key, value) => {
      entries = { ...entries, [key]: value };
      flush();
    },
    removeItem: (key) => {
      if (!(key in entries)) {
        return;
      }
      const next = { ...entries };
      delete next[key];
      entries = next;
      flush();
    }
  };
}
