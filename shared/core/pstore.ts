import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { StorageError } from './errors';

export type StorageValue = string;

export interface StorageBackend {
  getItem(key: string): Promise<StorageValue | null>;
  setItem(key: string, value: StorageValue): Promise<void>;
  removeItem(key: string): Promise<void>;
}

export type MemoryStorage = StorageBackend & { store: Map<string, string> };

export function createMemoryStorage(): MemoryStorage {
  const store = new Map<string, string>();
  return {
    store,
    async getItem(key: string): Promise<string | null> {
      return store.get(key) ?? null;
    },
    async setItem(key: string, value: string): Promise<void> {
      store.set(key, value);
    },
    async removeItem(key: string): Promise<void> {
      store.delete(key);
    },
  } satisfies MemoryStorage;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function fileNameForKey(key: string): string {
  return `${encodeURIComponent(key)}.json`;
}

/**
 * One file per key under `dir`. Writes go to a temp file first and are
 * renamed into place, so a crash never leaves a half-written value.
 */
export function createFileStorage(dir: string): StorageBackend {
  let ready: Promise<void> | null = null;
  let tempCounter = 0;

  const ensureDir = (): Promise<void> => {
    if (!ready) {
      ready = mkdir(dir, { recursive: true }).then(() => undefined);
      ready.catch(() => {
        ready = null;
      });
    }
    return ready;
  };

  return {
    async getItem(key: string): Promise<string | null> {
      try {
        return await readFile(path.join(dir, fileNameForKey(key)), 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          return null;
        }
        throw new StorageError(`failed to read ${key}`, { cause: error });
      }
    },
    async setItem(key: string, value: string): Promise<void> {
      const target = path.join(dir, fileNameForKey(key));
      tempCounter += 1;
      const temp = `${target}.${process.pid}.${tempCounter}.tmp`;
      try {
        await ensureDir();
        await writeFile(temp, value, 'utf8');
        await rename(temp, target);
      } catch (error) {
        throw new StorageError(`failed to write ${key}`, { cause: error });
      }
    },
    async removeItem(key: string): Promise<void> {
      try {
        await rm(path.join(dir, fileNameForKey(key)), { force: true });
      } catch (error) {
        throw new StorageError(`failed to remove ${key}`, { cause: error });
      }
    },
  } satisfies StorageBackend;
}

export function resolveStorage(dataDir: string | null): StorageBackend {
  return dataDir ? createFileStorage(dataDir) : createMemoryStorage();
}
