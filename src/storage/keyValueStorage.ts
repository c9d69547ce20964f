import fs from 'fs-extra';
import path from 'node:path';

/** Same surface as React Native's AsyncStorage, so hosts can pass either. */
export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const entries = new Map(Object.entries(initial));
  return {
    async getItem(key) {
      return entries.get(key) ?? null;
    },
    async setItem(key, value) {
      entries.set(key, value);
    },
    async removeItem(key) {
      entries.delete(key);
    },
  };
}

let tempFileSequence = 0;

function fileNameForKey(key: string): string {
  return `${encodeURIComponent(key)}.json`;
}

/**
 * One file per key under `directory`. Writes go through a temp file and a
 * rename so a crash mid-write leaves the previous value readable.
 */
export function createFileStorage(directory: string): KeyValueStorage {
  const resolve = (key: string) => path.join(directory, fileNameForKey(key));
  return {
    async getItem(key) {
      const file = resolve(key);
      if (!(await fs.pathExists(file))) {
        return null;
      }
      return fs.readFile(file, 'utf8');
    },
    async setItem(key, value) {
      const file = resolve(key);
      tempFileSequence += 1;
      const temp = `${file}.${process.pid}.${tempFileSequence}.tmp`;
      await fs.outputFile(temp, value, 'utf8');
      await fs.move(temp, file, { overwrite: true });
    },
    async removeItem(key) {
      await fs.remove(resolve(key));
    },
  };
}
