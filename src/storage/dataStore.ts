import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

/** JSON persistence keyed by relative paths such as `sessions/<id>.json`. */
export interface DataStore {
  /** Parsed JSON, or null when nothing is stored at the path. */
  readJSON(filePath: string): Promise<unknown>;
  writeJSON(filePath: string, data: unknown): Promise<void>;
  remove(filePath: string): Promise<void>;
  list(dir: string): Promise<string[]>;
  describe(): string;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function createFileStore(rootDir: string): Promise<DataStore> {
  await mkdir(rootDir, { recursive: true });

  let queue: Promise<void> = Promise.resolve();
  function enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const task = queue.then(fn);
    queue = task.then(
      () => {},
      () => {},
    );
    return task;
  }

  return {
    readJSON(filePath) {
      return enqueue(async () => {
        try {
          const content = await readFile(join(rootDir, filePath), 'utf-8');
          const parsed: unknown = JSON.parse(content);
          return parsed;
        } catch (error) {
          if (isMissingFileError(error)) return null;
          throw error;
        }
      });
    },

    writeJSON(filePath, data) {
      return enqueue(async () => {
        const fullPath = join(rootDir, filePath);
        await mkdir(dirname(fullPath), { recursive: true });
        await writeFile(fullPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      });
    },

    remove(filePath) {
      return enqueue(() => rm(join(rootDir, filePath), { force: true }));
    },

    list(dir) {
      return enqueue(async () => {
        try {
          return (await readdir(join(rootDir, dir))).sort();
        } catch (error) {
          if (isMissingFileError(error)) return [];
          throw error;
        }
      });
    },

    describe() {
      return rootDir;
    },
  };
}

/** Keeps serialized JSON in memory; used by tests and one-off CLI runs. */
export function createMemoryStore(): DataStore {
  const files = new Map<string, string>();

  return {
    async readJSON(filePath) {
      const content = files.get(filePath);
      if (content === undefined) return null;
      const parsed: unknown = JSON.parse(content);
      return parsed;
    },

    async writeJSON(filePath, data) {
      files.set(filePath, JSON.stringify(data));
    },

    async remove(filePath) {
      files.delete(filePath);
    },

    async list(dir) {
      const prefix = `${dir.replace(/\/+$/, '')}/`;
      return Array.from(files.keys())
        .filter((key) => key.startsWith(prefix) && !key.slice(prefix.length).includes('/'))
        .map((key) => key.slice(prefix.length))
        .sort();
    },

    describe() {
      return 'memory';
    },
  };
}
