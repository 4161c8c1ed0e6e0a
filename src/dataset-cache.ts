import * as fs from 'node:fs';
import * as path from 'node:path';
import Logger from './logger';
import type { LoadResult } from './types';

interface CacheEntry {
  identity: string;
  result: Promise<LoadResult>;
}

type Loader = (filePath: string) => Promise<LoadResult>;

/**
 * Source identity of a file: absolute path plus size and modification time.
 * A rewritten file gets a new identity and therefore misses the cache.
 */
export function sourceIdentity(filePath: string): string {
  const absolute = path.resolve(filePath);
  try {
    const stat = fs.statSync(absolute);
    return `${absolute}|${stat.size}|${stat.mtimeMs}`;
  } catch {
    return `${absolute}|missing`;
  }
}

/**
 * Whole-dataset cache keyed by source identity. Entries live until
 * invalidate() or clear() is called; failed loads are not kept.
 */
class DatasetCache {
  private entries = new Map<string, CacheEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(filePath: string): boolean {
    return this.get(filePath) !== null;
  }

  /** Cached result for the file's current identity, or null */
  get(filePath: string): Promise<LoadResult> | null {
    const entry = this.entries.get(path.resolve(filePath));
    if (!entry || entry.identity !== sourceIdentity(filePath)) return null;
    return entry.result;
  }

  /** Return the cached dataset, or run the loader and cache its result */
  load(filePath: string, loader: Loader): Promise<LoadResult> {
    const cached = this.get(filePath);
    if (cached) {
      Logger.debug(`Dataset cache hit: ${path.basename(filePath)}`);
      return cached;
    }

    const key = path.resolve(filePath);
    const identity = sourceIdentity(filePath);
    const result = loader(key).then(
      (loaded) => {
        if (loaded.issue !== null) this.dropIfCurrent(key, result);
        return loaded;
      },
      (err: unknown) => {
        this.dropIfCurrent(key, result);
        throw err;
      }
    );
    this.entries.set(key, { identity, result });
    return result;
  }

  /** Forget one source (e.g. after a confirmed upload replaced it) */
  invalidate(filePath: string): boolean {
    return this.entries.delete(path.resolve(filePath));
  }

  /** Forget everything (manual "refresh data") */
  clear(): void {
    this.entries.clear();
  }

  private dropIfCurrent(key: string, result: Promise<LoadResult>): void {
    if (this.entries.get(key)?.result === result) {
      this.entries.delete(key);
    }
  }
}

export default DatasetCache;
