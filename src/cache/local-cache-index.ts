import type { Dirent } from 'node:fs';
import { readdir, stat, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { CacheError, ConfigError, errorMessage } from '../errors/custom-errors';
import type { BroadcastDate, CacheArtifact } from '../types/broadcast.types';
import { hasErrorCode } from '../utils/fs-utils';
import { artifactPath, isPartialDownload, parseArtifactName } from './artifact-name';

export type PurgeResult = {
  removed: number;
  freedBytes: number;
};

/**
 * Read-side view of the cache directory plus the purge operation.
 *
 * Artifacts are recognised by parsing their file name (`<prefix>.<date>.mp4`), never by
 * searching the name for the date string. A missing directory is an empty cache.
 */
export class LocalCacheIndex {
  readonly cacheDir: string;
  readonly prefix: string;

  constructor(cacheDir: string, prefix: string) {
    this.cacheDir = cacheDir;
    this.prefix = prefix;
  }

  /**
   * Path a download for `date` is stored at
   */
  pathFor(date: BroadcastDate): string {
    return artifactPath(this.cacheDir, this.prefix, date);
  }

  /**
   * Find a cached edition for the date.
   *
   * Any prefix is accepted. Should files with different prefixes exist for the same
   * date, the first one in directory order wins; that order is up to the filesystem.
   */
  async findLocal(date: BroadcastDate): Promise<string | undefined> {
    for (const entry of await readEntries(this.cacheDir)) {
      if (entry.isFile() && parseArtifactName(entry.name)?.date === date) {
        return join(this.cacheDir, entry.name);
      }
    }
    return undefined;
  }

  /**
   * Sum of the sizes of all regular files below the cache directory
   */
  async totalSize(): Promise<number> {
    return directorySize(this.cacheDir);
  }

  /**
   * All cached editions, oldest first
   */
  async listArtifacts(): Promise<CacheArtifact[]> {
    const artifacts: CacheArtifact[] = [];

    for (const entry of await readEntries(this.cacheDir)) {
      const parsed = entry.isFile() ? parseArtifactName(entry.name) : undefined;
      if (!parsed) continue;

      const path = join(this.cacheDir, entry.name);
      const { size } = await stat(path);
      artifacts.push({ date: parsed.date, path, size });
    }

    return artifacts.sort((a, b) => a.date.localeCompare(b.date) || a.path.localeCompare(b.path));
  }

  /**
   * Delete every cached edition and every leftover partial download.
   * Other files in the directory are left alone.
   */
  async purge(): Promise<PurgeResult> {
    const result: PurgeResult = { removed: 0, freedBytes: 0 };

    for (const entry of await readEntries(this.cacheDir)) {
      if (!entry.isFile()) continue;
      if (!parseArtifactName(entry.name) && !isPartialDownload(entry.name)) continue;

      const path = join(this.cacheDir, entry.name);
      const { size } = await stat(path);
      await unlink(path);
      result.removed++;
      result.freedBytes += size;
    }

    return result;
  }
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;

  for (const entry of await readEntries(dir)) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(path);
    } else if (entry.isFile()) {
      total += (await stat(path)).size;
    }
  }

  return total;
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return [];
    if (hasErrorCode(error, 'ENOTDIR')) {
      throw new ConfigError(`Cache directory "${dir}" is not a directory`);
    }
    throw new CacheError(`Cannot read cache directory "${dir}": ${errorMessage(error)}`, dir);
  }
}
