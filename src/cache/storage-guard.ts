import { formatGigabytes } from '../utils/format-utils';
import type { LocalCacheIndex } from './local-cache-index';

type SizedCache = Pick<LocalCacheIndex, 'cacheDir' | 'totalSize'>;

/**
 * Warns when the cache directory grows past a size threshold. Advisory only.
 */
export class StorageGuard {
  private cacheIndex: SizedCache;
  private thresholdBytes: number;

  constructor(cacheIndex: SizedCache, thresholdBytes: number) {
    this.cacheIndex = cacheIndex;
    this.thresholdBytes = thresholdBytes;
  }

  /**
   * @returns Advisory message when the cache exceeds the threshold, otherwise undefined
   */
  async check(): Promise<string | undefined> {
    const total = await this.cacheIndex.totalSize();
    if (total <= this.thresholdBytes) {
      return undefined;
    }

    return (
      `Cache directory ${this.cacheIndex.cacheDir} holds ${formatGigabytes(total)} GB, ` +
      `above the ${formatGigabytes(this.thresholdBytes)} GB threshold. Run "purge" to free space.`
    );
  }
}
