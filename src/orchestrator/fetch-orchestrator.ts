import type { LocalCacheIndex } from '../cache/local-cache-index';
import type { StorageGuard } from '../cache/storage-guard';
import type { CatalogClient } from '../catalog/catalog-client';
import type { DownloadManager } from '../downloader/download-manager';
import { errorMessage, NotAvailableError } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import type { Player } from '../player/player';
import { ArtifactSource, type BroadcastDate, type PlaybackHandle } from '../types/broadcast.types';

export type FetchOrchestratorDependencies = {
  cacheIndex: Pick<LocalCacheIndex, 'findLocal'>;
  catalog: Pick<CatalogClient, 'findByDate'>;
  storageGuard: Pick<StorageGuard, 'check'>;
  downloader: Pick<DownloadManager, 'download'>;
  player: Player;
  notifier: Notifier;
};

export type FetchOptions = {
  /** Start the player once the file is available (default true) */
  play?: boolean;
};

/**
 * Resolves one date to a playable file: cache first, then search and download.
 *
 *   check cache ─ hit ──────────────────────────────► play
 *        └─ miss ─► search ─ match ─► download ─ ok ─► play
 *                      └─ none: NotAvailableError   └─ fail: DownloadError
 *
 * Nothing is retried. Failures surface as NotAvailableError, RemoteUnavailableError
 * or DownloadError.
 */
export class FetchOrchestrator {
  private deps: FetchOrchestratorDependencies;

  constructor(deps: FetchOrchestratorDependencies) {
    this.deps = deps;
  }

  async fetchAndPlay(date: BroadcastDate, options: FetchOptions = {}): Promise<PlaybackHandle> {
    const { cacheIndex, catalog, downloader, notifier } = this.deps;
    const play = options.play ?? true;

    const localPath = await cacheIndex.findLocal(date);
    if (localPath) {
      notifier.notify(NotificationLevel.SUCCESS, `Edition of ${date} found in cache: ${localPath}`);
      return this.finish(date, localPath, ArtifactSource.CACHE, play);
    }

    notifier.notify(NotificationLevel.INFO, `Edition of ${date} not cached, searching...`);
    const entry = await catalog.findByDate(date);
    if (!entry) {
      throw new NotAvailableError(date);
    }

    await this.checkStorage();

    await downloader.download(entry.sourceUrl, entry.targetPath);
    return this.finish(date, entry.targetPath, ArtifactSource.REMOTE, play);
  }

  private async checkStorage(): Promise<void> {
    const { storageGuard, notifier } = this.deps;
    try {
      const advisory = await storageGuard.check();
      if (advisory) {
        notifier.notify(NotificationLevel.WARNING, advisory);
      }
    } catch (error) {
      notifier.notify(NotificationLevel.WARNING, `Could not measure the cache size: ${errorMessage(error)}`);
    }
  }

  private async finish(
    date: BroadcastDate,
    path: string,
    source: ArtifactSource,
    play: boolean,
  ): Promise<PlaybackHandle> {
    const launched = play ? await this.deps.player.play(path) : false;
    return { date, path, source, launched };
  }
}
