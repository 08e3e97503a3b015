import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { LocalCacheIndex } from '../cache/local-cache-index';
import { StorageGuard } from '../cache/storage-guard';
import { CatalogClient, type FetchFn } from '../catalog/catalog-client';
import { DownloadManager } from '../downloader/download-manager';
import { DownloadError, NotAvailableError, RemoteUnavailableError } from '../errors/custom-errors';
import { NotificationLevel } from '../notifications/notifier';
import type { Player } from '../player/player';
import { createFakeNotifier, type FakeNotifier } from '../test-utils/fake-notifier';
import { FetchOrchestrator } from './fetch-orchestrator';

const SEARCH_URL = 'https://api.example.com/search/?searchText=tagesschau%2020%20Uhr';

function videoUrl(date: string): string {
  return `https://media.example.com/${date}.webxl.h264.mp4`;
}

function searchBody(dateTimes: string[]) {
  return {
    searchResults: dateTimes.map((date) => ({
      title: 'tagesschau',
      date,
      streams: { h264xl: videoUrl(date.slice(0, 10)) },
    })),
  };
}

describe('FetchOrchestrator', () => {
  let cacheDir: string;
  let notifier: FakeNotifier;
  let player: { play: Mock<Player['play']> };
  let cacheIndex: LocalCacheIndex;

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), 'tagesschau-orchestrator-'));
    notifier = createFakeNotifier();
    player = { play: vi.fn<Player['play']>(async () => true) };
    cacheIndex = new LocalCacheIndex(cacheDir, 'tagesschau');
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
  });

  /**
   * Wires real components around a fetch stand-in that serves the search
   * endpoint and the video URLs
   */
  function setup(options: { search?: () => Response; video?: (url: string) => Response; threshold?: number } = {}) {
    const search = options.search ?? (() => Response.json(searchBody([])));
    const video = options.video ?? (() => new Response('video-bytes'));
    const fetchFn = vi.fn<FetchFn>(async (input) => {
      const url = String(input);
      return url === SEARCH_URL ? search() : video(url);
    });

    const orchestrator = new FetchOrchestrator({
      cacheIndex,
      catalog: new CatalogClient(
        { searchUrl: SEARCH_URL, streamVariant: 'h264xl', requestTimeout: 1000, cacheDir, prefix: 'tagesschau' },
        notifier,
        fetchFn,
      ),
      storageGuard: new StorageGuard(cacheIndex, options.threshold ?? 1024 ** 3),
      downloader: new DownloadManager(notifier, { timeout: 1000 }, fetchFn),
      player,
      notifier,
    });

    return { orchestrator, fetchFn };
  }

  it('should play a cached edition without any network call', async () => {
    const cached = join(cacheDir, 'tagesschau.2023-04-21.mp4');
    writeFileSync(cached, 'cached');
    const { orchestrator, fetchFn } = setup();

    const handle = await orchestrator.fetchAndPlay('2023-04-21');

    expect(handle).toEqual({ date: '2023-04-21', path: cached, source: 'cache', launched: true });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(player.play).toHaveBeenCalledWith(cached);
  });

  it('should download and play an edition that is not cached', async () => {
    const { orchestrator, fetchFn } = setup({
      search: () =>
        Response.json(
          searchBody(['2023-04-21T17:00:00.000+02:00', '2023-04-21T20:00:00.000+02:00', '2023-04-20T20:00:00.000+02:00']),
        ),
    });
    const target = join(cacheDir, 'tagesschau.2023-04-21.mp4');

    const handle = await orchestrator.fetchAndPlay('2023-04-21');

    expect(handle).toEqual({ date: '2023-04-21', path: target, source: 'remote', launched: true });
    expect(readFileSync(target, 'utf8')).toBe('video-bytes');
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(fetchFn).toHaveBeenLastCalledWith(videoUrl('2023-04-21'), expect.anything());
    expect(player.play).toHaveBeenCalledWith(target);
  });

  it('should fail with NotAvailableError and leave the cache untouched', async () => {
    writeFileSync(join(cacheDir, 'tagesschau.2023-04-19.mp4'), 'older');
    const { orchestrator, fetchFn } = setup({
      search: () => Response.json(searchBody(['2023-04-20T20:00:00.000+02:00', '2023-04-21T17:00:00.000+02:00'])),
    });

    await expect(orchestrator.fetchAndPlay('2023-04-21')).rejects.toThrow(new NotAvailableError('2023-04-21'));

    expect(readdirSync(cacheDir)).toEqual(['tagesschau.2023-04-19.mp4']);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(player.play).not.toHaveBeenCalled();
  });

  it('should propagate an unreachable search endpoint', async () => {
    const { orchestrator } = setup({ search: () => new Response('down', { status: 502 }) });

    await expect(orchestrator.fetchAndPlay('2023-04-21')).rejects.toBeInstanceOf(RemoteUnavailableError);
    expect(player.play).not.toHaveBeenCalled();
  });

  it('should leave no artifact behind when the download fails', async () => {
    const { orchestrator } = setup({
      search: () => Response.json(searchBody(['2023-04-21T20:00:00.000+02:00'])),
      video: () => new Response('gone', { status: 410 }),
    });
    const sizeBefore = await cacheIndex.totalSize();

    await expect(orchestrator.fetchAndPlay('2023-04-21')).rejects.toBeInstanceOf(DownloadError);

    expect(await cacheIndex.totalSize()).toBe(sizeBefore);
    expect(existsSync(join(cacheDir, 'tagesschau.2023-04-21.mp4'))).toBe(false);
    expect(player.play).not.toHaveBeenCalled();
  });

  it('should warn about a full cache and still download', async () => {
    writeFileSync(join(cacheDir, 'tagesschau.2023-04-19.mp4'), 'older edition');
    const { orchestrator } = setup({
      search: () => Response.json(searchBody(['2023-04-21T20:00:00.000+02:00'])),
      threshold: 1,
    });

    const handle = await orchestrator.fetchAndPlay('2023-04-21');

    expect(handle.source).toBe('remote');
    expect(notifier.notify).toHaveBeenCalledWith(
      NotificationLevel.WARNING,
      `Cache directory ${cacheDir} holds 0.00 GB, above the 0.00 GB threshold. Run "purge" to free space.`,
    );
  });

  it('should not let a failing size check block the fetch', async () => {
    const download = vi.fn(async () => 11);
    const orchestrator = new FetchOrchestrator({
      cacheIndex,
      catalog: {
        findByDate: async (date) => ({
          date,
          time: '20:00',
          timezone: '+02:00',
          sourceUrl: videoUrl(date),
          targetPath: join(cacheDir, `tagesschau.${date}.mp4`),
        }),
      },
      storageGuard: {
        check: async () => {
          throw new Error('EACCES: permission denied');
        },
      },
      downloader: { download },
      player,
      notifier,
    });

    const handle = await orchestrator.fetchAndPlay('2023-04-21');

    expect(handle.source).toBe('remote');
    expect(download).toHaveBeenCalledWith(videoUrl('2023-04-21'), join(cacheDir, 'tagesschau.2023-04-21.mp4'));
    expect(notifier.notify).toHaveBeenCalledWith(
      NotificationLevel.WARNING,
      'Could not measure the cache size: EACCES: permission denied',
    );
  });

  it('should skip playback when asked to', async () => {
    writeFileSync(join(cacheDir, 'tagesschau.2023-04-21.mp4'), 'cached');
    const { orchestrator } = setup();

    const handle = await orchestrator.fetchAndPlay('2023-04-21', { play: false });

    expect(handle.launched).toBe(false);
    expect(player.play).not.toHaveBeenCalled();
  });

  it('should report a player that did not start without failing', async () => {
    writeFileSync(join(cacheDir, 'tagesschau.2023-04-21.mp4'), 'cached');
    player.play.mockResolvedValue(false);
    const { orchestrator } = setup();

    const handle = await orchestrator.fetchAndPlay('2023-04-21');

    expect(handle).toMatchObject({ source: 'cache', launched: false });
  });
});
