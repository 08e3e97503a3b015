import { createWriteStream } from 'node:fs';
import { copyFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { PARTIAL_SUFFIX } from '../cache/artifact-name';
import type { FetchFn } from '../catalog/catalog-client';
import { DownloadError, errorMessage } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import { formatDuration, formatSize } from '../utils/format-utils';
import { hasErrorCode } from '../utils/fs-utils';

export type DownloadManagerOptions = {
  /** Where partial downloads are written; defaults to the target's directory */
  tempDir?: string;
  /** Milliseconds for the whole transfer */
  timeout: number;
};

type PendingBody = {
  body: NonNullable<Response['body']>;
  /** Content-Length, when the server sent one */
  total?: number;
};

/**
 * Downloads a video into the cache.
 *
 * The body is streamed into `<file>.part` and renamed onto the target only once it is
 * complete, so the target path either holds a whole file or nothing. Any failure removes
 * the partial file and every directory the attempt created.
 */
export class DownloadManager {
  private notifier: Notifier;
  private tempDir?: string;
  private timeout: number;
  private fetchFn: FetchFn;

  constructor(notifier: Notifier, options: DownloadManagerOptions, fetchFn: FetchFn = fetch) {
    this.notifier = notifier;
    this.tempDir = options.tempDir ? resolve(options.tempDir) : undefined;
    this.timeout = options.timeout;
    this.fetchFn = fetchFn;
  }

  /**
   * Download `url` to `targetPath`
   *
   * @returns Size of the stored file in bytes
   * @throws DownloadError on any failure, after removing the partial file
   */
  async download(url: string, targetPath: string): Promise<number> {
    const fileName = basename(targetPath);
    const workDir = this.tempDir ?? dirname(targetPath);
    const tempPath = join(workDir, `${fileName}${PARTIAL_SUFFIX}`);
    const startedAt = Date.now();

    this.notifier.notify(NotificationLevel.HIGHLIGHT, `Downloading ${fileName}`);
    this.notifier.notify(NotificationLevel.DEBUG, `Source: ${url}, temp file: ${tempPath}`);

    // Directories this attempt creates; removed again if it fails
    const createdDirs: string[] = [];

    try {
      const pending = await this.request(url);

      for (const dir of [dirname(targetPath), workDir]) {
        const created = await mkdir(dir, { recursive: true });
        if (created) createdDirs.push(created);
      }

      await this.writeBody(pending, tempPath, fileName);

      const { size } = await stat(tempPath);
      if (size === 0) {
        throw new Error('Downloaded file is empty');
      }

      await moveIntoPlace(tempPath, targetPath);

      this.notifier.endProgress();
      this.notifier.notify(
        NotificationLevel.SUCCESS,
        `Downloaded ${fileName} (${formatSize(size)} in ${formatDuration(Date.now() - startedAt)})`,
      );
      return size;
    } catch (error) {
      this.notifier.endProgress();
      await this.cleanup([tempPath, ...createdDirs]);
      throw new DownloadError(`Failed to download ${url}: ${this.describe(error)}`, url);
    }
  }

  /**
   * Start the request; resolves once the headers are in and the status is a success
   */
  private async request(url: string): Promise<PendingBody> {
    const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeout) });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    const { body } = response;
    if (!body) {
      throw new Error('Response has no body');
    }
    return { body, total: Number(response.headers.get('content-length')) || undefined };
  }

  private async writeBody({ body, total }: PendingBody, tempPath: string, label: string): Promise<void> {
    const notifier = this.notifier;
    let received = 0;
    let lastPercent = -1;

    await pipeline(
      Readable.fromWeb(body),
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          received += chunk.length;
          if (total) {
            const percent = Math.min(100, Math.floor((received * 100) / total));
            if (percent !== lastPercent) {
              lastPercent = percent;
              notifier.progress(`${label}: ${percent}% of ${formatSize(total)}`);
            }
          }
          yield chunk;
        }
      },
      createWriteStream(tempPath),
    );
  }

  private describe(error: unknown): string {
    if (error instanceof Error && error.name === 'TimeoutError') {
      return `timed out after ${this.timeout} ms`;
    }
    return errorMessage(error);
  }

  private async cleanup(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        await rm(path, { recursive: true, force: true });
      } catch (error) {
        this.notifier.notify(NotificationLevel.WARNING, `Failed to delete ${path}: ${errorMessage(error)}`);
      }
    }
  }
}

/**
 * Rename the finished file onto its target. A temp directory on another device cannot be
 * renamed across, so the file is copied next to the target first and renamed from there.
 */
async function moveIntoPlace(tempPath: string, targetPath: string): Promise<void> {
  try {
    await rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!hasErrorCode(error, 'EXDEV')) throw error;
  }

  const sibling = `${targetPath}${PARTIAL_SUFFIX}`;
  try {
    await copyFile(tempPath, sibling);
    await rename(sibling, targetPath);
  } catch (error) {
    await rm(sibling, { force: true });
    throw error;
  }
  await rm(tempPath, { force: true });
}
