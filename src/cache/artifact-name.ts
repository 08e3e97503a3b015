import { basename, join } from 'node:path';
import { isBroadcastDate } from '../broadcast/date-resolver';
import type { BroadcastDate } from '../types/broadcast.types';

export const ARTIFACT_EXTENSION = '.mp4';

/**
 * Suffix of a download in progress
 */
export const PARTIAL_SUFFIX = '.part';

const ARTIFACT_PATTERN = /^(.+)\.(\d{4}-\d{2}-\d{2})\.mp4$/;

/**
 * `<prefix>.<date>.mp4`
 */
export function artifactFileName(prefix: string, date: BroadcastDate): string {
  return `${prefix}.${date}${ARTIFACT_EXTENSION}`;
}

/**
 * Where the edition for `date` lives in the cache. Depends on nothing but its arguments,
 * so the same date always names the same file.
 */
export function artifactPath(cacheDir: string, prefix: string, date: BroadcastDate): string {
  return join(cacheDir, artifactFileName(prefix, date));
}

/**
 * Split an artifact file name into prefix and date.
 * Returns undefined for anything else, including partial downloads.
 */
export function parseArtifactName(fileName: string): { prefix: string; date: BroadcastDate } | undefined {
  const match = basename(fileName).match(ARTIFACT_PATTERN);
  if (!match) return undefined;

  const [, prefix, date] = match;
  if (!prefix || !date || !isBroadcastDate(date)) return undefined;

  return { prefix, date };
}

export function isPartialDownload(fileName: string): boolean {
  return fileName.endsWith(PARTIAL_SUFFIX);
}
