import { createEnum } from '../utils/create-enum';

/**
 * Calendar day of a 20:00 edition, always `YYYY-MM-DD`
 */
export type BroadcastDate = string;

/**
 * A 20:00 edition found through the search API
 */
export type CatalogEntry = {
  date: BroadcastDate;
  /** Always "20:00"; other slots never become entries */
  time: string;
  /** UTC offset of the broadcast time, e.g. "+02:00" */
  timezone: string;
  sourceUrl: string;
  /** `<cacheDir>/<prefix>.<date>.mp4`, derived from the date alone */
  targetPath: string;
  title?: string;
};

/**
 * A downloaded edition in the cache directory
 */
export type CacheArtifact = {
  date: BroadcastDate;
  path: string;
  size: number;
};

const artifactSource = createEnum(['cache', 'remote'] as const);

export const ArtifactSource = artifactSource.object;

export type ArtifactSource = typeof artifactSource.type;

/**
 * Outcome of a successful fetch
 */
export type PlaybackHandle = {
  date: BroadcastDate;
  path: string;
  source: ArtifactSource;
  /** Whether the player was started */
  launched: boolean;
};
