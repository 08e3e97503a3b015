import { homedir } from 'node:os';
import { join } from 'node:path';
import { NotificationLevel } from '../notifications/notification-level';

/**
 * Fully resolved configuration, built once at startup and passed to each component
 */
export type DefaultConfig = {
  cache: {
    dir: string;
    prefix: string;
    tempDir?: string;
    sizeThreshold: number;
  };

  remote: {
    searchUrl: string;
    streamVariant: string;
    requestTimeout: number;
    downloadTimeout: number;
  };

  player: {
    command?: string;
    args: string[];
  };

  notifications: {
    consoleMinLevel: NotificationLevel;
  };
};

export type ResolvedConfig = DefaultConfig;

export const GIB = 1024 ** 3;

export const DEFAULT_SEARCH_URL =
  'https://www.tagesschau.de/api2u/search/?searchText=tagesschau%2020%20Uhr&resultPage=0&pageSize=30';

export const DEFAULT_CACHE_DIR = join(homedir(), '.cache', 'tagesschau-dl');

export const defaults: DefaultConfig = {
  cache: {
    dir: DEFAULT_CACHE_DIR,
    prefix: 'tagesschau',
    sizeThreshold: 5 * GIB,
  },
  remote: {
    searchUrl: DEFAULT_SEARCH_URL,
    streamVariant: 'h264xl',
    requestTimeout: 30_000,
    downloadTimeout: 30 * 60_000,
  },
  player: {
    args: [],
  },
  notifications: {
    consoleMinLevel: NotificationLevel.INFO,
  },
};
