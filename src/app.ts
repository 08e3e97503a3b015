import { boolean, command, flag, option, optional, runSafely, string, subcommands } from 'cmd-ts';
import { parseBroadcastDate, resolveSearchDate } from './broadcast/date-resolver';
import { LocalCacheIndex, type PurgeResult } from './cache/local-cache-index';
import { StorageGuard } from './cache/storage-guard';
import { CatalogClient, type FetchFn } from './catalog/catalog-client';
import type { ResolvedConfig } from './config/config-defaults';
import { loadConfig } from './config/config-loader';
import { DownloadManager } from './downloader/download-manager';
import { ConfigError, errorMessage, TagesschauError } from './errors/custom-errors';
import { ExitCode, exitCodeFor } from './errors/exit-codes';
import { ConsoleNotifier } from './notifications/console-notifier';
import { NotificationLevel, type Notifier } from './notifications/notifier';
import { FetchOrchestrator } from './orchestrator/fetch-orchestrator';
import { type RunCommand, SystemPlayer } from './player/system-player';
import type { BroadcastDate, CacheArtifact, CatalogEntry, PlaybackHandle } from './types/broadcast.types';
import { formatSize } from './utils/format-utils';
import { LogLevel, logger } from './utils/logger';

/**
 * Components built once per invocation from the resolved config
 */
export type Services = {
  cacheIndex: LocalCacheIndex;
  catalog: CatalogClient;
  orchestrator: FetchOrchestrator;
};

/**
 * Outside world the components talk to; replaced in tests
 */
export type ServiceIO = {
  fetchFn?: FetchFn;
  runCommand?: RunCommand;
};

export function buildServices(config: ResolvedConfig, notifier: Notifier, io: ServiceIO = {}): Services {
  const fetchFn = io.fetchFn ?? fetch;
  const cacheIndex = new LocalCacheIndex(config.cache.dir, config.cache.prefix);
  const catalog = new CatalogClient(
    {
      searchUrl: config.remote.searchUrl,
      streamVariant: config.remote.streamVariant,
      requestTimeout: config.remote.requestTimeout,
      cacheDir: config.cache.dir,
      prefix: config.cache.prefix,
    },
    notifier,
    fetchFn,
  );
  const downloader = new DownloadManager(
    notifier,
    { tempDir: config.cache.tempDir, timeout: config.remote.downloadTimeout },
    fetchFn,
  );
  const orchestrator = new FetchOrchestrator({
    cacheIndex,
    catalog,
    storageGuard: new StorageGuard(cacheIndex, config.cache.sizeThreshold),
    downloader,
    player: new SystemPlayer(notifier, config.player, io.runCommand),
    notifier,
  });

  return { cacheIndex, catalog, orchestrator };
}

function createConsoleNotifier(minLevel: NotificationLevel): Notifier {
  if (minLevel === NotificationLevel.DEBUG) {
    logger.setLevel(LogLevel.DEBUG);
  }
  return new ConsoleNotifier(minLevel);
}

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createNotifier: (minLevel: NotificationLevel) => Notifier;
  buildServices: (config: ResolvedConfig, notifier: Notifier) => Services;
  now: () => Date;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  createNotifier: createConsoleNotifier,
  buildServices: (config, notifier) => buildServices(config, notifier),
  now: () => new Date(),
};

export type CommonOptions = {
  config?: string;
  verbose: boolean;
};

export type PlayOptions = CommonOptions & {
  date?: string;
  noPlay: boolean;
};

/**
 * Everything a command works with once the config is loaded
 */
export type Session = {
  config: ResolvedConfig;
  notifier: Notifier;
  services: Services;
};

async function openSession(options: CommonOptions, deps: AppDependencies): Promise<Session> {
  const config = await deps.loadConfig(options.config);
  const notifier = deps.createNotifier(
    options.verbose ? NotificationLevel.DEBUG : config.notifications.consoleMinLevel,
  );
  notifier.notify(NotificationLevel.DEBUG, `Cache directory: ${config.cache.dir}`);

  return { config, notifier, services: deps.buildServices(config, notifier) };
}

/**
 * Report a failed command and set the matching exit code. Before a notifier exists
 * (bad date, bad config) the message goes straight to the logger.
 */
export function reportFailure(error: unknown, notifier?: Notifier): void {
  const report = (level: NotificationLevel, message: string) => {
    if (notifier) {
      notifier.notify(level, message);
    } else if (level === NotificationLevel.DEBUG) {
      logger.debug(message);
    } else {
      logger.error(message);
    }
  };

  if (error instanceof ConfigError) {
    report(NotificationLevel.ERROR, `Configuration error: ${error.message}`);
  } else if (error instanceof TagesschauError) {
    report(NotificationLevel.ERROR, error.message);
  } else {
    report(NotificationLevel.ERROR, `Unexpected error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      report(NotificationLevel.DEBUG, error.stack);
    }
  }
  process.exitCode = exitCodeFor(error);
}

/**
 * Load the config, run the command and report whatever it throws
 *
 * @returns The command's result, or undefined when it failed
 */
async function runReported<T>(
  options: CommonOptions,
  deps: AppDependencies,
  task: (session: Session) => Promise<T>,
): Promise<T | undefined> {
  let session: Session;
  try {
    session = await openSession(options, deps);
  } catch (error) {
    reportFailure(error);
    return undefined;
  }

  try {
    return await task(session);
  } catch (error) {
    reportFailure(error, session.notifier);
    return undefined;
  }
}

/**
 * Make the edition of one date available locally and open it
 */
export async function runPlay(
  options: PlayOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<PlaybackHandle | undefined> {
  // Validate the date before touching config or network
  let date: BroadcastDate;
  try {
    date = options.date === undefined ? resolveSearchDate(deps.now()) : parseBroadcastDate(options.date);
  } catch (error) {
    reportFailure(error);
    return undefined;
  }

  return runReported(options, deps, ({ services }) =>
    services.orchestrator.fetchAndPlay(date, { play: !options.noPlay }),
  );
}

export function runList(
  options: CommonOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<CacheArtifact[] | undefined> {
  return runReported(options, deps, async ({ config, notifier, services }) => {
    const artifacts = await services.cacheIndex.listArtifacts();

    if (artifacts.length === 0) {
      notifier.notify(NotificationLevel.INFO, `No editions cached in ${config.cache.dir}`);
      return artifacts;
    }

    for (const artifact of artifacts) {
      notifier.notify(
        NotificationLevel.INFO,
        `${artifact.date}  ${formatSize(artifact.size).padStart(10)}  ${artifact.path}`,
      );
    }
    const total = artifacts.reduce((sum, artifact) => sum + artifact.size, 0);
    notifier.notify(NotificationLevel.INFO, `${artifacts.length} edition(s), ${formatSize(total)} in total`);

    return artifacts;
  });
}

export function runPurge(
  options: CommonOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<PurgeResult | undefined> {
  return runReported(options, deps, async ({ config, notifier, services }) => {
    const result = await services.cacheIndex.purge();

    notifier.notify(
      NotificationLevel.SUCCESS,
      `Removed ${result.removed} file(s) from ${config.cache.dir}, freed ${formatSize(result.freedBytes)}`,
    );
    return result;
  });
}

/**
 * List the 20:00 editions the search endpoint currently offers, newest first
 */
export function runSearch(
  options: CommonOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<CatalogEntry[] | undefined> {
  return runReported(options, deps, async ({ notifier, services }) => {
    const entries = (await services.catalog.search()).sort((a, b) => b.date.localeCompare(a.date));

    if (entries.length === 0) {
      notifier.notify(NotificationLevel.WARNING, 'The search returned no 20:00 editions');
      return entries;
    }

    for (const entry of entries) {
      const cached = await services.cacheIndex.findLocal(entry.date);
      const title = entry.title ? `  ${entry.title}` : '';
      notifier.notify(
        NotificationLevel.INFO,
        `${entry.date} ${entry.time}${entry.timezone}${cached ? '  [cached]' : ''}${title}`,
      );
    }

    return entries;
  });
}

const commonArgs = {
  config: option({
    type: optional(string),
    long: 'config',
    short: 'c',
    description: 'Path to configuration file (default: $TAGESSCHAU_DL_CONFIG or ~/.config/tagesschau-dl/config.yaml)',
  }),
  verbose: flag({
    type: boolean,
    long: 'verbose',
    description: 'Print debug output',
  }),
};

export function createCli(deps: AppDependencies = defaultDependencies) {
  const play = command({
    name: 'play',
    description: 'Fetch the 20:00 edition of a day (cache first) and open it',
    args: {
      ...commonArgs,
      date: option({
        type: optional(string),
        long: 'date',
        short: 'd',
        description: 'Broadcast day as YYYY-MM-DD (default: the latest edition that has aired)',
      }),
      noPlay: flag({
        type: boolean,
        long: 'no-play',
        description: 'Only make the file available, do not start the player',
      }),
    },
    handler: (args) => runPlay(args, deps),
  });

  const list = command({
    name: 'list',
    description: 'List the cached editions',
    args: commonArgs,
    handler: (args) => runList(args, deps),
  });

  const purge = command({
    name: 'purge',
    description: 'Delete every cached edition and leftover partial download',
    args: commonArgs,
    handler: (args) => runPurge(args, deps),
  });

  const search = command({
    name: 'search',
    description: 'List the 20:00 editions available for download',
    args: commonArgs,
    handler: (args) => runSearch(args, deps),
  });

  return subcommands({
    name: 'tagesschau-dl',
    description: 'Download and play the tagesschau 20:00 edition',
    version: '0.1.0',
    cmds: { play, list, purge, search },
  });
}

export const cli = createCli();

/**
 * Parse the arguments and run the chosen command. Help and version exit with 0,
 * any argument cmd-ts rejects with the usage code.
 */
export async function runCli(argv: string[], app: ReturnType<typeof createCli> = cli): Promise<void> {
  const result = await runSafely(app, argv);
  if (result._tag === 'ok') {
    return;
  }

  const { exitCode, message, into } = result.error.config;
  if (into === 'stdout') {
    console.log(message);
  } else {
    console.error(message);
  }
  process.exitCode = exitCode === 0 ? ExitCode.SUCCESS : ExitCode.USAGE;
}
