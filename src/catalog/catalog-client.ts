import { z } from 'zod';
import { BROADCAST_TIME, isBroadcastDate } from '../broadcast/date-resolver';
import { artifactPath } from '../cache/artifact-name';
import { errorMessage, MalformedEntryError, RemoteUnavailableError } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import type { BroadcastDate, CatalogEntry } from '../types/broadcast.types';
import { parseBroadcastDateTime, RawSearchResultSchema, SearchResponseSchema } from './catalog-schema';

export type FetchFn = typeof fetch;

export type CatalogClientOptions = {
  searchUrl: string;
  /** Key in the result's `streams` mapping to download, e.g. "h264xl" */
  streamVariant: string;
  /** Milliseconds */
  requestTimeout: number;
  cacheDir: string;
  prefix: string;
};

const UrlSchema = z.url();

/**
 * Client for the remote search API. Turns the raw result list into 20:00 catalog entries.
 */
export class CatalogClient {
  private options: CatalogClientOptions;
  private notifier: Notifier;
  private fetchFn: FetchFn;

  constructor(options: CatalogClientOptions, notifier: Notifier, fetchFn: FetchFn = fetch) {
    this.options = options;
    this.notifier = notifier;
    this.fetchFn = fetchFn;
  }

  /**
   * Query the search endpoint and return one entry per date for the 20:00 slot.
   * Results from other slots are dropped; malformed results are skipped with a warning.
   *
   * @throws RemoteUnavailableError when the endpoint cannot be used at all
   */
  async search(): Promise<CatalogEntry[]> {
    const results = await this.fetchResults();
    const entries = new Map<BroadcastDate, CatalogEntry>();

    for (const [index, raw] of results.entries()) {
      let entry: CatalogEntry | undefined;
      try {
        entry = this.projectEntry(raw);
      } catch (error) {
        if (error instanceof MalformedEntryError) {
          this.notifier.notify(NotificationLevel.WARNING, `Skipping search result #${index}: ${error.message}`);
          continue;
        }
        throw error;
      }

      if (entry && !entries.has(entry.date)) {
        entries.set(entry.date, entry);
      }
    }

    this.notifier.notify(
      NotificationLevel.DEBUG,
      `Search returned ${results.length} results, ${entries.size} 20:00 editions`,
    );

    return [...entries.values()];
  }

  /**
   * The 20:00 edition for a date, if the search lists one
   */
  async findByDate(date: BroadcastDate): Promise<CatalogEntry | undefined> {
    const entries = await this.search();
    return entries.find((entry) => entry.date === date);
  }

  /**
   * Project one raw result
   *
   * @returns undefined for a result outside the 20:00 slot
   * @throws MalformedEntryError when a field the projection needs is missing or unusable
   */
  projectEntry(raw: unknown): CatalogEntry | undefined {
    const parsed = RawSearchResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedEntryError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const result = parsed.data;

    const dateTime = parseBroadcastDateTime(result.date);
    if (!dateTime || !isBroadcastDate(dateTime.date)) {
      throw new MalformedEntryError(`unrecognised date "${result.date}"`);
    }

    if (dateTime.time !== BROADCAST_TIME) {
      this.notifier.notify(NotificationLevel.DEBUG, `Ignoring ${dateTime.time} edition of ${dateTime.date}`);
      return undefined;
    }

    const { streamVariant } = this.options;
    const stream = result.streams?.[streamVariant];
    if (typeof stream !== 'string' || !UrlSchema.safeParse(stream).success) {
      throw new MalformedEntryError(`no "${streamVariant}" stream for ${dateTime.date}`);
    }

    return {
      date: dateTime.date,
      time: dateTime.time,
      timezone: dateTime.timezone,
      sourceUrl: stream,
      targetPath: artifactPath(this.options.cacheDir, this.options.prefix, dateTime.date),
      ...(result.title ? { title: result.title } : {}),
    };
  }

  private async fetchResults(): Promise<unknown[]> {
    const { searchUrl, requestTimeout } = this.options;

    let response: Response;
    try {
      response = await this.fetchFn(searchUrl, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(requestTimeout),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${requestTimeout} ms`
          : errorMessage(error);
      throw new RemoteUnavailableError(`Search request failed: ${reason}`, searchUrl);
    }

    if (!response.ok) {
      throw new RemoteUnavailableError(
        `Search request failed: HTTP ${response.status} ${response.statusText}`.trim(),
        searchUrl,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RemoteUnavailableError(`Search response is not JSON: ${errorMessage(error)}`, searchUrl, response.status);
    }

    const envelope = SearchResponseSchema.safeParse(body);
    if (!envelope.success) {
      throw new RemoteUnavailableError('Search response has no "searchResults" list', searchUrl, response.status);
    }

    return envelope.data.searchResults;
  }
}
