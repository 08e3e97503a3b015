import { z } from 'zod';

/**
 * Envelope of the search endpoint. Individual results are validated one at a time
 * so a single bad result cannot sink the whole response.
 */
export const SearchResponseSchema = z.object({
  searchResults: z.array(z.unknown()),
});

/**
 * The fields of a search result the catalog reads
 */
export const RawSearchResultSchema = z.object({
  title: z.string().nullish(),
  date: z.string({ message: '"date" is missing or not a string' }),
  streams: z.record(z.string(), z.unknown()).nullish(),
});

export type RawSearchResult = z.infer<typeof RawSearchResultSchema>;

/**
 * `2023-04-21T20:00:00.000+02:00`: date, hour, minute, optional seconds and fraction, offset
 */
const DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export type BroadcastDateTime = {
  date: string;
  time: string;
  timezone: string;
};

/**
 * Split the combined date-time-timezone string of a search result
 *
 * @returns undefined when the string does not have that shape
 */
export function parseBroadcastDateTime(value: string): BroadcastDateTime | undefined {
  const match = value.trim().match(DATE_TIME_PATTERN);
  if (!match) return undefined;

  const [, date, hours, minutes, offset] = match;
  if (!date || !hours || !minutes || !offset) return undefined;

  return {
    date,
    time: `${hours}:${minutes}`,
    timezone: offset === 'Z' ? '+00:00' : normalizeOffset(offset),
  };
}

function normalizeOffset(offset: string): string {
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}
