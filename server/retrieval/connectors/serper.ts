import { z } from 'zod';
import type { AppConfig } from '../../../shared/config';
import type { Candidate } from '../../../shared/types';
import { SearchRequestError } from '../errors';
import { decodeUtf8, fetchWithTimeouts, type TimedResponse } from '../http';
import type { ConnectorResult } from '../types';

const SerperResponseSchema = z.object({
  organic: z.array(z.unknown()).optional(),
});

const OrganicEntrySchema = z.record(z.unknown());
type OrganicEntry = z.infer<typeof OrganicEntrySchema>;

const asString = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

/**
 * Query the Serper-compatible search API. A response without an `organic`
 * field is an empty result and entries that are not objects are skipped; transport errors, non-2xx statuses and
 * unparseable bodies throw `SearchRequestError`.
 */
export const fetchSearchCandidates = async (query: string, config: AppConfig): Promise<ConnectorResult> => {
  const { search } = config;
  const payload = JSON.stringify({
    q: query,
    gl: search.region,
    hl: search.language,
    num: search.maxResults,
  });

  let response: TimedResponse;
  try {
    response = await fetchWithTimeouts(search.endpoint, {
      method: 'POST',
      headers: {
        'X-API-KEY': search.apiKey,
        'Content-Type': 'application/json',
      },
      body: payload,
      connectTimeoutMs: search.connectTimeoutMs,
      readTimeoutMs: search.readTimeoutMs,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchRequestError(`Search request failed: ${message}`, null, { cause: error });
  }

  const text = decodeUtf8(response.body);
  if (response.status < 200 || response.status >= 300) {
    throw new SearchRequestError(
      `Search request failed: ${response.status} ${response.statusText} ${text.slice(0, 200)}`.trim(),
      response.status,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SearchRequestError('Search response is not valid JSON', response.status, { cause: error });
  }

  const parsed = SerperResponseSchema.safeParse(data);
  const organic = parsed.success ? parsed.data.organic ?? [] : [];
  const entries = organic.flatMap((entry): OrganicEntry[] => {
    const result = OrganicEntrySchema.safeParse(entry);
    return result.success ? [result.data] : [];
  });

  const items: Candidate[] = entries.slice(0, search.maxResults).map((item, idx) => {
    const link = asString(item.link);
    return {
      title: asString(item.title) || link,
      link,
      snippet: asString(item.snippet),
      rank: idx + 1,
    };
  });

  return {
    provider: 'serper',
    fetchedAt: new Date().toISOString(),
    query,
    items,
    metrics: {
      returned: organic.length,
      used: items.length,
      skipped: organic.length - entries.length,
      missingOrganic: !parsed.success || parsed.data.organic === undefined,
    },
  };
};
