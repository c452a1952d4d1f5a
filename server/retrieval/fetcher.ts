import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';
import { sleep } from '../utils/async';
import { decodeBody } from './encoding';
import { decodeUtf8, fetchWithTimeouts } from './http';
import type { FetchResult } from './types';

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const isValidLink = (link: string): boolean => {
  try {
    return TRUSTED_PROTOCOLS.has(new URL(link).protocol);
  } catch {
    return false;
  }
};

export const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

const browserHeaders = (config: AppConfig['fetcher']): Record<string, string> => ({
  'User-Agent': config.userAgent,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
  Referer: config.referer,
});

type TierOutcome = { content: string | null; attempts: number; failures: string[] };

/**
 * Reader-proxy tier. 429/5xx and network errors are retried with a linear
 * backoff; any other non-200 status gives up on the tier at once.
 */
const fetchViaReaderProxy = async (link: string, config: AppConfig['fetcher'], logger: Logger): Promise<TierOutcome> => {
  const failures: string[] = [];
  const headers: Record<string, string> = { Accept: 'text/plain, text/markdown;q=0.9, */*;q=0.5' };
  if (config.readerApiKey) {
    headers.Authorization = `Bearer ${config.readerApiKey}`;
  }

  let attempt = 0;
  while (attempt < config.primaryAttempts) {
    attempt += 1;
    let retryable = true;
    try {
      const response = await fetchWithTimeouts(`${config.readerProxyUrl}${link}`, {
        headers,
        connectTimeoutMs: config.connectTimeoutMs,
        readTimeoutMs: config.readTimeoutMs,
      });
      if (response.status === 200) {
        return { content: decodeUtf8(response.body), attempts: attempt, failures };
      }
      failures.push(`primary#${attempt}: HTTP ${response.status}`);
      retryable = isRetryableStatus(response.status);
    } catch (error) {
      failures.push(`primary#${attempt}: ${describeError(error)}`);
    }

    logger.debug('Reader proxy attempt failed', { link, attempt, error: failures[failures.length - 1], retryable });
    if (!retryable) break;
    if (attempt < config.primaryAttempts) {
      await sleep(config.primaryBackoffMs * attempt);
    }
  }

  return { content: null, attempts: attempt, failures };
};

/**
 * Direct-fetch tier. 403 abandons the tier; short bodies are treated as
 * bot-challenge pages and retried like any other failure.
 */
const fetchDirect = async (link: string, config: AppConfig['fetcher'], logger: Logger): Promise<TierOutcome> => {
  const failures: string[] = [];

  let attempt = 0;
  while (attempt < config.fallbackAttempts) {
    attempt += 1;
    try {
      const response = await fetchWithTimeouts(link, {
        headers: browserHeaders(config),
        connectTimeoutMs: config.connectTimeoutMs,
        readTimeoutMs: config.readTimeoutMs,
      });
      if (response.status === 403) {
        failures.push(`fallback#${attempt}: HTTP 403`);
        logger.debug('Direct fetch forbidden; abandoning', { link, attempt });
        break;
      }
      if (response.status !== 200) {
        failures.push(`fallback#${attempt}: HTTP ${response.status}`);
      } else {
        const decoded = decodeBody(response.body, response.headers.get('content-type'));
        if (decoded.text.length >= config.minRawChars) {
          return { content: decoded.text, attempts: attempt, failures };
        }
        failures.push(`fallback#${attempt}: body too short (${decoded.text.length} chars)`);
      }
    } catch (error) {
      failures.push(`fallback#${attempt}: ${describeError(error)}`);
    }

    logger.debug('Direct fetch attempt failed', { link, attempt, error: failures[failures.length - 1] });
    if (attempt < config.fallbackAttempts) {
      await sleep(config.fallbackBackoffMs * attempt);
    }
  }

  return { content: null, attempts: attempt, failures };
};

/**
 * Retrieve raw text for one link: reader proxy first, direct fetch second.
 * Exhausting both tiers yields `strategyUsed: 'none'`, which is an expected
 * outcome rather than an error.
 */
export const fetchContent = async (link: string, config: AppConfig, logger: Logger): Promise<FetchResult> => {
  if (!isValidLink(link)) {
    return {
      content: null,
      strategyUsed: 'none',
      attempts: { primary: 0, fallback: 0 },
      failures: ['invalid_link'],
    };
  }

  const primary = await fetchViaReaderProxy(link, config.fetcher, logger);
  if (primary.content !== null) {
    return {
      content: primary.content,
      strategyUsed: 'primary',
      attempts: { primary: primary.attempts, fallback: 0 },
      failures: primary.failures,
    };
  }

  const fallback = await fetchDirect(link, config.fetcher, logger);
  const failures = [...primary.failures, ...fallback.failures];
  const attempts = { primary: primary.attempts, fallback: fallback.attempts };
  if (fallback.content !== null) {
    return { content: fallback.content, strategyUsed: 'fallback', attempts, failures };
  }

  return { content: null, strategyUsed: 'none', attempts, failures };
};
