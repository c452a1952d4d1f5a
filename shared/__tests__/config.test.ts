import { describe, expect, it } from 'vitest';
import { buildConfig } from '../../server/config/config';
import { getPublicConfig } from '../config';

describe('getPublicConfig', () => {
  it('exposes tuning values without secrets', () => {
    const config = buildConfig({
      SEARCH_API_KEY: 'test-search-key',
      LLM_API_KEY: 'test-llm-key',
      READER_API_KEY: 'test-reader-key',
      BLOCKLIST_DOMAINS: 'example.com',
    });

    const publicConfig = getPublicConfig(config);

    expect(publicConfig).toEqual({
      search: { region: 'cn', language: 'zh-cn', maxResults: 5 },
      fetcher: {
        primaryAttempts: 2,
        fallbackAttempts: 2,
        connectTimeoutMs: 10_000,
        readTimeoutMs: 30_000,
        minRawChars: 500,
      },
      minContentChars: 300,
      blocklist: ['example.com'],
      llm: { model: 'gemini-2.5-flash', maxExtractRetries: 2 },
      concurrency: 5,
    });
    expect(JSON.stringify(publicConfig)).not.toContain('test-');
  });
});
