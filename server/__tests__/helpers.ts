import { vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import { buildConfig } from '../config/config';
import type { Logger } from '../obs/logger';
import type { GenerationRequest, TextGenerator } from '../services/llmService';

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  SEARCH_API_KEY: 'test-key',
  SEARCH_ENDPOINT: 'https://search.test/search',
  READER_PROXY_URL: 'https://reader.test/',
  LLM_API_KEY: 'test-key',
  FETCH_PRIMARY_BACKOFF_MS: '0',
  FETCH_FALLBACK_BACKOFF_MS: '0',
  LLM_RETRY_BACKOFF_MS: '0',
  LOG_LEVEL: 'silent',
};

export const makeTestConfig = (overrides: Record<string, string> = {}): AppConfig =>
  buildConfig({ ...TEST_ENV, ...overrides });

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const textResponse = (body: string, status = 200, headers: Record<string, string> = {}) =>
  new Response(body, { status, headers });

export const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { 'content-type': 'application/json' } });

type FetchRoute = (url: string, init?: RequestInit) => Response | Promise<Response>;

/**
 * Stub global fetch with a single router and return the mock so tests can
 * inspect the calls made.
 */
export const stubFetch = (route: FetchRoute) => {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    return await route(url, init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

export const calledUrls = (fetchMock: ReturnType<typeof stubFetch>): string[] =>
  fetchMock.mock.calls.map(([input]) => String(input));

type GenerateHandler = (request: GenerationRequest, callIndex: number) => string | Promise<string>;

/** Scripted stand-in for the text-understanding service. */
export class FakeGenerator implements TextGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private handler: GenerateHandler) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return await this.handler(request, this.requests.length - 1);
  }

  /** Links the generator was asked about, taken from the user payload. */
  requestedLinks(): string[] {
    return this.requests.map((request) => request.prompt.split('\n')[0].replace('Source URL: ', ''));
  }
}

/** Article-like text comfortably above the minimum content length. */
export const longText = (label: string, repeat = 20): string =>
  Array.from({ length: repeat }, (_unused, idx) => `${label} paragraph ${idx + 1} explains the topic in detail.`).join(
    '\n\n',
  );

export const recordJson = (fields: Record<string, unknown> = {}): string =>
  JSON.stringify({
    valid: true,
    title: 'Extracted title',
    summary: 'A concise summary of the page.',
    key_points: ['First point', 'Second point'],
    code_snippets: [],
    source_url: 'https://ignored.example/',
    ...fields,
  });
