import { afterEach, describe, expect, it, vi } from 'vitest';
import { calledUrls, makeTestConfig, silentLogger, stubFetch, textResponse } from '../../__tests__/helpers';
import { FetchTimeoutError } from '../errors';
import { fetchContent } from '../fetcher';
import { fetchWithTimeouts } from '../http';

const LINK = 'https://site.test/article';
const PROXIED = `https://reader.test/${LINK}`;
const LONG_HTML = `<html><body><p>${'Readable paragraph text. '.repeat(40)}</p></body></html>`;

describe('fetchContent', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns reader proxy text on the first success', async () => {
    const fetchMock = stubFetch(() => textResponse('# Article\n\nBody'));

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result).toEqual({
      content: '# Article\n\nBody',
      strategyUsed: 'primary',
      attempts: { primary: 1, fallback: 0 },
      failures: [],
    });
    expect(calledUrls(fetchMock)).toEqual([PROXIED]);
  });

  it('retries the reader proxy on 5xx', async () => {
    let calls = 0;
    stubFetch(() => {
      calls += 1;
      return calls === 1 ? textResponse('busy', 503) : textResponse('# Recovered');
    });

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result.strategyUsed).toBe('primary');
    expect(result.content).toBe('# Recovered');
    expect(result.attempts).toEqual({ primary: 2, fallback: 0 });
    expect(result.failures).toEqual(['primary#1: HTTP 503']);
  });

  it('retries the reader proxy on 429', async () => {
    let calls = 0;
    const fetchMock = stubFetch(() => {
      calls += 1;
      return calls === 1 ? textResponse('slow down', 429) : textResponse('# After rate limit');
    });

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result).toEqual({
      content: '# After rate limit',
      strategyUsed: 'primary',
      attempts: { primary: 2, fallback: 0 },
      failures: ['primary#1: HTTP 429'],
    });
    expect(calledUrls(fetchMock)).toEqual([PROXIED, PROXIED]);
  });

  it('treats network errors on the reader proxy as retryable', async () => {
    let calls = 0;
    stubFetch(() => {
      calls += 1;
      if (calls === 1) {
        throw new TypeError('fetch failed');
      }
      return textResponse('# Second try');
    });

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result.content).toBe('# Second try');
    expect(result.failures).toEqual(['primary#1: fetch failed']);
  });

  it('abandons the reader proxy on a non-retryable status and fetches directly', async () => {
    const fetchMock = stubFetch((url) =>
      url === PROXIED ? textResponse('gone', 404) : textResponse(LONG_HTML, 200, { 'content-type': 'text/html' }),
    );

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result).toEqual({
      content: LONG_HTML,
      strategyUsed: 'fallback',
      attempts: { primary: 1, fallback: 1 },
      failures: ['primary#1: HTTP 404'],
    });
    expect(calledUrls(fetchMock)).toEqual([PROXIED, LINK]);
  });

  it('sends browser headers and a referer on direct fetch', async () => {
    const fetchMock = stubFetch((url) => (url === PROXIED ? textResponse('', 404) : textResponse(LONG_HTML)));

    await fetchContent(LINK, makeTestConfig({ FETCH_REFERER: 'https://referer.test/' }), silentLogger);

    const directInit = fetchMock.mock.calls[1][1];
    expect(directInit?.headers).toMatchObject({
      Referer: 'https://referer.test/',
      'User-Agent': expect.stringContaining('Mozilla/5.0'),
      'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
    });
  });

  it('sends the reader API key as a bearer token', async () => {
    const fetchMock = stubFetch(() => textResponse('# Article'));

    await fetchContent(LINK, makeTestConfig({ READER_API_KEY: 'test-reader-key' }), silentLogger);

    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-reader-key' });
  });

  it('stops the direct tier on 403 without retrying', async () => {
    const fetchMock = stubFetch((url) => (url === PROXIED ? textResponse('busy', 503) : textResponse('denied', 403)));

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result).toEqual({
      content: null,
      strategyUsed: 'none',
      attempts: { primary: 2, fallback: 1 },
      failures: ['primary#1: HTTP 503', 'primary#2: HTTP 503', 'fallback#1: HTTP 403'],
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries short direct bodies as challenge pages', async () => {
    let directCalls = 0;
    stubFetch((url) => {
      if (url === PROXIED) return textResponse('', 404);
      directCalls += 1;
      return directCalls === 1 ? textResponse('tiny') : textResponse(LONG_HTML);
    });

    const result = await fetchContent(LINK, makeTestConfig(), silentLogger);

    expect(result.strategyUsed).toBe('fallback');
    expect(result.attempts).toEqual({ primary: 1, fallback: 2 });
    expect(result.failures).toEqual(['primary#1: HTTP 404', 'fallback#1: body too short (4 chars)']);
  });

  it('rejects malformed links without any request', async () => {
    const fetchMock = stubFetch(() => textResponse('unused'));

    const result = await fetchContent('ftp://files.test/doc', makeTestConfig(), silentLogger);

    expect(result).toEqual({
      content: null,
      strategyUsed: 'none',
      attempts: { primary: 0, fallback: 0 },
      failures: ['invalid_link'],
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('fetchWithTimeouts', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports a connect timeout when headers never arrive', async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const pending = fetchWithTimeouts(LINK, { connectTimeoutMs: 20, readTimeoutMs: 1_000 });

    await expect(pending).rejects.toBeInstanceOf(FetchTimeoutError);
    await expect(pending).rejects.toThrow('Connect timeout after 20ms');
  });

  it('reports a read timeout when the body stalls after the headers', async () => {
    stubFetch(
      (_url, init) =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
            },
          }),
        ),
    );

    const pending = fetchWithTimeouts(LINK, { connectTimeoutMs: 1_000, readTimeoutMs: 20 });

    await expect(pending).rejects.toMatchObject({ name: 'FetchTimeoutError', phase: 'read', timeoutMs: 20 });
    await expect(pending).rejects.toThrow('Read timeout after 20ms');
  });
});
