import http from 'node:http';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import type { TextGenerator } from '../services/llmService';
import {
  FakeGenerator,
  jsonResponse,
  longText,
  makeTestConfig,
  recordJson,
  silentLogger,
  stubFetch,
  textResponse,
} from './helpers';

const SEARCH_URL = 'https://search.test/search';
const LINK = 'https://page.test/article';

interface PlainResponse {
  status: number;
  contentType: string;
  body: string;
}

const listen = (generator: TextGenerator) =>
  new Promise<Server>((resolve) => {
    const app = createApp({ config: makeTestConfig(), logger: silentLogger, generator });
    const server = app.listen(0, '127.0.0.1');
    server.once('listening', () => resolve(server));
  });

// node:http instead of fetch, since fetch is stubbed for the app's outbound calls.
const get = (server: Server, path: string) =>
  new Promise<PlainResponse>((resolve, reject) => {
    const address = server.address();
    if (!address || typeof address === 'string') {
      reject(new Error('Server is not listening on a TCP port'));
      return;
    }
    http
      .get({ host: '127.0.0.1', port: address.port, path }, (res) => {
        let body = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          body += chunk;
        });
        res.on('end', () =>
          resolve({ status: res.statusCode ?? 0, contentType: String(res.headers['content-type'] ?? ''), body }),
        );
      })
      .on('error', reject);
  });

const sseEventNames = (body: string) =>
  body
    .split('\n')
    .filter((line) => line.startsWith('event: '))
    .map((line) => line.slice('event: '.length));

const stubHealthySearch = () =>
  stubFetch((url) =>
    url === SEARCH_URL
      ? jsonResponse({ organic: [{ title: 'Article', link: LINK, snippet: 's' }] })
      : textResponse(longText('Article')),
  );

describe('HTTP app', () => {
  let server: Server;

  beforeEach(async () => {
    server = await listen(new FakeGenerator(() => recordJson({ title: 'Article record' })));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('answers health checks', async () => {
    const res = await get(server, '/api/healthz');
    expect(res.status).toBe(200);
    expect(JSON.parse(res.body)).toMatchObject({ ok: true });
  });

  it('serves the public configuration without keys', async () => {
    const res = await get(server, '/api/config');
    expect(res.status).toBe(200);
    expect(JSON.parse(res.body)).toMatchObject({ concurrency: 5, minContentChars: 300 });
    expect(res.body).not.toContain('test-key');
  });

  it('requires a query', async () => {
    const res = await get(server, '/api/collect');
    expect(res.status).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ error: 'Missing query parameter "q"' });
  });

  it('maps a search failure to 502', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    const res = await get(server, '/api/collect?q=pools');

    expect(res.status).toBe(502);
    expect(JSON.parse(res.body)).toMatchObject({
      status: 'failed',
      reason: 'search_failed',
      error: 'Search request failed: fetch failed',
      records: [],
    });
  });

  it('returns collected records', async () => {
    stubHealthySearch();

    const res = await get(server, '/api/collect?q=pools');

    expect(res.status).toBe(200);
    expect(JSON.parse(res.body)).toMatchObject({
      status: 'ok',
      query: 'pools',
      records: [
        {
          valid: true,
          title: 'Article record',
          summary: 'A concise summary of the page.',
          keyPoints: ['First point', 'Second point'],
          codeSnippets: [],
          sourceUrl: LINK,
        },
      ],
    });
  });

  it('renders the plain-text report', async () => {
    stubHealthySearch();

    const res = await get(server, '/api/collect/report?q=pools');

    expect(res.status).toBe(200);
    expect(res.contentType).toContain('text/plain');
    expect(res.body.split('\n').slice(0, 4)).toEqual([
      'Web content collected for "pools" (1 sources):',
      '',
      '--- Source [1]: Article record ---',
      `Link: ${LINK}`,
    ]);
  });

  it('streams stage events followed by the result', async () => {
    stubHealthySearch();

    const res = await get(server, '/api/collect-stream?q=pools');

    expect(res.contentType).toContain('text/event-stream');
    expect(sseEventNames(res.body)).toEqual([
      'stage-event',
      'stage-event',
      'stage-event',
      'stage-event',
      'stage-event',
      'stage-event',
      'collect-result',
    ]);
  });

  it('streams a fatal event for a missing query', async () => {
    const res = await get(server, '/api/collect-stream');
    expect(res.body).toBe('event: fatal\ndata: {"error":"Missing query parameter \\"q\\""}\n\n');
  });
});
