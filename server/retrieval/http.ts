import { FetchTimeoutError, type TimeoutPhase } from './errors';

export interface TimedRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** Budget for receiving the response headers. */
  connectTimeoutMs: number;
  /** Budget for reading the full body once headers arrived. */
  readTimeoutMs: number;
}

export interface TimedResponse {
  url: string;
  status: number;
  statusText: string;
  headers: Headers;
  body: Uint8Array;
}

/**
 * fetch() with a connect/read timeout pair. Each phase gets its own timer on
 * the same AbortController, so a server that answers quickly and then trickles
 * the body is still cut off.
 */
export const fetchWithTimeouts = async (url: string, options: TimedRequestOptions): Promise<TimedResponse> => {
  const controller = new AbortController();
  let phase: TimeoutPhase = 'connect';
  let timer = setTimeout(() => controller.abort(), options.connectTimeoutMs);

  try {
    const response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      redirect: 'follow',
      signal: controller.signal,
    });

    clearTimeout(timer);
    phase = 'read';
    timer = setTimeout(() => controller.abort(), options.readTimeoutMs);

    const buffer = await response.arrayBuffer();
    return {
      url: response.url || url,
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      body: new Uint8Array(buffer),
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(url, phase, phase === 'connect' ? options.connectTimeoutMs : options.readTimeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
};

export const decodeUtf8 = (body: Uint8Array): string => new TextDecoder('utf-8').decode(body);
