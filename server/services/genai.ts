import { GoogleGenAI, type GenerateContentParameters, type GenerateContentResponse } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
  lastUsedAt: number;
};

const stateByClientKey = new Map<string, KeyState>();
const MAX_KEYS = 32;
const WINDOW_MS = 60_000;

const trimStateCache = () => {
  if (stateByClientKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByClientKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByClientKey.delete(oldestKey);
  }
};

const getClientState = (llm: AppConfig['llm']): KeyState => {
  const key = `${llm.baseUrl ?? ''}|${llm.apiKey}`;
  const existing = stateByClientKey.get(key);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing;
  }

  const created: KeyState = {
    client: new GoogleGenAI({
      apiKey: llm.apiKey,
      httpOptions: { baseUrl: llm.baseUrl, timeout: llm.timeoutMs },
    }),
    requestTimestamps: [],
    rateLimitMutex: new Semaphore(1),
    lastUsedAt: Date.now(),
  };
  stateByClientKey.set(key, created);
  trimStateCache();
  return created;
};

const errorStatus = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = errorStatus(error);
  if (code === 429 || (code !== null && code >= 500)) {
    return true;
  }
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return /quota|unavailable|overload|temporar|timeout|timed out/.test(message);
};

/**
 * Wait until the sliding one-minute window has room for another request and
 * reserve a slot in it. Check and reserve happen under a one-slot mutex so
 * concurrent workers cannot both claim the last slot.
 */
const reserveRateLimitSlot = async (state: KeyState, requestsPerMinute: number): Promise<void> => {
  const rpm = Math.max(1, Math.floor(requestsPerMinute));
  while (true) {
    const release = await state.rateLimitMutex.acquire();
    let waitMs = 0;
    try {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
      } else {
        waitMs = Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
      }
    } finally {
      release();
    }

    if (waitMs <= 0) {
      return;
    }
    await sleep(waitMs);
  }
};

/**
 * One generateContent call behind the per-key rate limit. No retries here:
 * callers own their retry budget.
 */
export const rateLimitedGenerateContent = async (
  config: AppConfig,
  params: GenerateContentParameters,
): Promise<GenerateContentResponse> => {
  const state = getClientState(config.llm);
  await reserveRateLimitSlot(state, config.llm.requestsPerMinute);
  return await state.client.models.generateContent(params);
};

/**
 * Text payload of a generateContent response: the SDK's `text` accessor, or
 * the concatenated text parts of every candidate.
 */
export const extractGenerateContentText = (response: GenerateContentResponse): string | undefined => {
  const direct = response.text;
  if (typeof direct === 'string' && direct.trim()) {
    return direct;
  }

  const chunks: string[] = [];
  for (const candidate of response.candidates ?? []) {
    for (const part of candidate.content?.parts ?? []) {
      if (typeof part.text === 'string' && !part.thought) {
        chunks.push(part.text);
      }
    }
  }
  const joined = chunks.join('\n').trim();
  return joined || undefined;
};
