import { z } from 'zod';

export const DEFAULT_BLOCKLIST_DOMAINS = [
  'youtube.com',
  'youtu.be',
  'bilibili.com',
  'douyin.com',
  'tiktok.com',
  'facebook.com',
  'instagram.com',
  'twitter.com',
  'weibo.com',
] as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  search: z.object({
    endpoint: z.string().url(),
    apiKey: z.string().min(1),
    region: z.string().min(1),
    language: z.string().min(1),
    maxResults: z.number().int().positive().max(100),
    connectTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
  }),
  fetcher: z.object({
    readerProxyUrl: z.string().url(),
    readerApiKey: z.string().optional(),
    primaryAttempts: z.number().int().nonnegative(),
    primaryBackoffMs: z.number().int().nonnegative(),
    fallbackAttempts: z.number().int().nonnegative(),
    fallbackBackoffMs: z.number().int().nonnegative(),
    connectTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
    minRawChars: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
    referer: z.string().url(),
  }),
  normalizer: z.object({
    minContentChars: z.number().int().nonnegative(),
  }),
  blocklist: z.object({
    domains: z.array(z.string().min(1)),
  }),
  llm: z.object({
    apiKey: z.string().min(1),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    maxInputChars: z.number().int().positive(),
    maxExtractRetries: z.number().int().nonnegative(),
    retryBackoffMs: z.number().int().nonnegative(),
    requestsPerMinute: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
  pipeline: z.object({
    concurrency: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  search: {
    region: string;
    language: string;
    maxResults: number;
  };
  fetcher: {
    primaryAttempts: number;
    fallbackAttempts: number;
    connectTimeoutMs: number;
    readTimeoutMs: number;
    minRawChars: number;
  };
  minContentChars: number;
  blocklist: string[];
  llm: {
    model: string;
    maxExtractRetries: number;
  };
  concurrency: number;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  search: {
    region: config.search.region,
    language: config.search.language,
    maxResults: config.search.maxResults,
  },
  fetcher: {
    primaryAttempts: config.fetcher.primaryAttempts,
    fallbackAttempts: config.fetcher.fallbackAttempts,
    connectTimeoutMs: config.fetcher.connectTimeoutMs,
    readTimeoutMs: config.fetcher.readTimeoutMs,
    minRawChars: config.fetcher.minRawChars,
  },
  minContentChars: config.normalizer.minContentChars,
  blocklist: [...config.blocklist.domains],
  llm: {
    model: config.llm.model,
    maxExtractRetries: config.llm.maxExtractRetries,
  },
  concurrency: config.pipeline.concurrency,
});
