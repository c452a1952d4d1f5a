import {
  ConfigSchema,
  DEFAULT_BLOCKLIST_DOMAINS,
  LOG_LEVELS,
  type AppConfig,
} from '../../shared/config';

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const stringFromEnv = (...values: Array<string | undefined>): string | undefined => {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
};

const logLevelFromEnv = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const normalized = (value || 'info').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

export type { AppConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const blocklist = csvFromEnv(env.BLOCKLIST_DOMAINS);

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    search: {
      endpoint: stringFromEnv(env.SEARCH_ENDPOINT) ?? 'https://google.serper.dev/search',
      apiKey: stringFromEnv(env.SEARCH_API_KEY, env.SERPER_API_KEY) ?? '',
      region: stringFromEnv(env.SEARCH_REGION) ?? 'cn',
      language: stringFromEnv(env.SEARCH_LANGUAGE) ?? 'zh-cn',
      maxResults: numberFromEnv(env.SEARCH_MAX_RESULTS, 5),
      connectTimeoutMs: numberFromEnv(env.SEARCH_CONNECT_TIMEOUT_MS, 5_000),
      readTimeoutMs: numberFromEnv(env.SEARCH_READ_TIMEOUT_MS, 30_000),
    },
    fetcher: {
      readerProxyUrl: stringFromEnv(env.READER_PROXY_URL) ?? 'https://r.jina.ai/',
      readerApiKey: stringFromEnv(env.READER_API_KEY),
      primaryAttempts: numberFromEnv(env.FETCH_PRIMARY_ATTEMPTS, 2),
      primaryBackoffMs: numberFromEnv(env.FETCH_PRIMARY_BACKOFF_MS, 1_000),
      fallbackAttempts: numberFromEnv(env.FETCH_FALLBACK_ATTEMPTS, 2),
      fallbackBackoffMs: numberFromEnv(env.FETCH_FALLBACK_BACKOFF_MS, 1_000),
      connectTimeoutMs: numberFromEnv(env.FETCH_CONNECT_TIMEOUT_MS, 10_000),
      readTimeoutMs: numberFromEnv(env.FETCH_READ_TIMEOUT_MS, 30_000),
      minRawChars: numberFromEnv(env.FETCH_MIN_RAW_CHARS, 500),
      userAgent:
        stringFromEnv(env.FETCH_USER_AGENT) ??
        // Realistic browser UA; several publishers answer bots with 403
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      referer: stringFromEnv(env.FETCH_REFERER) ?? 'https://www.google.com/',
    },
    normalizer: {
      minContentChars: numberFromEnv(env.MIN_CONTENT_CHARS, 300),
    },
    blocklist: {
      domains: blocklist.length ? blocklist : [...DEFAULT_BLOCKLIST_DOMAINS],
    },
    llm: {
      apiKey: stringFromEnv(env.LLM_API_KEY, env.GEMINI_API_KEY) ?? '',
      baseUrl: stringFromEnv(env.LLM_BASE_URL),
      model: stringFromEnv(env.LLM_MODEL) ?? 'gemini-2.5-flash',
      temperature: numberFromEnv(env.LLM_TEMPERATURE, 0.1),
      maxOutputTokens: numberFromEnv(env.LLM_MAX_OUTPUT_TOKENS, 4096),
      maxInputChars: numberFromEnv(env.LLM_MAX_INPUT_CHARS, 80_000),
      maxExtractRetries: numberFromEnv(env.LLM_MAX_EXTRACT_RETRIES, 2),
      retryBackoffMs: numberFromEnv(env.LLM_RETRY_BACKOFF_MS, 1_000),
      requestsPerMinute: numberFromEnv(env.LLM_REQUESTS_PER_MINUTE, 60),
      timeoutMs: numberFromEnv(env.LLM_TIMEOUT_MS, 60_000),
    },
    pipeline: {
      concurrency: numberFromEnv(env.PIPELINE_CONCURRENCY, 5),
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};
