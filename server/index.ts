import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { LLMService } from './services/llmService';

const config = loadConfig();
const logger = createLogger(config, { service: 'web-content-collector' });
logger.info('Config loaded', {
  environment: config.environment,
  search: {
    endpoint: config.search.endpoint,
    maxResults: config.search.maxResults,
    hasApiKey: Boolean(config.search.apiKey),
  },
  fetcher: {
    readerProxyUrl: config.fetcher.readerProxyUrl,
    hasReaderApiKey: Boolean(config.fetcher.readerApiKey),
  },
  llm: {
    model: config.llm.model,
    hasBaseUrl: Boolean(config.llm.baseUrl),
    requestsPerMinute: config.llm.requestsPerMinute,
  },
  concurrency: config.pipeline.concurrency,
});

const app = createApp({ config, logger, generator: new LLMService(config, logger) });

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
