import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { getPublicConfig, type AppConfig } from '../shared/config';
import { createSseStream } from './http/sse';
import { describeError, type Logger } from './obs/logger';
import { collect } from './pipeline/collect';
import { formatReport } from './pipeline/report';
import { handleCollectStream } from './pipeline/runCollectStream';
import type { TextGenerator } from './services/llmService';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  generator: TextGenerator;
}

const queryParam = (req: Request): string => {
  const value = req.query.q ?? req.query.query;
  return typeof value === 'string' ? value.trim() : '';
};

export const createApp = ({ config, logger, generator }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/api/collect', async (req: Request, res: Response) => {
    const query = queryParam(req);
    if (!query) {
      res.status(400).json({ error: 'Missing query parameter "q"' });
      return;
    }
    try {
      const result = await collect(query, { config, logger, generator });
      res.status(result.status === 'failed' ? 502 : 200).json(result);
    } catch (error) {
      logger.error('Collect request failed', { query, error: describeError(error) });
      res.status(500).json({ error: 'Collect failed' });
    }
  });

  app.get('/api/collect/report', async (req: Request, res: Response) => {
    const query = queryParam(req);
    if (!query) {
      res.status(400).type('text/plain').send('Missing query parameter "q"');
      return;
    }
    try {
      const result = await collect(query, { config, logger, generator });
      res
        .status(result.status === 'failed' ? 502 : 200)
        .type('text/plain')
        .send(formatReport(result));
    } catch (error) {
      logger.error('Report request failed', { query, error: describeError(error) });
      res.status(500).type('text/plain').send('Collect failed');
    }
  });

  app.get('/api/collect-stream', async (req: Request, res: Response) => {
    const query = queryParam(req);
    const stream = createSseStream(res, {
      heartbeatMs: config.server.heartbeatIntervalMs,
      onClose: () => logger.debug('Collect stream closed', { query }),
    });

    if (!query) {
      stream.sendJson('fatal', { error: 'Missing query parameter "q"' });
      stream.close();
      return;
    }

    await handleCollectStream({ query, config, logger, generator, stream });
  });

  return app;
};
