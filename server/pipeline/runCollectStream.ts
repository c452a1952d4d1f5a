import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import { describeError, type Logger } from '../obs/logger';
import type { TextGenerator } from '../services/llmService';
import { collect } from './collect';

export interface RunCollectStreamArgs {
  query: string;
  config: AppConfig;
  logger: Logger;
  generator: TextGenerator;
  stream: SseStream;
}

export const handleCollectStream = async ({
  query,
  config,
  logger,
  generator,
  stream,
}: RunCollectStreamArgs): Promise<void> => {
  const runId = randomId();
  try {
    const result = await collect(query, {
      config,
      logger,
      generator,
      runId,
      onStageEvent: (event) => stream.send(event),
    });
    if (stream.isClosed()) {
      logger.info('Client left before the result was ready', { runId, records: result.records.length });
    } else if (result.status === 'failed') {
      stream.sendJson('fatal', { runId, reason: result.reason, error: result.error });
    } else {
      stream.sendJson('collect-result', result);
    }
  } catch (error) {
    const message = describeError(error);
    logger.error('Collect stream failed', { runId, error: message });
    stream.sendJson('fatal', { runId, error: message });
  } finally {
    stream.close();
  }
};
