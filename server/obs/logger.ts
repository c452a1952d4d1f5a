import type { AppConfig } from '../../shared/config';

type LogLevel = AppConfig['observability']['logLevel'];
type EmitLevel = Exclude<LogLevel, 'silent'>;
type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

const sinks: Record<EmitLevel, (line: string) => void> = {
  /* eslint-disable no-console */
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  /* eslint-enable no-console */
};

/**
 * JSON-lines logger. `bindings` are merged into every line, under the
 * per-call meta.
 */
export const createLogger = (config: Pick<AppConfig, 'observability'>, bindings: LogMeta = {}): Logger => {
  const threshold = levelWeights[config.observability.logLevel];
  const write = (level: EmitLevel) => (message: string, meta?: LogMeta) => {
    if (levelWeights[level] < threshold) return;
    sinks[level](JSON.stringify({ level, message, ts: new Date().toISOString(), ...bindings, ...meta }));
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
};

/** Wrap a logger so every line carries `bindings` (a run id, a link). */
export const withContext = (logger: Logger, bindings: LogMeta): Logger => ({
  debug: (message, meta) => logger.debug(message, { ...bindings, ...meta }),
  info: (message, meta) => logger.info(message, { ...bindings, ...meta }),
  warn: (message, meta) => logger.warn(message, { ...bindings, ...meta }),
  error: (message, meta) => logger.error(message, { ...bindings, ...meta }),
});

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
