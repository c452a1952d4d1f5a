import type { AppConfig } from '../../shared/config';
import type { StructuredRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';
import { loadPrompt, renderPrompt } from '../prompts/loader';
import type { TextGenerator } from '../services/llmService';
import { sleep } from '../utils/async';
import { parseStructuredRecord } from './validators';

const SUMMARY_MAX_CHARS = 500;

export interface ExtractInput {
  content: string;
  link: string;
  title?: string;
}

export type ExtractOutcome =
  | { status: 'ok'; record: StructuredRecord; attempts: number }
  | { status: 'invalid'; attempts: number }
  | { status: 'failed'; attempts: number; error: string };

export const buildUserPrompt = (link: string, content: string, maxInputChars: number): string =>
  `Source URL: ${link}\n\nPage content:\n${content.slice(0, maxInputChars)}`;

/**
 * Turns cleaned page text into a StructuredRecord through the
 * text-understanding service. Service errors and unparseable answers are
 * retried up to `maxExtractRetries` times; an explicit `valid: false` ends the
 * attempt loop at once.
 */
export class StructuredExtractor {
  private readonly systemInstruction: string;

  constructor(
    private config: AppConfig,
    private generator: TextGenerator,
    private logger: Logger,
  ) {
    this.systemInstruction = renderPrompt(loadPrompt('structured_record.md'), {
      SUMMARY_MAX_CHARS,
    });
  }

  async extract(input: ExtractInput): Promise<ExtractOutcome> {
    const { llm } = this.config;
    const maxAttempts = llm.maxExtractRetries + 1;
    const prompt = buildUserPrompt(input.link, input.content, llm.maxInputChars);
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const raw = await this.generator.generate({
          systemInstruction: this.systemInstruction,
          prompt,
          temperature: llm.temperature,
          responseMimeType: 'application/json',
        });
        const parsed = parseStructuredRecord(raw, { link: input.link, title: input.title });
        if (parsed.status === 'ok') {
          return { status: 'ok', record: parsed.record, attempts: attempt };
        }
        if (parsed.status === 'invalid') {
          this.logger.info('Model marked page as unusable', { link: input.link, attempt });
          return { status: 'invalid', attempts: attempt };
        }
        lastError = `Malformed response: ${parsed.error}`;
      } catch (error) {
        lastError = describeError(error);
      }

      this.logger.warn('Structured extraction attempt failed', {
        link: input.link,
        attempt,
        maxAttempts,
        error: lastError,
      });
      if (attempt < maxAttempts) {
        await sleep(llm.retryBackoffMs);
      }
    }

    return { status: 'failed', attempts: maxAttempts, error: lastError };
  }
}
