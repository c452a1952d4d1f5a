import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { extractGenerateContentText, isTransientError, rateLimitedGenerateContent } from './genai';

export interface GenerationRequest {
  systemInstruction: string;
  prompt: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
}

/**
 * Anything that turns an instruction plus a prompt into model text. The
 * extractor depends on this seam rather than on a concrete SDK.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export class LLMService implements TextGenerator {
  constructor(
    private config: AppConfig,
    private logger: Logger,
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    const model = request.model || this.config.llm.model;
    try {
      const response = await rateLimitedGenerateContent(this.config, {
        model,
        contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
        config: {
          systemInstruction: request.systemInstruction,
          temperature: request.temperature ?? this.config.llm.temperature,
          maxOutputTokens: request.maxOutputTokens ?? this.config.llm.maxOutputTokens,
          responseMimeType: request.responseMimeType,
        },
      });

      const text = extractGenerateContentText(response);
      if (text) return text;

      throw new Error('Empty response from LLM');
    } catch (error) {
      this.logger.warn('LLM generation error', {
        model,
        error: error instanceof Error ? error.message : String(error),
        isTransient: isTransientError(error),
      });
      throw error;
    }
  }
}
