import { PROMPT_TEMPLATES } from '../../shared/prompts';

const cache = new Map<string, string>();

export const loadPrompt = (filename: string): string => {
  const cached = cache.get(filename);
  if (cached !== undefined) {
    return cached;
  }
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  cache.set(filename, content);
  return content;
};

export const renderPrompt = (template: string, values: Record<string, string | number>): string =>
  template.replace(/\{([A-Z_]+)\}/g, (match, key: string) => (key in values ? String(values[key]) : match));
