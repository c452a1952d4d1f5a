import type { ContentTier, NormalizeOutcome } from './types';

export interface NormalizeOptions {
  minContentChars: number;
}

const MARKDOWN_IMAGE_RE = /!\[.*?\]\(.*?\)/g;
const BLANK_LINE_RUN_RE = /\n\s*\n/g;

export const collapseBlankLines = (text: string): string => text.replace(BLANK_LINE_RUN_RE, '\n\n');

/**
 * Clean reader-proxy output: drop image embeds and blank-line runs.
 */
export const cleanMarkdown = (markdown: string): string =>
  collapseBlankLines(markdown.replace(/\r\n?/g, '\n').replace(MARKDOWN_IMAGE_RE, '')).trim();

const decodeEntities = (text: string): string => {
  const named: Record<string, string> = {
    '&nbsp;': ' ',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&lt;': '<',
    '&gt;': '>',
  };
  let out = text;
  for (const [key, value] of Object.entries(named)) {
    out = out.replaceAll(key, value);
  }
  out = out.replace(/&#(\d+);/g, (_match, num: string) => {
    const code = Number(num);
    return code <= 0x10ffff ? String.fromCodePoint(code) : '';
  });
  out = out.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => {
    const code = Number.parseInt(hex, 16);
    return code <= 0x10ffff ? String.fromCodePoint(code) : '';
  });
  // Last, so "&amp;lt;" ends up as the literal text "&lt;".
  return out.replaceAll('&amp;', '&');
};

/**
 * Reduce an HTML document to its visible text.
 */
export const stripHtml = (html: string): string => {
  const withoutMarkup = html
    .replace(/\r\n?/g, '\n')
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ');

  const lines = decodeEntities(withoutMarkup)
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim());

  return collapseBlankLines(lines.join('\n')).trim();
};

/**
 * Clean raw text according to the tier it came from and reject text below
 * the minimum viable length.
 */
export const normalizeContent = (raw: string, tier: ContentTier, options: NormalizeOptions): NormalizeOutcome => {
  const text = tier === 'primary' ? cleanMarkdown(raw) : stripHtml(raw);
  if (text.length < options.minContentChars) {
    return { status: 'too_short', text, length: text.length };
  }
  return { status: 'ok', text };
};
