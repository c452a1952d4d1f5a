import type { CollectResult, StructuredRecord } from '../../shared/types';

export const SNIPPET_MAX_CHARS = 1500;

const clip = (text: string, max: number): string => (text.length > max ? `${text.slice(0, max)}...` : text);

const formatRecord = (record: StructuredRecord, index: number): string => {
  const lines = [
    `--- Source [${index + 1}]: ${record.title} ---`,
    `Link: ${record.sourceUrl}`,
    `Summary: ${record.summary}`,
  ];

  if (record.keyPoints.length) {
    lines.push('Key points:');
    for (const point of record.keyPoints) {
      lines.push(`- ${point}`);
    }
  }

  if (record.codeSnippets.length) {
    lines.push('Code snippets:');
    for (const snippet of record.codeSnippets) {
      lines.push('```', clip(snippet, SNIPPET_MAX_CHARS), '```');
    }
  }

  return lines.join('\n');
};

/**
 * Render a collect result as plain text that can be pasted into a prompt.
 */
export const formatReport = (result: CollectResult): string => {
  if (result.status === 'failed') {
    return `Web search failed for "${result.query}": ${result.error}`;
  }
  if (!result.records.length) {
    return `No usable web content was found for "${result.query}".`;
  }

  const header = `Web content collected for "${result.query}" (${result.records.length} sources):`;
  return [header, ...result.records.map(formatRecord)].join('\n\n');
};
