import type { AppConfig } from '../../shared/config';
import type { Candidate, CandidateDiagnostics, StructuredRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { evaluateBlocklist } from '../retrieval/blocklist';
import { fetchContent } from '../retrieval/fetcher';
import { normalizeContent } from '../retrieval/normalize';
import type { StructuredExtractor } from './extractor';

export interface CandidateOutcome {
  record: StructuredRecord | null;
  diagnostics: CandidateDiagnostics;
}

export interface ProcessCandidateDeps {
  config: AppConfig;
  logger: Logger;
  extractor: Pick<StructuredExtractor, 'extract'>;
}

/**
 * Filter, fetch, normalize and extract one candidate. Expected dead ends come
 * back as a diagnostics status; only unexpected failures throw.
 */
export const processCandidate = async (
  candidate: Candidate,
  { config, logger, extractor }: ProcessCandidateDeps,
): Promise<CandidateOutcome> => {
  const base = { link: candidate.link, title: candidate.title, rank: candidate.rank };

  const decision = evaluateBlocklist(candidate, config.blocklist.domains);
  if (!decision.accept) {
    logger.info('Skipping candidate', {
      link: candidate.link,
      reason: decision.reason,
      matched: decision.reason === 'blocked_domain' ? decision.matched : undefined,
    });
    return { record: null, diagnostics: { ...base, status: 'blocked', error: decision.reason } };
  }

  const fetched = await fetchContent(candidate.link, config, logger);
  if (fetched.content === null || fetched.strategyUsed === 'none') {
    logger.warn('No content retrieved', { link: candidate.link, failures: fetched.failures });
    return {
      record: null,
      diagnostics: { ...base, status: 'fetch_failed', strategy: 'none', error: fetched.failures.join('; ') },
    };
  }

  const normalized = normalizeContent(fetched.content, fetched.strategyUsed, {
    minContentChars: config.normalizer.minContentChars,
  });
  if (normalized.status === 'too_short') {
    logger.info('Content too short; skipping extraction', {
      link: candidate.link,
      chars: normalized.length,
      minChars: config.normalizer.minContentChars,
    });
    return {
      record: null,
      diagnostics: { ...base, status: 'too_short', strategy: fetched.strategyUsed, contentChars: normalized.length },
    };
  }

  const extracted = await extractor.extract({
    content: normalized.text,
    link: candidate.link,
    title: candidate.title,
  });
  const diagnostics: CandidateDiagnostics = {
    ...base,
    status: 'extracted',
    strategy: fetched.strategyUsed,
    contentChars: normalized.text.length,
    extractAttempts: extracted.attempts,
  };

  if (extracted.status === 'invalid') {
    return { record: null, diagnostics: { ...diagnostics, status: 'invalid' } };
  }
  if (extracted.status === 'failed') {
    return { record: null, diagnostics: { ...diagnostics, status: 'extract_failed', error: extracted.error } };
  }
  return { record: extracted.record, diagnostics };
};
