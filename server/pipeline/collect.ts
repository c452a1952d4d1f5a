import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { Candidate, CandidateDiagnostics, CollectFailureReason, CollectResult } from '../../shared/types';
import { describeError, withContext, type Logger } from '../obs/logger';
import { fetchSearchCandidates } from '../retrieval/connectors/serper';
import type { TextGenerator } from '../services/llmService';
import { runWithPool } from '../utils/concurrency';
import { ResultAggregator } from './aggregate';
import { StructuredExtractor } from './extractor';
import { processCandidate, type CandidateOutcome } from './processCandidate';
import { makeStageEmitter, type StageEventSender } from './stageEmitter';

export interface CollectDeps {
  config: AppConfig;
  logger: Logger;
  generator: TextGenerator;
  runId?: string;
  /** Receives stage events as the run progresses (used by the SSE route). */
  onStageEvent?: StageEventSender;
}

const summarize = (candidates: CandidateDiagnostics[]) =>
  candidates.reduce<Record<string, number>>((acc, item) => {
    acc[item.status] = (acc[item.status] ?? 0) + 1;
    return acc;
  }, {});

const settleUnexpected = (candidate: Candidate, error: unknown): CandidateOutcome => ({
  record: null,
  diagnostics: {
    link: candidate.link,
    title: candidate.title,
    rank: candidate.rank,
    status: 'error',
    error: describeError(error),
  },
});

/**
 * Run one query through search, the per-candidate pipeline and aggregation.
 * Never rejects for expected failures: an empty query or a failed search
 * resolves with `status: 'failed'`, and any single candidate's failure only
 * removes that candidate from the records.
 */
export const collect = async (query: string, deps: CollectDeps): Promise<CollectResult> => {
  const { config, generator } = deps;
  const runId = deps.runId ?? randomId();
  const logger = withContext(deps.logger, { runId });
  const send: StageEventSender = (event) => {
    try {
      deps.onStageEvent?.(event);
    } catch (error) {
      logger.warn('Stage event delivery failed', {
        stage: event.stage,
        status: event.status,
        error: describeError(error),
      });
    }
  };
  const startedAt = new Date().toISOString();
  const trimmed = query.trim();

  const fail = (reason: CollectFailureReason, error: string): CollectResult => ({
    status: 'failed',
    reason,
    error,
    runId,
    query: trimmed,
    records: [],
    candidates: [],
    startedAt,
    finishedAt: new Date().toISOString(),
  });

  const searchStage = makeStageEmitter(runId, 'search', send);
  if (!trimmed) {
    searchStage.failure(new Error('Query is empty'));
    return fail('empty_query', 'Query is empty');
  }

  searchStage.start({ message: `Searching for "${trimmed}"` });
  logger.info('Search started', { query: trimmed });
  let candidates: Candidate[];
  try {
    const result = await fetchSearchCandidates(trimmed, config);
    candidates = result.items;
    logger.info('Search finished', { query: trimmed, ...result.metrics });
    searchStage.success({ message: `Found ${candidates.length} candidates`, data: { candidates } });
  } catch (error) {
    const message = describeError(error);
    logger.error('Search failed', { query: trimmed, error: message });
    searchStage.failure(error);
    return fail('search_failed', message);
  }

  const extractor = new StructuredExtractor(config, generator, logger);
  const aggregator = new ResultAggregator(candidates.map((candidate) => candidate.link));
  const candidatesStage = makeStageEmitter(runId, 'candidates', send);
  candidatesStage.start({
    message: `Processing ${candidates.length} candidates`,
    data: { total: candidates.length, concurrency: config.pipeline.concurrency },
  });

  let settled = 0;
  await runWithPool(candidates, config.pipeline.concurrency, async (candidate) => {
    let outcome: CandidateOutcome;
    try {
      outcome = await processCandidate(candidate, { config, logger, extractor });
    } catch (error) {
      logger.warn('Candidate task failed', { link: candidate.link, error: describeError(error) });
      outcome = settleUnexpected(candidate, error);
    }
    aggregator.accept(outcome);
    settled += 1;
    candidatesStage.progress({
      message: `${settled}/${candidates.length}`,
      data: outcome.diagnostics,
    });
  });

  const snapshot = aggregator.snapshot();
  candidatesStage.success({ message: `Settled ${settled} candidates` });

  const statusCounts = summarize(snapshot.candidates);
  logger.info('Batch finished', {
    query: trimmed,
    candidates: candidates.length,
    records: snapshot.records.length,
    statuses: statusCounts,
  });
  makeStageEmitter(runId, 'aggregate', send).success({
    message: `Collected ${snapshot.records.length} records`,
    data: { records: snapshot.records.length, statuses: statusCounts },
  });

  return {
    status: 'ok',
    runId,
    query: trimmed,
    records: snapshot.records,
    candidates: snapshot.candidates,
    startedAt,
    finishedAt: new Date().toISOString(),
  };
};
