export type StageName = 'search' | 'candidates' | 'aggregate';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

/** One search-result entry before its content is fetched. */
export interface Candidate {
  title: string;
  /** Empty when the search provider returned no link for the entry. */
  link: string;
  snippet: string;
  /** 1-based position in the search response. */
  rank: number;
}

export type FetchStrategy = 'primary' | 'fallback' | 'none';

/** Schema-conformant output of the text-understanding service for one page. */
export interface StructuredRecord {
  valid: boolean;
  title: string;
  summary: string;
  keyPoints: string[];
  codeSnippets: string[];
  sourceUrl: string;
}

export type CandidateStatus =
  | 'extracted' // Record produced
  | 'blocked' // Blocklisted or missing link, never fetched
  | 'fetch_failed' // Both fetch tiers exhausted
  | 'too_short' // Cleaned text under the minimum length
  | 'invalid' // Model declared the page unusable
  | 'extract_failed' // Extraction retries exhausted
  | 'error'; // Unexpected exception at the task boundary

export interface CandidateDiagnostics {
  link: string;
  title: string;
  rank: number;
  status: CandidateStatus;
  strategy?: FetchStrategy;
  contentChars?: number;
  extractAttempts?: number;
  error?: string;
}

export type CollectFailureReason = 'empty_query' | 'search_failed';

interface CollectResultBase {
  runId: string;
  query: string;
  /** Completion order; re-sort by a record field when order matters. */
  records: StructuredRecord[];
  candidates: CandidateDiagnostics[];
  startedAt: string;
  finishedAt: string;
}

export interface CollectSuccess extends CollectResultBase {
  status: 'ok';
}

export interface CollectFailure extends CollectResultBase {
  status: 'failed';
  reason: CollectFailureReason;
  error: string;
}

export type CollectResult = CollectSuccess | CollectFailure;
