import type { Candidate, FetchStrategy } from '../../shared/types';

type ProviderName = 'serper';

export interface ConnectorResult {
  provider: ProviderName;
  fetchedAt: string;
  query: string;
  items: Candidate[];
  metrics?: Record<string, unknown>;
}

export type BlocklistDecision =
  | { accept: true }
  | { accept: false; reason: 'missing_link' }
  | { accept: false; reason: 'blocked_domain'; matched: string };

export interface FetchResult {
  content: string | null;
  strategyUsed: FetchStrategy;
  attempts: {
    primary: number;
    fallback: number;
  };
  /** One entry per failed attempt, e.g. `primary#1: HTTP 503`. */
  failures: string[];
}

/** Source tier of raw text, which decides how it is cleaned. */
export type ContentTier = Exclude<FetchStrategy, 'none'>;

export type NormalizeOutcome =
  | { status: 'ok'; text: string }
  | { status: 'too_short'; text: string; length: number };
