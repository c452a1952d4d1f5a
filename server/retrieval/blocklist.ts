import type { Candidate } from '../../shared/types';
import type { BlocklistDecision } from './types';

/**
 * Reject candidates whose link contains a blocklisted domain fragment.
 * Plain substring containment, case-insensitive; no URL parsing, no network.
 */
export const evaluateBlocklist = (
  candidate: Pick<Candidate, 'link'>,
  domains: readonly string[],
): BlocklistDecision => {
  const link = (candidate.link || '').trim().toLowerCase();
  if (!link) {
    return { accept: false, reason: 'missing_link' };
  }
  const matched = domains.find((domain) => domain && link.includes(domain.toLowerCase()));
  if (matched) {
    return { accept: false, reason: 'blocked_domain', matched };
  }
  return { accept: true };
};
