import type { CandidateDiagnostics, StructuredRecord } from '../../shared/types';
import type { CandidateOutcome } from './processCandidate';

/**
 * Collects task outcomes as they complete. Only valid records whose source
 * link belongs to a submitted candidate, and has not been claimed by another
 * record, make it into the result set.
 */
export class ResultAggregator {
  private readonly records: StructuredRecord[] = [];
  private readonly diagnostics: CandidateDiagnostics[] = [];
  private readonly claimedLinks = new Set<string>();
  private readonly candidateLinks: ReadonlySet<string>;

  constructor(candidateLinks: readonly string[]) {
    this.candidateLinks = new Set(candidateLinks);
  }

  accept(outcome: CandidateOutcome): void {
    this.diagnostics.push(outcome.diagnostics);
    const record = outcome.record;
    if (!record || record.valid !== true) {
      return;
    }
    if (!this.candidateLinks.has(record.sourceUrl) || this.claimedLinks.has(record.sourceUrl)) {
      return;
    }
    this.claimedLinks.add(record.sourceUrl);
    this.records.push(record);
  }

  snapshot(): { records: StructuredRecord[]; candidates: CandidateDiagnostics[] } {
    return {
      records: [...this.records],
      candidates: [...this.diagnostics],
    };
  }
}
