/**
 * In-process stand-ins for upstream systems and the committer
 */

import { UpstreamUnavailableError } from '../lib/errors';
import {
  CommitResult,
  EligibleLead,
  LookupAdapter,
  LookupQuery,
  MatchCandidate,
  MatchSource,
  MatchType,
  MATCH_TYPE_RANK,
  Outcome,
  ResultCommitter,
} from './types';

export function candidate(source: MatchSource, entityId: string, matchType: MatchType = 'email'): MatchCandidate {
  return { source, entityId, matchType, rank: MATCH_TYPE_RANK[matchType] };
}

// Per-email behaviour; unknown emails find nothing
export type FakeResponse = MatchCandidate[] | 'unavailable' | 'hang';

export class FakeAdapter implements LookupAdapter {
  readonly source: MatchSource;
  readonly required: boolean;
  readonly calls: LookupQuery[] = [];
  private readonly responses: Record<string, FakeResponse>;

  constructor(source: MatchSource, responses: Record<string, FakeResponse> = {}) {
    this.source = source;
    this.required = source !== 'registry';
    this.responses = responses;
  }

  async findMatches(query: LookupQuery): Promise<MatchCandidate[]> {
    this.calls.push(query);
    const response = this.responses[query.email] ?? [];
    if (response === 'unavailable') {
      throw new UpstreamUnavailableError(this.source, 'server', 'HTTP 503', 503);
    }
    if (response === 'hang') {
      return new Promise<MatchCandidate[]>(() => undefined);
    }
    return response;
  }
}

export class RecordingCommitter implements ResultCommitter {
  readonly commits: Array<{ leadId: number; outcome: Outcome }> = [];
  private readonly failFor: Set<number>;

  constructor(failFor: number[] = []) {
    this.failFor = new Set(failFor);
  }

  async commit(leadId: number, outcome: Outcome): Promise<CommitResult> {
    this.commits.push({ leadId, outcome });
    if (this.failFor.has(leadId)) {
      return { ok: false, error: 'store unavailable' };
    }
    return { ok: true };
  }
}

export function eligibleLead(leadId: number, email: string, overrides: Partial<EligibleLead> = {}): EligibleLead {
  return {
    leadId,
    email,
    validationState: 'complete',
    resolutionState: 'pending',
    emailStatus: 'valid',
    ...overrides,
  };
}

export function fakeAdapters(responses: {
  contacts?: Record<string, FakeResponse>;
  deals?: Record<string, FakeResponse>;
  registry?: Record<string, FakeResponse>;
} = {}): { contacts: FakeAdapter; deals: FakeAdapter; registry: FakeAdapter; all: LookupAdapter[] } {
  const contacts = new FakeAdapter('contacts', responses.contacts);
  const deals = new FakeAdapter('deals', responses.deals);
  const registry = new FakeAdapter('registry', responses.registry);
  return { contacts, deals, registry, all: [contacts, deals, registry] };
}
