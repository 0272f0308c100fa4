/**
 * Resolution engine types
 * Match candidates, summaries, outcomes and the collaborator contracts
 */

import type { MatchSource } from '../lib/errors';
import type { Lead } from '../state/types';

export type { MatchSource };

export const MATCH_SOURCES: readonly MatchSource[] = ['contacts', 'deals', 'registry'];

export type MatchType = 'email' | 'phone' | 'name';

// Confidence rank is derived from match type alone; higher is stronger
export const MATCH_TYPE_RANK: Record<MatchType, number> = {
  email: 3,
  phone: 2,
  name: 1,
};

export interface MatchCandidate {
  source: MatchSource;
  entityId: string;
  matchType: MatchType;
  rank: number;
  label?: string;               // display name of the matched entity, for audit
}

export interface SourceSummary {
  hasMatch: boolean;
  bestMatchType: MatchType | null;
  entityIds: string[];
}

export interface MatchSummary {
  contacts: SourceSummary;
  deals: SourceSummary;
  registry: SourceSummary;
}

export type Classification = 'unique' | 'duplicate';

export type RoutingReason =
  | 'new_lead'
  | 'contact_duplicate'
  | 'deal_exists'
  | 'alohacamp_exists';

export const ROUTING_REASONS: readonly RoutingReason[] = [
  'deal_exists',
  'contact_duplicate',
  'alohacamp_exists',
  'new_lead',
];

export interface PolicyDecision {
  classification: Classification;
  reason: RoutingReason;
  needsDeal: boolean;
}

export interface MatchedEntity {
  source: MatchSource;
  entityId: string;
  matchType: MatchType;
}

export interface Outcome extends PolicyDecision {
  leadId: number;
  matchedEntities: MatchedEntity[];
  contactMatchType: MatchType | null;
  degraded: string[];           // optional sources that could not be checked
  resolvedAt: string;           // ISO timestamp
}

// Query handed to every adapter; optional dimensions are skipped when absent
export interface LookupQuery {
  email: string;
  phone?: string;               // E.164 when present
  firstName?: string;
  lastName?: string;
  company?: string;
  propertyName?: string;
  city?: string;
}

export interface LookupAdapter {
  readonly source: MatchSource;
  readonly required: boolean;
  findMatches(query: LookupQuery, signal?: AbortSignal): Promise<MatchCandidate[]>;
}

export type CommitResult = { ok: true } | { ok: false; error: string };

export interface ResultCommitter {
  commit(leadId: number, outcome: Outcome): Promise<CommitResult>;
}

// Type alias so it can be stored as plain run metadata
export type RunSummary = {
  selected: number;
  resolved: number;
  skipped: number;              // required lookup failed, lead left pending
  byClassification: Record<Classification, number>;
  byReason: Record<RoutingReason, number>;
  degraded: number;
  commitFailures: number;
  policyViolations: number;
  errors: number;
  durationMs: number;
};

// Per-lead result, folded into the RunSummary after the fact
export type LeadResolution =
  | { kind: 'resolved'; leadId: number; outcome: Outcome; committed: boolean }
  | { kind: 'skipped'; leadId: number; error: string }
  | { kind: 'violation'; leadId: number; error: string };

export interface BatchResult {
  outcomes: Outcome[];
  summary: RunSummary;
}

export type EligibleLead = Pick<
  Lead,
  | 'leadId'
  | 'email'
  | 'phone'
  | 'firstName'
  | 'lastName'
  | 'company'
  | 'propertyName'
  | 'city'
  | 'country'
  | 'emailStatus'
  | 'validationState'
  | 'resolutionState'
>;
