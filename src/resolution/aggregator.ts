/**
 * Match aggregation
 * Folds every candidate for one lead into a per-source summary. The result
 * depends only on the candidate set, not on the order adapters answered in.
 */

import {
  MATCH_SOURCES,
  MATCH_TYPE_RANK,
  MatchCandidate,
  MatchedEntity,
  MatchSource,
  MatchSummary,
  MatchType,
  SourceSummary,
} from './types';

function strongest(a: MatchType | null, b: MatchType): MatchType {
  if (a === null) return b;
  return MATCH_TYPE_RANK[b] > MATCH_TYPE_RANK[a] ? b : a;
}

function summarizeSource(candidates: MatchCandidate[], source: MatchSource): SourceSummary {
  let bestMatchType: MatchType | null = null;
  const ids = new Set<string>();

  for (const candidate of candidates) {
    if (candidate.source !== source) continue;
    ids.add(candidate.entityId);
    bestMatchType = strongest(bestMatchType, candidate.matchType);
  }

  return {
    hasMatch: ids.size > 0,
    bestMatchType,
    entityIds: [...ids].sort(),
  };
}

export function emptySummary(): MatchSummary {
  return aggregateMatches([]);
}

export function aggregateMatches(candidates: MatchCandidate[]): MatchSummary {
  return {
    contacts: summarizeSource(candidates, 'contacts'),
    deals: summarizeSource(candidates, 'deals'),
    registry: summarizeSource(candidates, 'registry'),
  };
}

/**
 * Matched entities for the audit trail: one entry per source and id,
 * carrying the strongest match type seen for it, in source precedence
 * order (deals, contacts, registry) and then by id.
 */
export function collectEntities(candidates: MatchCandidate[]): MatchedEntity[] {
  const byKey = new Map<string, MatchedEntity>();

  for (const candidate of candidates) {
    const key = `${candidate.source}:${candidate.entityId}`;
    const existing = byKey.get(key);
    byKey.set(key, {
      source: candidate.source,
      entityId: candidate.entityId,
      matchType: strongest(existing?.matchType ?? null, candidate.matchType),
    });
  }

  const order: MatchSource[] = ['deals', 'contacts', 'registry'];
  return [...byKey.values()].sort((a, b) => {
    const bySource = order.indexOf(a.source) - order.indexOf(b.source);
    if (bySource !== 0) return bySource;
    return a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;
  });
}

export function matchedSources(summary: MatchSummary): MatchSource[] {
  return MATCH_SOURCES.filter((source) => summary[source].hasMatch);
}
