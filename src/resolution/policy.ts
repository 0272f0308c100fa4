/**
 * Classification policy
 *
 * First matching rule wins:
 *   1. deal found         -> duplicate / deal_exists
 *   2. contact found      -> duplicate / contact_duplicate (needs a deal)
 *   3. registry entry     -> duplicate / alohacamp_exists
 *   4. nothing            -> unique / new_lead (needs a deal)
 *
 * Pure: no I/O, same summary in, same decision out.
 */

import { PolicyViolationError } from '../lib/errors';
import { MATCH_SOURCES, MatchSummary, PolicyDecision, RoutingReason } from './types';

const NEEDS_DEAL: Record<RoutingReason, boolean> = {
  deal_exists: false,
  contact_duplicate: true,
  alohacamp_exists: false,
  new_lead: true,
};

function decision(reason: RoutingReason): PolicyDecision {
  return {
    classification: reason === 'new_lead' ? 'unique' : 'duplicate',
    reason,
    needsDeal: NEEDS_DEAL[reason],
  };
}

// A summary whose flags disagree with its entity lists has no defined outcome
export function assertConsistent(summary: MatchSummary): void {
  for (const source of MATCH_SOURCES) {
    const entry = summary[source];
    const hasIds = entry.entityIds.length > 0;
    if (entry.hasMatch !== hasIds) {
      throw new PolicyViolationError(
        `${source}: hasMatch=${entry.hasMatch} with ${entry.entityIds.length} matched entities`
      );
    }
    if (entry.hasMatch !== (entry.bestMatchType !== null)) {
      throw new PolicyViolationError(
        `${source}: hasMatch=${entry.hasMatch} with bestMatchType=${String(entry.bestMatchType)}`
      );
    }
  }
}

export function classify(summary: MatchSummary): PolicyDecision {
  assertConsistent(summary);

  if (summary.deals.hasMatch) return decision('deal_exists');
  if (summary.contacts.hasMatch) return decision('contact_duplicate');
  if (summary.registry.hasMatch) return decision('alohacamp_exists');
  return decision('new_lead');
}
