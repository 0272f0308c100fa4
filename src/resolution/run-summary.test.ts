import { describe, it, expect } from 'vitest';
import { addResolution, emptyRunSummary, formatRunSummary, summarize } from './run-summary';
import { LeadResolution, Outcome } from './types';

function outcome(leadId: number, overrides: Partial<Outcome> = {}): Outcome {
  return {
    leadId,
    classification: 'unique',
    reason: 'new_lead',
    needsDeal: true,
    matchedEntities: [],
    contactMatchType: null,
    degraded: [],
    resolvedAt: '2026-01-15T10:00:00.000Z',
    ...overrides,
  };
}

describe('summarize', () => {
  it('counts every kind of per-lead result', () => {
    const resolutions: LeadResolution[] = [
      { kind: 'resolved', leadId: 1, outcome: outcome(1), committed: true },
      {
        kind: 'resolved',
        leadId: 2,
        outcome: outcome(2, { classification: 'duplicate', reason: 'deal_exists', needsDeal: false }),
        committed: false,
      },
      { kind: 'resolved', leadId: 3, outcome: outcome(3, { degraded: ['registry'] }), committed: true },
      { kind: 'skipped', leadId: 4, error: 'contacts unavailable (timeout): slow' },
      { kind: 'violation', leadId: 5, error: 'contacts: inconsistent' },
    ];

    expect(summarize(resolutions, 42)).toEqual({
      selected: 5,
      resolved: 3,
      skipped: 1,
      byClassification: { unique: 2, duplicate: 1 },
      byReason: { new_lead: 2, contact_duplicate: 0, deal_exists: 1, alohacamp_exists: 0 },
      degraded: 1,
      commitFailures: 1,
      policyViolations: 1,
      errors: 3,
      durationMs: 42,
    });
  });

  it('returns zeros for an empty batch', () => {
    expect(summarize([], 0)).toEqual(emptyRunSummary());
  });
});

describe('addResolution', () => {
  it('does not mutate the summary it is given', () => {
    const before = emptyRunSummary();
    addResolution(before, { kind: 'resolved', leadId: 1, outcome: outcome(1), committed: true });

    expect(before.resolved).toBe(0);
    expect(before.byReason.new_lead).toBe(0);
  });
});

describe('formatRunSummary', () => {
  it('renders a single report line', () => {
    const summary = summarize([{ kind: 'resolved', leadId: 1, outcome: outcome(1), committed: true }], 15);

    expect(formatRunSummary(summary)).toBe(
      'selected=1 resolved=1 skipped=0 unique=1 duplicate=0 ' +
        'new_lead=1 contact_duplicate=0 deal_exists=0 alohacamp_exists=0 degraded=0 errors=0 duration=15ms'
    );
  });
});
