/**
 * RunSummary accumulation
 * Workers hand back LeadResolution values; counts are folded here, once,
 * after the batch has finished.
 */

import { LeadResolution, RunSummary } from './types';

export function emptyRunSummary(): RunSummary {
  return {
    selected: 0,
    resolved: 0,
    skipped: 0,
    byClassification: { unique: 0, duplicate: 0 },
    byReason: { new_lead: 0, contact_duplicate: 0, deal_exists: 0, alohacamp_exists: 0 },
    degraded: 0,
    commitFailures: 0,
    policyViolations: 0,
    errors: 0,
    durationMs: 0,
  };
}

export function addResolution(summary: RunSummary, resolution: LeadResolution): RunSummary {
  const next: RunSummary = {
    ...summary,
    byClassification: { ...summary.byClassification },
    byReason: { ...summary.byReason },
    selected: summary.selected + 1,
  };

  switch (resolution.kind) {
    case 'resolved': {
      const { outcome } = resolution;
      next.resolved++;
      next.byClassification[outcome.classification]++;
      next.byReason[outcome.reason]++;
      if (outcome.degraded.length > 0) next.degraded++;
      if (!resolution.committed) {
        next.commitFailures++;
        next.errors++;
      }
      break;
    }
    case 'skipped':
      next.skipped++;
      next.errors++;
      break;
    case 'violation':
      next.policyViolations++;
      next.errors++;
      break;
  }

  return next;
}

export function summarize(resolutions: LeadResolution[], durationMs: number): RunSummary {
  const summary = resolutions.reduce(addResolution, emptyRunSummary());
  return { ...summary, durationMs };
}

export function formatRunSummary(summary: RunSummary): string {
  const reasons = Object.entries(summary.byReason)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(' ');
  return (
    `selected=${summary.selected} resolved=${summary.resolved} skipped=${summary.skipped} ` +
    `unique=${summary.byClassification.unique} duplicate=${summary.byClassification.duplicate} ` +
    `${reasons} degraded=${summary.degraded} errors=${summary.errors} ` +
    `duration=${summary.durationMs}ms`
  );
}
