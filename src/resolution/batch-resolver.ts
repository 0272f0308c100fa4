/**
 * Batch resolver - the engine's entry point
 *
 * For each eligible lead: query every adapter, aggregate, classify, hand
 * the outcome to the committer. Failures stay scoped to the lead that
 * produced them; the batch always completes and reports a RunSummary.
 */

import pLimit from 'p-limit';
import { MAX_BATCH_SIZE, MAX_CONCURRENCY } from '../config/types';
import { ConfigError, PolicyViolationError, UpstreamUnavailableError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { normalizeEmail, normalizePhone, withTimeout } from '../lib/utils';
import { aggregateMatches, collectEntities, matchedSources } from './aggregator';
import { classify } from './policy';
import { summarize } from './run-summary';
import {
  BatchResult,
  EligibleLead,
  LeadResolution,
  LookupAdapter,
  LookupQuery,
  MatchCandidate,
  MatchSource,
  Outcome,
  PolicyDecision,
  ResultCommitter,
} from './types';

export interface BatchResolverOptions {
  batchSize: number;
  concurrency: number;
  lookupTimeoutMs: number;
  now?: () => Date;
}

const REQUIRED_SOURCES: readonly MatchSource[] = ['contacts', 'deals'];

export function isEligible(lead: EligibleLead): boolean {
  return (
    lead.validationState === 'complete' &&
    lead.resolutionState === 'pending' &&
    lead.emailStatus === 'valid' &&
    typeof lead.email === 'string' &&
    lead.email.trim() !== ''
  );
}

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function toLookupQuery(lead: EligibleLead): LookupQuery {
  return {
    email: normalizeEmail(lead.email ?? ''),
    phone: normalizePhone(lead.phone, lead.country) ?? undefined,
    firstName: clean(lead.firstName),
    lastName: clean(lead.lastName),
    company: clean(lead.company),
    propertyName: clean(lead.propertyName),
    city: clean(lead.city),
  };
}

type LookupResult =
  | { ok: true; adapter: LookupAdapter; candidates: MatchCandidate[] }
  | { ok: false; adapter: LookupAdapter; error: unknown };

export class BatchResolver {
  private readonly adapters: LookupAdapter[];
  private readonly committer: ResultCommitter;
  private readonly options: Required<BatchResolverOptions>;

  constructor(adapters: LookupAdapter[], committer: ResultCommitter, options: BatchResolverOptions) {
    for (const source of REQUIRED_SOURCES) {
      const adapter = adapters.find((a) => a.source === source);
      if (!adapter || !adapter.required) {
        throw new ConfigError(`A required ${source} adapter must be registered`);
      }
    }

    this.adapters = adapters;
    this.committer = committer;
    this.options = {
      batchSize: Math.min(Math.max(1, options.batchSize), MAX_BATCH_SIZE),
      concurrency: Math.min(Math.max(1, options.concurrency), MAX_CONCURRENCY),
      lookupTimeoutMs: options.lookupTimeoutMs,
      now: options.now ?? (() => new Date()),
    };
  }

  /**
   * Eligible leads, one per id, lowest id first, capped at the batch size.
   * Anything beyond the cap waits for the next run.
   */
  selectBatch<L extends EligibleLead>(leads: L[]): L[] {
    const seen = new Set<number>();
    const eligible: L[] = [];

    for (const lead of leads) {
      if (!isEligible(lead) || seen.has(lead.leadId)) continue;
      seen.add(lead.leadId);
      eligible.push(lead);
    }

    return eligible
      .sort((a, b) => a.leadId - b.leadId)
      .slice(0, this.options.batchSize);
  }

  async resolveBatch(leads: EligibleLead[]): Promise<BatchResult> {
    const startedAt = Date.now();
    const batch = this.selectBatch(leads);

    logger.info(`Resolving ${batch.length} leads`, {
      offered: leads.length,
      concurrency: this.options.concurrency,
    });

    const limit = pLimit(this.options.concurrency);
    const resolutions = await Promise.all(batch.map((lead) => limit(() => this.resolveSafely(lead))));

    const outcomes: Outcome[] = [];
    for (const resolution of resolutions) {
      if (resolution.kind === 'resolved') outcomes.push(resolution.outcome);
    }

    return { outcomes, summary: summarize(resolutions, Date.now() - startedAt) };
  }

  // Nothing thrown while resolving one lead may reach the batch
  private async resolveSafely(lead: EligibleLead): Promise<LeadResolution> {
    try {
      return await this.resolveLead(lead);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Resolution failed for lead ${lead.leadId}`, { error: message });
      return { kind: 'skipped', leadId: lead.leadId, error: message };
    }
  }

  async resolveLead(lead: EligibleLead): Promise<LeadResolution> {
    const query = toLookupQuery(lead);
    const results = await Promise.all(this.adapters.map((adapter) => this.lookup(adapter, query)));

    const candidates: MatchCandidate[] = [];
    const degraded: string[] = [];
    const failures: string[] = [];

    for (const result of results) {
      const { source, required } = result.adapter;
      if (result.ok) {
        candidates.push(...result.candidates.filter((c) => c.source === source));
        continue;
      }

      const message = errorMessage(result.error);
      const kind = result.error instanceof UpstreamUnavailableError ? result.error.kind : 'error';
      if (required) {
        failures.push(message);
        logger.logLookupFailure(lead.leadId, source, kind, { error: message });
      } else {
        degraded.push(source);
        logger.warn(`Degraded: ${source} unavailable, treating as no match`, {
          leadId: lead.leadId,
          kind,
          error: message,
        });
      }
    }

    if (failures.length > 0) {
      return { kind: 'skipped', leadId: lead.leadId, error: failures.join('; ') };
    }

    const summary = aggregateMatches(candidates);
    let decision: PolicyDecision;
    try {
      decision = classify(summary);
    } catch (error) {
      if (!(error instanceof PolicyViolationError)) throw error;
      logger.logDefect(`Policy violation for lead ${lead.leadId}`, { error: error.message });
      return { kind: 'violation', leadId: lead.leadId, error: error.message };
    }

    const outcome: Outcome = {
      leadId: lead.leadId,
      ...decision,
      matchedEntities: collectEntities(candidates),
      contactMatchType: summary.contacts.bestMatchType,
      degraded,
      resolvedAt: this.options.now().toISOString(),
    };

    const sources = matchedSources(summary);
    if (sources.length > 1 || outcome.matchedEntities.length > 1) {
      logger.debug(`Additional matches for lead ${lead.leadId}`, {
        decidedBy: outcome.reason,
        sources,
        entities: outcome.matchedEntities.map((e) => `${e.source}:${e.entityId}`),
      });
    }

    logger.info(`Lead ${lead.leadId}: ${outcome.classification} (${outcome.reason})`);

    const committed = await this.commit(outcome);
    return { kind: 'resolved', leadId: lead.leadId, outcome, committed };
  }

  // Each adapter gets its own deadline; a late answer is abandoned
  private async lookup(adapter: LookupAdapter, query: LookupQuery): Promise<LookupResult> {
    const controller = new AbortController();
    const timeoutMs = this.options.lookupTimeoutMs;

    try {
      const candidates = await withTimeout(
        adapter.findMatches(query, controller.signal),
        timeoutMs,
        () => {
          controller.abort();
          return new UpstreamUnavailableError(adapter.source, 'timeout', `lookup exceeded ${timeoutMs}ms`);
        }
      );
      return { ok: true, adapter, candidates };
    } catch (error) {
      return { ok: false, adapter, error };
    }
  }

  // At most one attempt per lead per run
  private async commit(outcome: Outcome): Promise<boolean> {
    try {
      const result = await this.committer.commit(outcome.leadId, outcome);
      if (result.ok) return true;
      logger.error(`Commit failed for lead ${outcome.leadId}`, { error: result.error, outcome });
    } catch (error) {
      logger.error(`Commit failed for lead ${outcome.leadId}`, { error: errorMessage(error), outcome });
    }
    return false;
  }
}
