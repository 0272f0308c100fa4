/**
 * RESOLVE Stage
 * Goal: classify each validated lead as unique or a duplicate of an
 * existing CRM contact, deal or registry entry
 */

import { BaseStage } from '../base-stage';
import { leadService } from '../../state/lead-service';
import { RunMetadata } from '../../state/types';
import { LeadResolverConfig } from '../../config';
import { logger } from '../../lib/logger';
import {
  BatchResolver,
  CommitResult,
  createAdapters,
  formatRunSummary,
  LookupAdapter,
  Outcome,
  ResultCommitter,
  RunSummary,
} from '../../resolution';

export interface ResolveStageOptions {
  limit?: number;
  concurrency?: number;
  dryRun?: boolean;
  adapters?: LookupAdapter[];
  committer?: ResultCommitter;
  config?: LeadResolverConfig;
}

// Accepts every outcome and persists nothing
export const dryRunCommitter: ResultCommitter = {
  async commit(): Promise<CommitResult> {
    return { ok: true };
  },
};

export class ResolveStage extends BaseStage {
  private readonly options: ResolveStageOptions;
  private summary: RunSummary | null = null;
  private outcomes: Outcome[] = [];

  constructor(options: ResolveStageOptions = {}) {
    super('resolve', options.config);
    this.options = options;
  }

  protected async execute(): Promise<void> {
    const { resolution } = this.config;
    const batchSize = this.options.limit ?? resolution.batchSize;
    const leads = leadService.getEligibleForResolution(batchSize);

    if (leads.length === 0) {
      logger.info('No leads awaiting resolution');
    }

    const committer = this.options.committer ?? (this.options.dryRun ? dryRunCommitter : leadService);
    const resolver = new BatchResolver(this.options.adapters ?? createAdapters(this.config), committer, {
      batchSize,
      concurrency: this.options.concurrency ?? resolution.concurrency,
      lookupTimeoutMs: resolution.lookupTimeoutMs,
    });

    const { outcomes, summary } = await resolver.resolveBatch(leads);

    this.outcomes = outcomes;
    this.summary = summary;
    this.processed = summary.selected;
    this.passed = summary.resolved - summary.commitFailures;
    this.failed = summary.errors;

    logger.info(`Run report: ${formatRunSummary(summary)}`, { ...summary, dryRun: Boolean(this.options.dryRun) });
  }

  protected completionMetadata(): RunMetadata | undefined {
    return this.summary ? { summary: this.summary } : undefined;
  }

  getSummary(): RunSummary | null {
    return this.summary;
  }

  getOutcomes(): Outcome[] {
    return this.outcomes;
  }
}

export { ResolveStage as default };
