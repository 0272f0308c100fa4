/**
 * Resolve command
 */

import { ResolveStage } from '../../stages/resolve';
import { logger } from '../../lib/logger';

export interface ResolveOptions {
  limit?: number;
  concurrency?: number;
  dryRun?: boolean;
}

export async function runResolve(options: ResolveOptions): Promise<void> {
  logger.info('Starting RESOLVE stage', { options });

  const stage = new ResolveStage({
    limit: options.limit,
    concurrency: options.concurrency,
    dryRun: options.dryRun,
  });
  const result = await stage.runStage({ options: { ...options } });

  if (!result.success) {
    throw new Error(`Resolve failed: ${result.errors.join(', ')}`);
  }

  const summary = stage.getSummary();
  logger.info('RESOLVE complete', {
    processed: result.processed,
    passed: result.passed,
    failed: result.failed,
    byReason: summary?.byReason,
  });
}
