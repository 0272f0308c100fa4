/**
 * Stats command - show resolution statistics
 */

import { leadService, runService } from '../../state';
import { logger } from '../../lib/logger';

export async function showStats(): Promise<void> {
  logger.info('Gathering statistics...');

  const stats = leadService.getStats();

  console.log('\n=== Lead Statistics ===');
  console.log(`Total leads: ${stats.total}`);
  for (const [stage, count] of Object.entries(stats.byFunnelStage)) {
    console.log(`  ${stage}: ${count}`);
  }

  console.log('\n=== Classification ===');
  for (const [classification, count] of Object.entries(stats.byClassification)) {
    console.log(`  ${classification}: ${count}`);
  }

  console.log('\n=== Routing Reasons ===');
  const resolved = stats.byFunnelStage.resolved;
  for (const [reason, count] of Object.entries(stats.byReason)) {
    const share = resolved > 0 ? ((count * 100) / resolved).toFixed(1) : '0.0';
    console.log(`  ${reason}: ${count} (${share}%)`);
  }
  console.log(`  needs deal: ${stats.needsDeal}`);

  // Run statistics
  const runStats = runService.getStats();
  console.log('\n=== Run Statistics by Stage ===');
  for (const [stage, entry] of Object.entries(runStats)) {
    console.log(`${stage}:`);
    console.log(`  Total runs: ${entry.total}`);
    console.log(`  Completed: ${entry.completed}`);
    console.log(`  Failed: ${entry.failed}`);
  }

  // Recent runs
  const recentRuns = runService.getRecent(5);
  console.log('\n=== Recent Runs ===');
  for (const run of recentRuns) {
    const status = run.status === 'completed' ? '✓' : run.status === 'failed' ? '✗' : '...';
    const date = new Date(run.startedAt).toISOString();
    console.log(
      `[${status}] ${run.stage} @ ${date} - ${run.leadsProcessed} processed, ${run.leadsPassed} passed, ${run.leadsFailed} failed`
    );
  }

  console.log('');
}
