/**
 * Audit command - where leads sit in the funnel and what the next
 * resolve run would pick up
 */

import { leadService, funnelStageOf } from '../../state';
import { getConfig } from '../../config';
import { logger } from '../../lib/logger';

export async function runAudit(sampleSize: number): Promise<void> {
  logger.info('Auditing funnel state...');

  const leads = leadService.getAll().slice(0, sampleSize);
  const counts = new Map<string, number>();
  for (const lead of leads) {
    const stage = funnelStageOf(lead);
    counts.set(stage, (counts.get(stage) ?? 0) + 1);
  }

  console.log(`\n=== Funnel (first ${leads.length} leads) ===`);
  for (const stage of ['no_email', 'awaiting_validation', 'invalid_email', 'awaiting_resolution', 'resolved']) {
    console.log(`  ${stage.padEnd(24)} ${counts.get(stage) ?? 0}`);
  }

  const batchSize = getConfig().resolution.batchSize;
  const next = leadService.getEligibleForResolution(batchSize);
  console.log(`\n=== Next resolve batch (limit ${batchSize}) ===`);
  console.log(`  ${next.length} leads eligible`);
  if (next.length > 0) {
    console.log(`  first: #${next[0].leadId} ${next[0].email ?? ''}`);
    console.log(`  last:  #${next[next.length - 1].leadId} ${next[next.length - 1].email ?? ''}`);
  }

  console.log('');
}
