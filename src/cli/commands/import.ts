/**
 * Import command
 */

import { ImportStage } from '../../stages/import';
import { logger } from '../../lib/logger';

export async function runImport(file: string): Promise<void> {
  logger.info('Starting IMPORT stage', { file });

  const stage = new ImportStage(file);
  const result = await stage.runStage({ options: { file } });

  if (!result.success) {
    throw new Error(`Import failed: ${result.errors.join(', ')}`);
  }

  logger.info('IMPORT complete', {
    processed: result.processed,
    imported: result.passed,
    rejected: result.failed,
  });
}
