#!/usr/bin/env node
/**
 * Lead Resolver CLI
 * Entry point for running pipeline stages
 */

import { Command, InvalidArgumentError } from 'commander';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { getConfig, redactConfig, reloadConfig } from '../config';
import { closeDatabase, initDatabase } from '../state/database';

// Import stage runners
import { runImport } from './commands/import';
import { runResolve } from './commands/resolve';
import { showStats } from './commands/stats';
import { runAudit } from './commands/audit';

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// Open the store, run the action, always close; exit 1 on failure
async function withDatabase(label: string, action: () => Promise<void>): Promise<void> {
  try {
    await initDatabase();
    await action();
  } catch (error) {
    logger.error(`${label} failed`, { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

const program = new Command();

program
  .name('lead-resolver')
  .description('Cross-system duplicate resolution for validated leads')
  .version('1.0.0');

// Import leads
program
  .command('import')
  .description('Import leads from a CSV (header row) or JSON file')
  .argument('<file>', 'Path to the lead file')
  .action((file: string) => withDatabase('Import', () => runImport(file)));

// Resolve stage
program
  .command('resolve')
  .description('Classify one batch of validated leads against HubSpot and the property registry')
  .option('-l, --limit <number>', 'Maximum leads to resolve this run', parsePositiveInt)
  .option('-c, --concurrency <number>', 'Leads resolved in parallel', parsePositiveInt)
  .option('--dry-run', 'Resolve without committing outcomes')
  .action((options: { limit?: number; concurrency?: number; dryRun?: boolean }) =>
    withDatabase('Resolve', () => runResolve(options))
  );

// Stats command
program
  .command('stats')
  .description('Show resolution statistics')
  .action(() => withDatabase('Stats', showStats));

// Audit command
program
  .command('audit')
  .description('Show where leads sit in the funnel')
  .option('-s, --sample <number>', 'Leads to inspect', parsePositiveInt, 1000)
  .action((options: { sample: number }) => withDatabase('Audit', () => runAudit(options.sample)));

// Config command
program
  .command('config')
  .description('Show current configuration (secrets masked)')
  .action(() => {
    const config = getConfig();
    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

// Reload config
program
  .command('reload-config')
  .description('Reload configuration from disk')
  .action(() => {
    reloadConfig();
    logger.info('Configuration reloaded');
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', { error: errorMessage(error) });
  process.exitCode = 1;
});
