/**
 * Run service - track pipeline execution runs
 */

import * as crypto from 'crypto';
import { z } from 'zod';
import { getDatabase, DatabaseWrapper, Row, textColumn, numberColumn } from './database';
import { Run, RunStatus, StageName, RunMetadata } from './types';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

const RUN_STATUSES: readonly RunStatus[] = ['running', 'completed', 'failed', 'cancelled'];
const STAGE_NAMES: readonly StageName[] = ['import', 'resolve'];

const runMetadataSchema = z.object({
  options: z.record(z.unknown()).optional(),
  summary: z.record(z.unknown()).optional(),
  errors: z.array(z.string()).optional(),
});

function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(4).toString('hex');
  return `run_${timestamp}_${random}`;
}

function parseMetadata(raw: string | undefined, runId: string): RunMetadata | undefined {
  if (!raw) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring malformed metadata for run ${runId}`, { error: errorMessage(error) });
    return undefined;
  }

  const parsed = runMetadataSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

function rowToRun(row: Row): Run {
  const status = textColumn(row, 'status');
  const stage = textColumn(row, 'stage');
  const runId = textColumn(row, 'run_id') ?? '';
  return {
    runId,
    stage: STAGE_NAMES.find((s) => s === stage) ?? 'resolve',
    startedAt: numberColumn(row, 'started_at') ?? 0,
    completedAt: numberColumn(row, 'completed_at'),
    status: RUN_STATUSES.find((s) => s === status) ?? 'failed',
    leadsProcessed: numberColumn(row, 'leads_processed') ?? 0,
    leadsPassed: numberColumn(row, 'leads_passed') ?? 0,
    leadsFailed: numberColumn(row, 'leads_failed') ?? 0,
    errorMessage: textColumn(row, 'error_message'),
    metadata: parseMetadata(textColumn(row, 'metadata'), runId),
  };
}

export class RunService {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  // Start a new run
  start(stage: StageName, metadata?: RunMetadata): Run {
    const run: Run = {
      runId: generateRunId(),
      stage,
      startedAt: Date.now(),
      status: 'running',
      leadsProcessed: 0,
      leadsPassed: 0,
      leadsFailed: 0,
      metadata,
    };

    const db = this.getDb();
    const stmt = db.prepare(`
      INSERT INTO runs (run_id, stage, started_at, status, leads_processed, leads_passed, leads_failed, metadata)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      run.runId,
      run.stage,
      run.startedAt,
      run.status,
      run.leadsProcessed,
      run.leadsPassed,
      run.leadsFailed,
      run.metadata ? JSON.stringify(run.metadata) : null
    );

    logger.setContext(stage, run.runId);
    logger.info(`Started ${stage} run`, { runId: run.runId });

    return run;
  }

  // Complete a run successfully
  complete(runId: string, processed: number, passed: number, failed: number, metadata?: RunMetadata): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      UPDATE runs SET
        completed_at = ?,
        status = ?,
        leads_processed = ?,
        leads_passed = ?,
        leads_failed = ?,
        metadata = COALESCE(?, metadata)
      WHERE run_id = ?
    `);

    stmt.run(
      Date.now(),
      'completed',
      processed,
      passed,
      failed,
      metadata ? JSON.stringify(metadata) : null,
      runId
    );
    logger.info(`Completed run`, { runId, processed, passed, failed });
  }

  // Fail a run
  fail(runId: string, errorMessage: string, processed?: number): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      UPDATE runs SET
        completed_at = ?,
        status = ?,
        error_message = ?,
        leads_processed = COALESCE(?, leads_processed)
      WHERE run_id = ?
    `);

    stmt.run(Date.now(), 'failed', errorMessage, processed, runId);
    logger.error(`Run failed`, { runId, errorMessage });
  }

  // Get run by ID
  getById(runId: string): Run | null {
    const row = this.getDb().prepare('SELECT * FROM runs WHERE run_id = ?').get(runId);
    return row ? rowToRun(row) : null;
  }

  // Get recent runs across all stages
  getRecent(limit: number = 10): Run[] {
    const db = this.getDb();
    const stmt = db.prepare('SELECT * FROM runs ORDER BY started_at DESC LIMIT ?');
    return stmt.all(limit).map(rowToRun);
  }

  // Get statistics
  getStats(): Record<string, { total: number; completed: number; failed: number }> {
    const db = this.getDb();
    const rows = db
      .prepare(`
        SELECT stage, status, COUNT(*) as count
        FROM runs
        GROUP BY stage, status
      `)
      .all();

    const stats: Record<string, { total: number; completed: number; failed: number }> = {};

    for (const row of rows) {
      const stage = textColumn(row, 'stage') ?? 'unknown';
      const count = numberColumn(row, 'count') ?? 0;
      const entry = stats[stage] ?? { total: 0, completed: 0, failed: 0 };
      entry.total += count;
      const status = textColumn(row, 'status');
      if (status === 'completed') {
        entry.completed += count;
      } else if (status === 'failed') {
        entry.failed += count;
      }
      stats[stage] = entry;
    }

    return stats;
  }
}

export const runService = new RunService();
