import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDatabase, getDatabase, initDatabase } from './database';
import { RunService } from './run-service';

describe('RunService', () => {
  const service = new RunService();

  beforeEach(async () => {
    await initDatabase();
  });

  afterEach(() => {
    closeDatabase();
  });

  it('stores completion metadata on the run', () => {
    const run = service.start('resolve', { options: { limit: 5 } });

    service.complete(run.runId, 5, 4, 1, { summary: { selected: 5 } });

    expect(service.getById(run.runId)).toMatchObject({
      status: 'completed',
      leadsProcessed: 5,
      leadsPassed: 4,
      leadsFailed: 1,
      metadata: { summary: { selected: 5 } },
    });
  });

  it('keeps listing runs whose metadata cell is unreadable', () => {
    const run = service.start('import', { options: { file: 'leads.csv' } });
    getDatabase().run('UPDATE runs SET metadata = ? WHERE run_id = ?', ['{broken', run.runId]);

    const recent = service.getRecent(5);

    expect(recent.map((r) => r.runId)).toEqual([run.runId]);
    expect(recent[0].metadata).toBeUndefined();
  });
});
