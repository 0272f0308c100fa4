import { describe, it, expect } from 'vitest';
import { BatchResolver, isEligible, toLookupQuery } from './batch-resolver';
import { ConfigError } from '../lib/errors';
import { candidate, eligibleLead, fakeAdapters, RecordingCommitter } from './test-fixtures';
import { LookupAdapter, LookupQuery, MatchCandidate, MatchSource } from './types';
import { sleep } from '../lib/utils';

const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

function resolver(
  adapters: LookupAdapter[],
  committer = new RecordingCommitter(),
  overrides: { batchSize?: number; concurrency?: number; lookupTimeoutMs?: number } = {}
): BatchResolver {
  return new BatchResolver(adapters, committer, {
    batchSize: overrides.batchSize ?? 100,
    concurrency: overrides.concurrency ?? 1,
    lookupTimeoutMs: overrides.lookupTimeoutMs ?? 1000,
    now: () => FIXED_NOW,
  });
}

describe('BatchResolver end-to-end', () => {
  it('classifies a lead with a deal match as deal_exists', async () => {
    const { all } = fakeAdapters({ deals: { 'a@x.com': [candidate('deals', '9001')] } });
    const committer = new RecordingCommitter();

    const { outcomes } = await resolver(all, committer).resolveBatch([eligibleLead(1, 'a@x.com')]);

    expect(outcomes).toEqual([
      {
        leadId: 1,
        classification: 'duplicate',
        reason: 'deal_exists',
        needsDeal: false,
        matchedEntities: [{ source: 'deals', entityId: '9001', matchType: 'email' }],
        contactMatchType: null,
        degraded: [],
        resolvedAt: '2026-01-15T10:00:00.000Z',
      },
    ]);
    expect(committer.commits.map((c) => c.leadId)).toEqual([1]);
  });

  it('classifies a lead with only a contact match as contact_duplicate', async () => {
    const { all } = fakeAdapters({ contacts: { 'b@x.com': [candidate('contacts', '501', 'phone')] } });

    const { outcomes } = await resolver(all).resolveBatch([eligibleLead(2, 'b@x.com')]);

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].classification).toBe('duplicate');
    expect(outcomes[0].reason).toBe('contact_duplicate');
    expect(outcomes[0].needsDeal).toBe(true);
    expect(outcomes[0].contactMatchType).toBe('phone');
  });

  it('classifies a lead with only a registry match as alohacamp_exists', async () => {
    const { all } = fakeAdapters({ registry: { 'c@x.com': [candidate('registry', 'recA1', 'name')] } });

    const { outcomes } = await resolver(all).resolveBatch([eligibleLead(3, 'c@x.com')]);

    expect(outcomes[0].classification).toBe('duplicate');
    expect(outcomes[0].reason).toBe('alohacamp_exists');
    expect(outcomes[0].matchedEntities).toEqual([{ source: 'registry', entityId: 'recA1', matchType: 'name' }]);
  });

  it('classifies a lead with no matches as new_lead', async () => {
    const { all } = fakeAdapters();

    const { outcomes, summary } = await resolver(all).resolveBatch([eligibleLead(4, 'd@x.com')]);

    expect(outcomes[0].classification).toBe('unique');
    expect(outcomes[0].reason).toBe('new_lead');
    expect(outcomes[0].matchedEntities).toEqual([]);
    expect(summary.byReason.new_lead).toBe(1);
    expect(summary.byClassification.unique).toBe(1);
  });

  it('skips a lead whose contacts lookup is unavailable and commits nothing', async () => {
    const { all } = fakeAdapters({ contacts: { 'e@x.com': 'unavailable' } });
    const committer = new RecordingCommitter();

    const { outcomes, summary } = await resolver(all, committer).resolveBatch([eligibleLead(5, 'e@x.com')]);

    expect(outcomes).toEqual([]);
    expect(committer.commits).toEqual([]);
    expect(summary.selected).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(summary.errors).toBe(1);
    expect(summary.resolved).toBe(0);
  });
});

describe('BatchResolver failure handling', () => {
  it('skips a lead when the deals lookup is unavailable', async () => {
    const { all } = fakeAdapters({
      contacts: { 'f@x.com': [candidate('contacts', '1')] },
      deals: { 'f@x.com': 'unavailable' },
    });

    const resolution = await resolver(all).resolveLead(eligibleLead(6, 'f@x.com'));

    expect(resolution).toEqual({
      kind: 'skipped',
      leadId: 6,
      error: 'deals unavailable (server): HTTP 503',
    });
  });

  it('treats an unavailable registry as no match and records the degradation', async () => {
    const { all } = fakeAdapters({ registry: { 'g@x.com': 'unavailable' } });

    const { outcomes, summary } = await resolver(all).resolveBatch([eligibleLead(7, 'g@x.com')]);

    expect(outcomes[0].reason).toBe('new_lead');
    expect(outcomes[0].degraded).toEqual(['registry']);
    expect(summary.degraded).toBe(1);
    expect(summary.errors).toBe(0);
  });

  it('still prefers a deal when the registry is down', async () => {
    const { all } = fakeAdapters({
      deals: { 'h@x.com': [candidate('deals', '77')] },
      registry: { 'h@x.com': 'unavailable' },
    });

    const { outcomes } = await resolver(all).resolveBatch([eligibleLead(8, 'h@x.com')]);

    expect(outcomes[0].reason).toBe('deal_exists');
    expect(outcomes[0].degraded).toEqual(['registry']);
  });

  it('turns a hung required lookup into a timeout skip', async () => {
    const { all } = fakeAdapters({ deals: { 'i@x.com': 'hang' } });
    const committer = new RecordingCommitter();

    const resolution = await resolver(all, committer, { lookupTimeoutMs: 20 }).resolveLead(eligibleLead(9, 'i@x.com'));

    expect(resolution).toEqual({
      kind: 'skipped',
      leadId: 9,
      error: 'deals unavailable (timeout): lookup exceeded 20ms',
    });
    expect(committer.commits).toEqual([]);
  });

  it('keeps the outcome but counts a failed commit', async () => {
    const { all } = fakeAdapters();
    const committer = new RecordingCommitter([11]);

    const { outcomes, summary } = await resolver(all, committer).resolveBatch([
      eligibleLead(10, 'j@x.com'),
      eligibleLead(11, 'k@x.com'),
    ]);

    expect(outcomes.map((o) => o.leadId)).toEqual([10, 11]);
    expect(committer.commits.map((c) => c.leadId)).toEqual([10, 11]);
    expect(summary.resolved).toBe(2);
    expect(summary.commitFailures).toBe(1);
    expect(summary.errors).toBe(1);
  });

  it('commits each lead at most once', async () => {
    const { all } = fakeAdapters();
    const committer = new RecordingCommitter([12]);

    await resolver(all, committer).resolveBatch([eligibleLead(12, 'l@x.com')]);

    expect(committer.commits).toHaveLength(1);
  });

  it('ignores candidates an adapter reports for another source', async () => {
    const { all } = fakeAdapters({ contacts: { 'm@x.com': [candidate('deals', '666')] } });

    const { outcomes } = await resolver(all).resolveBatch([eligibleLead(13, 'm@x.com')]);

    expect(outcomes[0].reason).toBe('new_lead');
  });

  it('isolates one failing lead from the rest of the batch', async () => {
    const { all } = fakeAdapters({ contacts: { 'bad@x.com': 'unavailable' } });

    const { outcomes, summary } = await resolver(all).resolveBatch([
      eligibleLead(20, 'ok1@x.com'),
      eligibleLead(21, 'bad@x.com'),
      eligibleLead(22, 'ok2@x.com'),
    ]);

    expect(outcomes.map((o) => o.leadId)).toEqual([20, 22]);
    expect(summary.selected).toBe(3);
    expect(summary.resolved).toBe(2);
    expect(summary.skipped).toBe(1);
  });
});

describe('BatchResolver selection', () => {
  it('drops ineligible leads without looking them up', async () => {
    const { all, contacts } = fakeAdapters();
    const committer = new RecordingCommitter();

    const { summary } = await resolver(all, committer).resolveBatch([
      eligibleLead(30, 'done@x.com', { resolutionState: 'complete' }),
      eligibleLead(31, 'unvalidated@x.com', { validationState: 'pending' }),
      eligibleLead(32, 'invalid@x.com', { emailStatus: 'invalid' }),
      eligibleLead(33, '   '),
      eligibleLead(34, 'ok@x.com'),
    ]);

    expect(contacts.calls.map((q) => q.email)).toEqual(['ok@x.com']);
    expect(committer.commits.map((c) => c.leadId)).toEqual([34]);
    expect(summary.selected).toBe(1);
  });

  it('processes leads in ascending id order', async () => {
    const { all } = fakeAdapters();

    const { outcomes } = await resolver(all).resolveBatch([
      eligibleLead(42, 'c@x.com'),
      eligibleLead(7, 'a@x.com'),
      eligibleLead(19, 'b@x.com'),
    ]);

    expect(outcomes.map((o) => o.leadId)).toEqual([7, 19, 42]);
  });

  it('resolves a repeated lead id only once', async () => {
    const { all, contacts } = fakeAdapters();

    const { outcomes } = await resolver(all).resolveBatch([
      eligibleLead(5, 'first@x.com'),
      eligibleLead(5, 'second@x.com'),
    ]);

    expect(outcomes.map((o) => o.leadId)).toEqual([5]);
    expect(contacts.calls.map((q) => q.email)).toEqual(['first@x.com']);
  });

  it('caps the batch at the configured size, lowest ids first', async () => {
    const { all } = fakeAdapters();
    const leads = [5, 4, 3, 2, 1].map((id) => eligibleLead(id, `lead${id}@x.com`));

    const { outcomes, summary } = await resolver(all, new RecordingCommitter(), { batchSize: 2 }).resolveBatch(leads);

    expect(outcomes.map((o) => o.leadId)).toEqual([1, 2]);
    expect(summary.selected).toBe(2);
  });

  it('rejects a configuration without both required adapters', () => {
    const { contacts, registry } = fakeAdapters();
    expect(() => resolver([contacts, registry])).toThrow(ConfigError);
    expect(() => resolver([contacts, registry])).toThrow('A required deals adapter must be registered');
  });
});

class SlowAdapter implements LookupAdapter {
  readonly required: boolean;
  inFlight = 0;
  maxInFlight = 0;

  constructor(readonly source: MatchSource, private readonly delayFor: (email: string) => number) {
    this.required = source !== 'registry';
  }

  async findMatches(query: LookupQuery): Promise<MatchCandidate[]> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await sleep(this.delayFor(query.email));
    this.inFlight--;
    return [];
  }
}

describe('BatchResolver concurrency', () => {
  it('bounds in-flight leads and keeps output in id order', async () => {
    const delays: Record<string, number> = { 'a@x.com': 30, 'b@x.com': 5, 'c@x.com': 15, 'd@x.com': 1 };
    const contacts = new SlowAdapter('contacts', (email) => delays[email] ?? 0);
    const deals = new SlowAdapter('deals', () => 0);

    const { outcomes } = await resolver([contacts, deals], new RecordingCommitter(), { concurrency: 2 }).resolveBatch([
      eligibleLead(1, 'a@x.com'),
      eligibleLead(2, 'b@x.com'),
      eligibleLead(3, 'c@x.com'),
      eligibleLead(4, 'd@x.com'),
    ]);

    expect(contacts.maxInFlight).toBe(2);
    expect(outcomes.map((o) => o.leadId)).toEqual([1, 2, 3, 4]);
  });
});

describe('isEligible', () => {
  it('requires completed validation, a valid email and pending resolution', () => {
    expect(isEligible(eligibleLead(1, 'a@x.com'))).toBe(true);
    expect(isEligible(eligibleLead(1, 'a@x.com', { emailStatus: 'catch-all' }))).toBe(false);
    expect(isEligible(eligibleLead(1, 'a@x.com', { email: undefined }))).toBe(false);
  });
});

describe('toLookupQuery', () => {
  it('normalizes email and phone and drops blank fields', () => {
    const query = toLookupQuery(
      eligibleLead(1, '  Jane.Doe@Example.COM ', {
        phone: '(213) 373-4253',
        country: 'US',
        firstName: ' Jane ',
        lastName: '',
        propertyName: 'Casa Verde',
      })
    );

    expect(query).toEqual({
      email: 'jane.doe@example.com',
      phone: '+12133734253',
      firstName: 'Jane',
      lastName: undefined,
      company: undefined,
      propertyName: 'Casa Verde',
      city: undefined,
    });
  });
});
