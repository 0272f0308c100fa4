import { afterEach, describe, expect, it, vi } from 'vitest';
import { sleep } from '../../lib/utils';
import { BatchResolver } from '../batch-resolver';
import { eligibleLead, fakeAdapters, RecordingCommitter } from '../test-fixtures';
import { DealsAdapter, dealLookupName } from './deals';
import { hubspotObject, hubspotResults, stubFetch, testHubSpotClient } from './test-fixtures';

function adapter(minIntervalMs = 0): DealsAdapter {
  return new DealsAdapter(testHubSpotClient(minIntervalMs), {
    searchLimit: 10,
    nameSearchLimit: 20,
    propertyNameThreshold: 0.7,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('DealsAdapter', () => {
  it('finds deals associated with the contact that has the email', async () => {
    const requests = stubFetch(
      hubspotResults(hubspotObject('c1')),
      hubspotResults(hubspotObject('d1', { dealname: 'Casa Verde' }), hubspotObject('d2', { dealname: 'Casa Verde 2' }))
    );

    const matches = await adapter().findMatches({ email: 'owner@x.com' });

    expect(matches).toEqual([
      { source: 'deals', entityId: 'd1', matchType: 'email', rank: 3, label: 'Casa Verde' },
      { source: 'deals', entityId: 'd2', matchType: 'email', rank: 3, label: 'Casa Verde 2' },
    ]);
    expect(requests.map((r) => r.url)).toEqual([
      'https://hubspot.test/crm/v3/objects/contacts/search',
      'https://hubspot.test/crm/v3/objects/deals/search',
    ]);
    expect(requests[1].body).toEqual({
      filterGroups: [{ filters: [{ propertyName: 'associations.contact', operator: 'EQ', value: 'c1' }] }],
      properties: ['dealname', 'dealstage', 'amount', 'closedate'],
      limit: 10,
    });
  });

  it('counts a deal shared by two matching contacts once', async () => {
    stubFetch(
      hubspotResults(hubspotObject('c1'), hubspotObject('c2')),
      hubspotResults(hubspotObject('d1')),
      hubspotResults(hubspotObject('d1'))
    );

    const matches = await adapter().findMatches({ email: 'owner@x.com' });

    expect(matches.map((m) => m.entityId)).toEqual(['d1']);
  });

  it('falls back to the deal name when no contact has a deal', async () => {
    const requests = stubFetch(
      hubspotResults(),
      hubspotResults(
        hubspotObject('d7', { dealname: 'Casa Verde Guesthouse' }),
        hubspotObject('d8', { dealname: 'Blue Lagoon Camp' })
      )
    );

    const matches = await adapter().findMatches({ email: 'owner@x.com', propertyName: 'Casa Verde' });

    expect(matches).toEqual([
      { source: 'deals', entityId: 'd7', matchType: 'name', rank: 1, label: 'Casa Verde Guesthouse' },
    ]);
    expect(requests[1].body).toEqual({
      filterGroups: [{ filters: [{ propertyName: 'dealname', operator: 'CONTAINS_TOKEN', value: 'Casa Verde' }] }],
      properties: ['dealname', 'dealstage', 'amount', 'closedate'],
      limit: 20,
    });
  });

  it('raises Unavailable for the deals system on a server error', async () => {
    stubFetch({ status: 503, body: {} });

    await expect(adapter().findMatches({ email: 'owner@x.com' })).rejects.toMatchObject({
      system: 'deals',
      kind: 'server',
      status: 503,
    });
  });
});

describe('DealsAdapter under a lookup deadline', () => {
  it('stops querying HubSpot once the resolver abandons the lookup', async () => {
    const requests = stubFetch(hubspotResults(hubspotObject('c1'), hubspotObject('c2'), hubspotObject('c3')));
    const { contacts, registry } = fakeAdapters();
    const resolver = new BatchResolver([contacts, adapter(60), registry], new RecordingCommitter(), {
      batchSize: 10,
      concurrency: 1,
      lookupTimeoutMs: 30,
    });

    const resolution = await resolver.resolveLead(eligibleLead(1, 'owner@x.com'));
    await sleep(200);

    expect(resolution).toEqual({
      kind: 'skipped',
      leadId: 1,
      error: 'deals unavailable (timeout): lookup exceeded 30ms',
    });
    expect(requests).toHaveLength(1);
  });
});

describe('dealLookupName', () => {
  it('prefers the property name over the company', () => {
    expect(dealLookupName({ email: 'a@x.com', propertyName: 'Casa Verde', company: 'Verde Ltd' })).toBe('Casa Verde');
    expect(dealLookupName({ email: 'a@x.com', company: 'Verde Ltd' })).toBe('Verde Ltd');
    expect(dealLookupName({ email: 'a@x.com' })).toBeUndefined();
  });
});
