/**
 * Build the lookup adapters from configuration
 */

import { LeadResolverConfig, resolveSecret } from '../../config';
import { logger } from '../../lib/logger';
import { Throttle } from '../../lib/utils';
import { LookupAdapter } from '../types';
import { ContactsAdapter } from './contacts';
import { DealsAdapter } from './deals';
import { HubSpotClient } from './hubspot-client';
import { RegistryAdapter } from './registry';

export { ContactsAdapter } from './contacts';
export { DealsAdapter } from './deals';
export { RegistryAdapter } from './registry';
export { HubSpotClient } from './hubspot-client';

export function createAdapters(config: LeadResolverConfig): LookupAdapter[] {
  const { hubspot, airtable, matching } = config;

  // Contacts and deals share one HubSpot quota
  const hubspotClient = new HubSpotClient({
    accessToken: resolveSecret(hubspot.accessToken, 'hubspot.accessToken'),
    baseUrl: hubspot.baseUrl,
    timeoutMs: hubspot.timeoutMs,
    throttle: new Throttle(hubspot.minIntervalMs),
  });

  const adapters: LookupAdapter[] = [
    new ContactsAdapter(hubspotClient, {
      searchLimit: hubspot.searchLimit,
      nameSearchLimit: hubspot.nameSearchLimit,
      personNameThreshold: matching.personNameThreshold,
    }),
    new DealsAdapter(hubspotClient, {
      searchLimit: hubspot.searchLimit,
      nameSearchLimit: hubspot.nameSearchLimit,
      propertyNameThreshold: matching.propertyNameThreshold,
    }),
  ];

  if (airtable.enabled) {
    adapters.push(
      new RegistryAdapter({
        token: resolveSecret(airtable.token, 'airtable.token'),
        baseId: resolveSecret(airtable.baseId, 'airtable.baseId'),
        table: airtable.table,
        nameField: airtable.nameField,
        maxRecords: airtable.maxRecords,
        timeoutMs: airtable.timeoutMs,
        propertyNameThreshold: matching.propertyNameThreshold,
        throttle: new Throttle(airtable.minIntervalMs),
      })
    );
  } else {
    logger.info('Registry lookups disabled; registry matches will be reported as absent');
  }

  return adapters;
}
