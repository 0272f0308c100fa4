/**
 * Configuration type definitions
 * Upstream credentials, throttles, matching thresholds and batch limits
 */

// HubSpot CRM (contacts and deals)
export interface HubSpotConfig {
  accessToken: string;          // literal or ${ENV_VAR}
  baseUrl: string;
  minIntervalMs: number;        // minimum delay between calls
  timeoutMs: number;            // per request
  searchLimit: number;
  nameSearchLimit: number;
}

// Airtable property registry (optional signal)
export interface AirtableConfig {
  enabled: boolean;
  token: string;                // literal or ${ENV_VAR}
  baseId: string;
  table: string;
  nameField: string;
  minIntervalMs: number;
  timeoutMs: number;
  maxRecords: number;
}

// Acceptance thresholds for name candidates (0-1)
export interface MatchingConfig {
  personNameThreshold: number;
  propertyNameThreshold: number;
}

export interface ResolutionConfig {
  batchSize: number;
  concurrency: number;
  lookupTimeoutMs: number;      // per adapter call, enforced by the resolver
}

// Main configuration interface
export interface LeadResolverConfig {
  version: string;
  hubspot: HubSpotConfig;
  airtable: AirtableConfig;
  matching: MatchingConfig;
  resolution: ResolutionConfig;
}

// Hard caps applied regardless of configuration
export const MAX_BATCH_SIZE = 1000;
export const MAX_CONCURRENCY = 8;
