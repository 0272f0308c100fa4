/**
 * Configuration loader
 * Loads and validates configuration from YAML/JSON files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { env } from '../lib/env';
import { logger } from '../lib/logger';
import { ConfigError } from '../lib/errors';
import { maskSecret } from '../lib/utils';
import { LeadResolverConfig, MAX_BATCH_SIZE, MAX_CONCURRENCY } from './types';

// Default configuration
export const DEFAULT_CONFIG: LeadResolverConfig = {
  version: '1.0.0',
  hubspot: {
    accessToken: '${HUBSPOT_TOKEN}',
    baseUrl: 'https://api.hubapi.com',
    minIntervalMs: 100,
    timeoutMs: 15000,
    searchLimit: 10,
    nameSearchLimit: 20,
  },
  airtable: {
    enabled: false,
    token: '${AIRTABLE_TOKEN}',
    baseId: '${AIRTABLE_BASE}',
    table: 'Properties v2',
    nameField: 'Property Name',
    minIntervalMs: 250,
    timeoutMs: 15000,
    maxRecords: 20,
  },
  matching: {
    personNameThreshold: 0.8,
    propertyNameThreshold: 0.7,
  },
  resolution: {
    batchSize: 100,
    concurrency: 1,
    lookupTimeoutMs: 20000,
  },
};

const positiveInt = z.number().int().positive();
const ratio = z.number().min(0).max(1);

const userConfigSchema = z
  .object({
    version: z.string(),
    hubspot: z
      .object({
        accessToken: z.string(),
        baseUrl: z.string().url(),
        minIntervalMs: z.number().int().nonnegative(),
        timeoutMs: positiveInt,
        searchLimit: positiveInt.max(100),
        nameSearchLimit: positiveInt.max(100),
      })
      .partial(),
    airtable: z
      .object({
        enabled: z.boolean(),
        token: z.string(),
        baseId: z.string(),
        table: z.string().min(1),
        nameField: z.string().min(1),
        minIntervalMs: z.number().int().nonnegative(),
        timeoutMs: positiveInt,
        maxRecords: positiveInt.max(100),
      })
      .partial(),
    matching: z
      .object({
        personNameThreshold: ratio,
        propertyNameThreshold: ratio,
      })
      .partial(),
    resolution: z
      .object({
        batchSize: positiveInt.max(MAX_BATCH_SIZE),
        concurrency: positiveInt.max(MAX_CONCURRENCY),
        lookupTimeoutMs: positiveInt,
      })
      .partial(),
  })
  .partial();

export type UserConfig = z.infer<typeof userConfigSchema>;

let loadedConfig: LeadResolverConfig | null = null;

export function mergeConfig(base: LeadResolverConfig, user: UserConfig): LeadResolverConfig {
  return {
    version: user.version ?? base.version,
    hubspot: { ...base.hubspot, ...user.hubspot },
    airtable: { ...base.airtable, ...user.airtable },
    matching: { ...base.matching, ...user.matching },
    resolution: { ...base.resolution, ...user.resolution },
  };
}

export function parseUserConfig(raw: unknown, source: string): UserConfig {
  if (raw === null || raw === undefined) return {};

  const result = userConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): LeadResolverConfig {
  if (loadedConfig && !configPath) {
    return loadedConfig;
  }

  const configFile = configPath || path.join(env.CONFIG_DIR, 'config.yaml');
  const jsonConfigFile = configPath || path.join(env.CONFIG_DIR, 'config.json');

  let userConfig: UserConfig = {};

  // Try YAML first, then JSON
  if (fs.existsSync(configFile)) {
    logger.info(`Loading config from ${configFile}`);
    const content = fs.readFileSync(configFile, 'utf-8');
    const parsed: unknown = configFile.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
    userConfig = parseUserConfig(parsed, configFile);
  } else if (fs.existsSync(jsonConfigFile)) {
    logger.info(`Loading config from ${jsonConfigFile}`);
    const content = fs.readFileSync(jsonConfigFile, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    userConfig = parseUserConfig(parsed, jsonConfigFile);
  } else {
    logger.warn(`No config file found, using defaults. Expected at: ${configFile}`);
    // Write default config for reference
    writeDefaultConfig(configFile);
  }

  loadedConfig = mergeConfig(DEFAULT_CONFIG, userConfig);
  return loadedConfig;
}

export function writeDefaultConfig(configPath: string): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const content = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(configPath, content);
  logger.info(`Wrote default config to ${configPath}`);
}

export function reloadConfig(): LeadResolverConfig {
  loadedConfig = null;
  return loadConfig();
}

export function getConfig(): LeadResolverConfig {
  return loadConfig();
}

/**
 * Resolve a "${NAME}" reference against process.env.
 * Literal values pass through unchanged.
 */
export function resolveSecret(raw: string, label: string): string {
  const match = /^\$\{?([A-Z0-9_]+)\}?$/.exec(raw.trim());
  if (!match) return raw;

  const value = process.env[match[1]];
  if (!value) {
    throw new ConfigError(`${label}: env var ${match[1]} is not set`);
  }
  return value;
}

// Config copy safe to print
export function redactConfig(config: LeadResolverConfig): LeadResolverConfig {
  const mask = (value: string): string => (value.startsWith('$') ? value : maskSecret(value));
  return {
    ...config,
    hubspot: { ...config.hubspot, accessToken: mask(config.hubspot.accessToken) },
    airtable: { ...config.airtable, token: mask(config.airtable.token) },
  };
}
