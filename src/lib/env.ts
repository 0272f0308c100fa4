/**
 * Environment variable handling for Lead Resolver
 * All paths come from env vars, with sensible defaults for development
 */

import * as path from 'path';
import * as fs from 'fs';

export interface EnvConfig {
  DATA_DIR: string;
  CONFIG_DIR: string;
  LOG_DIR: string;
  DB_PATH: string;
  NODE_ENV: string;
}

// DB_PATH value that keeps the record store in memory only
export const IN_MEMORY_DB = ':memory:';

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function getEnvConfig(): EnvConfig {
  const defaultBase = process.env.HOME || process.env.USERPROFILE || '/var/lib/lead-resolver';
  const defaultDataDir = path.join(defaultBase, '.lead-resolver', 'data');
  const defaultConfigDir = path.join(defaultBase, '.lead-resolver', 'config');
  const defaultLogDir = path.join(defaultBase, '.lead-resolver', 'logs');
  const defaultDbPath = path.join(defaultBase, '.lead-resolver', 'state.db');

  const config: EnvConfig = {
    DATA_DIR: process.env.DATA_DIR || defaultDataDir,
    CONFIG_DIR: process.env.CONFIG_DIR || defaultConfigDir,
    LOG_DIR: process.env.LOG_DIR || defaultLogDir,
    DB_PATH: process.env.DB_PATH || defaultDbPath,
    NODE_ENV: process.env.NODE_ENV || 'development',
  };

  // Ensure directories exist
  ensureDir(config.DATA_DIR);
  ensureDir(config.CONFIG_DIR);
  ensureDir(config.LOG_DIR);
  if (config.DB_PATH !== IN_MEMORY_DB) {
    ensureDir(path.dirname(config.DB_PATH));
  }

  return config;
}

export const env = getEnvConfig();
