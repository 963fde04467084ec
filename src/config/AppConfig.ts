import cloneDeep from 'lodash/cloneDeep.js';
import os from 'os';
import path from 'path';
import { ConfigError } from '../errors/RetentionErrors.js';
import { DEFAULT_MARKER_PREFIX } from '../labels/labelNames.js';
import { GMAIL_BATCH_LIMIT } from '../provider/GmailProvider.js';
import { AgeConversion, DEFAULT_AGE_CONVERSION } from '../types/index.js';

export interface AppConfig {
  paths: {
    rules: string;
    credentials: string;
    token: string;
  };
  processing: {
    pageSize: number;
    maxPages: number;
    chunkSize: number;
    chunkConcurrency: number;
  };
  markerPrefix: string;
  ageConversion: AgeConversion;
}

const CONFIG_DIR = path.join(os.homedir(), '.mail-retention');

export const DEFAULT_APP_CONFIG: AppConfig = {
  paths: {
    rules: path.join(CONFIG_DIR, 'rules.json'),
    credentials: path.join(CONFIG_DIR, 'credentials.json'),
    token: path.join(CONFIG_DIR, 'token.json'),
  },
  processing: {
    pageSize: 500,
    maxPages: 0,
    chunkSize: GMAIL_BATCH_LIMIT,
    chunkConcurrency: 1,
  },
  markerPrefix: DEFAULT_MARKER_PREFIX,
  ageConversion: DEFAULT_AGE_CONVERSION,
};

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(key, `must be at least ${min}, got ${raw}`);
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the configuration from environment variables over the defaults.
 * `.env` is loaded into the environment at start-up.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config = cloneDeep(DEFAULT_APP_CONFIG);

  config.paths.rules = readString(env, 'RETENTION_RULES_PATH', config.paths.rules);
  config.paths.credentials = readString(env, 'GMAIL_CREDENTIALS_PATH', config.paths.credentials);
  config.paths.token = readString(env, 'GMAIL_TOKEN_PATH', config.paths.token);

  const processing = config.processing;
  processing.pageSize = readInteger(env, 'RETENTION_PAGE_SIZE', processing.pageSize, 1);
  processing.maxPages = readInteger(env, 'RETENTION_MAX_PAGES', processing.maxPages, 0);
  processing.chunkSize = readInteger(env, 'RETENTION_CHUNK_SIZE', processing.chunkSize, 1);
  processing.chunkConcurrency = readInteger(env, 'RETENTION_CHUNK_CONCURRENCY', processing.chunkConcurrency, 1);
  if (processing.chunkSize > GMAIL_BATCH_LIMIT) {
    throw new ConfigError('RETENTION_CHUNK_SIZE', `must not exceed the Gmail batch limit ${GMAIL_BATCH_LIMIT}`);
  }

  config.markerPrefix = readString(env, 'RETENTION_MARKER_PREFIX', config.markerPrefix);
  if (config.markerPrefix.includes('/')) {
    throw new ConfigError('RETENTION_MARKER_PREFIX', 'must be a single label segment without "/"');
  }

  const conversion = config.ageConversion;
  conversion.daysPerWeek = readInteger(env, 'RETENTION_DAYS_PER_WEEK', conversion.daysPerWeek, 1);
  conversion.daysPerMonth = readInteger(env, 'RETENTION_DAYS_PER_MONTH', conversion.daysPerMonth, 1);
  conversion.daysPerYear = readInteger(env, 'RETENTION_DAYS_PER_YEAR', conversion.daysPerYear, 1);

  return config;
}
