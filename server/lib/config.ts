import { METRIC_COLUMNS, TIME_COLUMNS, isMetricColumn, isTimeColumn } from '../../shared/catalog';
import type { AnalysisConfig, ChangeMode } from '../../shared/types';
import { PoolDataError } from './errors';
import { parseConfigFile } from './io';

export const ENV_PREFIX = 'POOL_TRENDS_';

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  metric: METRIC_COLUMNS[0],
  timeColumn: TIME_COLUMNS[0],
  nMostChanged: 5,
  nHighest: 5,
  nHighestAverage: 5,
  changeMode: 'percent',
  ignoreTags: [],
  includeTags: []
};

type Environment = Record<string, string | undefined>;

export interface ServerConfig {
  dataDirectory: string;
  port: number;
  host: string;
  corsOrigin: string;
  configPath: string | null;
}

function invalid(key: string, raw: string, expected: string): PoolDataError {
  return new PoolDataError('INVALID_CONFIG', `${key} must be ${expected}, got "${raw}"`);
}

export function parseTagList(raw: string): string[] {
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean);
}

export function parseCount(key: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw invalid(key, raw, 'a non-negative integer');
  }
  return Number.parseInt(trimmed, 10);
}

export function parseChangeMode(key: string, raw: string): ChangeMode {
  const trimmed = raw.trim();
  if (trimmed === 'absolute' || trimmed === 'percent') {
    return trimmed;
  }
  throw invalid(key, raw, 'absolute or percent');
}

function applyOverride(config: AnalysisConfig, key: string, raw: string): AnalysisConfig {
  switch (key) {
    case 'METRIC': {
      const value = raw.trim();
      if (!isMetricColumn(value)) {
        throw invalid(key, raw, `one of ${METRIC_COLUMNS.join(', ')}`);
      }
      return { ...config, metric: value };
    }
    case 'TIME_COLUMN': {
      const value = raw.trim();
      if (!isTimeColumn(value)) {
        throw invalid(key, raw, `one of ${TIME_COLUMNS.join(', ')}`);
      }
      return { ...config, timeColumn: value };
    }
    case 'N_MOST_CHANGED':
      return { ...config, nMostChanged: parseCount(key, raw) };
    case 'N_HIGHEST':
      return { ...config, nHighest: parseCount(key, raw) };
    case 'N_HIGHEST_AVERAGE':
      return { ...config, nHighestAverage: parseCount(key, raw) };
    case 'CHANGE_MODE':
      return { ...config, changeMode: parseChangeMode(key, raw) };
    case 'IGNORE_TAGS':
      return { ...config, ignoreTags: parseTagList(raw) };
    case 'INCLUDE_TAGS':
      return { ...config, includeTags: parseTagList(raw) };
    default:
      return config;
  }
}

const ANALYSIS_KEYS = [
  'METRIC',
  'TIME_COLUMN',
  'N_MOST_CHANGED',
  'N_HIGHEST',
  'N_HIGHEST_AVERAGE',
  'CHANGE_MODE',
  'IGNORE_TAGS',
  'INCLUDE_TAGS'
] as const;

/**
 * Defaults, then the optional properties file, then POOL_TRENDS_* variables.
 */
export function loadAnalysisConfig(configPath: string | null, env: Environment = process.env): AnalysisConfig {
  let config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG };

  if (configPath) {
    for (const [key, raw] of parseConfigFile(configPath)) {
      config = applyOverride(config, key, raw);
    }
  }

  for (const key of ANALYSIS_KEYS) {
    const raw = env[`${ENV_PREFIX}${key}`];
    if (raw !== undefined && raw.trim() !== '') {
      config = applyOverride(config, key, raw);
    }
  }

  return config;
}

export function loadServerConfig(env: Environment = process.env): ServerConfig {
  const dataDirectory = env.POOL_DATA_DIR?.trim() ?? '';
  if (!dataDirectory) {
    throw new PoolDataError('INVALID_CONFIG', 'POOL_DATA_DIR must point at a directory of *pool.csv snapshots');
  }

  const rawPort = env.PORT ?? env[`${ENV_PREFIX}PORT`] ?? '8787';
  const port = parseCount('PORT', rawPort);

  return {
    dataDirectory,
    port,
    host: env[`${ENV_PREFIX}HOST`]?.trim() || '0.0.0.0',
    corsOrigin: env[`${ENV_PREFIX}CORS_ORIGIN`]?.trim() ?? '',
    configPath: env[`${ENV_PREFIX}CONFIG`]?.trim() || null
  };
}
