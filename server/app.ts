import express from 'express';
import { METRIC_COLUMNS, TIME_COLUMNS, isMetricColumn, isTimeColumn } from '../shared/catalog';
import type { AnalysisConfig } from '../shared/types';
import { listTags } from './lib/aggregator';
import { renderPoolChartSvg } from './lib/chart';
import { parseChangeMode, parseCount, parseTagList } from './lib/config';
import { PoolDataError, errorMessage, isRequestError } from './lib/errors';
import { formatPivotCsv, scalePivotForDisplay } from './lib/pivot';
import { buildPlotPayload, buildRankings, summarizeDataset, type LoadedPoolDataset } from './lib/service';

export type QueryParams = Record<string, unknown>;

function queryString(query: QueryParams, key: string): string {
  const value = query[key];
  if (value === undefined || value === null) {
    return '';
  }
  return String(value).trim();
}

/**
 * Applies per-request overrides on top of the start-up configuration. Unknown
 * selectors are rejected before any computation.
 */
export function resolveRequestConfig(base: AnalysisConfig, query: QueryParams): AnalysisConfig {
  const config: AnalysisConfig = { ...base };

  const metric = queryString(query, 'metric');
  if (metric) {
    if (!isMetricColumn(metric)) {
      throw new PoolDataError('INVALID_SELECTOR', `metric must be one of ${METRIC_COLUMNS.join(', ')}`);
    }
    config.metric = metric;
  }

  const timeColumn = queryString(query, 'timeColumn');
  if (timeColumn) {
    if (!isTimeColumn(timeColumn)) {
      throw new PoolDataError('INVALID_SELECTOR', `timeColumn must be one of ${TIME_COLUMNS.join(', ')}`);
    }
    config.timeColumn = timeColumn;
  }

  const changeMode = queryString(query, 'mode');
  if (changeMode) {
    config.changeMode = parseChangeMode('mode', changeMode);
  }

  const ignore = queryString(query, 'ignore');
  if (ignore) {
    config.ignoreTags = parseTagList(ignore);
  }
  const include = queryString(query, 'include');
  if (include) {
    config.includeTags = parseTagList(include);
  }

  const limit = queryString(query, 'limit');
  if (limit) {
    const count = parseCount('limit', limit);
    config.nMostChanged = count;
    config.nHighest = count;
    config.nHighestAverage = count;
  }
  for (const key of ['nMostChanged', 'nHighest', 'nHighestAverage'] as const) {
    const raw = queryString(query, key);
    if (raw) {
      config[key] = parseCount(key, raw);
    }
  }

  return config;
}

function sendError(res: express.Response, error: unknown): void {
  const status = isRequestError(error) ? 400 : 500;
  if (status === 500) {
    console.error(`[pool-trends-api] ${errorMessage(error)}`);
  }
  res.status(status).json({ error: errorMessage(error) });
}

export interface PoolAppOptions {
  loaded: LoadedPoolDataset;
  analysis: AnalysisConfig;
  corsOrigin?: string;
}

export function createPoolApp({ loaded, analysis, corsOrigin = '' }: PoolAppOptions): express.Express {
  const app = express();
  const { dataset } = loaded;

  app.use((req, res, next) => {
    if (!corsOrigin) {
      next();
      return;
    }

    const requestOrigin = req.get('origin');
    if (requestOrigin && requestOrigin === corsOrigin) {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET,OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
      res.setHeader('Vary', 'Origin');
    }

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/summary', (_req, res) => {
    res.json({ directory: loaded.directory, files: loaded.files, ...summarizeDataset(dataset) });
  });

  app.get('/api/tags', (_req, res) => {
    res.json({ tags: listTags(dataset) });
  });

  app.get('/api/config', (_req, res) => {
    res.json(analysis);
  });

  app.get('/api/rankings', (req, res) => {
    try {
      res.json(buildRankings(dataset, resolveRequestConfig(analysis, req.query)));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/plot', (req, res) => {
    try {
      const payload = buildPlotPayload(dataset, resolveRequestConfig(analysis, req.query));
      res.json({ selection: payload.selection, pivot: scalePivotForDisplay(payload.pivot) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/plot.svg', (req, res) => {
    try {
      const payload = buildPlotPayload(dataset, resolveRequestConfig(analysis, req.query));
      res.type('image/svg+xml').send(renderPoolChartSvg(payload.pivot));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/plot.csv', (req, res) => {
    try {
      const payload = buildPlotPayload(dataset, resolveRequestConfig(analysis, req.query));
      res.type('text/csv').send(formatPivotCsv(payload.pivot));
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}
