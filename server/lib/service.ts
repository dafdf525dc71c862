import path from 'node:path';
import { METRIC_COLUMNS, TOTAL_TAG } from '../../shared/catalog';
import type {
  AnalysisConfig,
  DatasetSummary,
  PlotPayload,
  PoolDataset,
  TagScore
} from '../../shared/types';
import { PoolEntries, listTags, timestampOf } from './aggregator';
import { PoolDataError } from './errors';
import { listSnapshotFiles } from './io';
import { pivotDataset } from './pivot';
import { rankHighestTags, rankMostChangedTags, rankTagsByAverage, selectPlotTags } from './ranking';
import { formatSnapshotTimestamp } from './snapshot';

export interface LoadedPoolDataset {
  directory: string;
  files: string[];
  dataset: PoolDataset;
}

export interface RankingsPayload {
  metric: AnalysisConfig['metric'];
  changeMode: AnalysisConfig['changeMode'];
  mostChanged: TagScore[];
  highest: TagScore[];
  highestAverage: TagScore[];
}

export function loadPoolDataset(directory: string): LoadedPoolDataset {
  const files = listSnapshotFiles(directory);
  if (files.length === 0) {
    throw new PoolDataError('NO_SNAPSHOTS', `No *pool.csv files found in ${path.resolve(directory)}`);
  }

  const entries = new PoolEntries();
  for (const filePath of files) {
    entries.addCsvFile(filePath);
  }
  const dataset = entries.digest();

  console.log(
    `[pool-ingest] merged ${files.length} snapshot files into ${dataset.rows.length} rows from ${path.resolve(directory)}`
  );
  return { directory: path.resolve(directory), files, dataset };
}

export function summarizeDataset(dataset: PoolDataset): DatasetSummary {
  const first = dataset.rows[0];
  const last = dataset.rows[dataset.rows.length - 1];
  const columnNames = new Set(dataset.schema.columns.map((column) => column.name));
  const tags = listTags(dataset).filter((tag) => tag !== TOTAL_TAG);

  return {
    snapshotCount: dataset.snapshotCount,
    rowCount: dataset.rows.length,
    tagCount: tags.length,
    firstTimestamp: first ? formatSnapshotTimestamp(timestampOf(first, dataset.sortColumn)) : null,
    lastTimestamp: last ? formatSnapshotTimestamp(timestampOf(last, dataset.sortColumn)) : null,
    sortColumn: dataset.sortColumn,
    metrics: METRIC_COLUMNS.filter((metric) => columnNames.has(metric)),
    columns: dataset.schema.columns
  };
}

export function buildRankings(
  dataset: PoolDataset,
  config: Pick<AnalysisConfig, 'metric' | 'changeMode' | 'ignoreTags' | 'nMostChanged' | 'nHighest' | 'nHighestAverage'>
): RankingsPayload {
  return {
    metric: config.metric,
    changeMode: config.changeMode,
    mostChanged: rankMostChangedTags(dataset, {
      metric: config.metric,
      limit: config.nMostChanged,
      ignoreTags: config.ignoreTags,
      mode: config.changeMode
    }),
    highest: rankHighestTags(dataset, {
      metric: config.metric,
      limit: config.nHighest,
      ignoreTags: config.ignoreTags
    }),
    highestAverage: rankTagsByAverage(dataset, {
      metric: config.metric,
      limit: config.nHighestAverage,
      ignoreTags: config.ignoreTags
    })
  };
}

export function buildPlotPayload(dataset: PoolDataset, config: AnalysisConfig): PlotPayload {
  const selection = selectPlotTags(dataset, {
    metric: config.metric,
    ignoreTags: config.ignoreTags,
    includeTags: config.includeTags,
    nMostChanged: config.nMostChanged,
    nHighest: config.nHighest,
    nHighestAverage: config.nHighestAverage,
    changeMode: config.changeMode
  });

  const missingIncludes = config.includeTags.filter((tag) => !selection.tags.includes(tag));
  if (missingIncludes.length > 0) {
    console.warn(`[pool-trends] include tags not present in any snapshot: ${missingIncludes.join(', ')}`);
  }

  const pivot = pivotDataset(dataset, {
    tags: selection.tags,
    timeColumn: config.timeColumn,
    metric: config.metric
  });
  return { selection, pivot };
}
