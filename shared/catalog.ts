import type { ColumnSpec, MetricColumn, RankingCategory, TimeColumn } from './types';

export const TOTAL_TAG = 'TOTAL';

export const TAG_COLUMN = 'Tag';

export const TIME_COLUMNS: TimeColumn[] = ['DateTime', 'DateTimeUTC'];

// The first entry is the default metric.
export const METRIC_COLUMNS: MetricColumn[] = [
  'TotalUsedBytes',
  'PagedDiff',
  'NonPagedDiff',
  'TotalDiff',
  'PagedUsedBytes',
  'NonPagedUsedBytes'
];

export const SORT_COLUMN: TimeColumn = 'DateTime';

export const TIMESTAMP_FORMAT = 'YYYY-MM-DD[T]HH:mm:ss';

export const SNAPSHOT_FILE_SUFFIX = 'pool.csv';

export const CHANGE_EPSILON = 0.001;

export const BYTES_PER_MEGABYTE = 1024 * 1024;

export const REQUIRED_COLUMNS: ColumnSpec[] = [
  { name: TAG_COLUMN, kind: 'tag' },
  { name: 'DateTime', kind: 'datetime' },
  { name: 'DateTimeUTC', kind: 'datetime' }
];

/** Counter columns the snapshot writer emits; always whole numbers. */
export const DECLARED_INTEGER_COLUMNS = new Set<string>([
  'TotalUsedBytes',
  'PagedUsedBytes',
  'NonPagedUsedBytes',
  'PagedDiff',
  'NonPagedDiff'
]);

export const DERIVED_DIFF_COLUMN: MetricColumn = 'TotalDiff';
export const DIFF_SOURCE_COLUMNS = ['PagedDiff', 'NonPagedDiff'] as const;

export const RANKING_LABELS: Record<RankingCategory, string> = {
  most_changed: 'GREATEST INCREASE',
  highest_peak: 'HIGHEST PEAK USAGE',
  highest_average: 'HIGHEST AVERAGE USAGE'
};

export function isMetricColumn(value: string): value is MetricColumn {
  return METRIC_COLUMNS.some((column) => column === value);
}

export function isTimeColumn(value: string): value is TimeColumn {
  return TIME_COLUMNS.some((column) => column === value);
}

export function isByteMetric(metric: MetricColumn): boolean {
  return metric.endsWith('Bytes');
}
