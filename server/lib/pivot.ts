import { stringify } from 'csv-stringify/sync';
import { BYTES_PER_MEGABYTE, isByteMetric, isTimeColumn } from '../../shared/catalog';
import type { MetricColumn, PivotDisplay, PivotRequest, PivotRow, PivotTable, PoolDataset } from '../../shared/types';
import { timestampOf } from './aggregator';
import { PoolDataError } from './errors';
import { assertMetricSelector } from './ranking';
import { formatSnapshotTimestamp } from './snapshot';

export function resolvePivotDisplay(metric: MetricColumn): PivotDisplay {
  if (isByteMetric(metric)) {
    return { title: `${metric} (MB)`, valueFormat: 'decimal3', divisor: BYTES_PER_MEGABYTE };
  }
  return { title: `${metric} (n_allocs)`, valueFormat: 'integer', divisor: 1 };
}

/**
 * Reshapes the selected tags into one column per tag and one row per distinct
 * timestamp. Cells a tag has no sample for are null.
 */
export function pivotDataset(dataset: PoolDataset, request: PivotRequest): PivotTable {
  if (!isTimeColumn(request.timeColumn)) {
    throw new PoolDataError('INVALID_SELECTOR', `Invalid timestamp column: ${request.timeColumn}`);
  }
  const metric = assertMetricSelector(dataset, request.metric);
  const timeColumn = request.timeColumn;
  const requested = [...new Set(request.tags)];
  const requestedSet = new Set(requested);

  const cells = new Map<string, Map<number, number>>();
  const timestamps = new Set<number>();
  for (const row of dataset.rows) {
    if (!requestedSet.has(row.tag)) {
      continue;
    }
    const value = row.numbers[metric];
    if (value === undefined) {
      continue;
    }
    const timestamp = timestampOf(row, timeColumn);
    let byTime = cells.get(row.tag);
    if (!byTime) {
      byTime = new Map<number, number>();
      cells.set(row.tag, byTime);
    }
    if (byTime.has(timestamp)) {
      throw new PoolDataError(
        'DUPLICATE_SAMPLE',
        `Tag ${row.tag} has more than one sample at ${formatSnapshotTimestamp(timestamp)} (${timeColumn})`
      );
    }
    byTime.set(timestamp, value);
    timestamps.add(timestamp);
  }

  const tags = requested.filter((tag) => cells.has(tag));
  const rows: PivotRow[] = [...timestamps]
    .sort((left, right) => left - right)
    .map((timestamp) => ({
      timestamp,
      values: tags.map((tag) => cells.get(tag)?.get(timestamp) ?? null)
    }));

  return {
    timeColumn,
    metric,
    tags,
    rows,
    display: resolvePivotDisplay(metric),
    scaled: false
  };
}

export function scalePivotForDisplay(table: PivotTable): PivotTable {
  if (table.scaled || table.display.divisor === 1) {
    return { ...table, scaled: true };
  }
  const { divisor } = table.display;
  return {
    ...table,
    rows: table.rows.map((row) => ({
      timestamp: row.timestamp,
      values: row.values.map((value) => (value === null ? null : value / divisor))
    })),
    scaled: true
  };
}

export function formatPivotCsv(table: PivotTable): string {
  const records = table.rows.map((row) => [
    formatSnapshotTimestamp(row.timestamp),
    ...row.values.map((value) => (value === null ? '' : String(value)))
  ]);
  return stringify([[table.timeColumn, ...table.tags], ...records]);
}
