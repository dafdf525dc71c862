import { TOTAL_TAG } from '../../shared/catalog';
import type { PoolRow, SnapshotTable } from '../../shared/types';
import { PoolDataError } from './errors';

/**
 * Builds the synthetic TOTAL row for one snapshot: integer columns are summed
 * over every row, everything else is taken from the first row. Timestamps and
 * non-integer columns are expected to be constant within a snapshot; when they
 * are not, the copied values are simply those of the first row.
 */
export function buildTotalsRow(table: SnapshotTable): PoolRow {
  const [first] = table.rows;
  if (!first) {
    throw new PoolDataError('EMPTY_SNAPSHOT', 'Cannot total a snapshot without rows', { filePath: table.source });
  }

  const numbers: Record<string, number> = { ...first.numbers };
  for (const column of table.schema.columns) {
    if (column.kind !== 'integer') {
      continue;
    }
    numbers[column.name] = table.rows.reduce((sum, row) => sum + (row.numbers[column.name] ?? 0), 0);
  }

  return {
    tag: TOTAL_TAG,
    dateTime: first.dateTime,
    dateTimeUtc: first.dateTimeUtc,
    numbers,
    texts: { ...first.texts }
  };
}

export function appendTotalsRow(table: SnapshotTable): SnapshotTable {
  return {
    source: table.source,
    schema: table.schema,
    rows: [...table.rows, buildTotalsRow(table)]
  };
}
