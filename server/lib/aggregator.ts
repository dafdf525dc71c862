import { DERIVED_DIFF_COLUMN, DIFF_SOURCE_COLUMNS, SORT_COLUMN } from '../../shared/catalog';
import type { ColumnSpec, PoolDataset, PoolRow, SnapshotSchema, SnapshotTable, TimeColumn } from '../../shared/types';
import { PoolDataError } from './errors';
import { parseSnapshotFile } from './snapshot';
import { appendTotalsRow } from './totals';

type AggregatorState =
  | { phase: 'accumulating'; snapshots: SnapshotTable[] }
  | { phase: 'finalized'; dataset: PoolDataset | null };

function describeSchema(schema: SnapshotSchema): string {
  return schema.columns.map((column) => `${column.name}:${column.kind}`).join(', ');
}

function assertSameSchema(expected: SnapshotTable, actual: SnapshotTable): void {
  const expectedKinds = new Map(expected.schema.columns.map((column) => [column.name, column.kind]));
  const sameColumns =
    actual.schema.columns.length === expectedKinds.size &&
    actual.schema.columns.every((column) => expectedKinds.get(column.name) === column.kind);

  if (!sameColumns) {
    throw new PoolDataError(
      'SCHEMA_MISMATCH',
      `Columns [${describeSchema(actual.schema)}] do not match [${describeSchema(expected.schema)}] from ${expected.source}`,
      { filePath: actual.source }
    );
  }
}

export function timestampOf(row: PoolRow, column: TimeColumn): number {
  return column === 'DateTime' ? row.dateTime : row.dateTimeUtc;
}

export function sortRowsByTime(rows: PoolRow[], column: TimeColumn): PoolRow[] {
  // Array.prototype.sort is stable, so equal timestamps keep concatenation order.
  return [...rows].sort((left, right) => timestampOf(left, column) - timestampOf(right, column));
}

function withDerivedDiff(schema: SnapshotSchema, rows: PoolRow[]): { schema: SnapshotSchema; rows: PoolRow[] } {
  const kinds = new Map(schema.columns.map((column) => [column.name, column.kind]));
  const hasSources = DIFF_SOURCE_COLUMNS.every((name) => kinds.get(name) === 'integer');
  if (!hasSources || kinds.has(DERIVED_DIFF_COLUMN)) {
    return { schema, rows };
  }

  const [pagedColumn, nonPagedColumn] = DIFF_SOURCE_COLUMNS;
  const derived: ColumnSpec = { name: DERIVED_DIFF_COLUMN, kind: 'integer' };
  return {
    schema: { columns: [...schema.columns, derived] },
    rows: rows.map((row) => ({
      ...row,
      numbers: {
        ...row.numbers,
        [DERIVED_DIFF_COLUMN]: (row.numbers[pagedColumn] ?? 0) + (row.numbers[nonPagedColumn] ?? 0)
      }
    }))
  };
}

/**
 * Collects parsed snapshots and merges them into one time-ordered dataset.
 * The instance is single use: once digested it accepts no more snapshots and
 * refuses to digest again.
 */
export class PoolEntries {
  private state: AggregatorState = { phase: 'accumulating', snapshots: [] };

  get phase(): AggregatorState['phase'] {
    return this.state.phase;
  }

  addSnapshot(table: SnapshotTable): void {
    if (this.state.phase !== 'accumulating') {
      throw new PoolDataError('AGGREGATOR_FINALIZED', 'Cannot add snapshots after digest()', {
        filePath: table.source
      });
    }
    this.state.snapshots.push(table);
  }

  addCsvFile(filePath: string): void {
    if (this.state.phase !== 'accumulating') {
      throw new PoolDataError('AGGREGATOR_FINALIZED', 'Cannot add snapshots after digest()', { filePath });
    }
    this.addSnapshot(parseSnapshotFile(filePath));
  }

  digest(): PoolDataset {
    if (this.state.phase !== 'accumulating') {
      throw new PoolDataError('REPEATED_DIGEST', 'digest() called again');
    }
    const { snapshots } = this.state;
    this.state = { phase: 'finalized', dataset: null };

    const [first] = snapshots;
    if (!first) {
      throw new PoolDataError('NO_SNAPSHOTS', 'No snapshots were added before digest()');
    }
    for (const snapshot of snapshots.slice(1)) {
      assertSameSchema(first, snapshot);
    }

    const concatenated = snapshots.flatMap((snapshot) => appendTotalsRow(snapshot).rows);
    const sorted = sortRowsByTime(concatenated, SORT_COLUMN);
    const { schema, rows } = withDerivedDiff(first.schema, sorted);

    const dataset: PoolDataset = {
      schema,
      rows,
      sortColumn: SORT_COLUMN,
      snapshotCount: snapshots.length,
      sources: snapshots.map((snapshot) => snapshot.source)
    };
    this.state = { phase: 'finalized', dataset };
    return dataset;
  }

  getDataset(): PoolDataset {
    if (this.state.phase === 'accumulating') {
      return this.digest();
    }
    if (!this.state.dataset) {
      throw new PoolDataError('REPEATED_DIGEST', 'digest() failed earlier; no dataset is available');
    }
    return this.state.dataset;
  }

  getAllTags(): string[] {
    return listTags(this.getDataset());
  }
}

export function listTags(dataset: PoolDataset): string[] {
  const tags = new Set<string>();
  for (const row of dataset.rows) {
    tags.add(row.tag);
  }
  return [...tags];
}
