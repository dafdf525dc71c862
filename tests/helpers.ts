import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PoolEntries } from '../server/lib/aggregator';
import { isPoolDataError, type PoolDataErrorCode } from '../server/lib/errors';
import { parseSnapshotText } from '../server/lib/snapshot';
import type { PoolDataset } from '../shared/types';

export const SNAPSHOT_HEADER = [
  'Tag',
  'DateTime',
  'DateTimeUTC',
  'TotalUsedBytes',
  'PagedUsedBytes',
  'NonPagedUsedBytes',
  'PagedDiff',
  'NonPagedDiff'
] as const;

export interface FixtureTagRow {
  tag: string;
  totalUsedBytes: number;
  pagedUsedBytes?: number;
  nonPagedUsedBytes?: number;
  pagedDiff?: number;
  nonPagedDiff?: number;
}

export interface FixtureSnapshot {
  dateTime: string;
  dateTimeUtc?: string;
  rows: FixtureTagRow[];
}

export function buildSnapshotCsv(snapshot: FixtureSnapshot): string {
  const lines = [SNAPSHOT_HEADER.join(',')];
  for (const row of snapshot.rows) {
    lines.push(
      [
        row.tag,
        snapshot.dateTime,
        snapshot.dateTimeUtc ?? snapshot.dateTime,
        String(row.totalUsedBytes),
        String(row.pagedUsedBytes ?? row.totalUsedBytes),
        String(row.nonPagedUsedBytes ?? 0),
        String(row.pagedDiff ?? 0),
        String(row.nonPagedDiff ?? 0)
      ].join(',')
    );
  }
  return `${lines.join('\n')}\n`;
}

/** Snapshots of TotalUsedBytes per tag, keyed by DateTime. */
export function buildDataset(snapshots: Array<{ dateTime: string; values: Record<string, number> }>): PoolDataset {
  const entries = new PoolEntries();
  snapshots.forEach((snapshot, index) => {
    const csv = buildSnapshotCsv({
      dateTime: snapshot.dateTime,
      rows: Object.entries(snapshot.values).map(([tag, totalUsedBytes]) => ({ tag, totalUsedBytes }))
    });
    entries.addSnapshot(parseSnapshotText(csv, `fixture-${index}-pool.csv`));
  });
  return entries.digest();
}

export function createFixtureDirectory(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `pool-trends-${prefix}-`));
}

export function expectPoolError(action: () => unknown, code: PoolDataErrorCode, message: string): void {
  let thrown: unknown = null;
  try {
    action();
  } catch (error) {
    thrown = error;
  }
  if (!isPoolDataError(thrown, code)) {
    const actual = thrown instanceof Error ? `${thrown.name}: ${thrown.message}` : String(thrown);
    throw new Error(`${message}: expected PoolDataError ${code}, got ${actual}`);
  }
}
