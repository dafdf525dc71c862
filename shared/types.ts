export type MetricColumn =
  | 'TotalUsedBytes'
  | 'PagedDiff'
  | 'NonPagedDiff'
  | 'TotalDiff'
  | 'PagedUsedBytes'
  | 'NonPagedUsedBytes';

export type TimeColumn = 'DateTime' | 'DateTimeUTC';

export type ColumnKind = 'tag' | 'datetime' | 'integer' | 'float' | 'text';

export interface ColumnSpec {
  name: string;
  kind: ColumnKind;
}

export interface SnapshotSchema {
  columns: ColumnSpec[];
}

/**
 * One tag measured at one instant. Timestamps are epoch milliseconds of the
 * wall-clock value written in the file, read as UTC.
 */
export interface PoolRow {
  tag: string;
  dateTime: number;
  dateTimeUtc: number;
  numbers: Record<string, number>;
  texts: Record<string, string>;
}

export interface SnapshotTable {
  source: string;
  schema: SnapshotSchema;
  rows: PoolRow[];
}

export interface PoolDataset {
  schema: SnapshotSchema;
  rows: readonly PoolRow[];
  sortColumn: TimeColumn;
  snapshotCount: number;
  sources: string[];
}

export type ChangeMode = 'absolute' | 'percent';

export interface TagScore {
  tag: string;
  value: number;
}

export interface RankingRequest {
  metric: MetricColumn;
  limit: number;
  ignoreTags?: Iterable<string>;
}

export interface ChangeRankingRequest extends RankingRequest {
  mode?: ChangeMode;
}

export type RankingCategory = 'most_changed' | 'highest_peak' | 'highest_average';

export interface RankingCategoryResult {
  category: RankingCategory;
  label: string;
  tags: string[];
}

export interface PlotSelectionRequest {
  metric: MetricColumn;
  ignoreTags: string[];
  includeTags: string[];
  nMostChanged: number;
  nHighest: number;
  nHighestAverage: number;
  changeMode: ChangeMode;
}

export interface PlotSelection {
  tags: string[];
  categories: RankingCategoryResult[];
}

export type ValueFormat = 'integer' | 'decimal3';

export interface PivotDisplay {
  title: string;
  valueFormat: ValueFormat;
  divisor: number;
}

export interface PivotRow {
  timestamp: number;
  values: Array<number | null>;
}

export interface PivotTable {
  timeColumn: TimeColumn;
  metric: MetricColumn;
  tags: string[];
  rows: PivotRow[];
  display: PivotDisplay;
  scaled: boolean;
}

export interface PivotRequest {
  tags: Iterable<string>;
  timeColumn: TimeColumn;
  metric: MetricColumn;
}

export interface DatasetSummary {
  snapshotCount: number;
  rowCount: number;
  tagCount: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  sortColumn: TimeColumn;
  metrics: MetricColumn[];
  columns: ColumnSpec[];
}

export interface AnalysisConfig {
  metric: MetricColumn;
  timeColumn: TimeColumn;
  nMostChanged: number;
  nHighest: number;
  nHighestAverage: number;
  changeMode: ChangeMode;
  ignoreTags: string[];
  includeTags: string[];
}

export interface PlotPayload {
  selection: PlotSelection;
  pivot: PivotTable;
}
