import { CHANGE_EPSILON, RANKING_LABELS, TOTAL_TAG, isMetricColumn } from '../../shared/catalog';
import type {
  ChangeMode,
  ChangeRankingRequest,
  MetricColumn,
  PlotSelection,
  PlotSelectionRequest,
  PoolDataset,
  RankingCategoryResult,
  RankingRequest,
  TagScore
} from '../../shared/types';
import { listTags } from './aggregator';
import { PoolDataError } from './errors';

export function assertMetricSelector(dataset: PoolDataset, metric: string): MetricColumn {
  if (!isMetricColumn(metric)) {
    throw new PoolDataError('INVALID_SELECTOR', `Invalid column name: ${metric}`);
  }
  const column = dataset.schema.columns.find((entry) => entry.name === metric);
  if (!column || (column.kind !== 'integer' && column.kind !== 'float')) {
    throw new PoolDataError('INVALID_SELECTOR', `Column ${metric} is not present in the snapshots`);
  }
  return metric;
}

export function assertLimit(limit: number, label = 'limit'): number {
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new PoolDataError('INVALID_LIMIT', `${label} must be a non-negative integer, got ${limit}`);
  }
  return limit;
}

function buildIgnoreSet(ignoreTags: Iterable<string> | undefined): Set<string> {
  const ignored = new Set<string>(ignoreTags ?? []);
  ignored.add(TOTAL_TAG);
  return ignored;
}

function compareTagNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Metric values per tag, in dataset (chronological) order. Tags are returned
 * in code-point order so equal scores rank deterministically.
 */
export function groupMetricByTag(
  dataset: PoolDataset,
  metric: MetricColumn,
  ignoreTags?: Iterable<string>
): Map<string, number[]> {
  const ignored = buildIgnoreSet(ignoreTags);
  const groups = new Map<string, number[]>();
  for (const row of dataset.rows) {
    if (ignored.has(row.tag)) {
      continue;
    }
    const value = row.numbers[metric];
    if (value === undefined) {
      continue;
    }
    const values = groups.get(row.tag);
    if (values) {
      values.push(value);
    } else {
      groups.set(row.tag, [value]);
    }
  }

  return new Map([...groups.entries()].sort(([left], [right]) => compareTagNames(left, right)));
}

function rankBy(
  dataset: PoolDataset,
  request: RankingRequest,
  score: (values: number[]) => number
): TagScore[] {
  const metric = assertMetricSelector(dataset, request.metric);
  const limit = assertLimit(request.limit);
  if (limit === 0) {
    return [];
  }

  const scores: TagScore[] = [];
  for (const [tag, values] of groupMetricByTag(dataset, metric, request.ignoreTags)) {
    scores.push({ tag, value: score(values) });
  }
  scores.sort((left, right) => right.value - left.value);
  return scores.slice(0, limit);
}

export function peakValue(values: number[]): number {
  return values.reduce((max, value) => (value > max ? value : max), Number.NEGATIVE_INFINITY);
}

export function endpointChange(values: number[], mode: ChangeMode): number {
  const first = values[0] ?? 0;
  const last = values[values.length - 1] ?? 0;
  if (mode === 'absolute') {
    return last - first;
  }
  return ((last - first) * 100) / (last + CHANGE_EPSILON);
}

export function meanValue(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function rankHighestTags(dataset: PoolDataset, request: RankingRequest): TagScore[] {
  return rankBy(dataset, request, peakValue);
}

export function rankMostChangedTags(dataset: PoolDataset, request: ChangeRankingRequest): TagScore[] {
  const mode = request.mode ?? 'percent';
  return rankBy(dataset, request, (values) => endpointChange(values, mode));
}

export function rankTagsByAverage(dataset: PoolDataset, request: RankingRequest): TagScore[] {
  return rankBy(dataset, request, meanValue);
}

export function getHighestTags(dataset: PoolDataset, request: RankingRequest): string[] {
  return rankHighestTags(dataset, request).map((entry) => entry.tag);
}

export function getMostChangedTags(dataset: PoolDataset, request: ChangeRankingRequest): string[] {
  return rankMostChangedTags(dataset, request).map((entry) => entry.tag);
}

export function getTagsWithHighestAverageUsage(dataset: PoolDataset, request: RankingRequest): string[] {
  return rankTagsByAverage(dataset, request).map((entry) => entry.tag);
}

export function selectPlotTags(dataset: PoolDataset, request: PlotSelectionRequest): PlotSelection {
  const metric = assertMetricSelector(dataset, request.metric);
  const selected = new Set<string>([TOTAL_TAG]);
  const categories: RankingCategoryResult[] = [];

  const collect = (category: RankingCategoryResult['category'], tags: string[]) => {
    categories.push({ category, label: RANKING_LABELS[category], tags });
    for (const tag of tags) {
      selected.add(tag);
    }
  };

  if (assertLimit(request.nMostChanged, 'nMostChanged') > 0) {
    collect(
      'most_changed',
      getMostChangedTags(dataset, {
        metric,
        limit: request.nMostChanged,
        ignoreTags: request.ignoreTags,
        mode: request.changeMode
      })
    );
  }
  if (assertLimit(request.nHighest, 'nHighest') > 0) {
    collect('highest_peak', getHighestTags(dataset, { metric, limit: request.nHighest, ignoreTags: request.ignoreTags }));
  }
  if (assertLimit(request.nHighestAverage, 'nHighestAverage') > 0) {
    collect(
      'highest_average',
      getTagsWithHighestAverageUsage(dataset, {
        metric,
        limit: request.nHighestAverage,
        ignoreTags: request.ignoreTags
      })
    );
  }

  const knownTags = new Set(listTags(dataset));
  for (const tag of request.includeTags) {
    if (knownTags.has(tag)) {
      selected.add(tag);
    }
  }

  return { tags: [...selected], categories };
}
