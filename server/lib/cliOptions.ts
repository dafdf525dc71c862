import { isMetricColumn, isTimeColumn } from '../../shared/catalog';
import type { AnalysisConfig, PlotSelection } from '../../shared/types';
import { PoolDataError } from './errors';

export function formatSelectionReport(selection: PlotSelection): string[] {
  return selection.categories.map(
    (category) => `tags with ${category.label.padEnd(25)}: [${category.tags.map((tag) => `'${tag}'`).join(', ')}]`
  );
}

export interface CliArguments {
  directory: string;
  type?: string;
  timeStamp?: string;
  includeTags?: string[];
  excludeTags?: string[];
  nMostChangedTags?: number;
  nHighestUsageTags?: number;
  nHighestAverageUsageTags?: number;
  changeMode?: string;
  config?: string;
  svg?: string;
  csv?: string;
}

export function mergeCliArguments(base: AnalysisConfig, args: CliArguments): AnalysisConfig {
  const config: AnalysisConfig = { ...base };
  if (args.type !== undefined) {
    if (!isMetricColumn(args.type)) {
      throw new PoolDataError('INVALID_SELECTOR', `Invalid column name: ${args.type}`);
    }
    config.metric = args.type;
  }
  if (args.timeStamp !== undefined) {
    if (!isTimeColumn(args.timeStamp)) {
      throw new PoolDataError('INVALID_SELECTOR', `Invalid timestamp tag: ${args.timeStamp}`);
    }
    config.timeColumn = args.timeStamp;
  }
  if (args.changeMode === 'absolute' || args.changeMode === 'percent') {
    config.changeMode = args.changeMode;
  }
  if (args.includeTags) {
    config.includeTags = [...args.includeTags];
  }
  if (args.excludeTags) {
    config.ignoreTags = [...args.excludeTags];
  }
  if (args.nMostChangedTags !== undefined) {
    config.nMostChanged = args.nMostChangedTags;
  }
  if (args.nHighestUsageTags !== undefined) {
    config.nHighest = args.nHighestUsageTags;
  }
  if (args.nHighestAverageUsageTags !== undefined) {
    config.nHighestAverage = args.nHighestAverageUsageTags;
  }
  return config;
}
