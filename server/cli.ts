import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { METRIC_COLUMNS, TIME_COLUMNS } from '../shared/catalog';
import { renderPoolChartSvg } from './lib/chart';
import { formatSelectionReport, mergeCliArguments, type CliArguments } from './lib/cliOptions';
import { loadAnalysisConfig } from './lib/config';
import { errorMessage } from './lib/errors';
import { writeOutputFile } from './lib/io';
import { formatPivotCsv } from './lib/pivot';
import { buildPlotPayload, loadPoolDataset } from './lib/service';

function parseArguments(argv: string[]): CliArguments {
  return yargs(argv)
    .scriptName('pool-trends')
    .usage('$0 -d <directory> [-t <metric>] [--svg chart.svg] [--csv series.csv]')
    .option('directory', {
      alias: 'd',
      type: 'string',
      describe: 'The directory where the *pool.csv snapshots reside',
      demandOption: true
    })
    .option('type', {
      alias: 't',
      type: 'string',
      choices: METRIC_COLUMNS,
      describe: 'Metric column to rank and plot'
    })
    .option('time-stamp', {
      alias: 'ts',
      type: 'string',
      choices: TIME_COLUMNS,
      describe: 'Which timestamp to use'
    })
    .option('include-tags', {
      alias: 'it',
      type: 'string',
      array: true,
      describe: 'Tags that must be included'
    })
    .option('exclude-tags', {
      alias: 'et',
      type: 'string',
      array: true,
      describe: 'Tags that must be excluded from rankings'
    })
    .option('n-most-changed-tags', {
      alias: 'nmc',
      type: 'number',
      describe: 'Number of tags that show the highest growth'
    })
    .option('n-highest-usage-tags', {
      alias: 'nh',
      type: 'number',
      describe: 'Number of tags that have the highest peak usage'
    })
    .option('n-highest-average-usage-tags', {
      alias: 'nha',
      type: 'number',
      describe: 'Number of tags that have the highest average usage'
    })
    .option('change-mode', {
      type: 'string',
      choices: ['absolute', 'percent'],
      describe: 'How the endpoint change is measured'
    })
    .option('config', {
      type: 'string',
      describe: 'Properties file with analysis defaults'
    })
    .option('svg', {
      type: 'string',
      describe: 'Write the chart as an SVG file'
    })
    .option('csv', {
      type: 'string',
      describe: 'Write the plotted series as a wide CSV file'
    })
    .parserConfiguration({ 'short-option-groups': false })
    .strict()
    .help()
    .parseSync();
}

function runCli(argv: string[]): void {
  const args = parseArguments(argv);
  const config = mergeCliArguments(loadAnalysisConfig(args.config ?? null), args);

  const { dataset } = loadPoolDataset(args.directory);
  const { selection, pivot } = buildPlotPayload(dataset, config);

  for (const line of formatSelectionReport(selection)) {
    console.log(line);
  }

  if (args.svg) {
    const written = writeOutputFile(args.svg, renderPoolChartSvg(pivot));
    console.log(`[pool-trends] chart written to ${written}`);
  }
  if (args.csv) {
    const written = writeOutputFile(args.csv, formatPivotCsv(pivot));
    console.log(`[pool-trends] series written to ${written}`);
  }
}

try {
  runCli(hideBin(process.argv));
} catch (error) {
  console.error(`[pool-trends] ${errorMessage(error)}`);
  process.exitCode = 1;
}
