import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { resolveRequestConfig } from '../server/app';
import { formatSelectionReport, mergeCliArguments } from '../server/lib/cliOptions';
import { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, loadServerConfig } from '../server/lib/config';
import { isRequestError } from '../server/lib/errors';
import { listSnapshotFiles, parseConfigFile } from '../server/lib/io';
import { buildPlotPayload, buildRankings, loadPoolDataset, summarizeDataset } from '../server/lib/service';
import { buildSnapshotCsv, createFixtureDirectory, expectPoolError } from './helpers';

const T0 = Date.UTC(2024, 0, 1, 0, 0, 0);
const T1 = Date.UTC(2024, 0, 1, 1, 0, 0);

// Snapshot discovery
const snapshotDir = createFixtureDirectory('service');
fs.writeFileSync(
  path.join(snapshotDir, 'b-pool.csv'),
  buildSnapshotCsv({
    dateTime: '2024-01-01T01:00:00',
    rows: [
      { tag: 'Ntfs', totalUsedBytes: 500 },
      { tag: 'Irp', totalUsedBytes: 300 },
      { tag: 'Mdl', totalUsedBytes: 20 }
    ]
  })
);
fs.writeFileSync(
  path.join(snapshotDir, 'a-pool.csv'),
  buildSnapshotCsv({
    dateTime: '2024-01-01T00:00:00',
    rows: [
      { tag: 'Ntfs', totalUsedBytes: 400, pagedUsedBytes: 300, nonPagedUsedBytes: 100, pagedDiff: 2, nonPagedDiff: 1 },
      { tag: 'Irp', totalUsedBytes: 100 }
    ]
  })
);
fs.writeFileSync(path.join(snapshotDir, 'notes.txt'), 'not a snapshot\n');
fs.writeFileSync(path.join(snapshotDir, 'c-pool.csv.bak'), 'Tag\n');
fs.mkdirSync(path.join(snapshotDir, 'nested-pool.csv'));

assert.deepEqual(listSnapshotFiles(snapshotDir), [
  path.join(snapshotDir, 'a-pool.csv'),
  path.join(snapshotDir, 'b-pool.csv')
]);

const loaded = loadPoolDataset(snapshotDir);
assert.equal(loaded.directory, path.resolve(snapshotDir));
assert.equal(loaded.files.length, 2);
assert.deepEqual(
  loaded.dataset.rows.map((row) => `${row.tag}:${row.numbers.TotalUsedBytes}`),
  ['Ntfs:400', 'Irp:100', 'TOTAL:500', 'Ntfs:500', 'Irp:300', 'Mdl:20', 'TOTAL:820']
);
assert.equal(loaded.dataset.rows[0].numbers.TotalDiff, 3);

const summary = summarizeDataset(loaded.dataset);
assert.equal(summary.snapshotCount, 2);
assert.equal(summary.rowCount, 7);
assert.equal(summary.tagCount, 3, 'TOTAL is not counted as a tag');
assert.equal(summary.firstTimestamp, '2024-01-01T00:00:00');
assert.equal(summary.lastTimestamp, '2024-01-01T01:00:00');
assert.equal(summary.sortColumn, 'DateTime');
assert.deepEqual(summary.metrics, [
  'TotalUsedBytes',
  'PagedDiff',
  'NonPagedDiff',
  'TotalDiff',
  'PagedUsedBytes',
  'NonPagedUsedBytes'
]);

const emptyDir = createFixtureDirectory('empty');
expectPoolError(() => loadPoolDataset(emptyDir), 'NO_SNAPSHOTS', 'Directory without snapshots');
expectPoolError(
  () => loadPoolDataset(path.join(emptyDir, 'missing')),
  'INPUT_NOT_FOUND',
  'Missing snapshot directory'
);

// Rankings and plot payloads
assert.deepEqual(
  buildRankings(loaded.dataset, {
    ...DEFAULT_ANALYSIS_CONFIG,
    nMostChanged: 2,
    nHighest: 2,
    nHighestAverage: 1,
    changeMode: 'absolute'
  }),
  {
    metric: 'TotalUsedBytes',
    changeMode: 'absolute',
    mostChanged: [
      { tag: 'Irp', value: 200 },
      { tag: 'Ntfs', value: 100 }
    ],
    highest: [
      { tag: 'Ntfs', value: 500 },
      { tag: 'Irp', value: 300 }
    ],
    highestAverage: [{ tag: 'Ntfs', value: 450 }]
  }
);

const payload = buildPlotPayload(loaded.dataset, {
  ...DEFAULT_ANALYSIS_CONFIG,
  nMostChanged: 1,
  nHighest: 1,
  nHighestAverage: 0,
  includeTags: ['Mdl', 'Pool']
});
assert.deepEqual(payload.selection.tags, ['TOTAL', 'Irp', 'Ntfs', 'Mdl']);
assert.deepEqual(payload.pivot.tags, ['TOTAL', 'Irp', 'Ntfs', 'Mdl']);
assert.deepEqual(payload.pivot.rows, [
  { timestamp: T0, values: [500, 100, 400, null] },
  { timestamp: T1, values: [820, 300, 500, 20] }
]);
assert.deepEqual(formatSelectionReport(payload.selection), [
  "tags with GREATEST INCREASE        : ['Irp']",
  "tags with HIGHEST PEAK USAGE       : ['Ntfs']"
]);

// Analysis configuration layering
const configDir = createFixtureDirectory('config');
const configPath = path.join(configDir, 'analysis.properties');
fs.writeFileSync(
  configPath,
  ['# analysis defaults', 'METRIC = PagedDiff', 'N_HIGHEST=3', 'IGNORE_TAGS="Ntfs, Irp"', 'UNKNOWN_KEY=1', ''].join('\n')
);
assert.equal(parseConfigFile(configPath).get('IGNORE_TAGS'), 'Ntfs, Irp');

assert.deepEqual(loadAnalysisConfig(null, {}), DEFAULT_ANALYSIS_CONFIG);
assert.deepEqual(
  loadAnalysisConfig(configPath, {
    POOL_TRENDS_N_HIGHEST: '7',
    POOL_TRENDS_CHANGE_MODE: 'absolute',
    POOL_TRENDS_METRIC: ''
  }),
  {
    metric: 'PagedDiff',
    timeColumn: 'DateTime',
    nMostChanged: 5,
    nHighest: 7,
    nHighestAverage: 5,
    changeMode: 'absolute',
    ignoreTags: ['Ntfs', 'Irp'],
    includeTags: []
  }
);
expectPoolError(() => loadAnalysisConfig(null, { POOL_TRENDS_N_HIGHEST: '-1' }), 'INVALID_CONFIG', 'Negative count');
expectPoolError(() => loadAnalysisConfig(null, { POOL_TRENDS_METRIC: 'Bogus' }), 'INVALID_CONFIG', 'Unknown metric');
expectPoolError(
  () => loadAnalysisConfig(path.join(configDir, 'missing.properties'), {}),
  'INPUT_NOT_FOUND',
  'Missing config file'
);

assert.deepEqual(loadServerConfig({ POOL_DATA_DIR: '/data/pools', PORT: '9000' }), {
  dataDirectory: '/data/pools',
  port: 9000,
  host: '0.0.0.0',
  corsOrigin: '',
  configPath: null
});
assert.deepEqual(
  loadServerConfig({
    POOL_DATA_DIR: '/data/pools',
    POOL_TRENDS_PORT: '8080',
    POOL_TRENDS_HOST: '127.0.0.1',
    POOL_TRENDS_CORS_ORIGIN: 'http://localhost:5173',
    POOL_TRENDS_CONFIG: '/etc/pool-trends.properties'
  }),
  {
    dataDirectory: '/data/pools',
    port: 8080,
    host: '127.0.0.1',
    corsOrigin: 'http://localhost:5173',
    configPath: '/etc/pool-trends.properties'
  }
);
expectPoolError(() => loadServerConfig({}), 'INVALID_CONFIG', 'Missing data directory');
expectPoolError(() => loadServerConfig({ POOL_DATA_DIR: '/data', PORT: 'http' }), 'INVALID_CONFIG', 'Bad port');

// Request and command-line overrides
assert.deepEqual(
  resolveRequestConfig(DEFAULT_ANALYSIS_CONFIG, {
    metric: 'PagedDiff',
    timeColumn: 'DateTimeUTC',
    mode: 'absolute',
    ignore: 'A, B',
    include: 'C',
    limit: '2',
    nHighest: '4'
  }),
  {
    metric: 'PagedDiff',
    timeColumn: 'DateTimeUTC',
    nMostChanged: 2,
    nHighest: 4,
    nHighestAverage: 2,
    changeMode: 'absolute',
    ignoreTags: ['A', 'B'],
    includeTags: ['C']
  }
);
assert.deepEqual(resolveRequestConfig(DEFAULT_ANALYSIS_CONFIG, {}), DEFAULT_ANALYSIS_CONFIG);
expectPoolError(
  () => resolveRequestConfig(DEFAULT_ANALYSIS_CONFIG, { metric: 'Bogus' }),
  'INVALID_SELECTOR',
  'Unknown metric query'
);
expectPoolError(
  () => resolveRequestConfig(DEFAULT_ANALYSIS_CONFIG, { timeColumn: 'When' }),
  'INVALID_SELECTOR',
  'Unknown time column query'
);
try {
  resolveRequestConfig(DEFAULT_ANALYSIS_CONFIG, { limit: 'many' });
  assert.fail('Non-numeric limits are rejected');
} catch (error) {
  assert.equal(isRequestError(error), true, 'Bad limits map to a client error');
}

assert.deepEqual(
  mergeCliArguments(DEFAULT_ANALYSIS_CONFIG, {
    directory: snapshotDir,
    type: 'NonPagedDiff',
    timeStamp: 'DateTimeUTC',
    excludeTags: ['A'],
    includeTags: ['B'],
    nHighestUsageTags: 0,
    changeMode: 'absolute'
  }),
  {
    metric: 'NonPagedDiff',
    timeColumn: 'DateTimeUTC',
    nMostChanged: 5,
    nHighest: 0,
    nHighestAverage: 5,
    changeMode: 'absolute',
    ignoreTags: ['A'],
    includeTags: ['B']
  }
);
expectPoolError(
  () => mergeCliArguments(DEFAULT_ANALYSIS_CONFIG, { directory: snapshotDir, type: 'Bytes' }),
  'INVALID_SELECTOR',
  'Unknown metric flag'
);

for (const dir of [snapshotDir, emptyDir, configDir]) {
  fs.rmSync(dir, { recursive: true, force: true });
}

console.log('Service tests passed.');
