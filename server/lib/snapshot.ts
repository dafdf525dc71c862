import fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';
import iconv from 'iconv-lite';
import {
  DECLARED_INTEGER_COLUMNS,
  REQUIRED_COLUMNS,
  TAG_COLUMN,
  TIMESTAMP_FORMAT
} from '../../shared/catalog';
import type { ColumnKind, ColumnSpec, PoolRow, SnapshotSchema, SnapshotTable } from '../../shared/types';
import { sniffEncoding } from './encoding';
import { PoolDataError, errorMessage } from './errors';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const INTEGER_TOKEN = /^[+-]?\d+$/;

const REQUIRED_KIND_BY_NAME = new Map(REQUIRED_COLUMNS.map((column) => [column.name, column.kind]));

function isIntegerToken(value: string): boolean {
  return INTEGER_TOKEN.test(value) && Number.isSafeInteger(Number(value));
}

function isNumericToken(value: string): boolean {
  return value.length > 0 && Number.isFinite(Number(value));
}

function toStringRecords(parsed: unknown, source: string): string[][] {
  if (!Array.isArray(parsed)) {
    throw new PoolDataError('SCHEMA_MISMATCH', 'Snapshot did not parse into rows', { filePath: source });
  }
  return parsed.map((record: unknown) => {
    if (!Array.isArray(record)) {
      throw new PoolDataError('SCHEMA_MISMATCH', 'Snapshot row did not parse into fields', { filePath: source });
    }
    return record.map((field: unknown) => (typeof field === 'string' ? field : String(field)));
  });
}

function readRecords(text: string, source: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, trim: true, skip_empty_lines: true });
  } catch (error) {
    throw new PoolDataError('SCHEMA_MISMATCH', `Malformed delimited text: ${errorMessage(error)}`, {
      filePath: source,
      cause: error
    });
  }
  return toStringRecords(parsed, source);
}

function inferColumnKind(values: string[]): ColumnKind {
  if (values.every(isIntegerToken)) {
    return 'integer';
  }
  if (values.every(isNumericToken)) {
    return 'float';
  }
  return 'text';
}

function buildSchema(header: string[], dataRows: string[][], source: string): SnapshotSchema {
  const seen = new Set<string>();
  for (const name of header) {
    if (!name) {
      throw new PoolDataError('SCHEMA_MISMATCH', 'Header contains an unnamed column', { filePath: source });
    }
    if (seen.has(name)) {
      throw new PoolDataError('SCHEMA_MISMATCH', `Header repeats column "${name}"`, { filePath: source });
    }
    seen.add(name);
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !seen.has(column.name)).map((column) => column.name);
  if (missing.length > 0) {
    throw new PoolDataError('SCHEMA_MISMATCH', `Missing required columns: ${missing.join(', ')}`, {
      filePath: source
    });
  }

  const columns: ColumnSpec[] = header.map((name, index) => {
    const requiredKind = REQUIRED_KIND_BY_NAME.get(name);
    if (requiredKind) {
      return { name, kind: requiredKind };
    }
    if (DECLARED_INTEGER_COLUMNS.has(name)) {
      return { name, kind: 'integer' };
    }
    return { name, kind: inferColumnKind(dataRows.map((row) => row[index] ?? '')) };
  });

  return { columns };
}

export function parseSnapshotTimestamp(value: string): number | null {
  const parsed = dayjs.utc(value, TIMESTAMP_FORMAT, true);
  return parsed.isValid() ? parsed.valueOf() : null;
}

export function formatSnapshotTimestamp(epochMs: number): string {
  return dayjs.utc(epochMs).format(TIMESTAMP_FORMAT);
}

function buildRow(schema: SnapshotSchema, record: string[], lineNumber: number, source: string): PoolRow {
  const row: PoolRow = { tag: '', dateTime: 0, dateTimeUtc: 0, numbers: {}, texts: {} };

  schema.columns.forEach((column, index) => {
    const raw = record[index] ?? '';
    switch (column.kind) {
      case 'tag':
        if (!raw) {
          throw new PoolDataError('SCHEMA_MISMATCH', `Row ${lineNumber} has an empty ${TAG_COLUMN}`, {
            filePath: source
          });
        }
        row.tag = raw;
        break;
      case 'datetime': {
        const timestamp = parseSnapshotTimestamp(raw);
        if (timestamp === null) {
          throw new PoolDataError(
            'TIMESTAMP_PARSE_FAILURE',
            `Row ${lineNumber} column ${column.name}: "${raw}" is not a ${TIMESTAMP_FORMAT.replace('[T]', 'T')} timestamp`,
            { filePath: source }
          );
        }
        if (column.name === 'DateTime') {
          row.dateTime = timestamp;
        } else {
          row.dateTimeUtc = timestamp;
        }
        break;
      }
      case 'integer':
        if (!isIntegerToken(raw)) {
          throw new PoolDataError(
            'SCHEMA_MISMATCH',
            `Row ${lineNumber} column ${column.name}: "${raw}" is not an integer`,
            { filePath: source }
          );
        }
        row.numbers[column.name] = Number.parseInt(raw, 10);
        break;
      case 'float':
        if (!isNumericToken(raw)) {
          throw new PoolDataError(
            'SCHEMA_MISMATCH',
            `Row ${lineNumber} column ${column.name}: "${raw}" is not numeric`,
            { filePath: source }
          );
        }
        row.numbers[column.name] = Number(raw);
        break;
      case 'text':
        row.texts[column.name] = raw;
        break;
    }
  });

  return row;
}

export function parseSnapshotText(text: string, source: string): SnapshotTable {
  const records = readRecords(text, source);
  if (records.length === 0) {
    throw new PoolDataError('SCHEMA_MISMATCH', 'Snapshot has no header row', { filePath: source });
  }

  const [header, ...dataRows] = records;
  if (dataRows.length === 0) {
    throw new PoolDataError('EMPTY_SNAPSHOT', 'Snapshot has a header but no data rows', { filePath: source });
  }

  const schema = buildSchema(header, dataRows, source);
  // Header is line 1.
  const rows = dataRows.map((record, index) => buildRow(schema, record, index + 2, source));
  return { source, schema, rows };
}

export function decodeSnapshotFile(filePath: string): string {
  const encoding = sniffEncoding(filePath);
  return iconv.decode(fs.readFileSync(filePath), encoding);
}

export function parseSnapshotFile(filePath: string): SnapshotTable {
  if (!fs.existsSync(filePath)) {
    throw new PoolDataError('INPUT_NOT_FOUND', 'Snapshot file does not exist', { filePath });
  }
  return parseSnapshotText(decodeSnapshotFile(filePath), filePath);
}
