import fs from 'node:fs';
import path from 'node:path';
import { SNAPSHOT_FILE_SUFFIX } from '../../shared/catalog';
import { PoolDataError } from './errors';

export function parseConfigFile(configPath: string): Map<string, string> {
  if (!fs.existsSync(configPath)) {
    throw new PoolDataError('INPUT_NOT_FOUND', 'Config file does not exist', { filePath: configPath });
  }

  const out = new Map<string, string>();
  const lines = fs.readFileSync(configPath, 'utf-8').split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = /^([A-Z0-9_]+)\s*=\s*(.*)$/.exec(trimmed);
    if (!match) {
      continue;
    }

    const key = match[1];
    const raw = match[2].trim();
    const value = raw.replace(/^"|"$/g, '');
    out.set(key, value);
  }

  return out;
}

export function resolveSnapshotDirectory(directory: string): string {
  const resolved = path.resolve(directory);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw new PoolDataError('INPUT_NOT_FOUND', 'Snapshot directory does not exist', { filePath: resolved });
  }
  return resolved;
}

export function listSnapshotFiles(directory: string): string[] {
  const resolved = resolveSnapshotDirectory(directory);
  return fs
    .readdirSync(resolved, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(SNAPSHOT_FILE_SUFFIX))
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right))
    .map((name) => path.join(resolved, name));
}

export function writeOutputFile(filePath: string, content: string): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, content, 'utf-8');
  return resolved;
}
