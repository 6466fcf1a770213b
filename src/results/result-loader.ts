/**
 * Solver result file loading
 *
 * The solver writes one delimited text file per output step: a header row
 * naming the columns, then one row per spatial sample. Only the coordinates
 * and the in-plane velocity components are read; other columns (pressure,
 * z, ...) are ignored.
 *
 * A malformed row aborts the load; rows are never dropped.
 */

import * as fs from 'fs';
import { SamplePoint } from '../types';
import { MalformedRowError, MissingColumnError } from '../errors';
import { debugLog, elapsedMs } from '../debug';

export const REQUIRED_COLUMNS = {
  x: 'x',
  y: 'y',
  velocityX: 'velocity.x',
  velocityY: 'velocity.y',
} as const satisfies Record<keyof SamplePoint, string>;

type SampleField = keyof typeof REQUIRED_COLUMNS;

const SAMPLE_FIELDS: readonly SampleField[] = ['x', 'y', 'velocityX', 'velocityY'];

export interface ResultLoaderOptions {
  delimiter?: string;
  /** Used in error messages; defaults to the file path when loading from disk. */
  source?: string;
}

/** Trim a field and drop one pair of surrounding double quotes. */
function unquote(field: string): string {
  const trimmed = field.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

function parseField(raw: string, line: number, column: string): number {
  const text = unquote(raw);
  if (text === '') {
    throw new MalformedRowError(line, column, 'empty field');
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new MalformedRowError(line, column, `'${text}' is not a finite number`);
  }
  return value;
}

export function parseResults(content: string, options: ResultLoaderOptions = {}): SamplePoint[] {
  const delimiter = options.delimiter ?? ',';
  const source = options.source ?? 'result file';

  const lines = content.split(/\r?\n/);
  let headerLine = 0;
  while (headerLine < lines.length && lines[headerLine].trim() === '') headerLine++;

  if (headerLine >= lines.length) {
    throw new MissingColumnError(SAMPLE_FIELDS.map(f => REQUIRED_COLUMNS[f]), `${source} (no header row)`);
  }

  const header = lines[headerLine].split(delimiter).map(unquote);
  const missing = SAMPLE_FIELDS
    .map(f => REQUIRED_COLUMNS[f])
    .filter(name => !header.includes(name));
  if (missing.length > 0) {
    throw new MissingColumnError(missing, source);
  }

  const columnIndex = {
    x: header.indexOf(REQUIRED_COLUMNS.x),
    y: header.indexOf(REQUIRED_COLUMNS.y),
    velocityX: header.indexOf(REQUIRED_COLUMNS.velocityX),
    velocityY: header.indexOf(REQUIRED_COLUMNS.velocityY),
  };
  const lastRequired = Math.max(columnIndex.x, columnIndex.y, columnIndex.velocityX, columnIndex.velocityY);

  const samples: SamplePoint[] = [];
  for (let i = headerLine + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;

    const lineNumber = i + 1;
    const parts = lines[i].split(delimiter);
    if (parts.length <= lastRequired) {
      throw new MalformedRowError(lineNumber, undefined, `expected ${header.length} fields, found ${parts.length}`);
    }

    samples.push({
      x: parseField(parts[columnIndex.x], lineNumber, REQUIRED_COLUMNS.x),
      y: parseField(parts[columnIndex.y], lineNumber, REQUIRED_COLUMNS.y),
      velocityX: parseField(parts[columnIndex.velocityX], lineNumber, REQUIRED_COLUMNS.velocityX),
      velocityY: parseField(parts[columnIndex.velocityY], lineNumber, REQUIRED_COLUMNS.velocityY),
    });
  }

  return samples;
}

export function loadResults(filePath: string, options: ResultLoaderOptions = {}): SamplePoint[] {
  const start = performance.now();
  const content = fs.readFileSync(filePath, 'utf-8');
  const samples = parseResults(content, { ...options, source: options.source ?? filePath });
  debugLog('Loader', `Read ${samples.length} samples from ${filePath} in ${elapsedMs(start)}`);
  return samples;
}
