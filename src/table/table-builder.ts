/**
 * Table Builder
 *
 * Splits raw delimited text into a header line and data rows.
 *
 *   a,b,c          columns: a | b | c
 *   1,2,3    →     row 1:   1 | 2 | 3
 *   4,5,6          row 2:   4 | 5 | 6
 *
 * A lone line is treated as data and gets numeric column names "0".."N-1".
 * Quoted fields are not special: the separator always splits.
 */

import { ConfigurationError } from '../errors/index.js';
import { assignStyles, seedFromNames } from './style-assigner.js';
import type { BuildTableOptions, Column, Row, Table } from './types.js';

export const ELLIPSIS = '...';

/** Split on every CR and LF, dropping empty lines. */
export function splitLines(rawText: string): string[] {
  return rawText.split(/[\r\n]/).filter((line) => line.length > 0);
}

/** Truncate to `maxLength` code points and append the ellipsis marker. */
export function truncateField(value: string, maxLength?: number): string {
  if (maxLength === undefined) return value;
  const chars = Array.from(value);
  if (chars.length <= maxLength) return value;
  return chars.slice(0, maxLength).join('') + ELLIPSIS;
}

export function buildTable(
  rawText: string,
  separator = ',',
  options: BuildTableOptions = {}
): Table {
  if (separator.length === 0) {
    throw new ConfigurationError('Separator must not be empty');
  }
  const { maxFieldLength } = options;
  if (maxFieldLength !== undefined && (!Number.isInteger(maxFieldLength) || maxFieldLength < 1)) {
    throw new ConfigurationError(`maxFieldLength must be a positive integer, got: ${maxFieldLength}`);
  }

  const lines = splitLines(rawText);
  if (lines.length === 0) {
    return { separator, columns: [], rows: [] };
  }

  // A lone line is data under synthesized names "0".."N-1".
  const dataLines = lines.length === 1 ? lines : lines.slice(1);
  const names = lines.length === 1
    ? Array.from({ length: lines[0].split(separator).length }, (_, i) => String(i))
    : lines[0].split(separator);

  const styles = assignStyles(names.length, {
    seed: options.styleSeed ?? seedFromNames(names),
  });
  const columns: Column[] = names.map((name, c) => ({ name, style: styles[c] }));

  const rows: Row[] = dataLines.map((line, i) => ({
    index: i + 1,
    values: line.split(separator).map((item) => truncateField(item, maxFieldLength)),
  }));

  return { separator, columns, rows };
}
