/**
 * Table model tests: TableBuilder and StyleAssigner
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../errors/index.js';
import { buildTable, splitLines, truncateField } from './table-builder.js';
import { assignStyles, createSeededRandom, seedFromNames, STYLE_PALETTE } from './style-assigner.js';

// ─── buildTable ───────────────────────────────────────────────────────────────

describe('buildTable', () => {
  it('uses the first line as columns and the rest as rows', () => {
    const table = buildTable('a,b,c\n1,2,3\n4,5,6');
    expect(table.separator).toBe(',');
    expect(table.columns.map((c) => c.name)).toEqual(['a', 'b', 'c']);
    expect(table.rows).toEqual([
      { index: 1, values: ['1', '2', '3'] },
      { index: 2, values: ['4', '5', '6'] },
    ]);
  });

  it('synthesizes numeric column names for a single line', () => {
    const table = buildTable('1,2,3', ',');
    expect(table.columns.map((c) => c.name)).toEqual(['0', '1', '2']);
    expect(table.rows).toEqual([{ index: 1, values: ['1', '2', '3'] }]);
  });

  it('synthesizes names correctly when the separator is a digit', () => {
    const table = buildTable('a1b1c1d1e1f1g1h1i1j1k', '1');
    expect(table.columns).toHaveLength(11);
    expect(table.columns[10].name).toBe('10');
    expect(table.rows[0].values[10]).toBe('k');
  });

  it('honours a custom separator', () => {
    const table = buildTable('a.b.c\n1.2.3', '.');
    expect(table.columns.map((c) => c.name)).toEqual(['a', 'b', 'c']);
    expect(table.rows[0].values).toEqual(['1', '2', '3']);
  });

  it('splits on CR and LF and drops empty lines', () => {
    const table = buildTable('a;b\r\n\r\n1;2\r\n', ';');
    expect(table.columns.map((c) => c.name)).toEqual(['a', 'b']);
    expect(table.rows).toEqual([{ index: 1, values: ['1', '2'] }]);
  });

  it('keeps empty leading, inner and trailing fields', () => {
    const table = buildTable('a,,c\n,2,');
    expect(table.columns.map((c) => c.name)).toEqual(['a', '', 'c']);
    expect(table.rows[0].values).toEqual(['', '2', '']);
  });

  it('keeps ragged rows as parsed', () => {
    const table = buildTable('a,b\n1,2,3\n4');
    expect(table.rows).toEqual([
      { index: 1, values: ['1', '2', '3'] },
      { index: 2, values: ['4'] },
    ]);
  });

  it('truncates long data fields and appends an ellipsis', () => {
    const table = buildTable('a,b,c\n1,2,33333333333333', ',', { maxFieldLength: 7 });
    expect(table.rows[0].values).toEqual(['1', '2', '3333333...']);
  });

  it('never truncates column names', () => {
    const table = buildTable('longheader,b\n1,2', ',', { maxFieldLength: 3 });
    expect(table.columns[0].name).toBe('longheader');
  });

  it('returns an empty table for empty input', () => {
    expect(buildTable('')).toEqual({ separator: ',', columns: [], rows: [] });
    expect(buildTable('\r\n\n').columns).toEqual([]);
  });

  it('rejects an empty separator', () => {
    expect(() => buildTable('a,b', '')).toThrow(ConfigurationError);
  });

  it('rejects a negative maxFieldLength', () => {
    expect(() => buildTable('a,b', ',', { maxFieldLength: -1 })).toThrow(ConfigurationError);
  });

  it('rejects a zero maxFieldLength, like the config validator', () => {
    expect(() => buildTable('a,b', ',', { maxFieldLength: 0 })).toThrow(
      'maxFieldLength must be a positive integer, got: 0'
    );
  });

  it('is deterministic for identical input', () => {
    const raw = 'name,city\nAda,London\nGrace,Arlington';
    expect(buildTable(raw)).toEqual(buildTable(raw));
  });

  it('assigns one palette style per column', () => {
    const table = buildTable('a,b,c,d,e,f,g,h,i,j\n1,2,3,4,5,6,7,8,9,10');
    expect(table.columns).toHaveLength(10);
    for (const column of table.columns) {
      expect(STYLE_PALETTE).toContainEqual(column.style);
    }
  });

  it('uses an explicit style seed when given', () => {
    const a = buildTable('x,y\n1,2', ',', { styleSeed: 42 });
    const b = buildTable('p,q\n1,2', ',', { styleSeed: 42 });
    expect(a.columns.map((c) => c.style)).toEqual(b.columns.map((c) => c.style));
  });
});

// ─── helpers ─────────────────────────────────────────────────────────────────

describe('splitLines', () => {
  it('splits on lone CR as well as LF', () => {
    expect(splitLines('a\rb\nc')).toEqual(['a', 'b', 'c']);
  });
});

describe('truncateField', () => {
  it('leaves values at the limit unchanged', () => {
    expect(truncateField('1234567', 7)).toBe('1234567');
  });

  it('counts code points, not UTF-16 units', () => {
    expect(truncateField('😀😀😀', 2)).toBe('😀😀...');
  });

  it('passes values through without a limit', () => {
    expect(truncateField('', undefined)).toBe('');
    expect(truncateField('abc')).toBe('abc');
  });
});

// ─── StyleAssigner ───────────────────────────────────────────────────────────

describe('assignStyles', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns exactly columnCount styles, repeating the palette', () => {
    const styles = assignStyles(20, { seed: 7 });
    expect(styles).toHaveLength(20);
    for (const style of styles) {
      expect(STYLE_PALETTE).toContainEqual(style);
    }
  });

  it('returns copies that do not alias the palette', () => {
    const [style] = assignStyles(1, { seed: 5 });
    const original = STYLE_PALETTE.find((entry) => entry.name === style.name);
    expect(style).toEqual(original);
    expect(style).not.toBe(original);
    style.background = '#000000';
    expect(original?.background).not.toBe('#000000');
  });

  it('returns an empty list for zero columns', () => {
    expect(assignStyles(0)).toEqual([]);
  });

  it('is reproducible for the same seed', () => {
    expect(assignStyles(6, { seed: 1234 })).toEqual(assignStyles(6, { seed: 1234 }));
  });

  it('draws from Math.random in random mode', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.99);
    const styles = assignStyles(3, { seed: 'random' });
    expect(styles).toEqual([STYLE_PALETTE[7], STYLE_PALETTE[7], STYLE_PALETTE[7]]);
  });

  it('uses a custom palette', () => {
    const only = { name: 'only', background: '#ffffff', text: '#000000', border: '#cccccc' };
    expect(assignStyles(2, { palette: [only] })).toEqual([only, only]);
  });

  it('rejects an empty palette', () => {
    expect(() => assignStyles(1, { palette: [] })).toThrow(/at least one style/);
  });
});

describe('createSeededRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRandom(99);
    const b = createSeededRandom(99);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('seedFromNames', () => {
  it('returns the FNV offset basis for no names', () => {
    expect(seedFromNames([])).toBe(2166136261);
  });

  it('differs for different headers', () => {
    expect(seedFromNames(['a'])).not.toBe(seedFromNames(['b']));
  });
});
