/**
 * Column style assignment.
 *
 * Styles come from a fixed palette through a small seeded PRNG, so the same
 * header always yields the same colours unless an unseeded draw is requested.
 */

import type { ColumnStyle, StyleSeed } from './types.js';

export const STYLE_PALETTE: readonly ColumnStyle[] = [
  { name: 'blue',   background: '#dbeafe', text: '#1e3a8a', border: '#93c5fd' },
  { name: 'green',  background: '#dcfce7', text: '#14532d', border: '#86efac' },
  { name: 'yellow', background: '#fef9c3', text: '#713f12', border: '#fde047' },
  { name: 'red',    background: '#fee2e2', text: '#7f1d1d', border: '#fca5a5' },
  { name: 'purple', background: '#f3e8ff', text: '#581c87', border: '#d8b4fe' },
  { name: 'orange', background: '#ffedd5', text: '#7c2d12', border: '#fdba74' },
  { name: 'teal',   background: '#ccfbf1', text: '#134e4a', border: '#5eead4' },
  { name: 'gray',   background: '#f3f4f6', text: '#111827', border: '#d1d5db' },
];

export interface AssignStylesOptions {
  seed?: StyleSeed;
  palette?: readonly ColumnStyle[];
}

/** mulberry32. Returns floats in [0, 1). */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** 32-bit FNV-1a hash of the column names, joined with a unit separator. */
export function seedFromNames(names: readonly string[]): number {
  let hash = 0x811c9dc5;
  const input = names.join('\u001f');
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Pick one style per column. Returns exactly `columnCount` fresh copies;
 * styles repeat once the palette is exhausted.
 */
export function assignStyles(columnCount: number, options: AssignStylesOptions = {}): ColumnStyle[] {
  const palette = options.palette ?? STYLE_PALETTE;
  if (palette.length === 0) {
    throw new Error('Style palette must contain at least one style');
  }
  const seed = options.seed ?? 0;
  const random = seed === 'random' ? Math.random : createSeededRandom(seed);

  const styles: ColumnStyle[] = [];
  for (let i = 0; i < columnCount; i++) {
    const pick = Math.min(palette.length - 1, Math.floor(random() * palette.length));
    styles.push({ ...palette[pick] });
  }
  return styles;
}
