/**
 * Chooses how an array is laid out. The choice depends on content only;
 * delimiter and length marker affect encoding, never selection.
 */

import { isPrimitive, toonNull, type ToonMap, type ToonPrimitive, type ToonValue } from './ast.js';

export type ArrayFormat =
  | { readonly format: 'inline' }
  | {
      readonly format: 'tabular';
      readonly headers: readonly string[];
      readonly rows: readonly (readonly ToonPrimitive[])[];
    }
  | { readonly format: 'list' };

const INLINE: ArrayFormat = Object.freeze({ format: 'inline' });
const LIST: ArrayFormat = Object.freeze({ format: 'list' });

export function selectArrayFormat(items: readonly ToonValue[]): ArrayFormat {
  if (items.length === 0) return INLINE;
  const tabular = tabularLayout(items);
  if (tabular) return tabular;
  if (items.every(isPrimitive)) return INLINE;
  return LIST;
}

function tabularLayout(items: readonly ToonValue[]): ArrayFormat | undefined {
  const maps: ToonMap[] = [];
  for (const item of items) {
    if (item.kind !== 'object') return undefined;
    maps.push(item.entries);
  }
  const first = maps[0];
  if (first === undefined || first.size === 0) return undefined;

  const headers = [...first.keys()].sort(compareKeys);
  const rows: ToonPrimitive[][] = [];
  for (const map of maps) {
    if (map.size !== headers.length) return undefined;
    const row: ToonPrimitive[] = [];
    for (const header of headers) {
      if (!map.has(header)) return undefined;
      const cell = map.get(header) ?? toonNull();
      if (!isPrimitive(cell)) return undefined;
      row.push(cell);
    }
    rows.push(row);
  }
  return { format: 'tabular', headers, rows };
}

/** Code-unit order, matching a byte-wise sort for ASCII keys. */
function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
