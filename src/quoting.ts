/**
 * When a string must be written inside double quotes, and how it is escaped.
 * Only the active delimiter forces quoting; the other two never do.
 */

import { delimiterChar, type Delimiter } from './options.js';

export const TRUE_LITERAL = 'true';
export const FALSE_LITERAL = 'false';
export const NULL_LITERAL = 'null';
export const LIST_ITEM_PREFIX = '- ';

// Anything a float parser would accept: decimals, exponents, inf/infinity/nan.
const NUMERIC_RE = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;
const BIGINT_RE = /^-?\d+n$/;
const BARE_KEY_RE = /^[A-Za-z_][\w.-]*$/;
// `[3`, `[#3` and the like open an array header
const ARRAY_HEADER_PREFIX_RE = /^\[[^\d\]\s]?\d/;

export function isReservedLiteral(s: string): boolean {
  return s === TRUE_LITERAL || s === FALSE_LITERAL || s === NULL_LITERAL;
}

export function looksNumeric(s: string): boolean {
  return NUMERIC_RE.test(s);
}

export function looksLikeBigInt(s: string): boolean {
  return BIGINT_RE.test(s);
}

function looksStructural(s: string): boolean {
  if (ARRAY_HEADER_PREFIX_RE.test(s)) return true;
  return (s.startsWith('[') && s.includes(']')) || (s.startsWith('{') && s.includes('}'));
}

export function needsQuotes(s: string, delimiter: Delimiter = 'comma'): boolean {
  if (s.length === 0) return true;
  if (s.startsWith(' ') || s.endsWith(' ')) return true;
  if (/[:"\\\n\r\t\0]/.test(s)) return true;
  if (s.includes(delimiterChar(delimiter))) return true;
  if (isReservedLiteral(s)) return true;
  if (looksNumeric(s) || looksLikeBigInt(s)) return true;
  if (s.startsWith(LIST_ITEM_PREFIX)) return true;
  return looksStructural(s);
}

export function escapeString(s: string): string {
  return s
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/\x08/g, '\\b')
    .replace(/\f/g, '\\f')
    .replace(/\0/g, '\\0');
}

export function quoteString(s: string, delimiter: Delimiter = 'comma'): string {
  return needsQuotes(s, delimiter) ? `"${escapeString(s)}"` : s;
}

/** Keys stay bare only when they cannot be mistaken for a value or a list item. */
export function formatKey(key: string, delimiter: Delimiter = 'comma'): string {
  if (BARE_KEY_RE.test(key) && !isReservedLiteral(key) && !needsQuotes(key, delimiter)) return key;
  return `"${escapeString(key)}"`;
}
