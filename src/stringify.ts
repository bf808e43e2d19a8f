/**
 * TOON writer: ToonValue → text. Lines are built at absolute indentation
 * columns and joined with `\n`.
 */

import type { ToonMap, ToonNumber, ToonPrimitive, ToonValue } from './ast.js';
import { buildValue, isValueSource, type ValueSource } from './binding.js';
import { ConfigManager } from './config.js';
import { ToonUnsupportedTypeError } from './errors.js';
import { selectArrayFormat } from './format.js';
import { log } from './logger.js';
import {
  createOptions,
  delimiterChar,
  delimiterHeaderSuffix,
  headerFieldSeparator,
  type ToonOptions,
  type ToonOptionsInput,
} from './options.js';
import { formatKey, LIST_ITEM_PREFIX, NULL_LITERAL, quoteString } from './quoting.js';

export interface SerializeOptions extends ToonOptionsInput {
  /** Max nesting depth (default from TOON_MAX_DEPTH, 256). */
  maxDepth?: number;
}

/**
 * Serializes a value, or anything a ValueSource can emit.
 */
export function serialize(input: ToonValue | ValueSource, options: SerializeOptions = {}): string {
  const { maxDepth = ConfigManager.cfg.maxDepth, ...rest } = options;
  const opts = createOptions(rest);
  const value = isValueSource(input) ? buildValue(input) : input;
  const writer = new Writer(opts, maxDepth);
  const out = writer.write(value);
  if (writer.specialFloats > 0) {
    log.warn('non-finite numbers written as null', { count: writer.specialFloats });
  }
  log.debug('serialized value', { chars: out.length, root: value.kind });
  return out;
}

/** Plain decimal text for a finite float; whole floats keep a `.0`. */
export function formatFloat(value: number): string {
  if (value === 0) return '0';
  const text = expandExponent(String(value));
  return Number.isInteger(value) ? `${text}.0` : text;
}

/** `1e+21` → `1000000000000000000000`, `1.5e-7` → `0.00000015`. */
function expandExponent(text: string): string {
  const m = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!m) return text;
  const sign = m[1] ?? '';
  const digits = (m[2] ?? '') + (m[3] ?? '');
  const exp = Number(m[4]);
  const point = 1 + exp;
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

class Writer {
  private readonly lines: string[] = [];
  specialFloats = 0;

  constructor(
    private readonly options: ToonOptions,
    private readonly maxDepth: number
  ) {}

  write(value: ToonValue): string {
    switch (value.kind) {
      case 'object':
        this.writeFields(value.entries, 0, 0);
        break;
      case 'array':
        this.writeArray('', value.items, 0, 0);
        break;
      case 'table':
        this.writeTable('', value.headers, value.rows, 0);
        break;
      default:
        this.lines.push(this.primitive(value));
    }
    const text = this.lines.join('\n');
    return this.options.pretty ? `${text}\n` : text;
  }

  private pad(column: number): string {
    return ' '.repeat(column);
  }

  private checkDepth(depth: number): void {
    if (depth > this.maxDepth) {
      throw new ToonUnsupportedTypeError(`nesting deeper than ${this.maxDepth} levels`);
    }
  }

  // --- scalars ---

  private primitive(value: ToonPrimitive): string {
    switch (value.kind) {
      case 'null':
        return NULL_LITERAL;
      case 'bool':
        return String(value.value);
      case 'number':
        return this.number(value.value);
      case 'string':
        return quoteString(value.value, this.options.delimiter);
      case 'date':
        return quoteString(value.value.toISOString(), this.options.delimiter);
      case 'bigint':
        return `${value.value}n`;
    }
  }

  private number(n: ToonNumber): string {
    switch (n.kind) {
      case 'integer':
        return String(n.value);
      case 'float':
        return formatFloat(n.value);
      default:
        this.specialFloats++;
        return NULL_LITERAL;
    }
  }

  // --- objects ---

  private writeFields(entries: ToonMap, column: number, depth: number): void {
    this.checkDepth(depth);
    for (const [key, value] of entries) {
      this.writeField(this.pad(column), key, value, column, depth);
    }
  }

  /**
   * One `key: value` line. `lead` is everything before the key on that line;
   * nested content goes one level past `column`.
   */
  private writeField(lead: string, key: string, value: ToonValue, column: number, depth: number): void {
    const keyPart = `${lead}${formatKey(key, this.options.delimiter)}:`;
    switch (value.kind) {
      case 'object':
        this.lines.push(keyPart);
        if (value.entries.size > 0) this.writeFields(value.entries, column + this.options.indent, depth + 1);
        return;
      case 'array':
        this.writeArray(`${keyPart} `, value.items, column, depth + 1);
        return;
      case 'table':
        this.writeTable(`${keyPart} `, value.headers, value.rows, column);
        return;
      default:
        this.lines.push(`${keyPart} ${this.primitive(value)}`);
    }
  }

  // --- arrays ---

  private header(length: number): string {
    const marker = this.options.lengthMarker ?? '';
    return `[${marker}${length}${delimiterHeaderSuffix(this.options.delimiter)}]`;
  }

  /** `lead` precedes the header on its line; items and rows go one level past `column`. */
  private writeArray(lead: string, items: readonly ToonValue[], column: number, depth: number): void {
    this.checkDepth(depth);
    const layout = selectArrayFormat(items);
    switch (layout.format) {
      case 'tabular':
        this.writeTable(lead, layout.headers, layout.rows, column);
        return;
      case 'inline': {
        const cells: string[] = [];
        for (const item of items) {
          if (item.kind === 'array' || item.kind === 'object' || item.kind === 'table') {
            throw new ToonUnsupportedTypeError(`${item.kind} inside an inline array`);
          }
          cells.push(this.primitive(item));
        }
        const body = cells.length > 0 ? ` ${cells.join(delimiterChar(this.options.delimiter))}` : '';
        this.lines.push(`${lead}${this.header(items.length)}:${body}`);
        return;
      }
      case 'list': {
        const marker = this.options.lengthMarker ?? '';
        this.lines.push(`${lead}[${marker}${items.length}]:`);
        const itemColumn = column + this.options.indent;
        for (const item of items) this.writeListItem(item, itemColumn, depth + 1);
        return;
      }
    }
  }

  private writeTable(
    lead: string,
    headers: readonly string[],
    rows: readonly (readonly ToonValue[])[],
    column: number
  ): void {
    const fields = headers.map((h) => formatKey(h, this.options.delimiter)).join(headerFieldSeparator(this.options.delimiter));
    this.lines.push(`${lead}${this.header(rows.length)}{${fields}}:`);
    const rowLead = this.pad(column + this.options.indent);
    const sep = delimiterChar(this.options.delimiter);
    for (const row of rows) {
      const cells = row.map((cell) => {
        if (cell.kind === 'array' || cell.kind === 'object' || cell.kind === 'table') {
          throw new ToonUnsupportedTypeError(`${cell.kind} inside a tabular row`);
        }
        return this.primitive(cell);
      });
      this.lines.push(`${rowLead}${cells.join(sep)}`);
    }
  }

  /** A `- ` item with its dash at `column`; object fields line up after the dash. */
  private writeListItem(item: ToonValue, column: number, depth: number): void {
    const dash = `${this.pad(column)}${LIST_ITEM_PREFIX}`;
    switch (item.kind) {
      case 'array':
        this.writeArray(dash, item.items, column, depth);
        return;
      case 'table':
        this.writeTable(dash, item.headers, item.rows, column);
        return;
      case 'object': {
        this.checkDepth(depth);
        if (item.entries.size === 0) {
          this.lines.push(`${this.pad(column)}-`);
          return;
        }
        const fieldColumn = column + LIST_ITEM_PREFIX.length;
        let first = true;
        for (const [key, value] of item.entries) {
          this.writeField(first ? dash : this.pad(fieldColumn), key, value, fieldColumn, depth);
          first = false;
        }
        return;
      }
      default:
        this.lines.push(`${dash}${this.primitive(item)}`);
    }
  }
}
