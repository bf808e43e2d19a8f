/**
 * TOON value model: a closed tagged union shared by the parser and the writer.
 * All runtime values are immutable once constructed.
 */

export interface SourcePosition {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  /** 0-based UTF-16 offset into the input */
  offset: number;
}

export type ToonNumber =
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'infinity' }
  | { readonly kind: 'negative-infinity' }
  | { readonly kind: 'nan' };

export type ToonMap = ReadonlyMap<string, ToonValue>;

export type ToonNull = { readonly kind: 'null' };
export type ToonBool = { readonly kind: 'bool'; readonly value: boolean };
export type ToonNumberValue = { readonly kind: 'number'; readonly value: ToonNumber };
export type ToonString = { readonly kind: 'string'; readonly value: string };
export type ToonArray = { readonly kind: 'array'; readonly items: readonly ToonValue[] };
export type ToonObject = { readonly kind: 'object'; readonly entries: ToonMap };
/** Produced only while parsing a tabular array; see {@link normalizeTables}. */
export type ToonTable = {
  readonly kind: 'table';
  readonly headers: readonly string[];
  readonly rows: readonly (readonly ToonValue[])[];
};
export type ToonDate = { readonly kind: 'date'; readonly value: Date };
export type ToonBigInt = { readonly kind: 'bigint'; readonly value: bigint };

export type ToonValue =
  | ToonNull
  | ToonBool
  | ToonNumberValue
  | ToonString
  | ToonArray
  | ToonObject
  | ToonTable
  | ToonDate
  | ToonBigInt;

/** Values allowed in a tabular row or an inline array. */
export type ToonPrimitive = ToonNull | ToonBool | ToonNumberValue | ToonString | ToonDate | ToonBigInt;

// --- Constructors ---

const NULL: ToonNull = Object.freeze({ kind: 'null' });
const TRUE: ToonBool = Object.freeze({ kind: 'bool', value: true });
const FALSE: ToonBool = Object.freeze({ kind: 'bool', value: false });

export function toonNull(): ToonNull {
  return NULL;
}

export function toonBool(value: boolean): ToonBool {
  return value ? TRUE : FALSE;
}

export function toonInteger(value: number): ToonNumberValue {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Integer out of range: ${value}`);
  }
  return Object.freeze({ kind: 'number', value: Object.freeze({ kind: 'integer', value: value === 0 ? 0 : value }) });
}

export function toonFloat(value: number): ToonNumberValue {
  return freezeNumber(floatNumber(value));
}

/** Picks the number variant for a JS number: safe integers stay integers. */
export function toonNumber(value: number): ToonNumberValue {
  if (Number.isSafeInteger(value)) return toonInteger(value);
  return toonFloat(value);
}

/** Wraps a number variant; `integer` must be a safe integer and `float` finite. */
export function toonNumberOf(value: ToonNumber): ToonNumberValue {
  switch (value.kind) {
    case 'integer':
      return toonInteger(value.value);
    case 'float':
      if (!Number.isFinite(value.value)) {
        throw new RangeError(`Float must be finite: ${value.value}`);
      }
      return freezeNumber({ kind: 'float', value: value.value });
    default:
      return freezeNumber({ ...value });
  }
}

function freezeNumber(value: ToonNumber): ToonNumberValue {
  return Object.freeze({ kind: 'number', value: Object.freeze(value) });
}

function floatNumber(value: number): ToonNumber {
  if (Number.isNaN(value)) return { kind: 'nan' };
  if (value === Infinity) return { kind: 'infinity' };
  if (value === -Infinity) return { kind: 'negative-infinity' };
  return { kind: 'float', value };
}

export function toonString(value: string): ToonString {
  return Object.freeze({ kind: 'string', value });
}

export function toonArray(items: Iterable<ToonValue>): ToonArray {
  return Object.freeze({ kind: 'array', items: Object.freeze([...items]) });
}

/**
 * Builds an object from entries. A repeated key replaces the earlier value
 * and keeps the earlier position, as `Map#set` does.
 */
export function toonObject(entries: Iterable<readonly [string, ToonValue]> = []): ToonObject {
  const map = new Map<string, ToonValue>();
  for (const [key, value] of entries) map.set(key, value);
  return Object.freeze({ kind: 'object', entries: map });
}

export function toonTable(headers: readonly string[], rows: readonly (readonly ToonValue[])[]): ToonTable {
  for (const row of rows) {
    if (row.length !== headers.length) {
      throw new RangeError(`Table row has ${row.length} cells, expected ${headers.length}`);
    }
  }
  return Object.freeze({
    kind: 'table',
    headers: Object.freeze([...headers]),
    rows: Object.freeze(rows.map((row) => Object.freeze([...row]))),
  });
}

export function toonDate(value: Date): ToonDate {
  if (Number.isNaN(value.getTime())) throw new RangeError('Invalid date');
  return Object.freeze({ kind: 'date', value: new Date(value.getTime()) });
}

export function toonBigInt(value: bigint): ToonBigInt {
  return Object.freeze({ kind: 'bigint', value });
}

// --- Predicates ---

export function isNull(v: ToonValue): v is ToonNull {
  return v.kind === 'null';
}

export function isBool(v: ToonValue): v is ToonBool {
  return v.kind === 'bool';
}

export function isNumber(v: ToonValue): v is ToonNumberValue {
  return v.kind === 'number';
}

export function isString(v: ToonValue): v is ToonString {
  return v.kind === 'string';
}

export function isArray(v: ToonValue): v is ToonArray {
  return v.kind === 'array';
}

export function isObject(v: ToonValue): v is ToonObject {
  return v.kind === 'object';
}

export function isTable(v: ToonValue): v is ToonTable {
  return v.kind === 'table';
}

export function isDate(v: ToonValue): v is ToonDate {
  return v.kind === 'date';
}

export function isBigInt(v: ToonValue): v is ToonBigInt {
  return v.kind === 'bigint';
}

export function isPrimitive(v: ToonValue): v is ToonPrimitive {
  return v.kind !== 'array' && v.kind !== 'object' && v.kind !== 'table';
}

export function isInteger(n: ToonNumber): boolean {
  return n.kind === 'integer';
}

export function isFloat(n: ToonNumber): boolean {
  return n.kind === 'float';
}

/** Infinity, -Infinity or NaN. */
export function isSpecial(n: ToonNumber): boolean {
  return n.kind === 'infinity' || n.kind === 'negative-infinity' || n.kind === 'nan';
}

// --- Accessors ---

export function asBool(v: ToonValue): boolean | undefined {
  return v.kind === 'bool' ? v.value : undefined;
}

export function asString(v: ToonValue): string | undefined {
  return v.kind === 'string' ? v.value : undefined;
}

export function asI64(v: ToonValue): number | undefined {
  return v.kind === 'number' ? numberAsI64(v.value) : undefined;
}

export function asF64(v: ToonValue): number | undefined {
  return v.kind === 'number' ? numberAsF64(v.value) : undefined;
}

export function asArray(v: ToonValue): readonly ToonValue[] | undefined {
  return v.kind === 'array' ? v.items : undefined;
}

export function asObject(v: ToonValue): ToonMap | undefined {
  return v.kind === 'object' ? v.entries : undefined;
}

export function asDate(v: ToonValue): Date | undefined {
  return v.kind === 'date' ? new Date(v.value.getTime()) : undefined;
}

export function asBigInt(v: ToonValue): bigint | undefined {
  return v.kind === 'bigint' ? v.value : undefined;
}

/** Integers and whole floats in the safe-integer range; undefined otherwise. */
export function numberAsI64(n: ToonNumber): number | undefined {
  switch (n.kind) {
    case 'integer':
      return n.value;
    case 'float':
      return Number.isSafeInteger(n.value) ? n.value : undefined;
    default:
      return undefined;
  }
}

export function numberAsF64(n: ToonNumber): number {
  switch (n.kind) {
    case 'integer':
    case 'float':
      return n.value;
    case 'infinity':
      return Infinity;
    case 'negative-infinity':
      return -Infinity;
    case 'nan':
      return NaN;
  }
}

// --- Tables ---

/** Replaces every table in the tree with an array of objects keyed by header. */
export function normalizeTables(value: ToonValue): ToonValue {
  switch (value.kind) {
    case 'table':
      return toonArray(
        value.rows.map((row) =>
          toonObject(value.headers.map((header, i): [string, ToonValue] => [header, row[i] ?? NULL]))
        )
      );
    case 'array':
      return toonArray(value.items.map(normalizeTables));
    case 'object': {
      const entries: [string, ToonValue][] = [];
      for (const [key, v] of value.entries) entries.push([key, normalizeTables(v)]);
      return toonObject(entries);
    }
    default:
      return value;
  }
}

// --- Equality ---

/**
 * Structural equality. Numbers compare by value (`1` equals `1.0`, NaN equals
 * NaN); objects compare as key sets; tables compare in normalized form.
 */
export function valueEquals(a: ToonValue, b: ToonValue): boolean {
  if (a.kind === 'table' || b.kind === 'table') {
    return valueEquals(normalizeTables(a), normalizeTables(b));
  }
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'bigint':
      return b.kind === 'bigint' && b.value === a.value;
    case 'date':
      return b.kind === 'date' && b.value.getTime() === a.value.getTime();
    case 'number': {
      if (b.kind !== 'number') return false;
      const x = numberAsF64(a.value);
      const y = numberAsF64(b.value);
      return x === y || (Number.isNaN(x) && Number.isNaN(y));
    }
    case 'array':
      return (
        b.kind === 'array' &&
        b.items.length === a.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && valueEquals(item, other);
        })
      );
    case 'object': {
      if (b.kind !== 'object' || b.entries.size !== a.entries.size) return false;
      for (const [key, v] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valueEquals(v, other)) return false;
      }
      return true;
    }
  }
}

// --- Display ---

const VARIANT_NAMES: Record<ToonValue['kind'], string> = {
  null: 'null',
  bool: 'boolean',
  number: 'number',
  string: 'string',
  array: 'array',
  object: 'object',
  table: 'table',
  date: 'date',
  bigint: 'bigint',
};

export function describeValue(v: ToonValue): string {
  return VARIANT_NAMES[v.kind];
}

export function numberToDisplayString(n: ToonNumber): string {
  switch (n.kind) {
    case 'integer':
    case 'float':
      return String(n.value);
    case 'infinity':
      return 'Infinity';
    case 'negative-infinity':
      return '-Infinity';
    case 'nan':
      return 'NaN';
  }
}

/** Short display form for messages and debugging; not the wire format. */
export function valueToDisplayString(v: ToonValue): string {
  switch (v.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return String(v.value);
    case 'number':
      return numberToDisplayString(v.value);
    case 'string':
      return JSON.stringify(v.value);
    case 'array':
      return `[${v.items.map(valueToDisplayString).join(', ')}]`;
    case 'object':
      return '{object}';
    case 'table':
      return `[table ${v.rows.length}x${v.headers.length}]`;
    case 'date':
      return v.value.toISOString();
    case 'bigint':
      return `${v.value}n`;
  }
}
