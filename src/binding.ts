/**
 * Bridges between TOON values and host data. A ValueSink folds a parsed
 * value bottom-up; a ValueSource pushes host data through a ValueEmitter.
 */

import {
  numberAsF64,
  toonArray,
  toonBigInt,
  toonBool,
  toonDate,
  toonNull,
  toonNumber,
  toonNumberOf,
  toonObject,
  toonString,
  type ToonNumber,
  type ToonValue,
} from './ast.js';
import { ConfigManager } from './config.js';
import { ToonCustomError, ToonUnsupportedTypeError } from './errors.js';

// --- Deserialization side ---

export interface ValueSink<T> {
  visitNull(): T;
  visitBool(value: boolean): T;
  visitNumber(value: ToonNumber): T;
  visitString(value: string): T;
  visitDate(value: Date): T;
  visitBigInt(value: bigint): T;
  visitSequence(elements: T[]): T;
  visitMap(entries: [string, T][]): T;
}

/**
 * Walks a value bottom-up. Tables are presented as sequences of maps, so a
 * sink never sees one.
 */
export function accept<T>(value: ToonValue, sink: ValueSink<T>): T {
  switch (value.kind) {
    case 'null':
      return sink.visitNull();
    case 'bool':
      return sink.visitBool(value.value);
    case 'number':
      return sink.visitNumber(value.value);
    case 'string':
      return sink.visitString(value.value);
    case 'date':
      return sink.visitDate(new Date(value.value.getTime()));
    case 'bigint':
      return sink.visitBigInt(value.value);
    case 'array':
      return sink.visitSequence(value.items.map((item) => accept(item, sink)));
    case 'object': {
      const entries: [string, T][] = [];
      for (const [key, v] of value.entries) entries.push([key, accept(v, sink)]);
      return sink.visitMap(entries);
    }
    case 'table':
      return sink.visitSequence(
        value.rows.map((row) =>
          sink.visitMap(value.headers.map((header, i): [string, T] => [header, accept(row[i] ?? toonNull(), sink)]))
        )
      );
  }
}

/** Converts to plain JS data: numbers, strings, booleans, null, Date, bigint, arrays and objects. */
export class PlainSink implements ValueSink<unknown> {
  visitNull(): unknown {
    return null;
  }

  visitBool(value: boolean): unknown {
    return value;
  }

  visitNumber(value: ToonNumber): unknown {
    return numberAsF64(value);
  }

  visitString(value: string): unknown {
    return value;
  }

  visitDate(value: Date): unknown {
    return value;
  }

  visitBigInt(value: bigint): unknown {
    return value;
  }

  visitSequence(elements: unknown[]): unknown {
    return elements;
  }

  visitMap(entries: [string, unknown][]): unknown {
    return Object.fromEntries(entries);
  }
}

// --- Serialization side ---

/** Receives exactly one value. Containers are filled through callbacks. */
export interface ValueEmitter {
  null(): void;
  bool(value: boolean): void;
  /** Safe integers become integers; everything else a float or a special value. */
  number(value: number): void;
  numberOf(value: ToonNumber): void;
  string(value: string): void;
  date(value: Date): void;
  bigint(value: bigint): void;
  sequence(fill: (element: ValueEmitter) => void): void;
  /** `field(key)` returns the emitter for that key's value. */
  map(fill: (field: (key: string) => ValueEmitter) => void): void;
  /** Emits an already-built value. */
  value(value: ToonValue): void;
}

export interface ValueSource {
  emit(out: ValueEmitter): void;
}

export function isValueSource(input: ToonValue | ValueSource): input is ValueSource {
  return 'emit' in input && typeof input.emit === 'function';
}

/** Assembles a ToonValue from emitter events and hands it to `put`. */
export class ValueBuilder implements ValueEmitter {
  constructor(private readonly put: (value: ToonValue) => void) {}

  null(): void {
    this.put(toonNull());
  }

  bool(value: boolean): void {
    this.put(toonBool(value));
  }

  number(value: number): void {
    this.put(toonNumber(value));
  }

  numberOf(value: ToonNumber): void {
    this.put(toonNumberOf(value));
  }

  string(value: string): void {
    this.put(toonString(value));
  }

  date(value: Date): void {
    if (Number.isNaN(value.getTime())) throw new ToonUnsupportedTypeError('invalid Date');
    this.put(toonDate(value));
  }

  bigint(value: bigint): void {
    this.put(toonBigInt(value));
  }

  sequence(fill: (element: ValueEmitter) => void): void {
    const items: ToonValue[] = [];
    fill(new ValueBuilder((v) => items.push(v)));
    this.put(toonArray(items));
  }

  map(fill: (field: (key: string) => ValueEmitter) => void): void {
    const entries = new Map<string, ToonValue>();
    fill((key) => new ValueBuilder((v) => entries.set(key, v)));
    this.put(toonObject(entries));
  }

  value(value: ToonValue): void {
    this.put(value);
  }
}

/** Runs a source and returns the single value it emitted. */
export function buildValue(source: ValueSource): ToonValue {
  let result: ToonValue | undefined;
  source.emit(
    new ValueBuilder((v) => {
      if (result !== undefined) throw new ToonCustomError('source emitted more than one root value');
      result = v;
    })
  );
  if (result === undefined) throw new ToonCustomError('source emitted no value');
  return result;
}

/**
 * Plain JS data as a source. `undefined` fields are dropped and `undefined`
 * array slots become null; Maps need string keys.
 */
export class PlainSource implements ValueSource {
  private readonly seen = new Set<object>();

  constructor(
    private readonly data: unknown,
    private readonly maxDepth: number = ConfigManager.cfg.maxDepth
  ) {}

  emit(out: ValueEmitter): void {
    this.seen.clear();
    this.emitValue(this.data, out, 0);
  }

  private emitValue(v: unknown, out: ValueEmitter, depth: number): void {
    if (v === null || v === undefined) return out.null();
    switch (typeof v) {
      case 'boolean':
        return out.bool(v);
      case 'number':
        return out.number(v);
      case 'string':
        return out.string(v);
      case 'bigint':
        return out.bigint(v);
      case 'function':
      case 'symbol':
        throw new ToonUnsupportedTypeError(`${typeof v} values cannot be serialized`);
    }
    if (typeof v !== 'object') throw new ToonUnsupportedTypeError(`${typeof v} values cannot be serialized`);
    if (v instanceof Date) return out.date(v);
    if (depth >= this.maxDepth) {
      throw new ToonUnsupportedTypeError(`nesting deeper than ${this.maxDepth} levels`);
    }
    if (this.seen.has(v)) throw new ToonUnsupportedTypeError('circular structure');
    this.seen.add(v);
    try {
      if (Array.isArray(v)) {
        out.sequence((element) => {
          for (const item of v) this.emitValue(item, element, depth + 1);
        });
      } else if (v instanceof Map) {
        out.map((field) => {
          for (const [key, item] of v) {
            if (typeof key !== 'string') {
              throw new ToonUnsupportedTypeError(`map keys must be strings, found ${typeof key}`);
            }
            if (item !== undefined) this.emitValue(item, field(key), depth + 1);
          }
        });
      } else {
        out.map((field) => {
          for (const [key, item] of Object.entries(v)) {
            if (item !== undefined) this.emitValue(item, field(key), depth + 1);
          }
        });
      }
    } finally {
      this.seen.delete(v);
    }
  }
}

/** Plain JS data → ToonValue. */
export function toValue(data: unknown): ToonValue {
  return buildValue(new PlainSource(data));
}

/** ToonValue → plain JS data. */
export function fromValue(value: ToonValue): unknown {
  return accept(value, new PlainSink());
}
