import { describe, expect, it } from 'vitest';
import { escapeString, formatKey, looksLikeBigInt, looksNumeric, needsQuotes, quoteString } from './quoting.js';

describe('needsQuotes', () => {
  it('leaves plain words bare', () => {
    expect(needsQuotes('hello')).toBe(false);
    expect(needsQuotes('hello world')).toBe(false);
    expect(needsQuotes('café')).toBe(false);
  });

  it('quotes empty strings and surrounding spaces', () => {
    expect(needsQuotes('')).toBe(true);
    expect(needsQuotes(' x')).toBe(true);
    expect(needsQuotes('x ')).toBe(true);
  });

  it('quotes structural characters', () => {
    for (const s of ['a:b', 'say "hi"', 'back\\slash', 'two\nlines', 'cr\rhere', 'tab\there', 'nul\0']) {
      expect(needsQuotes(s)).toBe(true);
    }
  });

  it('quotes only the active delimiter', () => {
    expect(needsQuotes('a,b', 'comma')).toBe(true);
    expect(needsQuotes('a,b', 'pipe')).toBe(false);
    expect(needsQuotes('a|b', 'pipe')).toBe(true);
    expect(needsQuotes('a|b', 'comma')).toBe(false);
  });

  it('quotes reserved words and number-like text', () => {
    for (const s of ['true', 'false', 'null', '42', '-3.5', '1e10', '.5', 'inf', '-Infinity', 'NaN', '12n', '-7n']) {
      expect(needsQuotes(s)).toBe(true);
    }
    expect(needsQuotes('True')).toBe(false);
    expect(needsQuotes('1.2.3')).toBe(false);
  });

  it('quotes list prefixes and structural look-alikes', () => {
    expect(needsQuotes('- item')).toBe(true);
    expect(needsQuotes('-item')).toBe(false);
    expect(needsQuotes('[x]')).toBe(true);
    expect(needsQuotes('{a}')).toBe(true);
    expect(needsQuotes('[3')).toBe(true);
    expect(needsQuotes('[#3')).toBe(true);
    expect(needsQuotes('[abc')).toBe(false);
  });
});

describe('number detection', () => {
  it('recognizes float syntax', () => {
    expect(looksNumeric('+1')).toBe(true);
    expect(looksNumeric('1.')).toBe(true);
    expect(looksNumeric('1e')).toBe(false);
    expect(looksNumeric('0x10')).toBe(false);
  });

  it('recognizes bigint literals', () => {
    expect(looksLikeBigInt('123n')).toBe(true);
    expect(looksLikeBigInt('n')).toBe(false);
    expect(looksLikeBigInt('1.5n')).toBe(false);
  });
});

describe('escapeString', () => {
  it('escapes control characters and quotes', () => {
    expect(escapeString('a"b\\c')).toBe('a\\"b\\\\c');
    expect(escapeString('\n\r\t\b\f\0')).toBe('\\n\\r\\t\\b\\f\\0');
  });
});

describe('quoteString', () => {
  it('wraps and escapes only when needed', () => {
    expect(quoteString('plain')).toBe('plain');
    expect(quoteString('line1\nline2')).toBe('"line1\\nline2"');
    expect(quoteString('hello,world')).toBe('"hello,world"');
    expect(quoteString('hello,world', 'pipe')).toBe('hello,world');
  });

  it('is stable when applied to its own output', () => {
    const once = quoteString('a:b');
    expect(once).toBe('"a:b"');
    expect(quoteString(once)).toBe('"\\"a:b\\""');
  });
});

describe('formatKey', () => {
  it('keeps identifier-like keys bare', () => {
    expect(formatKey('name')).toBe('name');
    expect(formatKey('user_id')).toBe('user_id');
    expect(formatKey('a.b-c')).toBe('a.b-c');
  });

  it('quotes everything else', () => {
    expect(formatKey('my key')).toBe('"my key"');
    expect(formatKey('-x')).toBe('"-x"');
    expect(formatKey('1st')).toBe('"1st"');
    expect(formatKey('true')).toBe('"true"');
    expect(formatKey('')).toBe('""');
  });
});
