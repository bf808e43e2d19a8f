import { describe, expect, it } from 'vitest';
import { ToonInvalidOptionsError } from './errors.js';
import {
  createOptions,
  defaultOptions,
  delimiterChar,
  delimiterHeaderSuffix,
  headerFieldSeparator,
  prettyOptions,
  withDelimiter,
  withIndent,
  withLengthMarker,
  withPretty,
} from './options.js';

describe('options', () => {
  it('has compact comma defaults', () => {
    expect(defaultOptions()).toEqual({ indent: 2, delimiter: 'comma', lengthMarker: undefined, pretty: false });
    expect(createOptions()).toEqual(defaultOptions());
    expect(prettyOptions().pretty).toBe(true);
  });

  it('returns frozen copies from the with helpers', () => {
    const base = defaultOptions();
    const tabbed = withDelimiter(withIndent(base, 4), 'tab');
    expect(tabbed).toEqual({ indent: 4, delimiter: 'tab', lengthMarker: undefined, pretty: false });
    expect(base.indent).toBe(2);
    expect(Object.isFrozen(tabbed)).toBe(true);
    expect(withLengthMarker(base, '#').lengthMarker).toBe('#');
    expect(withPretty(base, true).pretty).toBe(true);
  });

  it('rejects out-of-range values', () => {
    expect(() => createOptions({ indent: 0 })).toThrow(ToonInvalidOptionsError);
    expect(() => createOptions({ indent: 2.5 })).toThrow(ToonInvalidOptionsError);
    expect(() => createOptions({ lengthMarker: '##' })).toThrow(ToonInvalidOptionsError);
    expect(() => createOptions({ lengthMarker: '3' })).toThrow(ToonInvalidOptionsError);
  });

  it('rejects whitespace length markers', () => {
    for (const marker of [' ', '\t', '\f', '\v', '\u00a0', '\u2003']) {
      expect(() => createOptions({ lengthMarker: marker })).toThrow(ToonInvalidOptionsError);
    }
  });

  it('lists every issue', () => {
    try {
      createOptions({ indent: 0, lengthMarker: '|' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ToonInvalidOptionsError);
      if (err instanceof ToonInvalidOptionsError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0]).toMatch(/^indent: /);
        expect(err.issues[1]).toBe('lengthMarker: length marker cannot be a digit, whitespace, `]` or `|`');
      }
    }
  });

  it('describes delimiters', () => {
    expect(delimiterChar('comma')).toBe(',');
    expect(delimiterChar('tab')).toBe('\t');
    expect(delimiterChar('pipe')).toBe('|');
    expect(delimiterHeaderSuffix('comma')).toBe('');
    expect(delimiterHeaderSuffix('tab')).toBe('    ');
    expect(delimiterHeaderSuffix('pipe')).toBe('|');
    expect(headerFieldSeparator('tab')).toBe('    ');
    expect(headerFieldSeparator('pipe')).toBe('|');
  });
});
