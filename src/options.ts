/**
 * Serialization options. Options records are frozen; the `with*` helpers
 * return updated copies.
 */

import { z } from 'zod';
import { ToonInvalidOptionsError } from './errors.js';

export type Delimiter = 'comma' | 'tab' | 'pipe';

export interface ToonOptions {
  /** Spaces per nesting level (default 2). */
  readonly indent: number;
  /** Separator for inline arrays, tabular rows and tabular headers (default comma). */
  readonly delimiter: Delimiter;
  /** Single character written before array lengths, e.g. `#` gives `[#3]`. */
  readonly lengthMarker: string | undefined;
  /** Ends the document with a newline (default false). */
  readonly pretty: boolean;
}

export type ToonOptionsInput = Partial<ToonOptions>;

const MAX_INDENT = 16;

const OptionsSchema = z.object({
  indent: z.number().int().min(1).max(MAX_INDENT).default(2),
  delimiter: z.enum(['comma', 'tab', 'pipe']).default('comma'),
  lengthMarker: z
    .string()
    .length(1, 'length marker must be a single character')
    .regex(/^[^\d\]|\s]$/u, 'length marker cannot be a digit, whitespace, `]` or `|`')
    .optional(),
  pretty: z.boolean().default(false),
});

const DEFAULTS: ToonOptions = Object.freeze({
  indent: 2,
  delimiter: 'comma',
  lengthMarker: undefined,
  pretty: false,
});

export function defaultOptions(): ToonOptions {
  return DEFAULTS;
}

/** Validates and freezes an options record; unset fields take their defaults. */
export function createOptions(input: ToonOptionsInput = {}): ToonOptions {
  const parsed = OptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ToonInvalidOptionsError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`),
      { cause: parsed.error }
    );
  }
  return Object.freeze({
    indent: parsed.data.indent,
    delimiter: parsed.data.delimiter,
    lengthMarker: parsed.data.lengthMarker,
    pretty: parsed.data.pretty,
  });
}

export function prettyOptions(): ToonOptions {
  return createOptions({ pretty: true });
}

export function withIndent(options: ToonOptions, indent: number): ToonOptions {
  return createOptions({ ...options, indent });
}

export function withDelimiter(options: ToonOptions, delimiter: Delimiter): ToonOptions {
  return createOptions({ ...options, delimiter });
}

export function withLengthMarker(options: ToonOptions, lengthMarker: string | undefined): ToonOptions {
  return createOptions({ ...options, lengthMarker });
}

export function withPretty(options: ToonOptions, pretty: boolean): ToonOptions {
  return createOptions({ ...options, pretty });
}

/** The character that separates values on a row. */
export function delimiterChar(delimiter: Delimiter): string {
  switch (delimiter) {
    case 'comma':
      return ',';
    case 'tab':
      return '\t';
    case 'pipe':
      return '|';
  }
}

/**
 * How the delimiter is announced inside `[N…]` and between tabular headers.
 * Tabs are shown as four spaces there; comma is implicit in the length suffix.
 */
export function delimiterHeaderSuffix(delimiter: Delimiter): string {
  switch (delimiter) {
    case 'comma':
      return '';
    case 'tab':
      return '    ';
    case 'pipe':
      return '|';
  }
}

export function headerFieldSeparator(delimiter: Delimiter): string {
  return delimiter === 'tab' ? '    ' : delimiterChar(delimiter);
}
