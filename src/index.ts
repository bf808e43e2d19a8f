/**
 * toon-codec: parse and serialize TOON, a compact line-oriented text format
 * for structured data.
 */

import type { ToonValue } from './ast.js';
import { fromValue, PlainSource } from './binding.js';
import { isToonError, ToonCustomError, type ToonError } from './errors.js';
import { parse, type ParseOptions } from './parser.js';
import { serialize, type SerializeOptions } from './stringify.js';

export * from './ast.js';
export * from './errors.js';
export * from './options.js';
export { needsQuotes, escapeString, quoteString, formatKey } from './quoting.js';
export { selectArrayFormat, type ArrayFormat } from './format.js';
export { parse, parseRaw, type ParseOptions } from './parser.js';
export { serialize, formatFloat, type SerializeOptions } from './stringify.js';
export {
  accept,
  buildValue,
  fromValue,
  isValueSource,
  PlainSink,
  PlainSource,
  toValue,
  ValueBuilder,
  type ValueEmitter,
  type ValueSink,
  type ValueSource,
} from './binding.js';
export { ConfigManager, type ToonConfig, type LogLevel } from './config.js';
export { resetLogger } from './logger.js';

export type TryParseResult = { ok: true; value: ToonValue } | { ok: false; error: ToonError };

/** Like `parse`, but reports failures as a result instead of throwing. */
export function tryParse(text: string, options?: ParseOptions): TryParseResult {
  try {
    return { ok: true, value: parse(text, options) };
  } catch (err) {
    if (isToonError(err)) return { ok: false, error: err };
    return { ok: false, error: new ToonCustomError(err instanceof Error ? err.message : String(err), { cause: err }) };
  }
}

/** Plain JS data → TOON text. */
export function encode(data: unknown, options?: SerializeOptions): string {
  return serialize(new PlainSource(data, options?.maxDepth), options);
}

/** TOON text → plain JS data. */
export function decode(text: string, options?: ParseOptions): unknown {
  return fromValue(parse(text, options));
}
