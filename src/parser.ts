/**
 * Single-pass TOON reader: text → ToonValue. Tracks indentation scopes on a
 * stack; the only lookahead is bounded to the current or next non-blank line.
 */

import {
  normalizeTables,
  toonArray,
  toonBigInt,
  toonBool,
  toonFloat,
  toonInteger,
  toonNull,
  toonObject,
  toonString,
  toonTable,
  type SourcePosition,
  type ToonValue,
} from './ast.js';
import { DEFAULT_MAX_DEPTH } from './config.js';
import {
  ToonIndentationError,
  ToonInvalidFormatError,
  ToonSyntaxError,
  ToonTypeMismatchError,
  ToonUnexpectedEofError,
} from './errors.js';
import { log } from './logger.js';
import { delimiterChar, type Delimiter } from './options.js';

export interface ParseOptions {
  /** Max nesting depth (default 256). */
  maxDepth?: number;
  /** Max input length in characters (default 10_000_000). */
  maxInputLength?: number;
}

const DEFAULT_MAX_INPUT_LENGTH = 10_000_000;

const enum C {
  Tab = 9,
  Newline = 10,
  Space = 32,
  Quote = 34,
  Minus = 45,
  Zero = 48,
  Nine = 57,
  Colon = 58,
  LBracket = 91,
  Backslash = 92,
  RBracket = 93,
  LowerB = 98,
  LowerF = 102,
  LowerN = 110,
  LowerR = 114,
  LowerT = 116,
  LowerU = 117,
  LBrace = 123,
  Pipe = 124,
  RBrace = 125,
}

const INTEGER_RE = /^[+-]?\d+$/;
const BIGINT_RE = /^-?\d+n$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_RE = /^[+-]?inf(?:inity)?$/i;
const NAN_RE = /^[+-]?nan$/i;
const NUMBER_LEXEME_RE = /-?\d+(?:\.\d+)?/y;
const ARRAY_START_RE = /\[[^\d\]\s]?\d/y;
const WORD_RE = /[A-Za-z]+/y;

const MIN_I64 = -(2n ** 63n);
const MAX_I64 = 2n ** 63n - 1n;

interface LineInfo {
  /** Offset of the first character of the line. */
  start: number;
  /** Leading spaces. */
  indent: number;
}

/**
 * Parses a document. Tabular arrays come back as arrays of objects.
 */
export function parse(text: string, options: ParseOptions = {}): ToonValue {
  return normalizeTables(parseRaw(text, options));
}

/**
 * Parses a document and keeps tabular arrays as `table` values.
 */
export function parseRaw(text: string, options: ParseOptions = {}): ToonValue {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (text.length > maxLen) {
    throw new ToonInvalidFormatError(`Input exceeds maximum length (${text.length} > ${maxLen})`, {
      line: 1,
      column: 1,
      offset: 0,
    });
  }
  const input = text.includes('\r\n') ? text.replace(/\r\n/g, '\n') : text;
  const value = new Reader(input, maxDepth).parseDocument();
  log.debug('parsed document', { chars: text.length, root: value.kind });
  return value;
}

class Reader {
  private pos = 0;
  private line = 1;
  private col = 1;
  /** Indentation of each open object or array body; the root scope is 0. */
  private readonly indentStack: number[] = [0];

  constructor(
    private readonly input: string,
    private readonly maxDepth: number
  ) {}

  // --- cursor ---

  private get len(): number {
    return this.input.length;
  }

  private peek(): number {
    return this.pos >= this.len ? -1 : this.input.charCodeAt(this.pos);
  }

  private advance(): number {
    if (this.pos >= this.len) return -1;
    const c = this.input.charCodeAt(this.pos);
    this.pos++;
    if (c === C.Newline) {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return c;
  }

  private moveTo(offset: number): void {
    while (this.pos < offset) this.advance();
  }

  private skipSpaces(): void {
    while (this.peek() === C.Space) this.advance();
  }

  private atLineEnd(): boolean {
    const c = this.peek();
    return c === -1 || c === C.Newline;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.col, offset: this.pos };
  }

  private scopeIndent(): number {
    return this.indentStack[this.indentStack.length - 1] ?? 0;
  }

  // --- lines ---

  private lineStartOf(offset: number): number {
    return this.input.lastIndexOf('\n', offset - 1) + 1;
  }

  private currentLineIndent(): number {
    const start = this.lineStartOf(this.pos);
    let i = start;
    while (i < this.len && this.input.charCodeAt(i) === C.Space) i++;
    return i - start;
  }

  /** First line at or after `start` holding something other than spaces and tabs. */
  private contentLineFrom(start: number): LineInfo | undefined {
    let lineStart = start;
    while (lineStart < this.len) {
      let i = lineStart;
      while (i < this.len && this.input.charCodeAt(i) === C.Space) i++;
      let j = i;
      while (j < this.len && (this.input.charCodeAt(j) === C.Space || this.input.charCodeAt(j) === C.Tab)) j++;
      if (j >= this.len) return undefined;
      if (this.input.charCodeAt(j) !== C.Newline) return { start: lineStart, indent: i - lineStart };
      lineStart = j + 1;
    }
    return undefined;
  }

  private nextContentLine(): LineInfo | undefined {
    const nl = this.input.indexOf('\n', this.pos);
    return nl === -1 ? undefined : this.contentLineFrom(nl + 1);
  }

  /** A `:` outside double quotes between `from` and the end of its line. */
  private colonAheadOnLine(from: number): boolean {
    let inQuotes = false;
    for (let i = from; i < this.len; i++) {
      const c = this.input.charCodeAt(i);
      if (c === C.Newline) break;
      if (inQuotes) {
        if (c === C.Backslash) i++;
        else if (c === C.Quote) inQuotes = false;
      } else if (c === C.Quote) {
        inQuotes = true;
      } else if (c === C.Colon) {
        return true;
      }
    }
    return false;
  }

  /** True when the quoted string at the cursor is followed by `:` (a quoted key). */
  private quotedKeyAhead(): boolean {
    let i = this.pos + 1;
    for (; i < this.len; i++) {
      const c = this.input.charCodeAt(i);
      if (c === C.Newline) return false;
      if (c === C.Backslash) i++;
      else if (c === C.Quote) break;
    }
    i++;
    while (i < this.len && this.input.charCodeAt(i) === C.Space) i++;
    return i < this.len && this.input.charCodeAt(i) === C.Colon;
  }

  private arrayStartAhead(): boolean {
    ARRAY_START_RE.lastIndex = this.pos;
    return ARRAY_START_RE.test(this.input);
  }

  // --- errors ---

  private context(): string {
    const start = this.lineStartOf(this.pos);
    let end = this.input.indexOf('\n', this.pos);
    if (end === -1) end = this.len;
    return `${this.input.slice(start, end)}\n${' '.repeat(this.pos - start)}^`;
  }

  private fail(message: string, suggestion?: string): never {
    throw new ToonSyntaxError(message, this.position(), { context: this.context(), suggestion });
  }

  private failFormat(message: string): never {
    throw new ToonInvalidFormatError(message, this.position());
  }

  private failEof(expected: string): never {
    throw new ToonUnexpectedEofError(expected, this.position(), this.context());
  }

  private failIndent(expected: number, line: LineInfo): never {
    this.moveTo(line.start + line.indent);
    throw new ToonIndentationError(expected, line.indent, this.position(), this.context());
  }

  private expectLineEnd(): void {
    this.skipSpaces();
    if (!this.atLineEnd()) this.fail('Unexpected characters after value');
  }

  // --- document ---

  parseDocument(): ToonValue {
    const first = this.contentLineFrom(0);
    if (!first) return toonObject();
    this.moveTo(first.start + first.indent);
    const value = this.parseValue(0);
    this.expectLineEnd();
    const rest = this.nextContentLine();
    if (rest) {
      this.moveTo(rest.start + rest.indent);
      this.fail('Unexpected content after the end of the document', 'did you mean `key: value`?');
    }
    return value;
  }

  private parseValue(depth: number): ToonValue {
    if (depth > this.maxDepth) this.failFormat(`Maximum nesting depth exceeded (${this.maxDepth})`);
    this.skipSpaces();
    const c = this.peek();

    if (c === C.LBracket && this.arrayStartAhead()) return this.parseArray(depth);
    if (c === C.Quote) {
      if (this.quotedKeyAhead()) return this.parseObject(depth);
      return toonString(this.parseQuotedString());
    }
    if (c === C.LowerT || c === C.LowerF || c === C.LowerN) {
      const literal = this.tryLiteral();
      if (literal) return literal;
    } else if (c === C.Minus || (c >= C.Zero && c <= C.Nine)) {
      const num = this.tryNumber();
      if (num) return num;
    }
    if (this.atLineEnd()) return toonObject();
    if (this.colonAheadOnLine(this.pos)) return this.parseObject(depth);
    return this.coerceScalar(this.readUnquoted(-1));
  }

  /** `true`, `false` or `null` when the whole word matches and ends the value. */
  private tryLiteral(): ToonValue | undefined {
    WORD_RE.lastIndex = this.pos;
    const m = WORD_RE.exec(this.input);
    if (!m) return undefined;
    const word = m[0];
    if (word !== 'true' && word !== 'false' && word !== 'null') return undefined;
    if (!this.valueEndsAt(this.pos + word.length)) return undefined;
    this.moveTo(this.pos + word.length);
    return word === 'null' ? toonNull() : toonBool(word === 'true');
  }

  private tryNumber(): ToonValue | undefined {
    NUMBER_LEXEME_RE.lastIndex = this.pos;
    const m = NUMBER_LEXEME_RE.exec(this.input);
    if (!m) return undefined;
    const lexeme = m[0];
    if (!this.valueEndsAt(this.pos + lexeme.length)) return undefined;
    const value = lexeme.includes('.') ? toonFloat(Number(lexeme)) : this.integerFromLexeme(lexeme);
    this.moveTo(this.pos + lexeme.length);
    return value;
  }

  /** Only spaces remain on the line from `offset`. */
  private valueEndsAt(offset: number): boolean {
    let i = offset;
    while (i < this.len && this.input.charCodeAt(i) === C.Space) i++;
    return i >= this.len || this.input.charCodeAt(i) === C.Newline;
  }

  private integerFromLexeme(lexeme: string): ToonValue {
    const n = Number(lexeme);
    if (Number.isSafeInteger(n)) return toonInteger(n);
    const big = BigInt(lexeme);
    if (big < MIN_I64 || big > MAX_I64) this.fail('Invalid integer');
    return toonBigInt(big);
  }

  // --- scalars ---

  private parseQuotedString(): string {
    const start = this.position();
    this.advance();
    let out = '';
    for (;;) {
      const c = this.peek();
      if (c === -1 || c === C.Newline) {
        throw new ToonSyntaxError('Unterminated string', start, {
          context: this.context(),
          suggestion: 'close the string with `"`; write line breaks as \\n',
        });
      }
      this.advance();
      if (c === C.Quote) return out;
      if (c !== C.Backslash) {
        out += String.fromCharCode(c);
        continue;
      }
      const e = this.advance();
      switch (e) {
        case -1:
          return this.fail('Unexpected end of input in string');
        case C.Backslash:
          out += '\\';
          break;
        case C.Quote:
          out += '"';
          break;
        case C.LowerN:
          out += '\n';
          break;
        case C.LowerR:
          out += '\r';
          break;
        case C.LowerT:
          out += '\t';
          break;
        case C.LowerB:
          out += '\b';
          break;
        case C.LowerF:
          out += '\f';
          break;
        case C.Zero:
          out += '\0';
          break;
        case C.LowerU: {
          const hex = this.input.slice(this.pos, this.pos + 4);
          if (!/^[\da-fA-F]{4}$/.test(hex)) {
            this.fail('Invalid unicode escape sequence (expected 4 hex digits)');
          }
          this.moveTo(this.pos + 4);
          out += String.fromCharCode(parseInt(hex, 16));
          break;
        }
        default:
          // unknown escapes are kept as written
          out += '\\' + String.fromCharCode(e);
      }
    }
  }

  /** Reads up to `stop` (or the line end) and trims surrounding spaces. */
  private readUnquoted(stop: number): string {
    const start = this.pos;
    while (!this.atLineEnd() && this.peek() !== stop) this.advance();
    const raw = this.input.slice(start, this.pos).replace(/^ +| +$/g, '');
    if (raw.length === 0) this.fail('Expected value');
    return raw;
  }

  private coerceScalar(raw: string): ToonValue {
    if (raw === 'true') return toonBool(true);
    if (raw === 'false') return toonBool(false);
    if (raw === 'null') return toonNull();
    if (INTEGER_RE.test(raw)) return this.integerFromLexeme(raw);
    if (BIGINT_RE.test(raw)) return toonBigInt(BigInt(raw.slice(0, -1)));
    if (FLOAT_RE.test(raw)) return toonFloat(Number(raw));
    if (INFINITY_RE.test(raw)) return toonFloat(raw.startsWith('-') ? -Infinity : Infinity);
    if (NAN_RE.test(raw)) return toonFloat(NaN);
    return toonString(raw);
  }

  /** A cell of an inline array or tabular row. */
  private parsePrimitive(delimiter: number): ToonValue {
    this.skipSpaces();
    if (this.peek() === C.Quote) return toonString(this.parseQuotedString());
    if (this.peek() === C.LBracket && this.arrayStartAhead()) {
      throw new ToonTypeMismatchError('primitive value', 'array', this.position());
    }
    return this.coerceScalar(this.readUnquoted(delimiter));
  }

  // --- arrays ---

  private parseArray(depth: number): ToonValue {
    const headerIndent = Math.max(this.currentLineIndent(), this.scopeIndent());
    this.advance();

    const next = this.peek();
    if (next !== -1 && !(next >= C.Zero && next <= C.Nine) && next !== C.RBracket) this.advance();

    const digitsStart = this.pos;
    while (this.peek() >= C.Zero && this.peek() <= C.Nine) this.advance();
    if (this.pos === digitsStart) this.fail('Invalid array length', 'array headers look like `[3]:`');
    const length = Number(this.input.slice(digitsStart, this.pos));
    if (!Number.isSafeInteger(length)) this.fail('Invalid array length');

    let delimiter: Delimiter = 'comma';
    if (this.peek() === C.Pipe) {
      this.advance();
      delimiter = 'pipe';
    } else if (this.peek() === C.Space) {
      const spacesStart = this.pos;
      this.skipSpaces();
      if (this.pos - spacesStart < 4) this.fail("Expected ']'", 'a tab delimiter is written as four spaces');
      delimiter = 'tab';
    }
    if (this.peek() !== C.RBracket) this.fail("Expected ']'");
    this.advance();

    if (this.peek() === C.LBrace) return this.parseTable(length, delimiter, headerIndent);

    if (this.peek() === C.Colon) {
      this.advance();
    } else if (length !== 0) {
      this.fail("Expected ':' after array header", `write \`[${length}]: …\``);
    }
    if (length === 0) return toonArray([]);

    this.skipSpaces();
    if (this.atLineEnd()) return this.parseListBody(length, headerIndent, depth);
    return this.parseInlineBody(length, delimiter);
  }

  private parseInlineBody(length: number, delimiter: Delimiter): ToonValue {
    const d = delimiterChar(delimiter).charCodeAt(0);
    const items: ToonValue[] = [];
    for (let i = 0; i < length; i++) {
      if (i > 0) {
        this.skipSpaces();
        if (this.atLineEnd()) this.failFormat(`Array declared ${length} items but found ${i}`);
        if (this.peek() !== d) this.fail(`Expected ${JSON.stringify(delimiterChar(delimiter))} between values`);
        this.advance();
      }
      items.push(this.parsePrimitive(d));
    }
    this.skipSpaces();
    if (this.peek() === d) this.failFormat(`Array declared ${length} items but found more`);
    return toonArray(items);
  }

  private parseListBody(length: number, headerIndent: number, depth: number): ToonValue {
    this.indentStack.push(headerIndent);
    const items: ToonValue[] = [];
    let itemIndent: number | undefined;
    for (let i = 0; i < length; i++) {
      const line = this.nextContentLine();
      if (!line) this.failEof(`${length} list items, found ${i}`);
      if (line.indent <= headerIndent) {
        this.moveTo(line.start + line.indent);
        this.failFormat(`Array declared ${length} items but found ${i}`);
      }
      if (itemIndent === undefined) itemIndent = line.indent;
      else if (line.indent !== itemIndent) this.failIndent(itemIndent, line);
      this.moveTo(line.start + line.indent);

      if (this.peek() !== C.Minus) this.fail("Expected '- ' prefix in list format");
      this.advance();
      if (this.atLineEnd()) {
        items.push(toonObject());
        continue;
      }
      if (this.peek() !== C.Space) this.fail("Expected space after '-'");
      this.advance();
      items.push(this.parseValue(depth + 1));
      this.expectLineEnd();
    }
    const after = this.nextContentLine();
    if (after && after.indent === itemIndent && this.input.charCodeAt(after.start + after.indent) === C.Minus) {
      this.moveTo(after.start + after.indent);
      this.failFormat(`Array declared ${length} items but found more`);
    }
    this.indentStack.pop();
    return toonArray(items);
  }

  private parseTable(length: number, delimiter: Delimiter, headerIndent: number): ToonValue {
    const headers = this.parseHeaderFields(delimiter);
    if (this.peek() !== C.Colon) this.fail("Expected ':' after field list");
    this.advance();
    this.skipSpaces();
    if (!this.atLineEnd()) this.fail('Tabular rows start on the next line');

    const d = delimiterChar(delimiter).charCodeAt(0);
    this.indentStack.push(headerIndent);
    const rows: ToonValue[][] = [];
    let rowIndent: number | undefined;
    for (let i = 0; i < length; i++) {
      const line = this.nextContentLine();
      if (!line) this.failEof(`${length} rows, found ${i}`);
      if (line.indent <= headerIndent) {
        this.moveTo(line.start + line.indent);
        this.failFormat(`Array declared ${length} rows but found ${i}`);
      }
      rowIndent ??= line.indent;
      this.moveTo(line.start + line.indent);

      const row: ToonValue[] = [];
      for (let j = 0; j < headers.length; j++) {
        if (j > 0) {
          this.skipSpaces();
          if (this.atLineEnd()) this.failFormat(`Row has ${j} values, expected ${headers.length}`);
          if (this.peek() !== d) this.fail(`Expected ${JSON.stringify(delimiterChar(delimiter))} between values`);
          this.advance();
        }
        row.push(this.parsePrimitive(d));
      }
      this.skipSpaces();
      if (this.peek() === d) this.failFormat(`Row has more than ${headers.length} values`);
      this.expectLineEnd();
      rows.push(row);
    }
    const after = this.nextContentLine();
    if (after && rowIndent !== undefined && after.indent >= rowIndent) {
      this.moveTo(after.start + after.indent);
      this.failFormat(`Array declared ${length} rows but found more`);
    }
    this.indentStack.pop();
    return toonTable(headers, rows);
  }

  /** `{h1,h2}`: starts on `{` and leaves the cursor after `}`. */
  private parseHeaderFields(delimiter: Delimiter): string[] {
    this.advance();
    const d = delimiterChar(delimiter).charCodeAt(0);
    const headers: string[] = [];
    for (;;) {
      if (delimiter !== 'tab') this.skipSpaces();
      if (this.peek() === C.Quote) {
        headers.push(this.parseQuotedString());
      } else {
        const start = this.pos;
        for (;;) {
          const c = this.peek();
          if (c === -1 || c === C.Newline || c === C.RBrace || c === C.Colon || c === d) break;
          if (delimiter === 'tab' && c === C.Space) break;
          this.advance();
        }
        const name = this.input.slice(start, this.pos).replace(/^ +| +$/g, '');
        if (name.length === 0) this.fail('Expected field name');
        headers.push(name);
      }
      if (delimiter !== 'tab') this.skipSpaces();
      if (this.peek() === C.RBrace) break;
      if (delimiter === 'tab') {
        if (this.peek() !== C.Space && this.peek() !== C.Tab) this.fail("Expected '}'");
        while (this.peek() === C.Space || this.peek() === C.Tab) this.advance();
        if (this.peek() === C.RBrace) break;
      } else {
        if (this.peek() !== d) this.fail("Expected '}'");
        this.advance();
      }
    }
    this.advance();
    return headers;
  }

  // --- objects ---

  /**
   * Reads `key: value` lines. The object's base indentation is the column of
   * its first key; a line indented less ends it. A root object (base 0) also
   * ends at a non-blank line without a `:`.
   */
  private parseObject(depth: number): ToonValue {
    const base = this.col - 1;
    const entries = new Map<string, ToonValue>();
    this.indentStack.push(base);
    for (;;) {
      const key = this.parseKey();
      this.skipSpaces();
      if (this.peek() !== C.Colon) this.fail("Expected ':' after key", `did you mean \`${key}: value\`?`);
      this.advance();
      this.skipSpaces();
      const value = this.atLineEnd() ? this.parseNestedValue(base, depth) : this.parseValue(depth + 1);
      entries.set(key, value);
      this.expectLineEnd();

      const line = this.nextContentLine();
      if (!line || line.indent < base) break;
      if (line.indent > base) this.failIndent(base, line);
      if (base === 0 && !this.colonAheadOnLine(line.start)) break;
      this.moveTo(line.start + line.indent);
    }
    this.indentStack.pop();
    return toonObject(entries);
  }

  private parseKey(): string {
    if (this.peek() === C.Quote) return this.parseQuotedString();
    const start = this.pos;
    while (!this.atLineEnd() && this.peek() !== C.Colon) this.advance();
    const key = this.input.slice(start, this.pos).replace(/^ +| +$/g, '');
    if (key.length === 0) this.fail('Expected key');
    return key;
  }

  /** A value on the following, more indented lines; none means an empty object. */
  private parseNestedValue(base: number, depth: number): ToonValue {
    const line = this.nextContentLine();
    if (!line || line.indent <= base) return toonObject();
    this.moveTo(line.start + line.indent);
    return this.parseValue(depth + 1);
  }
}
