/**
 * TOON parse/serialize errors. Positioned errors carry 1-based line and column.
 */

import type { SourcePosition } from './ast.js';

export type ToonErrorCode =
  | 'syntax'
  | 'type-mismatch'
  | 'indentation'
  | 'unsupported-type'
  | 'invalid-format'
  | 'unexpected-eof'
  | 'invalid-options'
  | 'custom';

type ConstructorOptions = { position?: SourcePosition; context?: string; cause?: unknown };

export abstract class ToonError extends Error {
  override readonly name: string = 'ToonError';
  abstract readonly code: ToonErrorCode;
  readonly position?: SourcePosition;
  /** Offending source line with a caret under the column, when known. */
  readonly context?: string;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.context = options?.context;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

export class ToonSyntaxError extends ToonError {
  override readonly name = 'ToonSyntaxError';
  readonly code = 'syntax';
  readonly detail: string;
  readonly suggestion?: string;

  constructor(detail: string, position: SourcePosition, options?: { context?: string; suggestion?: string }) {
    const help = options?.suggestion ? `\nHelp: ${options.suggestion}` : '';
    const ctx = options?.context ? `\n${options.context}` : '';
    super(`Syntax error at line ${position.line}, column ${position.column}:${ctx}\n${detail}${help}`, {
      position,
      context: options?.context,
    });
    this.detail = detail;
    this.suggestion = options?.suggestion;
  }
}

export class ToonTypeMismatchError extends ToonError {
  override readonly name = 'ToonTypeMismatchError';
  readonly code = 'type-mismatch';
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string, position: SourcePosition) {
    super(
      `Type mismatch at line ${position.line}, column ${position.column}: expected ${expected}, found ${found}`,
      { position }
    );
    this.expected = expected;
    this.found = found;
  }
}

export class ToonIndentationError extends ToonError {
  override readonly name = 'ToonIndentationError';
  readonly code = 'indentation';
  readonly expected: number;
  readonly found: number;

  constructor(expected: number, found: number, position: SourcePosition, context: string) {
    super(
      `Indentation error at line ${position.line}, column ${position.column}:\n${context}\n` +
        `Expected ${expected} spaces, found ${found} spaces\n` +
        'Help: nested fields must line up under the first field of their object',
      { position, context }
    );
    this.expected = expected;
    this.found = found;
  }
}

export class ToonUnsupportedTypeError extends ToonError {
  override readonly name = 'ToonUnsupportedTypeError';
  readonly code = 'unsupported-type';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Unsupported type: ${message}`, options);
  }
}

export class ToonInvalidFormatError extends ToonError {
  override readonly name = 'ToonInvalidFormatError';
  readonly code = 'invalid-format';
  readonly detail: string;

  constructor(detail: string, position: SourcePosition) {
    super(`Invalid TOON format at line ${position.line}, column ${position.column}: ${detail}`, { position });
    this.detail = detail;
  }
}

export class ToonUnexpectedEofError extends ToonError {
  override readonly name = 'ToonUnexpectedEofError';
  readonly code = 'unexpected-eof';
  readonly expected: string;

  constructor(expected: string, position: SourcePosition, context: string) {
    super(
      `Unexpected end of input at line ${position.line}, column ${position.column}\n${context}\nExpected: ${expected}`,
      { position, context }
    );
    this.expected = expected;
  }
}

export class ToonInvalidOptionsError extends ToonError {
  override readonly name = 'ToonInvalidOptionsError';
  readonly code = 'invalid-options';
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: { cause?: unknown }) {
    super(`Invalid options: ${issues.join('; ')}`, options);
    this.issues = issues;
  }
}

/** Raised by binding-layer code (sinks and sources) with its own message. */
export class ToonCustomError extends ToonError {
  override readonly name = 'ToonCustomError';
  readonly code = 'custom';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isToonError(err: unknown): err is ToonError {
  return err instanceof ToonError;
}
