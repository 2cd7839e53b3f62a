/**
 * Structured Error System for trace2lean
 *
 * Every failure of the translator is fatal for the transcript at hand, so
 * errors carry enough location data to be reported exactly once.
 */

/**
 * Error codes for translation operations
 */
export type TranslationErrorCode =
  | 'PARSE_ERROR'               // Malformed term or expression text
  | 'MISSING_DEPENDENCY'        // Justification names nothing declared
  | 'MISSING_TOP_LEVEL_RECORD'  // Transcript lacks the hypothesis or conjecture
  | 'CONFIG_ERROR'              // Invalid configuration value
  | 'IO_ERROR';                 // Input or output file problem

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span and suggestions
 */
export interface TranslationError {
  code: TranslationErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending expression or transcript line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping TranslationError for throw/catch patterns
 */
export class TranslationException extends Error {
  public readonly error: TranslationError;

  constructor(error: TranslationError) {
    super(error.message);
    this.name = 'TranslationException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranslationException);
    }
  }

  get code(): TranslationErrorCode {
    return this.error.code;
  }

  /**
   * Re-anchor the error on a transcript line. Offsets inside the
   * expression are kept; the line number and text are added.
   */
  atLine(line: number, text: string): TranslationException {
    const span: ErrorSpan = this.error.span
      ? { ...this.error.span, line }
      : { start: 0, end: text.length, line };
    return new TranslationException({
      ...this.error,
      message: `Line ${line}: ${this.error.message}`,
      span,
      context: text,
    });
  }

  toJSON(): TranslationError {
    return this.error;
  }
}

/**
 * Common term syntax mistakes and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\bop\s+\(/,
      suggestion: "Write 'op(' without a space before the parenthesis"
    },
    {
      pattern: /\bop\([^,()]*\)/,
      suggestion: "'op' takes exactly two arguments separated by ','"
    },
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /=.*=/,
      suggestion: "Only one top-level '=' is allowed per expression"
    },
    {
      pattern: /,\s*[,)]/,
      suggestion: "Empty argument in 'op(...)'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): TranslationException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new TranslationException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create an error for a dependency token that resolves to nothing
 */
export function createMissingDependencyError(
  token: string,
  context?: string
): TranslationException {
  return new TranslationException({
    code: 'MISSING_DEPENDENCY',
    message: `Dependency '${token}' does not resolve to a lemma, axiom or the hypothesis`,
    suggestion: 'Check that the transcript declares every axiom and lemma it cites',
    context,
    details: { token },
  });
}

/**
 * Create an error for a transcript without hypothesis or conjecture
 */
export function createMissingTopLevelRecordError(
  role: 'axiom' | 'conjecture'
): TranslationException {
  return new TranslationException({
    code: 'MISSING_TOP_LEVEL_RECORD',
    message: `Missing ${role} in TPTP input`,
    suggestion: `Add a 'fof(<name>, ${role}, <formula>).' declaration`,
    details: { role },
  });
}

export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): TranslationException {
  return new TranslationException({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${message}`,
    details,
  });
}

export function createIoError(
  message: string,
  path: string
): TranslationException {
  return new TranslationException({
    code: 'IO_ERROR',
    message,
    context: path,
    details: { path },
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a TranslationError for JSON output
 */
export function serializeTranslationError(error: TranslationError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
