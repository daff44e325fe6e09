/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for knowledge base operations
 */
export type LogicErrorCode =
  | 'SYNTAX_ERROR'          // Malformed program text
  | 'NOT_FOUND'             // Missing file or literal
  | 'STRUCTURAL_ERROR'      // Malformed object input
  | 'INTERNAL_ERROR';       // Broken engine invariant

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
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending program text
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Narrow an unknown thrown value to a LogicException, optionally of one code
 */
export function isLogicException(value: unknown, code?: LogicErrorCode): value is LogicException {
  return value instanceof LogicException && (code === undefined || value.error.code === code);
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /(^|[\s,])[-!][A-Za-z]/,
      suggestion: "Use '~' to negate a literal (e.g., '~rain')"
    },
    {
      pattern: /<-|->/,
      suggestion: "Use ':-' between a rule's head and body (e.g., 'wet :- rain.')"
    },
    {
      pattern: /:-\s*\./,
      suggestion: "Rule has no body - list at least one literal after ':-'"
    },
    {
      pattern: /;/,
      suggestion: "Separate literals with ',' and end statements with '.'"
    },
    {
      pattern: /,\s*,/,
      suggestion: "Double comma in literal list - remove extra comma"
    },
    {
      pattern: /\.\s*\./,
      suggestion: "Empty statement - remove the extra '.'"
    },
    {
      pattern: /(^|[\s,~])[0-9_]/,
      suggestion: "Atoms must start with a letter (e.g., 'module_1' not '1_module')"
    },
    {
      pattern: /[^.\s]\s*$/,
      suggestion: "Statement is missing its terminating '.'"
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
 * Create a syntax error with optional span and suggestion
 */
export function createSyntaxError(
  message: string,
  input: string,
  position?: number
): LogicException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new LogicException({
    code: 'SYNTAX_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create a not-found error for a missing file or literal
 */
export function createNotFoundError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'NOT_FOUND',
    message,
    details,
  });
}

/**
 * Create a structural error for malformed clause/rule objects
 */
export function createStructuralError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'STRUCTURAL_ERROR',
    message,
    details,
  });
}

/**
 * Create an internal error. Raised only when an engine invariant is broken.
 */
export function createInternalError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INTERNAL_ERROR',
    message: `Internal error: ${message}`,
    details,
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
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

