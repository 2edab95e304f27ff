/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for chaining operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'           // Malformed fact, term or rule text
  | 'UNSAFE_RULE'           // Conclusion variable not bound by any premise
  | 'ARITY_MISMATCH'        // Predicate reused with a different argument count
  | 'INVALID_QUERY'         // Query contains a variable
  | 'NON_GROUND_FACT'       // Variable inside a fact meant for the fact base
  | 'ROUND_CAP_EXCEEDED'    // Round cap reached before proof or fixpoint
  | 'INVALID_OPTION'        // Bad option value (round cap, timeout)
  | 'INVALID_ARGUMENTS'     // Tool arguments failed schema validation
  | 'SESSION_NOT_FOUND'     // Session ID not found
  | 'SESSION_LIMIT'         // Max sessions reached
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
  context?: string;          // The offending statement
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

  /**
   * Serialize error for MCP response
   */
  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Narrow an unknown thrown value, optionally to one error code.
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
      pattern: /[^\x00-\x7F]/,
      suggestion: 'Only ASCII letters and digits are allowed in names (write => instead of ⇒)'
    },
    {
      pattern: /\w\s*\([^()]*\w\s*\(/,
      suggestion: 'Nested terms are not supported - arguments must be plain names'
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
      pattern: /->|:-/,
      suggestion: "Use '=>' to separate rule premises from the conclusion"
    },
    {
      pattern: /=>\s*$/,
      suggestion: "Incomplete rule - missing conclusion after '=>'"
    },
    {
      pattern: /^\s*=>/,
      suggestion: "Incomplete rule - at least one premise is required before '=>'"
    },
    {
      pattern: /,\s*,/,
      suggestion: 'Double comma in argument list - remove extra comma'
    },
    {
      pattern: /\(\s*,|,\s*\)/,
      suggestion: 'Empty argument in argument list'
    },
    {
      pattern: /_/,
      suggestion: 'Underscores are not allowed in names - use letters and digits only'
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string, _position?: number): string | undefined {
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
): LogicException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new LogicException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input, position),
    context: input,
  });
}

/**
 * Create an unsafe rule error
 */
export function createUnsafeRuleError(
  rule: string,
  unboundVariables: string[]
): LogicException {
  return new LogicException({
    code: 'UNSAFE_RULE',
    message: `Unsafe rule: conclusion variable${unboundVariables.length > 1 ? 's' : ''} ${unboundVariables.join(', ')} not bound by any premise`,
    suggestion: 'Every variable in the conclusion must also appear in at least one premise',
    context: rule,
    details: { unboundVariables },
  });
}

/**
 * Create an arity mismatch error
 */
export function createArityMismatchError(
  predicate: string,
  expected: number,
  actual: number,
  context?: string
): LogicException {
  return new LogicException({
    code: 'ARITY_MISMATCH',
    message: `Predicate '${predicate}' used with ${actual} argument(s) but previously with ${expected}`,
    suggestion: 'Check for a typo, or disable strict arity checking',
    context,
    details: { predicate, expected, actual },
  });
}

/**
 * Create an invalid query error
 */
export function createInvalidQueryError(
  query: string,
  variables: string[]
): LogicException {
  return new LogicException({
    code: 'INVALID_QUERY',
    message: `Query must be ground but contains variable${variables.length > 1 ? 's' : ''} ${variables.join(', ')}`,
    suggestion: 'Variables start with a lowercase letter; use constants (uppercase or digit first) in queries',
    context: query,
    details: { variables },
  });
}

/**
 * Create a non-ground fact error
 */
export function createNonGroundFactError(
  fact: string,
  variables: string[]
): LogicException {
  return new LogicException({
    code: 'NON_GROUND_FACT',
    message: `Fact must be ground but contains variable${variables.length > 1 ? 's' : ''} ${variables.join(', ')}`,
    suggestion: 'Facts may only mention constants; write a rule to generalize',
    context: fact,
    details: { variables },
  });
}

/**
 * Create a round cap error. Reported inside a result rather than thrown.
 */
export function createRoundCapError(
  roundCap: number,
  factCount: number
): LogicException {
  return new LogicException({
    code: 'ROUND_CAP_EXCEEDED',
    message: `Round cap of ${roundCap} reached before a fixpoint or proof`,
    suggestion: 'Try increasing roundCap (or use high-power mode) and run again',
    details: { roundCap, factCount },
  });
}

/**
 * Create an invalid option error
 */
export function createInvalidOptionError(
  option: string,
  value: unknown,
  expectation: string
): LogicException {
  return new LogicException({
    code: 'INVALID_OPTION',
    message: `Invalid value for ${option}: ${String(value)} (${expectation})`,
    details: { option, value },
  });
}

/**
 * Create an invalid tool arguments error
 */
export function createInvalidArgumentsError(
  tool: string,
  issues: string[]
): LogicException {
  return new LogicException({
    code: 'INVALID_ARGUMENTS',
    message: `Invalid arguments for '${tool}': ${issues.join('; ')}`,
    details: { tool, issues },
  });
}

/**
 * Create a session not found error
 */
export function createSessionNotFoundError(sessionId: string): LogicException {
  return new LogicException({
    code: 'SESSION_NOT_FOUND',
    message: `Session '${sessionId}' not found or expired`,
    suggestion: 'Create a new session with create-session tool',
    details: { sessionId },
  });
}

/**
 * Create a session limit error
 */
export function createSessionLimitError(maxSessions: number): LogicException {
  return new LogicException({
    code: 'SESSION_LIMIT',
    message: `Maximum session limit of ${maxSessions} reached`,
    suggestion: 'Delete unused sessions or wait for sessions to expire',
    details: { maxSessions },
  });
}

/**
 * Create an internal error for a broken engine invariant
 */
export function createInternalError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INTERNAL_ERROR',
    message: `Internal engine error: ${message}`,
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
