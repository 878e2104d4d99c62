/**
 * PropsweepError - Error hierarchy for propsweep
 *
 * All errors extend the native JavaScript Error class so they can travel in
 * AnalysisResult.errors[] (Error[]) next to plain errors.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - FileAccessError: File system access errors (error)
 * - LanguageError: Unparseable source files (warning)
 * - InvariantViolationError: Contract violations inside a check (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  check?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of PropsweepError
 */
export interface PropsweepErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all propsweep errors.
 */
export abstract class PropsweepError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): PropsweepErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml parsing, invalid values
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends PropsweepError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable files, missing paths
 *
 * Severity: error
 * Codes: ERR_FILE_UNREADABLE, ERR_PATH_NOT_FOUND
 */
export class FileAccessError extends PropsweepError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Language error - source the parser rejects
 *
 * Severity: warning (always). The file is skipped, the run continues.
 * Codes: ERR_PARSE_FAILURE
 */
export class LanguageError extends PropsweepError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Invariant violation - a check was driven in a way its contract forbids,
 * e.g. asked for the property name of a node that has none.
 *
 * Severity: fatal (always). Never caught inside a check.
 * Codes: ERR_INVARIANT_VIOLATION
 */
export class InvariantViolationError extends PropsweepError {
  readonly code = 'ERR_INVARIANT_VIOLATION';
  readonly severity = 'fatal' as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'This is a bug in propsweep, not in the analyzed code');
  }
}
