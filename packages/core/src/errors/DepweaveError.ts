/**
 * DepweaveError - Error hierarchy for depweave
 *
 * All errors extend the native JavaScript Error class so callers can keep
 * treating them as plain Errors.
 *
 * Error types:
 * - StructuralViolationError: instruction stream breaks positional operand rules (fatal)
 * - UnitDecodeError: compiled unit dump is malformed or unreadable (fatal)
 * - DuplicateNodeError / DuplicateEdgeError: graph insert conflicts (error)
 * - NodeNotFoundError / NoSuchEdgeError: graph lookups on missing entries (error)
 * - ConfigError: configuration parsing/validation errors (fatal)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  unit?: string;
  offset?: number;
  identifier?: string;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of DepweaveError
 */
export interface DepweaveErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all depweave errors.
 */
export abstract class DepweaveError extends Error {
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

  toJSON(): DepweaveErrorJSON {
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
 * The instruction stream violates the positional operand layout
 * (e.g. an import not preceded by two constant loads).
 *
 * Severity: fatal (always). Indicates a corrupt or unsupported unit format.
 */
export class StructuralViolationError extends DepweaveError {
  readonly code = 'ERR_STRUCTURAL_VIOLATION';
  readonly severity = 'fatal' as const;
}

/**
 * A compiled unit dump could not be read or decoded.
 *
 * Severity: fatal (always)
 * Codes: ERR_UNIT_DECODE, ERR_UNIT_UNREADABLE
 */
export class UnitDecodeError extends DepweaveError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

export class DuplicateNodeError extends DepweaveError {
  readonly code = 'ERR_DUPLICATE_NODE';
  readonly severity = 'error' as const;
}

export class DuplicateEdgeError extends DepweaveError {
  readonly code = 'ERR_DUPLICATE_EDGE';
  readonly severity = 'error' as const;
}

export class NodeNotFoundError extends DepweaveError {
  readonly code = 'ERR_NODE_NOT_FOUND';
  readonly severity = 'error' as const;
}

export class NoSuchEdgeError extends DepweaveError {
  readonly code = 'ERR_NO_SUCH_EDGE';
  readonly severity = 'error' as const;
}

/**
 * Configuration error - config file validation, incompatible version
 *
 * Severity: fatal (always)
 */
export class ConfigError extends DepweaveError {
  readonly code = 'ERR_CONFIG_INVALID';
  readonly severity = 'fatal' as const;
}
