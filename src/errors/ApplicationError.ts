/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Operational vs programmer error classification
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // File System Errors
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_NOT_A_FILE = 'FS_NOT_A_FILE',
  FS_NOT_A_DIRECTORY = 'FS_NOT_A_DIRECTORY',
  FS_READ_FAILED = 'FS_READ_FAILED',

  // Scanner Errors
  SCANNER_NOT_READY = 'SCANNER_NOT_READY',
  SCANNER_INVALID_STEP = 'SCANNER_INVALID_STEP',
  SCANNER_UNSUPPORTED_TYPE = 'SCANNER_UNSUPPORTED_TYPE',

  // Extraction Errors
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',

  // Tree / Record Errors
  TREE_STRUCTURAL_CONFLICT = 'TREE_STRUCTURAL_CONFLICT',
  TREE_INVALID_KEY_PATH = 'TREE_INVALID_KEY_PATH',
  RECORD_KEY_CONFLICT = 'RECORD_KEY_CONFLICT',

  // Configuration Errors
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'scan', 'preChecks') */
  operation?: string;

  /** File the operation was working on */
  filePath?: string;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// OPERATIONAL ERRORS (expected at runtime)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * Raised when a scanner is used before its pre-checks passed, or when the
 * target path does not exist or is not a regular file.
 */
export class GeneralError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, context, cause);
  }
}

/**
 * A required external library or executable is absent or unusable.
 * `hint` tells the operator how to fix it.
 */
export class MissingDependencyError extends OperationalError {
  constructor(
    public readonly dependency: string,
    public readonly hint: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Missing or unusable dependency: ${dependency}`,
      ErrorCode.SYSTEM_DEPENDENCY_MISSING,
      { ...context, metadata: { ...context?.metadata, dependency, hint } }
    );
  }
}

export class ProcessError extends OperationalError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number | string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Process '${processName}' failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}

export class ExtractionError extends OperationalError {
  constructor(
    public readonly extractor: string,
    message: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      ErrorCode.EXTRACTION_FAILED,
      { ...context, metadata: { ...context?.metadata, extractor } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (programmer errors, never recovered)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class InvalidStepError extends PermanentError {
  constructor(
    public readonly scanner: string,
    message: string,
    context?: ErrorContext
  ) {
    super(
      message,
      ErrorCode.SCANNER_INVALID_STEP,
      { ...context, metadata: { ...context?.metadata, scanner } }
    );
  }
}

export class StructuralConflictError extends PermanentError {
  constructor(
    public readonly keyPath: readonly string[],
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Structural conflict at '${keyPath.join('/')}'`,
      ErrorCode.TREE_STRUCTURAL_CONFLICT,
      { ...context, metadata: { ...context?.metadata, keyPath } }
    );
  }
}

export class InvalidKeyPathError extends PermanentError {
  constructor(
    public readonly keyPath: readonly string[],
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || 'Key path must contain at least one non-empty segment',
      ErrorCode.TREE_INVALID_KEY_PATH,
      { ...context, metadata: { ...context?.metadata, keyPath } }
    );
  }
}

export class RecordConflictError extends PermanentError {
  constructor(
    public readonly key: string,
    public readonly scanners: readonly string[],
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Metadata key '${key}' emitted with different values by ${scanners.join(' and ')}`,
      ErrorCode.RECORD_KEY_CONFLICT,
      { ...context, metadata: { ...context?.metadata, key, scanners } }
    );
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}
