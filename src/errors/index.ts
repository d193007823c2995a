/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 * Do not import directly from ApplicationError.ts.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  GeneralError,
  MissingDependencyError,
  ProcessError,
  ExtractionError,
} from './ApplicationError.js';

// Permanent errors (programmer errors)
export {
  PermanentError,
  InvalidStepError,
  StructuralConflictError,
  InvalidKeyPathError,
  RecordConflictError,
  ConfigurationError,
} from './ApplicationError.js';
