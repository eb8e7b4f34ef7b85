/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors (4xx)
export {
  ValidationError,
  InputValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  FileSystemError,
  FileNotFoundError,
  ExtractionError,
  DescriptionFormatError,
  ProviderError,
  DescriptionError,
} from './ApplicationError.js';

// Permanent errors (5xx - not retryable)
export {
  PermanentError,
  ConfigurationError,
  ProcessError,
} from './ApplicationError.js';
