/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - HTTP status code mapping for the tool boundary
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // File System Errors
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',

  // Analysis Errors
  ANALYSIS_EXTRACTION_FAILED = 'ANALYSIS_EXTRACTION_FAILED',
  ANALYSIS_DESCRIPTION_INVALID = 'ANALYSIS_DESCRIPTION_INVALID',

  // Provider Errors (vision backend)
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors (5xx - permanent)
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'extract', 'organize') */
  operation?: string;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for tool-boundary responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: cause ? {
        name: cause.name,
        message: cause.message,
        stack: cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class InputValidationError extends ValidationError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid input for field '${field}'`,
      { ...context, metadata: { ...context?.metadata, field, value } }
    );
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    statusCode = 500,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      false,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

/**
 * Missing file or directory. The one condition the tool boundary raises.
 */
export class FileNotFoundError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext) {
    super(
      message || `File not found: ${path}`,
      ErrorCode.FS_FILE_NOT_FOUND,
      path,
      404,
      context
    );
  }
}

// Analysis Errors

/**
 * Text extraction could not decode the image or the OCR engine failed.
 * The pipeline treats it as a signal to fall back to description.
 */
export class ExtractionError extends OperationalError {
  constructor(
    public readonly imagePath: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Text extraction failed: ${imagePath}`,
      ErrorCode.ANALYSIS_EXTRACTION_FAILED,
      422,
      false,
      { ...context, metadata: { ...context?.metadata, imagePath } },
      cause
    );
  }
}

/**
 * The vision backend answered, but not with a usable JSON object.
 */
export class DescriptionFormatError extends OperationalError {
  constructor(
    public readonly rawResponse: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || 'Invalid JSON response from vision model',
      ErrorCode.ANALYSIS_DESCRIPTION_INVALID,
      502,
      false,
      { ...context, metadata: { ...context?.metadata, rawResponse: rawResponse.slice(0, 200) } },
      cause
    );
  }
}

// Provider Errors
export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

/**
 * Transport or HTTP failure talking to the vision backend
 */
export class DescriptionError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode?: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Vision provider request failed: ${providerName}`,
      providerName,
      httpStatusCode ? ErrorCode.PROVIDER_SERVER_ERROR : ErrorCode.PROVIDER_UNAVAILABLE,
      502,
      httpStatusCode === undefined || httpStatusCode >= 500,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
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
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class ProcessError extends PermanentError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number | string | undefined,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Process '${processName}' failed with exit code ${String(exitCode)}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      500,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}
