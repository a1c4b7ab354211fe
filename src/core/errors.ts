/**
 * Error Classes for the Kernel Analyzer
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Parsing errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_GRAMMAR_NOT_FOUND = "E2001",
  PARSE_NOT_INITIALIZED = "E2002",
  PARSE_SYNTAX_ERROR = "E2003",

  // Schema errors (3xxx)
  SCHEMA_UNREADABLE = "E3000",
  SCHEMA_INVALID = "E3001",
  SCHEMA_NOT_CONFIGURED = "E3002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all analyzer errors
 */
export class KernelAnalyzerError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "KernelAnalyzerError";
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Parsing errors
 */
export class ParsingError extends KernelAnalyzerError {
  public readonly filePath?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = "ParsingError";
    this.filePath = context?.filePath;
    this.line = context?.line;
    this.column = context?.column;
  }

  override toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
        if (this.column !== undefined) {
          location += `:${this.column}`;
        }
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Schema loading errors. The analyzer cannot run without a schema, so these
 * are fatal wherever they surface.
 */
export class SchemaError extends KernelAnalyzerError {
  public readonly schemaPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCHEMA_INVALID,
    context?: Record<string, unknown> & { schemaPath?: string }
  ) {
    super(message, code, context);
    this.name = "SchemaError";
    this.schemaPath = context?.schemaPath;
  }
}

/**
 * Configuration file errors
 */
export class ConfigurationError extends KernelAnalyzerError {
  public readonly configPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown> & { configPath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
  }
}

/**
 * Check if an error is a KernelAnalyzerError
 */
export function isKernelAnalyzerError(error: unknown): error is KernelAnalyzerError {
  return error instanceof KernelAnalyzerError;
}

/**
 * Wrap an unknown error in a KernelAnalyzerError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): KernelAnalyzerError {
  if (isKernelAnalyzerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new KernelAnalyzerError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new KernelAnalyzerError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
