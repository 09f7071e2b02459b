/**
 * Error Classes for pokemon-meetup
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_READ_FAILED = "E1001",

  // Storage errors (2xxx)
  STORAGE_OPEN_FAILED = "E2000",
  STORAGE_NOT_READY = "E2001",
  STORAGE_MIGRATION_FAILED = "E2002",
  STORAGE_QUERY_FAILED = "E2003",

  // Provider errors (3xxx)
  PROVIDER_REQUEST_FAILED = "E3000",
  PROVIDER_HTTP_STATUS = "E3001",
  PROVIDER_INVALID_PAYLOAD = "E3002",
  PROVIDER_SESSION_CLOSED = "E3003",

  // Template errors (4xxx)
  TEMPLATE_NOT_FOUND = "E4000",
  TEMPLATE_MISSING_VARIABLE = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_INPUT = "E9001",
  PROMPT_CANCELLED = "E9002",
}

/**
 * Base error class for all pokemon-meetup errors
 */
export class PokemonMeetupError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: Record<string, unknown>) {
    super(message);
    this.name = "PokemonMeetupError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
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
      timestamp: this.timestamp.toISOString(),
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
 * Configuration loading and validation errors
 */
export class ConfigurationError extends PokemonMeetupError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Local store errors
 */
export class StorageError extends PokemonMeetupError {
  constructor(message: string, code: ErrorCode = ErrorCode.STORAGE_QUERY_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

/**
 * Remote stats provider errors. These never cross the adapter boundary;
 * they are logged and degrade the affected dataset to an empty table.
 */
export class ProviderError extends PokemonMeetupError {
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PROVIDER_REQUEST_FAILED,
    context?: Record<string, unknown> & { endpoint?: string }
  ) {
    super(message, code, context);
    this.name = "ProviderError";
    this.endpoint = context?.endpoint;
  }
}

/**
 * Template loading and rendering errors
 */
export class TemplateError extends PokemonMeetupError {
  public readonly templateName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TEMPLATE_NOT_FOUND,
    context?: Record<string, unknown> & { templateName?: string }
  ) {
    super(message, code, context);
    this.name = "TemplateError";
    this.templateName = context?.templateName;
  }
}

/**
 * Caller supplied a value outside the accepted range
 */
export class InvalidInputError extends PokemonMeetupError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_INPUT, context);
    this.name = "InvalidInputError";
  }
}

/**
 * The user dismissed an interactive prompt
 */
export class PromptCancelledError extends PokemonMeetupError {
  constructor(message: string = "Cancelled") {
    super(message, ErrorCode.PROMPT_CANCELLED);
    this.name = "PromptCancelledError";
  }
}

/**
 * Check if an error is a PokemonMeetupError
 */
export function isPokemonMeetupError(error: unknown): error is PokemonMeetupError {
  return error instanceof PokemonMeetupError;
}

