/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors (fatal)
  | "AUTH_MISSING_KEY"
  | "AUTH_INVALID_KEY"
  | "AUTH_PERMISSION_DENIED"
  // Validation errors (fatal)
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_UNKNOWN_DEVICE"
  | "VALIDATION_CONFIG_INVALID"
  // API errors
  | "API_RATE_LIMITED"
  | "API_SERVER_ERROR"
  | "API_BAD_REQUEST"
  | "API_NOT_FOUND"
  | "API_INVALID_RESPONSE"
  // Network errors
  | "NETWORK_OFFLINE"
  | "NETWORK_TIMEOUT"
  // Filesystem errors
  | "FILE_WRITE_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Errors that abort a whole download run: bad credentials, missing scopes
 * and invalid input. Everything else is recorded per measurement.
 */
export function isFatalError(error: unknown): boolean {
  if (!isCLIError(error)) return false;
  return error.code.startsWith("AUTH_") || error.code.startsWith("VALIDATION_");
}

/**
 * Errors worth another attempt: the network and the server's own failures.
 */
export function isRetryableError(error: unknown): boolean {
  if (!isCLIError(error)) return false;
  return (
    error.code === "NETWORK_OFFLINE" ||
    error.code === "NETWORK_TIMEOUT" ||
    error.code === "API_SERVER_ERROR" ||
    error.code === "API_RATE_LIMITED"
  );
}
