import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function missingApiKey(): CLIError {
  return new CLIError("AUTH_MISSING_KEY", "No API key available", {
    suggestion: "Pass --api-key, set BACTOCLOUD_API_KEY, or store a key",
    example: "bactocloud auth login",
  });
}

export function invalidApiKey(details?: string): CLIError {
  return new CLIError("AUTH_INVALID_KEY", "The API key was rejected", {
    suggestion: "Check the key in BactoCloud and log in again",
    example: "bactocloud auth login",
    details,
  });
}

export function permissionDenied(details?: string): CLIError {
  return new CLIError("AUTH_PERMISSION_DENIED", "The API key lacks the required permissions", {
    suggestion: "The key needs the PermDeviceView and PermDataView scopes",
    details,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string, command: string, example?: string): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
    example: example ?? `bactocloud ${command} --help`,
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function unknownDevices(serials: string[]): CLIError {
  return new CLIError(
    "VALIDATION_UNKNOWN_DEVICE",
    `Unknown device serial${serials.length > 1 ? "s" : ""}: ${serials.join(", ")}`,
    {
      suggestion: "List the devices this key can see",
      example: "bactocloud devices",
    }
  );
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// API Errors
// ============================================================================

export function rateLimited(): CLIError {
  return new CLIError("API_RATE_LIMITED", "Too many requests", {
    suggestion: "Wait a moment and try again",
  });
}

export function serverError(details?: string): CLIError {
  return new CLIError("API_SERVER_ERROR", "BactoCloud returned a server error", {
    suggestion: "This is usually temporary. Try again in a few minutes",
    details,
  });
}

export function badRequest(details?: string): CLIError {
  return new CLIError("API_BAD_REQUEST", "The request couldn't be processed", {
    suggestion: details || "Check your input and try again",
  });
}

export function apiNotFound(resource?: string): CLIError {
  const message = resource ? `Not found: ${resource}` : "Resource not found";
  return new CLIError("API_NOT_FOUND", message);
}

export function invalidResponse(path: string, details?: string): CLIError {
  return new CLIError("API_INVALID_RESPONSE", `Unexpected response from ${path}`, {
    details,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(details?: string, cause?: unknown): CLIError {
  return new CLIError("NETWORK_OFFLINE", "Can't connect to BactoCloud", {
    suggestion: "Check your internet connection and try again",
    details,
    cause,
  });
}

export function networkTimeout(timeoutMs: number, cause?: unknown): CLIError {
  return new CLIError("NETWORK_TIMEOUT", `Request timed out after ${timeoutMs} ms`, {
    suggestion: "Raise --timeout or try again in a moment",
    cause,
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function writeFailed(path: string, cause: unknown): CLIError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CLIError("FILE_WRITE_FAILED", `Can't write "${path}"`, {
    suggestion: "Check free disk space and permissions on the output directory",
    details: reason,
    cause,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

/**
 * Convert an HTTP error response to a CLIError.
 */
export function fromHttpStatus(
  status: number,
  statusText: string,
  payload?: unknown
): CLIError {
  const details = extractErrorMessage(payload);

  switch (status) {
    case 401:
      return invalidApiKey(details);
    case 403:
      return permissionDenied(details);
    case 404:
      return apiNotFound(details);
    case 429:
      return rateLimited();
    case 400:
      return badRequest(details);
    default:
      if (status >= 500) {
        return serverError(details ?? `${status} ${statusText}`);
      }
      return new CLIError(
        "UNKNOWN_ERROR",
        `Request failed (${status} ${statusText})`,
        { details }
      );
  }
}

/**
 * Extract error message from API response payload.
 * BactoCloud reports failures as `{ "error": "..." }`.
 */
export function extractErrorMessage(payload: unknown): string | undefined {
  if (payload === undefined || payload === null || payload === "") return undefined;
  if (typeof payload === "string") return payload;
  if (typeof payload === "object") {
    for (const key of ["error", "message", "error_description"]) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === "string" && value) return value;
    }
    return JSON.stringify(payload);
  }
  return undefined;
}
