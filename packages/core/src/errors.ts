/**
 * Error taxonomy for yami operations
 *
 * Invariants:
 * - Every failure surfaced to a user maps to exactly one ErrorCode
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Hints exist only for codes with a known common remedy
 */

/**
 * Closed set of error codes reported in error envelopes
 */
export const ERROR_CODES = [
  "CONNECTION_ERROR",
  "NOT_FOUND",
  "VALIDATION_ERROR",
  "ALREADY_EXISTS",
  "AUTHENTICATION_ERROR",
  "FILE_NOT_FOUND",
  "INVALID_FORMAT",
  "MISSING_ARGUMENT",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Remedies shown alongside an error. Codes without an entry get no hint.
 */
export const ERROR_HINTS: Partial<Record<ErrorCode, string>> = {
  NOT_FOUND: "Use the matching list command (e.g. 'yami collection list') to see what exists",
  AUTHENTICATION_ERROR: "Verify your token with --token, MILVUS_TOKEN or the active profile",
  ALREADY_EXISTS: "Use a different name or drop the existing resource first",
  FILE_NOT_FOUND: "Check that the file path is correct and the file exists",
  MISSING_ARGUMENT: "Use 'yami <group> <action> --help' to see required arguments",
};

export function hintFor(code: ErrorCode): string | undefined {
  return ERROR_HINTS[code];
}

/**
 * Base class for all yami errors
 */
export abstract class YamiError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Remedy for this particular error; defaults to the code's hint
   */
  get hint(): string | undefined {
    return hintFor(this.code);
  }
}

export class ConnectionError extends YamiError {
  readonly code = "CONNECTION_ERROR";
}

export class NotFoundError extends YamiError {
  readonly code = "NOT_FOUND";
}

export class ValidationError extends YamiError {
  readonly code = "VALIDATION_ERROR";
}

export class AlreadyExistsError extends YamiError {
  readonly code = "ALREADY_EXISTS";
}

export class AuthenticationError extends YamiError {
  readonly code = "AUTHENTICATION_ERROR";
}

/**
 * Thrown when an input file (rows, schema) cannot be found
 */
export class FileNotFoundError extends YamiError {
  readonly code = "FILE_NOT_FOUND";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`File not found: ${filePath}`, options);
  }
}

export class InvalidFormatError extends YamiError {
  readonly code = "INVALID_FORMAT";
}

export class MissingArgumentError extends YamiError {
  readonly code = "MISSING_ARGUMENT";
}

export type AbortReason = "non-interactive" | "declined";

/**
 * Thrown when a destructive command is not confirmed.
 * Reported as MISSING_ARGUMENT because the missing piece is --force.
 */
export class OperationAbortedError extends YamiError {
  readonly code = "MISSING_ARGUMENT";

  constructor(
    public readonly command: string,
    public readonly reason: AbortReason,
    options?: ErrorOptions
  ) {
    super(
      reason === "non-interactive"
        ? `Aborted '${command}': confirmation required but no terminal is attached`
        : `Aborted '${command}': not confirmed`,
      options
    );
  }

  override get hint(): string {
    return "Re-run with --force to skip the confirmation prompt";
  }
}

/**
 * Fault reported by the vector database backend.
 * `category` is the backend's own classification (a status name or gRPC code).
 */
export class BackendFault extends Error {
  constructor(
    public readonly category: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "BackendFault";
  }
}
