/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Network / HTTP errors
  | "FETCH_HTTP_STATUS"
  | "FETCH_NOT_FOUND"
  | "FETCH_NETWORK"
  | "FETCH_TIMEOUT"
  // Resolution errors (bad URL, unexpected service response, nothing to pick)
  | "RESOLUTION_INVALID_URL"
  | "RESOLUTION_BAD_RESPONSE"
  | "RESOLUTION_NO_RESULTS"
  | "RESOLUTION_NO_REVISIONS"
  | "RESOLUTION_NO_SOURCE"
  | "RESOLUTION_EMPTY_SEARCH"
  | "RESOLUTION_SELECTION_CANCELLED"
  // Local filesystem errors while writing a tab
  | "DOWNLOAD_WRITE_FAILED"
  // Usage errors, detected before any target runs
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "INPUT_NOT_READABLE"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Coarse error family. Callers match on this instead of the message text.
 */
export type ErrorKind = "fetch" | "resolution" | "download" | "usage" | "unknown";

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  FETCH_HTTP_STATUS: "fetch",
  FETCH_NOT_FOUND: "fetch",
  FETCH_NETWORK: "fetch",
  FETCH_TIMEOUT: "fetch",
  RESOLUTION_INVALID_URL: "resolution",
  RESOLUTION_BAD_RESPONSE: "resolution",
  RESOLUTION_NO_RESULTS: "resolution",
  RESOLUTION_NO_REVISIONS: "resolution",
  RESOLUTION_NO_SOURCE: "resolution",
  RESOLUTION_EMPTY_SEARCH: "resolution",
  RESOLUTION_SELECTION_CANCELLED: "resolution",
  DOWNLOAD_WRITE_FAILED: "download",
  VALIDATION_MISSING_ARG: "usage",
  VALIDATION_INVALID_OPTION: "usage",
  INPUT_NOT_READABLE: "usage",
  UNKNOWN_ERROR: "unknown",
};

export function kindOf(code: ErrorCode): ErrorKind {
  return KIND_BY_CODE[code];
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;
  /** Request URL or file path the error relates to */
  readonly target?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      target?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.kind = kindOf(code);
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
    this.target = options?.target;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

export type FetchError = CLIError & { readonly kind: "fetch" };
export type ResolutionError = CLIError & { readonly kind: "resolution" };
export type DownloadError = CLIError & { readonly kind: "download" };

export function isFetchError(error: unknown): error is FetchError {
  return isCLIError(error) && error.kind === "fetch";
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return isCLIError(error) && error.kind === "resolution";
}

export function isDownloadError(error: unknown): error is DownloadError {
  return isCLIError(error) && error.kind === "download";
}

/**
 * Wrap anything thrown into a CLIError, keeping CLIErrors as they are.
 */
export function toCLIError(error: unknown): CLIError {
  if (isCLIError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}
