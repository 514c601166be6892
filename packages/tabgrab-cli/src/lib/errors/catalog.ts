import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Fetch Errors
// ============================================================================

export function httpStatus(url: string, status: number, statusText: string): CLIError {
  const code = status === 404 ? "FETCH_NOT_FOUND" : "FETCH_HTTP_STATUS";
  const label = statusText ? `${status} ${statusText}` : `${status}`;
  return new CLIError(code, `Request failed (${label})`, {
    target: url,
    details: url,
    suggestion: status === 404 ? "Check that the tab still exists on Songsterr" : undefined,
  });
}

export function networkFailure(url: string, cause: unknown): CLIError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CLIError("FETCH_NETWORK", `Couldn't reach ${new URL(url).host}`, {
    target: url,
    details: reason,
    suggestion: "Check your internet connection and try again",
    cause,
  });
}

export function requestTimeout(url: string, timeoutMs: number): CLIError {
  return new CLIError("FETCH_TIMEOUT", `No response after ${timeoutMs}ms`, {
    target: url,
    details: url,
    suggestion: "Raise the limit with --timeout <ms>",
    example: "tabgrab --timeout 60000 <url>",
  });
}

// ============================================================================
// Resolution Errors
// ============================================================================

export function invalidTabUrl(target: string, reason: string): CLIError {
  return new CLIError("RESOLUTION_INVALID_URL", `Not a Songsterr tab URL: ${reason}`, {
    target,
    suggestion: "Tab URLs look like https://www.songsterr.com/a/wsa/<artist>-<song>-tab-s<id>",
  });
}

export function unexpectedResponse(url: string, issues: string[]): CLIError {
  return new CLIError("RESOLUTION_BAD_RESPONSE", "Songsterr returned an unexpected response", {
    target: url,
    details: issues.join("; "),
  });
}

export function noSearchResults(query: string): CLIError {
  return new CLIError("RESOLUTION_NO_RESULTS", `No songs found for "${query}"`, {
    suggestion: "Try fewer or different search words",
  });
}

export function noRevisions(songId: number): CLIError {
  return new CLIError("RESOLUTION_NO_REVISIONS", `No revisions available for song ${songId}`);
}

export function missingSource(revisionId: number): CLIError {
  return new CLIError("RESOLUTION_NO_SOURCE", `No Guitar Pro export for revision ${revisionId}`);
}

export function emptySearch(): CLIError {
  return new CLIError("RESOLUTION_EMPTY_SEARCH", "Search text cannot be empty");
}

export function selectionCancelled(): CLIError {
  return new CLIError("RESOLUTION_SELECTION_CANCELLED", "Selection cancelled");
}

// ============================================================================
// Download Errors
// ============================================================================

export function writeFailed(path: string, cause: unknown): CLIError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CLIError("DOWNLOAD_WRITE_FAILED", `Couldn't write "${path}"`, {
    target: path,
    details: reason,
    suggestion: "Check that the output directory is writable and the disk isn't full",
    cause,
  });
}

// ============================================================================
// Usage Errors
// ============================================================================

export function missingTargets(): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", "No URLs or search terms provided", {
    suggestion: "Pass tab URLs, a file of targets, or search interactively",
    examples: [
      "tabgrab https://www.songsterr.com/a/wsa/band-song-tab-s12345",
      "tabgrab -f urls.txt",
      "tabgrab -i band song",
    ],
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function inputNotReadable(path: string, cause: unknown): CLIError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CLIError("INPUT_NOT_READABLE", `Can't read targets from "${path}"`, {
    target: path,
    details: reason,
    suggestion: "Check the file path exists, or use -f - to read from stdin",
    cause,
  });
}
