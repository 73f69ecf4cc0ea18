export type PolisherErrorKind =
  | "invalid-path"
  | "config"
  | "authentication"
  | "transient"
  | "malformed-response"
  | "write";

/** Failure kinds an enhancement call can end with. */
export type FailureKind = "authentication" | "transient" | "malformed-response" | "cancelled";

export abstract class PolisherError extends Error {
  abstract readonly kind: PolisherErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidPathError extends PolisherError {
  readonly kind = "invalid-path";
  readonly path: string;

  constructor(path: string, reason: string) {
    super(path ? `${reason}: ${path}` : reason);
    this.path = path;
  }
}

export class ConfigError extends PolisherError {
  readonly kind = "config";
}

export class AuthenticationError extends PolisherError {
  readonly kind = "authentication";
}

export class TransientServiceError extends PolisherError {
  readonly kind = "transient";
}

export class MalformedResponseError extends PolisherError {
  readonly kind = "malformed-response";
}

export class WriteError extends PolisherError {
  readonly kind = "write";
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export interface ClassifiedFailure {
  failure: FailureKind;
  message: string;
  retryable: boolean;
}

const AUTH_PATTERN = /\b401\b|\b403\b|unauthori[sz]ed|authenticat|invalid (x-)?api[ _-]?key|api key|\/login|credential/i;
const TRANSIENT_PATTERN =
  /\b429\b|\b5\d\d\b|rate.?limit|quota|overloaded|timed? ?out|timeout|ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|EPIPE|socket hang up|network|fetch failed|exited with code/i;

/**
 * Map an SDK-level error code (as carried on assistant messages) to an error class.
 * Unknown codes fall back to message matching.
 */
export function errorFromCode(code: string, message: string): PolisherError {
  switch (code) {
    case "authentication_failed":
      return new AuthenticationError(message);
    case "rate_limit":
    case "server_error":
    case "billing_error":
      return new TransientServiceError(message);
    case "invalid_request":
      return new MalformedResponseError(`request rejected: ${message}`);
    default:
      return errorFromMessage(message);
  }
}

export function errorFromMessage(message: string, cause?: unknown): PolisherError {
  const options = cause === undefined ? undefined : { cause };
  if (AUTH_PATTERN.test(message)) return new AuthenticationError(message, options);
  if (TRANSIENT_PATTERN.test(message)) return new TransientServiceError(message, options);
  // Unrecognized engine failures are most often a crashed or interrupted
  // subprocess; retrying is the useful default.
  return new TransientServiceError(message, options);
}

export function classifyFailure(err: unknown): ClassifiedFailure {
  if (err instanceof PolisherError) {
    switch (err.kind) {
      case "authentication":
        return { failure: "authentication", message: err.message, retryable: false };
      case "transient":
        return { failure: "transient", message: err.message, retryable: true };
      case "malformed-response":
        return { failure: "malformed-response", message: err.message, retryable: false };
      default:
        return { failure: "malformed-response", message: err.message, retryable: false };
    }
  }
  if (err instanceof Error && err.name === "AbortError") {
    return { failure: "cancelled", message: err.message || "aborted", retryable: false };
  }
  const message = err instanceof Error ? err.message : String(err);
  return classifyFailure(errorFromMessage(message, err));
}
