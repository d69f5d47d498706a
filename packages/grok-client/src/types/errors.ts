/**
 * Error hierarchy for the Grok client.
 *
 * All library errors inherit from SDKError. Error class names are chosen to
 * avoid shadowing common language built-in names. The client never retries on
 * its own; `retryable` tells the caller whether trying again can help.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all Grok client errors. */
export class SDKError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// StatusError: a gRPC status returned by the service
// ---------------------------------------------------------------------------

/** gRPC status codes whose failures are transient. */
const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  4, // DEADLINE_EXCEEDED
  8, // RESOURCE_EXHAUSTED
  14, // UNAVAILABLE
]);

/** Whether a gRPC status code denotes a transient failure. */
export function isRetryableStatusCode(code: number): boolean {
  return RETRYABLE_STATUS_CODES.has(code);
}

/** Error status returned by the remote service. */
export class StatusError extends SDKError {
  /** Numeric gRPC status code. */
  readonly code: number;
  /** Symbolic name, e.g. "NOT_FOUND". */
  readonly code_name: string;
  /** Status details text sent by the service. */
  readonly details?: string;

  constructor(
    message: string,
    options: {
      code: number;
      code_name: string;
      details?: string;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? isRetryableStatusCode(options.code),
    });
    this.name = "StatusError";
    this.code = options.code;
    this.code_name = options.code_name;
    this.details = options.details;
  }
}

/** RESOURCE_EXHAUSTED: rate limit hit. Retryable. */
export class RateLimitError extends StatusError {
  /** Seconds the service asked us to wait, when it said. */
  readonly retry_after?: number;

  constructor(
    message: string,
    options: Omit<ConstructorParameters<typeof StatusError>[1], "retryable"> & {
      retry_after?: number;
    },
  ) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
    this.retry_after = options.retry_after;
  }
}

/** UNAUTHENTICATED / PERMISSION_DENIED: bad or insufficient credential. */
export class AuthenticationError extends StatusError {
  constructor(
    message: string,
    options: Omit<ConstructorParameters<typeof StatusError>[1], "retryable">,
  ) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

// ---------------------------------------------------------------------------
// Non-status errors
// ---------------------------------------------------------------------------

/** Channel or connection failure with no service status. Retryable. */
export class TransportError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "TransportError";
  }
}

/**
 * Malformed domain data, or a response that breaks the wire contract
 * (no outputs, undecodable embedding, deferred status mismatch). Not retryable.
 */
export class InvalidRequestError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Client misconfiguration. Not retryable. */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** The credential environment variable is not set. Not retryable. */
export class MissingCredentialError extends SDKError {
  /** Name of the variable that was looked up. */
  readonly variable: string;

  constructor(variable: string) {
    super(`Environment variable ${variable} is not set`, { retryable: false });
    this.name = "MissingCredentialError";
    this.variable = variable;
  }
}

/** The credential cannot be sent as a header value. Not retryable. */
export class InvalidHeaderError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidHeaderError";
  }
}

/** A client-side deadline (deferred polling) passed. Not retryable. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "RequestTimeoutError";
  }
}
