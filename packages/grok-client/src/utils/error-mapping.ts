/**
 * Error mapping for gRPC call failures.
 *
 * Maps `@grpc/grpc-js` service errors (status code, details, trailing
 * metadata) onto the typed error hierarchy. Anything that carries no gRPC
 * status is a transport failure.
 */

import { status, type Metadata, type ServiceError } from "@grpc/grpc-js";
import {
  AuthenticationError,
  RateLimitError,
  SDKError,
  StatusError,
  TransportError,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isServiceError(err: unknown): err is ServiceError {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "number" &&
    "details" in err &&
    "metadata" in err
  );
}

/** Symbolic name of a status code, e.g. 5 -> "NOT_FOUND". */
export function statusName(code: number): string {
  return status[code] ?? `UNKNOWN_STATUS_${code}`;
}

/**
 * Parse the `retry-after` trailer (integer or decimal seconds).
 *
 * Returns seconds (as a number) or `undefined`.
 */
export function parseRetryAfter(metadata?: Metadata): number | undefined {
  if (!metadata) return undefined;

  const [raw] = metadata.get("retry-after");
  if (raw === undefined) return undefined;

  const seconds = parseFloat(raw.toString());
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map any failure thrown by a gRPC call to an `SDKError`.
 *
 * Errors that already are `SDKError`s pass through untouched.
 */
export function mapGrpcError(err: unknown): SDKError {
  if (err instanceof SDKError) return err;

  if (!isServiceError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError(`Transport failure: ${message}`, { cause: err });
  }

  const code = err.code;
  const code_name = statusName(code);
  const details = err.details || undefined;
  const opts = { code, code_name, details, cause: err };

  switch (code) {
    case status.RESOURCE_EXHAUSTED: {
      const retry_after = parseRetryAfter(err.metadata);
      const message =
        retry_after !== undefined
          ? `Rate limit exceeded, retry after ${retry_after} seconds`
          : `Rate limit exceeded${details ? `: ${details}` : ""}`;
      return new RateLimitError(message, { ...opts, retry_after });
    }
    case status.UNAUTHENTICATED:
    case status.PERMISSION_DENIED:
      return new AuthenticationError(
        `Authentication failed (${code_name})${details ? `: ${details}` : ""}`,
        opts,
      );
    default:
      return new StatusError(
        `gRPC status ${code_name}${details ? `: ${details}` : ""}`,
        opts,
      );
  }
}
