import { describe, it, expect } from "vitest";
import { Metadata, status } from "@grpc/grpc-js";
import { mapGrpcError, parseRetryAfter, statusName } from "../src/utils/error-mapping.js";
import {
  AuthenticationError,
  InvalidRequestError,
  RateLimitError,
  StatusError,
  TransportError,
} from "../src/types/errors.js";

// ---------------------------------------------------------------------------
// Helper: a ServiceError shaped like the ones grpc-js rejects with
// ---------------------------------------------------------------------------

function serviceError(code: number, details: string, metadata = new Metadata()) {
  return Object.assign(new Error(`${code} ${statusName(code)}: ${details}`), {
    code,
    details,
    metadata,
  });
}

function withRetryAfter(value: string): Metadata {
  const metadata = new Metadata();
  metadata.set("retry-after", value);
  return metadata;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("statusName", () => {
  it("names known codes", () => {
    expect(statusName(5)).toBe("NOT_FOUND");
    expect(statusName(16)).toBe("UNAUTHENTICATED");
  });

  it("falls back for unknown codes", () => {
    expect(statusName(99)).toBe("UNKNOWN_STATUS_99");
  });
});

describe("parseRetryAfter", () => {
  it("reads integer and decimal seconds", () => {
    expect(parseRetryAfter(withRetryAfter("30"))).toBe(30);
    expect(parseRetryAfter(withRetryAfter("1.5"))).toBe(1.5);
  });

  it("ignores missing or garbage values", () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter(new Metadata())).toBeUndefined();
    expect(parseRetryAfter(withRetryAfter("soon"))).toBeUndefined();
    expect(parseRetryAfter(withRetryAfter("-3"))).toBeUndefined();
  });
});

describe("mapGrpcError", () => {
  it("maps RESOURCE_EXHAUSTED with retry-after to RateLimitError", () => {
    const err = mapGrpcError(
      serviceError(status.RESOURCE_EXHAUSTED, "slow down", withRetryAfter("30")),
    );
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err.message).toBe("Rate limit exceeded, retry after 30 seconds");
    expect(err instanceof RateLimitError && err.retry_after).toBe(30);
    expect(err.retryable).toBe(true);
  });

  it("maps RESOURCE_EXHAUSTED without retry-after", () => {
    const err = mapGrpcError(serviceError(status.RESOURCE_EXHAUSTED, "slow down"));
    expect(err.message).toBe("Rate limit exceeded: slow down");
    expect(err instanceof RateLimitError && err.retry_after).toBeUndefined();
  });

  it.each([status.UNAUTHENTICATED, status.PERMISSION_DENIED])(
    "maps status %i to AuthenticationError",
    (code) => {
      const err = mapGrpcError(serviceError(code, "details"));
      expect(err).toBeInstanceOf(AuthenticationError);
      expect(err.message).toBe(`Authentication failed (${statusName(code)}): details`);
      expect(err.retryable).toBe(false);
    },
  );

  it("maps other statuses to StatusError with code and details", () => {
    const err = mapGrpcError(serviceError(status.UNAVAILABLE, "connection reset"));
    expect(err).toBeInstanceOf(StatusError);
    expect(err.message).toBe("gRPC status UNAVAILABLE: connection reset");
    expect(err.retryable).toBe(true);
    expect(err instanceof StatusError && [err.code, err.code_name, err.details]).toEqual([
      14,
      "UNAVAILABLE",
      "connection reset",
    ]);
  });

  it("omits empty details", () => {
    const err = mapGrpcError(serviceError(status.NOT_FOUND, ""));
    expect(err.message).toBe("gRPC status NOT_FOUND");
    expect(err instanceof StatusError && err.details).toBeUndefined();
    expect(err.retryable).toBe(false);
  });

  it("wraps errors without a status as TransportError", () => {
    const cause = new Error("socket hang up");
    const err = mapGrpcError(cause);
    expect(err).toBeInstanceOf(TransportError);
    expect(err.message).toBe("Transport failure: socket hang up");
    expect(err.cause).toBe(cause);
    expect(mapGrpcError("boom").message).toBe("Transport failure: boom");
  });

  it("passes SDK errors through", () => {
    const original = new InvalidRequestError("bad input");
    expect(mapGrpcError(original)).toBe(original);
  });
});
