/**
 * Bearer-token authentication for every outgoing call.
 */

import { InterceptingCall, type Interceptor, type Metadata } from "@grpc/grpc-js";
import { InvalidHeaderError } from "../types/index.js";

/** Visible ASCII plus space: what a metadata value may hold. */
const HEADER_VALUE = /^[\x20-\x7e]+$/;

/**
 * Throws `InvalidHeaderError` unless `apiKey` can be sent as a header value.
 * The key itself is never part of the message.
 */
export function assertHeaderSafe(apiKey: string): void {
  if (!HEADER_VALUE.test(apiKey)) {
    throw new InvalidHeaderError(
      "API key contains characters that cannot be sent in an authorization header",
    );
  }
}

export function setBearer(metadata: Metadata, apiKey: string): void {
  metadata.set("authorization", `Bearer ${apiKey}`);
}

/** Client interceptor adding `authorization: Bearer <key>` on call start. */
export function bearerAuthInterceptor(apiKey: string): Interceptor {
  assertHeaderSafe(apiKey);
  return (options, nextCall) =>
    new InterceptingCall(nextCall(options), {
      start(metadata, listener, next) {
        setBearer(metadata, apiKey);
        next(metadata, listener);
      },
    });
}
