/**
 * Deferred completions: start once, then poll a status endpoint until the
 * result is ready.
 *
 *   Started -> Pending (sleep, poll again) -> Done
 *                                          -> Expired / invalid status
 *
 * Expired, invalid and "done without payload" are terminal and never
 * retried. The deadline is checked against a monotonic clock before every
 * poll, so once it has passed no further polls go out.
 */

import { InvalidRequestError, RequestTimeoutError } from "./types/index.js";
import type { ChatResponse } from "./types/index.js";
import { WireDeferredStatus } from "./wire/enums.js";
import type { WireGetDeferredCompletionResponse } from "./wire/types.js";
import { translateChatResponse } from "./translate/translate-response.js";

// ---------------------------------------------------------------------------
// Status interpretation
// ---------------------------------------------------------------------------

/**
 * Interpret one poll reply: the response when done, `undefined` while
 * pending. Every other state throws `InvalidRequestError`.
 */
export function interpretDeferredStatus(
  raw: WireGetDeferredCompletionResponse,
): ChatResponse | undefined {
  switch (raw.status) {
    case WireDeferredStatus.DONE:
      if (!raw.response) {
        throw new InvalidRequestError("Deferred request marked as done but no response");
      }
      return translateChatResponse(raw.response);
    case WireDeferredStatus.PENDING:
      return undefined;
    case WireDeferredStatus.EXPIRED:
      throw new InvalidRequestError("Deferred request has expired");
    default:
      throw new InvalidRequestError("Invalid deferred status");
  }
}

// ---------------------------------------------------------------------------
// Polling loop
// ---------------------------------------------------------------------------

export interface WaitForDeferredOptions {
  /** Delay between polls, in milliseconds. */
  pollInterval: number;
  /** Give up once this many milliseconds have elapsed. */
  timeout: number;
  /** Monotonic clock in milliseconds. Default: `performance.now()`. */
  now?: () => number;
  /** Default: a `setTimeout` promise. */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `poll` until it yields a value, sleeping `pollInterval` between
 * attempts. Errors thrown by `poll` propagate immediately.
 *
 * Throws `RequestTimeoutError` when more than `timeout` ms have elapsed
 * before a poll would be issued.
 */
export async function waitForDeferred<T>(
  poll: () => Promise<T | undefined>,
  options: WaitForDeferredOptions,
): Promise<T> {
  const now = options.now ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;
  const start = now();

  for (;;) {
    const elapsed = now() - start;
    if (elapsed > options.timeout) {
      throw new RequestTimeoutError(
        `Deferred request timed out after ${Math.round(elapsed)} ms`,
      );
    }

    const result = await poll();
    if (result !== undefined) return result;

    await sleep(options.pollInterval);
  }
}
