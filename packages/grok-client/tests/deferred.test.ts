import { describe, it, expect, vi } from "vitest";
import { interpretDeferredStatus, waitForDeferred } from "../src/deferred.js";
import { InvalidRequestError, RequestTimeoutError } from "../src/types/errors.js";
import { WireDeferredStatus } from "../src/wire/enums.js";
import type {
  WireGetChatCompletionResponse,
  WireGetDeferredCompletionResponse,
} from "../src/wire/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const completion: WireGetChatCompletionResponse = {
  id: "resp_deferred",
  outputs: [
    {
      finish_reason: 3,
      index: 0,
      message: { content: "Done!", reasoning_content: "", role: 2, tool_calls: [] },
      logprobs: null,
    },
  ],
  created: null,
  model: "grok-4",
  system_fingerprint: "",
  usage: null,
  citations: [],
};

const pending: WireGetDeferredCompletionResponse = { status: WireDeferredStatus.PENDING };
const done: WireGetDeferredCompletionResponse = {
  status: WireDeferredStatus.DONE,
  response: completion,
};

/** A clock that only moves when the fake sleep is called. */
function fakeTime() {
  let now = 0;
  const sleep = vi.fn(async (ms: number) => {
    now += ms;
  });
  return { now: () => now, sleep };
}

// ---------------------------------------------------------------------------
// interpretDeferredStatus
// ---------------------------------------------------------------------------

describe("interpretDeferredStatus", () => {
  it("returns undefined while pending", () => {
    expect(interpretDeferredStatus(pending)).toBeUndefined();
  });

  it("returns the assembled response when done", () => {
    expect(interpretDeferredStatus(done)?.content).toBe("Done!");
  });

  it("rejects done without a payload", () => {
    expect(() =>
      interpretDeferredStatus({ status: WireDeferredStatus.DONE, response: null }),
    ).toThrow("Deferred request marked as done but no response");
  });

  it("rejects an expired request", () => {
    expect(() => interpretDeferredStatus({ status: WireDeferredStatus.EXPIRED })).toThrow(
      new InvalidRequestError("Deferred request has expired"),
    );
  });

  it.each([0, 7])("rejects unrecognized status %i", (status) => {
    expect(() => interpretDeferredStatus({ status })).toThrow("Invalid deferred status");
  });
});

// ---------------------------------------------------------------------------
// waitForDeferred
// ---------------------------------------------------------------------------

describe("waitForDeferred", () => {
  it("returns the payload after some pending polls", async () => {
    const time = fakeTime();
    const replies = [pending, pending, done];
    const poll = vi.fn(async () => interpretDeferredStatus(replies.shift() ?? pending));

    const response = await waitForDeferred(poll, {
      pollInterval: 100,
      timeout: 1_000,
      ...time,
    });

    expect(response.id).toBe("resp_deferred");
    expect(poll).toHaveBeenCalledTimes(3);
    expect(time.sleep).toHaveBeenCalledTimes(2);
    expect(time.sleep).toHaveBeenCalledWith(100);
  });

  it("times out when pending outlasts the deadline and stops polling", async () => {
    const time = fakeTime();
    const poll = vi.fn(async () => interpretDeferredStatus(pending));

    await expect(
      waitForDeferred(poll, { pollInterval: 100, timeout: 250, ...time }),
    ).rejects.toThrow(new RequestTimeoutError("Deferred request timed out after 300 ms"));

    // Polls at t=0, 100, 200; the check at t=300 fails before a fourth poll.
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it("polls at exactly the deadline but not past it", async () => {
    const time = fakeTime();
    const poll = vi.fn(async () => interpretDeferredStatus(pending));

    await expect(
      waitForDeferred(poll, { pollInterval: 100, timeout: 200, ...time }),
    ).rejects.toBeInstanceOf(RequestTimeoutError);

    // Elapsed 200 is not greater than 200, so t=200 still polls.
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it("fails on immediate expiry without sleeping", async () => {
    const time = fakeTime();
    const poll = vi.fn(async () => interpretDeferredStatus({ status: WireDeferredStatus.EXPIRED }));

    await expect(
      waitForDeferred(poll, { pollInterval: 100, timeout: 1_000, ...time }),
    ).rejects.toThrow("Deferred request has expired");

    expect(poll).toHaveBeenCalledTimes(1);
    expect(time.sleep).not.toHaveBeenCalled();
  });

  it("timeout errors are not retryable", async () => {
    const time = fakeTime();
    const err = await waitForDeferred(async () => undefined, {
      pollInterval: 50,
      timeout: 0,
      ...time,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestTimeoutError);
    expect(err instanceof RequestTimeoutError && err.retryable).toBe(false);
  });
});
