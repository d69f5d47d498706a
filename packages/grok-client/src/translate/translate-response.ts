/**
 * Translate wire completion messages into ChatResponse / ChatChunk.
 *
 * Wire-permitted absences never crash: missing sub-messages become absent
 * fields, empty strings become undefined, unknown enum codes become
 * "unknown". The two contract checks (no outputs, no message) throw
 * `InvalidRequestError`.
 */

import {
  EMPTY_USAGE,
  InvalidRequestError,
  type ChatChunk,
  type ChatResponse,
  type FinishReason,
  type TokenLogProb,
  type TokenUsage,
} from "../types/index.js";
import { WireFinishReason } from "../wire/enums.js";
import type {
  WireGetChatCompletionChunk,
  WireGetChatCompletionResponse,
  WireLogProbs,
  WireSamplingUsage,
} from "../wire/types.js";
import { fromTimestamp } from "./timestamp.js";
import { translateToolCall } from "./tools.js";

// ---------------------------------------------------------------------------
// Finish reason mapping
// ---------------------------------------------------------------------------

/** Total over all integers; codes outside the table are "unknown". */
export function mapFinishReason(code: number): FinishReason {
  switch (code) {
    case WireFinishReason.REASON_STOP:
      return { reason: "stop" };
    case WireFinishReason.REASON_MAX_LEN:
    case WireFinishReason.REASON_MAX_CONTEXT:
      return { reason: "length" };
    case WireFinishReason.REASON_TOOL_CALLS:
      return { reason: "tool_calls" };
    case WireFinishReason.REASON_TIME_LIMIT:
      return { reason: "error", message: "Time limit reached" };
    default:
      return { reason: "unknown" };
  }
}

// ---------------------------------------------------------------------------
// Usage and logprobs
// ---------------------------------------------------------------------------

export function translateUsage(usage: WireSamplingUsage | null | undefined): TokenUsage {
  if (!usage) return EMPTY_USAGE;
  return {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.total_tokens,
    reasoning_tokens: usage.reasoning_tokens,
    cached_prompt_tokens: usage.cached_prompt_text_tokens,
    prompt_image_tokens: usage.prompt_image_tokens,
    sources_used: usage.num_sources_used,
  };
}

function translateLogprobs(
  logprobs: WireLogProbs | null | undefined,
): readonly TokenLogProb[] | undefined {
  if (!logprobs || logprobs.content.length === 0) return undefined;
  return logprobs.content.map((entry) => ({
    token: entry.token,
    logprob: entry.logprob,
    bytes: Uint8Array.from(entry.bytes),
    top_logprobs: entry.top_logprobs.map((top) => ({
      token: top.token,
      logprob: top.logprob,
      bytes: Uint8Array.from(top.bytes),
    })),
  }));
}

/** Empty string means "not set" for string fields with no presence bit. */
function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

// ---------------------------------------------------------------------------
// Main translation functions
// ---------------------------------------------------------------------------

/** Translate a blocking completion. Only the first output is used. */
export function translateChatResponse(raw: WireGetChatCompletionResponse): ChatResponse {
  const output = raw.outputs[0];
  if (output === undefined) {
    throw new InvalidRequestError("Response has no outputs");
  }
  const message = output.message;
  if (!message) {
    throw new InvalidRequestError("Output has no message");
  }

  const reasoning = nonEmpty(message.reasoning_content);
  const logprobs = translateLogprobs(output.logprobs);
  const created = fromTimestamp(raw.created);
  const fingerprint = nonEmpty(raw.system_fingerprint);

  return {
    id: raw.id,
    model: raw.model,
    content: message.content,
    finish_reason: mapFinishReason(output.finish_reason),
    usage: translateUsage(raw.usage),
    citations: [...raw.citations],
    tool_calls: message.tool_calls.map(translateToolCall),
    ...(reasoning !== undefined ? { reasoning_content: reasoning } : {}),
    ...(logprobs !== undefined ? { logprobs } : {}),
    ...(created !== undefined ? { created } : {}),
    ...(fingerprint !== undefined ? { system_fingerprint: fingerprint } : {}),
  };
}

/**
 * Translate one streamed chunk.
 *
 * A chunk with no outputs (e.g. a trailing usage-only frame) is valid and
 * yields an empty delta.
 */
export function translateChatChunk(raw: WireGetChatCompletionChunk): ChatChunk {
  const output = raw.outputs[0];
  const delta = output?.delta ?? null;

  const reasoning = nonEmpty(delta?.reasoning_content);
  const logprobs = translateLogprobs(output?.logprobs);
  const finishCode = output?.finish_reason ?? WireFinishReason.REASON_INVALID;

  return {
    id: raw.id,
    model: raw.model,
    delta: delta?.content ?? "",
    tool_calls: (delta?.tool_calls ?? []).map(translateToolCall),
    citations: [...raw.citations],
    // Zero means "still streaming", not a reason.
    ...(finishCode !== WireFinishReason.REASON_INVALID
      ? { finish_reason: mapFinishReason(finishCode) }
      : {}),
    ...(raw.usage ? { cumulative_usage: translateUsage(raw.usage) } : {}),
    ...(reasoning !== undefined ? { reasoning_delta: reasoning } : {}),
    ...(logprobs !== undefined ? { logprobs } : {}),
  };
}
