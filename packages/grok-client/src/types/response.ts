/**
 * Response types for the Grok client.
 */

import type { ToolCall } from "./tool.js";

// ---------------------------------------------------------------------------
// FinishReason: discriminated union on `reason`
// ---------------------------------------------------------------------------

/** Why generation stopped. */
export type FinishReason =
  | { readonly reason: "stop" }
  | { readonly reason: "length" }
  | { readonly reason: "tool_calls" }
  | { readonly reason: "content_filter" }
  | { readonly reason: "error"; readonly message: string }
  | { readonly reason: "unknown" };

// ---------------------------------------------------------------------------
// TokenUsage
// ---------------------------------------------------------------------------

/** Token accounting. All counts are non-negative integers. */
export interface TokenUsage {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
  readonly reasoning_tokens: number;
  readonly cached_prompt_tokens: number;
  readonly prompt_image_tokens: number;
  /** Live-search sources consulted. */
  readonly sources_used: number;
}

export const EMPTY_USAGE: TokenUsage = Object.freeze({
  prompt_tokens: 0,
  completion_tokens: 0,
  total_tokens: 0,
  reasoning_tokens: 0,
  cached_prompt_tokens: 0,
  prompt_image_tokens: 0,
  sources_used: 0,
});

// ---------------------------------------------------------------------------
// Log probabilities
// ---------------------------------------------------------------------------

export interface TopLogProb {
  readonly token: string;
  readonly logprob: number;
  readonly bytes: Uint8Array;
}

export interface TokenLogProb extends TopLogProb {
  /** Most likely alternatives at this position. */
  readonly top_logprobs: readonly TopLogProb[];
}

// ---------------------------------------------------------------------------
// ChatResponse
// ---------------------------------------------------------------------------

/** A complete (blocking) chat completion. */
export interface ChatResponse {
  readonly id: string;
  readonly model: string;
  readonly content: string;
  readonly finish_reason: FinishReason;
  readonly usage: TokenUsage;
  readonly citations: readonly string[];
  readonly tool_calls: readonly ToolCall[];
  readonly reasoning_content?: string;
  readonly logprobs?: readonly TokenLogProb[];
  /** Unix seconds. */
  readonly created?: number;
  readonly system_fingerprint?: string;
}

// ---------------------------------------------------------------------------
// ChatChunk
// ---------------------------------------------------------------------------

/**
 * One increment of a streamed completion.
 *
 * `finish_reason` is set only on the terminal chunk. `tool_calls` and
 * `citations` are normally only filled in there as well.
 */
export interface ChatChunk {
  readonly id: string;
  readonly model: string;
  readonly delta: string;
  readonly finish_reason?: FinishReason;
  /** Usage so far, not just for this chunk. Absent on frames that carry none. */
  readonly cumulative_usage?: TokenUsage;
  readonly reasoning_delta?: string;
  readonly tool_calls: readonly ToolCall[];
  readonly citations: readonly string[];
  readonly logprobs?: readonly TokenLogProb[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Whether the model stopped to ask for tool calls. */
export function requiresToolExecution(response: ChatResponse): boolean {
  return response.finish_reason.reason === "tool_calls" && response.tool_calls.length > 0;
}

/** Human-readable form of a finish reason. */
export function describeFinishReason(finish: FinishReason): string {
  return finish.reason === "error" ? `error: ${finish.message}` : finish.reason;
}
