/**
 * Stream accumulator for the Grok client.
 */

import type { ToolCall } from "./tool.js";
import type { ChatChunk, ChatResponse, FinishReason, TokenLogProb, TokenUsage } from "./response.js";
import { EMPTY_USAGE } from "./response.js";

/**
 * Collects streamed chunks into a complete ChatResponse.
 *
 * Usage:
 * ```ts
 * const acc = new ChunkAccumulator();
 * for await (const chunk of client.streamChat(request)) {
 *   acc.process(chunk);
 * }
 * const response = acc.response();
 * ```
 */
export class ChunkAccumulator {
  private id = "";
  private model = "";
  private textChunks: string[] = [];
  private reasoningChunks: string[] = [];
  private toolCalls: ToolCall[] = [];
  private citations: string[] = [];
  private logprobs: TokenLogProb[] = [];
  private finishReason: FinishReason | undefined;
  private usage: TokenUsage = EMPTY_USAGE;

  /**
   * Process a single chunk.
   */
  process(chunk: ChatChunk): void {
    if (chunk.id) this.id = chunk.id;
    if (chunk.model) this.model = chunk.model;

    this.textChunks.push(chunk.delta);
    if (chunk.reasoning_delta !== undefined) {
      this.reasoningChunks.push(chunk.reasoning_delta);
    }

    // A later copy of the same call supersedes an earlier one. Calls
    // without an id are kept in arrival order; results match by position.
    for (const call of chunk.tool_calls) {
      const index = call.id ? this.toolCalls.findIndex((seen) => seen.id === call.id) : -1;
      if (index >= 0) {
        this.toolCalls[index] = call;
      } else {
        this.toolCalls.push(call);
      }
    }
    for (const citation of chunk.citations) {
      if (!this.citations.includes(citation)) this.citations.push(citation);
    }
    if (chunk.logprobs) this.logprobs.push(...chunk.logprobs);

    // Usage is cumulative, so the latest reported value wins.
    if (chunk.cumulative_usage) this.usage = chunk.cumulative_usage;
    if (chunk.finish_reason) this.finishReason = chunk.finish_reason;
  }

  /** Whether a terminal chunk has been seen. */
  get finished(): boolean {
    return this.finishReason !== undefined;
  }

  /**
   * Build and return the accumulated ChatResponse.
   *
   * Before the terminal chunk the finish reason reads as "unknown".
   */
  response(): ChatResponse {
    const reasoning = this.reasoningChunks.join("");
    return {
      id: this.id,
      model: this.model,
      content: this.textChunks.join(""),
      finish_reason: this.finishReason ?? { reason: "unknown" },
      usage: this.usage,
      citations: [...this.citations],
      tool_calls: [...this.toolCalls],
      ...(reasoning.length > 0 ? { reasoning_content: reasoning } : {}),
      ...(this.logprobs.length > 0 ? { logprobs: [...this.logprobs] } : {}),
    };
  }
}
