/**
 * Chat request types and the fluent request builder.
 */

import type {
  ImageDetail,
  IncludeOption,
  ReasoningEffort,
  SearchMode,
} from "./enums.js";
import { SearchMode as SearchModeValues, SearchSourceKind } from "./enums.js";
import type { ContentPart, Message, MessageContent } from "./message.js";
import {
  createAssistantMessage,
  createSystemMessage,
  createToolResultMessage,
  createUserMessage,
  filePart,
  imageUrlPart,
  textPart,
} from "./message.js";
import type { Tool, ToolCall, ToolChoice } from "./tool.js";

// ---------------------------------------------------------------------------
// ResponseFormat
// ---------------------------------------------------------------------------

/** Controls the format of the model's response. */
export type ResponseFormat =
  | { readonly type: "text" }
  | { readonly type: "json_object" }
  | {
      readonly type: "json_schema";
      /** Serialized as-is; the service enforces it. */
      readonly json_schema: Record<string, unknown>;
    };

// ---------------------------------------------------------------------------
// Live search
// ---------------------------------------------------------------------------

export interface WebSearchSource {
  readonly kind: typeof SearchSourceKind.WEB;
  readonly excluded_websites?: readonly string[];
  readonly allowed_websites?: readonly string[];
  readonly country?: string;
  readonly safe_search?: boolean;
}

export interface NewsSearchSource {
  readonly kind: typeof SearchSourceKind.NEWS;
  readonly excluded_websites?: readonly string[];
  readonly country?: string;
  readonly safe_search?: boolean;
}

export interface XSearchSource {
  readonly kind: typeof SearchSourceKind.X;
  readonly included_x_handles?: readonly string[];
  readonly excluded_x_handles?: readonly string[];
}

export type SearchSource = WebSearchSource | NewsSearchSource | XSearchSource;

/** Live search settings attached to a chat request. */
export interface SearchConfig {
  readonly mode: SearchMode;
  readonly sources: readonly SearchSource[];
  readonly from_date?: Date;
  readonly to_date?: Date;
  readonly return_citations?: boolean;
  readonly max_search_results?: number;
}

/** Auto-mode web search returning at most five results. */
export function webSearchConfig(): SearchConfig {
  return {
    mode: SearchModeValues.AUTO,
    sources: [{ kind: SearchSourceKind.WEB }],
    max_search_results: 5,
  };
}

// ---------------------------------------------------------------------------
// ChatRequest
// ---------------------------------------------------------------------------

/**
 * The single input type for `completeChat()`, `streamChat()` and
 * `startDeferred()`. Build one with `ChatRequestBuilder`.
 */
export interface ChatRequest {
  readonly messages: readonly Message[];
  /** Falls back to the client's default model when omitted. */
  readonly model?: string;
  readonly max_tokens?: number;
  /** Within [0, 2]. */
  readonly temperature?: number;
  /** Within [0, 1]. */
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
  readonly stop_sequences?: readonly string[];
  readonly seed?: number;
  readonly tools?: readonly Tool[];
  readonly tool_choice?: ToolChoice;
  readonly response_format?: ResponseFormat;
  readonly search?: SearchConfig;
  readonly reasoning_effort?: ReasoningEffort;
  /** End-user identifier for abuse monitoring. */
  readonly user?: string;
  readonly logprobs?: boolean;
  readonly top_logprobs?: number;
  readonly parallel_tool_calls?: boolean;
  /** Continue a conversation stored on the server. */
  readonly previous_response_id?: string;
  /** Ask the server to keep this exchange for later retrieval. */
  readonly store_messages?: boolean;
  /** Upper bound on agentic server-side tool turns. At least 1. */
  readonly max_turns?: number;
  readonly include?: readonly IncludeOption[];
}

/** Generation settings that can be reused across requests. */
export interface CompletionOptions {
  readonly model?: string;
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
  readonly stop_sequences?: readonly string[];
  readonly tools?: readonly Tool[];
  readonly tool_choice?: ToolChoice;
  readonly response_format?: ResponseFormat;
}

// ---------------------------------------------------------------------------
// Clamping
// ---------------------------------------------------------------------------

function clamp(value: number, min: number, max: number, label: string): number {
  if (Number.isNaN(value)) {
    throw new RangeError(`${label} must be a number, got NaN`);
  }
  return Math.min(max, Math.max(min, value));
}

/** Clamp a sampling temperature into [0, 2]. */
export function clampTemperature(value: number): number {
  return clamp(value, 0, 2, "temperature");
}

/** Clamp a nucleus sampling value into [0, 1]. */
export function clampTopP(value: number): number {
  return clamp(value, 0, 1, "top_p");
}

// ---------------------------------------------------------------------------
// ChatRequestBuilder
// ---------------------------------------------------------------------------

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Fluent builder for `ChatRequest`.
 *
 * ```ts
 * const request = new ChatRequestBuilder()
 *   .system("You are terse.")
 *   .user("Name three primes.")
 *   .withTemperature(0.2)
 *   .build();
 * ```
 *
 * Messages are append-only. `build()` returns a frozen snapshot, so a builder
 * can keep going after a build without touching requests already sent.
 */
export class ChatRequestBuilder {
  private readonly messages: Message[] = [];
  private readonly fields: Mutable<Omit<ChatRequest, "messages">> = {};

  /** Seed a builder with existing messages and reusable options. */
  static fromMessages(
    messages: readonly Message[],
    options?: CompletionOptions,
  ): ChatRequestBuilder {
    const builder = new ChatRequestBuilder();
    builder.messages.push(...messages);
    if (options) builder.withOptions(options);
    return builder;
  }

  // -----------------------------------------------------------------------
  // Messages
  // -----------------------------------------------------------------------

  message(message: Message): this {
    this.messages.push(message);
    return this;
  }

  system(text: string): this {
    return this.message(createSystemMessage(text));
  }

  user(content: MessageContent): this {
    return this.message(createUserMessage(content));
  }

  assistant(text: string, tool_calls?: readonly ToolCall[]): this {
    return this.message(createAssistantMessage(text, tool_calls));
  }

  /**
   * Append the result of one tool call.
   *
   * Results are matched to calls by position: add them in the order the
   * calls appeared in the response.
   */
  toolResult(tool_call_id: string, content: string): this {
    return this.message(createToolResultMessage(tool_call_id, content));
  }

  userWithImage(text: string, url: string, detail?: ImageDetail): this {
    return this.user([textPart(text), imageUrlPart(url, detail)]);
  }

  userWithFile(text: string, file_id: string): this {
    return this.user([textPart(text), filePart(file_id)]);
  }

  /** A user message from parts, in exactly the given order. */
  userMultimodal(parts: readonly ContentPart[]): this {
    return this.user([...parts]);
  }

  // -----------------------------------------------------------------------
  // Sampling
  // -----------------------------------------------------------------------

  withModel(model: string): this {
    this.fields.model = model;
    return this;
  }

  withMaxTokens(max_tokens: number): this {
    this.fields.max_tokens = max_tokens;
    return this;
  }

  /** Clamped into [0, 2] immediately. */
  withTemperature(temperature: number): this {
    this.fields.temperature = clampTemperature(temperature);
    return this;
  }

  /** Clamped into [0, 1] immediately. */
  withTopP(top_p: number): this {
    this.fields.top_p = clampTopP(top_p);
    return this;
  }

  withFrequencyPenalty(penalty: number): this {
    this.fields.frequency_penalty = penalty;
    return this;
  }

  withPresencePenalty(penalty: number): this {
    this.fields.presence_penalty = penalty;
    return this;
  }

  withStop(stop_sequences: readonly string[]): this {
    this.fields.stop_sequences = [...stop_sequences];
    return this;
  }

  withSeed(seed: number): this {
    this.fields.seed = seed;
    return this;
  }

  withLogprobs(top_logprobs?: number): this {
    this.fields.logprobs = true;
    if (top_logprobs !== undefined) this.fields.top_logprobs = top_logprobs;
    return this;
  }

  withUser(user: string): this {
    this.fields.user = user;
    return this;
  }

  // -----------------------------------------------------------------------
  // Tools and output shape
  // -----------------------------------------------------------------------

  withTools(tools: readonly Tool[]): this {
    this.fields.tools = [...tools];
    return this;
  }

  withToolChoice(tool_choice: ToolChoice): this {
    this.fields.tool_choice = tool_choice;
    return this;
  }

  withParallelToolCalls(enabled: boolean): this {
    this.fields.parallel_tool_calls = enabled;
    return this;
  }

  withResponseFormat(response_format: ResponseFormat): this {
    this.fields.response_format = response_format;
    return this;
  }

  withSearch(search: SearchConfig): this {
    this.fields.search = search;
    return this;
  }

  withReasoningEffort(effort: ReasoningEffort): this {
    this.fields.reasoning_effort = effort;
    return this;
  }

  /** Throws `RangeError` unless `max_turns` is an integer >= 1. */
  withMaxTurns(max_turns: number): this {
    if (!Number.isInteger(max_turns) || max_turns < 1) {
      throw new RangeError(`max_turns must be an integer >= 1, got ${max_turns}`);
    }
    this.fields.max_turns = max_turns;
    return this;
  }

  withInclude(include: readonly IncludeOption[]): this {
    this.fields.include = [...include];
    return this;
  }

  // -----------------------------------------------------------------------
  // Server-side storage
  // -----------------------------------------------------------------------

  withPreviousResponseId(id: string): this {
    this.fields.previous_response_id = id;
    return this;
  }

  withStoreMessages(store: boolean): this {
    this.fields.store_messages = store;
    return this;
  }

  /** Apply every option that is set; temperature and top-p are clamped. */
  withOptions(options: CompletionOptions): this {
    if (options.model !== undefined) this.withModel(options.model);
    if (options.temperature !== undefined) this.withTemperature(options.temperature);
    if (options.max_tokens !== undefined) this.withMaxTokens(options.max_tokens);
    if (options.top_p !== undefined) this.withTopP(options.top_p);
    if (options.frequency_penalty !== undefined) {
      this.withFrequencyPenalty(options.frequency_penalty);
    }
    if (options.presence_penalty !== undefined) {
      this.withPresencePenalty(options.presence_penalty);
    }
    if (options.stop_sequences !== undefined) this.withStop(options.stop_sequences);
    if (options.tools !== undefined) this.withTools(options.tools);
    if (options.tool_choice !== undefined) this.withToolChoice(options.tool_choice);
    if (options.response_format !== undefined) {
      this.withResponseFormat(options.response_format);
    }
    return this;
  }

  /** Snapshot the builder into a frozen request. */
  build(): ChatRequest {
    return Object.freeze({
      ...this.fields,
      messages: Object.freeze([...this.messages]),
    });
  }
}
