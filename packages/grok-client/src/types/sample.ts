/**
 * Raw text sampling (prompt in, continuation out, no chat roles).
 */

import { clampTemperature, clampTopP } from "./request.js";
import type { TokenUsage } from "./response.js";

export interface SampleRequest {
  readonly model: string;
  /** Each prompt is sampled independently. */
  readonly prompts: readonly string[];
  readonly n?: number;
  readonly max_tokens?: number;
  readonly seed?: number;
  readonly stop?: readonly string[];
  readonly temperature?: number;
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
  readonly logprobs?: boolean;
  readonly top_logprobs?: number;
  readonly user?: string;
}

/** "stop" | "length" | "max_context" | "tool_calls" | "time_limit" | "unknown" */
export type SampleFinishReason =
  | "stop"
  | "length"
  | "max_context"
  | "tool_calls"
  | "time_limit"
  | "unknown";

export interface SampleChoice {
  readonly index: number;
  readonly text: string;
  /** Empty on streamed increments that are not terminal. */
  readonly finish_reason: SampleFinishReason | "";
}

export interface SampleResponse {
  readonly id: string;
  readonly model: string;
  readonly choices: readonly SampleChoice[];
  readonly usage: TokenUsage;
  /** Unix seconds. */
  readonly created?: number;
  readonly system_fingerprint?: string;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Fluent builder for `SampleRequest`. Clamps like `ChatRequestBuilder`. */
export class SampleRequestBuilder {
  private readonly prompts: string[] = [];
  private readonly fields: Mutable<Omit<SampleRequest, "model" | "prompts">> = {};

  constructor(private readonly model: string) {}

  addPrompt(prompt: string): this {
    this.prompts.push(prompt);
    return this;
  }

  withN(n: number): this {
    this.fields.n = n;
    return this;
  }

  withMaxTokens(max_tokens: number): this {
    this.fields.max_tokens = max_tokens;
    return this;
  }

  withSeed(seed: number): this {
    this.fields.seed = seed;
    return this;
  }

  withStop(stop: readonly string[]): this {
    this.fields.stop = [...stop];
    return this;
  }

  withTemperature(temperature: number): this {
    this.fields.temperature = clampTemperature(temperature);
    return this;
  }

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

  withLogprobs(top_logprobs?: number): this {
    this.fields.logprobs = true;
    if (top_logprobs !== undefined) this.fields.top_logprobs = top_logprobs;
    return this;
  }

  withUser(user: string): this {
    this.fields.user = user;
    return this;
  }

  build(): SampleRequest {
    return Object.freeze({
      ...this.fields,
      model: this.model,
      prompts: Object.freeze([...this.prompts]),
    });
  }
}
