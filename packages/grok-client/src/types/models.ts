/**
 * Model descriptors returned by the Models service.
 *
 * Prices stay in the service's fixed-point units: 1/100 of a cent per million
 * tokens (or per image / per search). Conversion to dollars happens only in
 * `calculateCost`.
 */

import { Modality } from "./enums.js";

interface ModelDescriptor {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly version: string;
  readonly input_modalities: readonly Modality[];
  readonly output_modalities: readonly Modality[];
  readonly system_fingerprint: string;
}

export interface LanguageModel extends ModelDescriptor {
  readonly prompt_text_token_price: number;
  readonly prompt_image_token_price: number;
  readonly cached_prompt_token_price: number;
  readonly completion_text_token_price: number;
  readonly search_price: number;
  /** Context window in tokens. */
  readonly max_prompt_length: number;
}

export interface EmbeddingModel extends ModelDescriptor {
  readonly prompt_text_token_price: number;
  readonly prompt_image_token_price: number;
}

export interface ImageGenerationModel extends ModelDescriptor {
  /** Per generated image. */
  readonly image_price: number;
  readonly max_prompt_length: number;
}

/** Fixed-point price units per dollar-per-token. */
const PRICE_SCALE = 100 * 1_000_000;

/**
 * Dollar cost of one call against `model`.
 *
 * ```ts
 * // prompt 500, completion 1500 units; 1000 prompt + 500 completion tokens
 * calculateCost(model, 1000, 500, 0); // 0.0125
 * ```
 */
export function calculateCost(
  model: LanguageModel,
  prompt_tokens: number,
  completion_tokens: number,
  cached_tokens = 0,
): number {
  const prompt = prompt_tokens * model.prompt_text_token_price;
  const cached = cached_tokens * model.cached_prompt_token_price;
  const completion = completion_tokens * model.completion_text_token_price;
  return (prompt + cached + completion) / PRICE_SCALE;
}

/** Whether the model accepts both text and image input. */
export function supportsMultimodal(model: ModelDescriptor): boolean {
  return (
    model.input_modalities.includes(Modality.TEXT) &&
    model.input_modalities.includes(Modality.IMAGE)
  );
}
