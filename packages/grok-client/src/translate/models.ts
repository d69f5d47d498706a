/**
 * Model descriptors from the Models service. Prices are copied unscaled.
 */

import {
  Modality,
  type EmbeddingModel,
  type ImageGenerationModel,
  type LanguageModel,
} from "../types/index.js";
import { WireModality } from "../wire/enums.js";
import type {
  WireEmbeddingModel,
  WireImageGenerationModel,
  WireLanguageModel,
} from "../wire/types.js";

const MODALITIES: Readonly<Record<number, Modality>> = {
  [WireModality.TEXT]: Modality.TEXT,
  [WireModality.IMAGE]: Modality.IMAGE,
  [WireModality.EMBEDDING]: Modality.EMBEDDING,
};

export function mapModality(code: number): Modality {
  return MODALITIES[code] ?? Modality.UNKNOWN;
}

export function translateLanguageModel(raw: WireLanguageModel): LanguageModel {
  return {
    name: raw.name,
    aliases: [...raw.aliases],
    version: raw.version,
    input_modalities: raw.input_modalities.map(mapModality),
    output_modalities: raw.output_modalities.map(mapModality),
    prompt_text_token_price: raw.prompt_text_token_price,
    prompt_image_token_price: raw.prompt_image_token_price,
    cached_prompt_token_price: raw.cached_prompt_token_price,
    completion_text_token_price: raw.completion_text_token_price,
    search_price: raw.search_price,
    max_prompt_length: raw.max_prompt_length,
    system_fingerprint: raw.system_fingerprint,
  };
}

export function translateEmbeddingModel(raw: WireEmbeddingModel): EmbeddingModel {
  return {
    name: raw.name,
    aliases: [...raw.aliases],
    version: raw.version,
    input_modalities: raw.input_modalities.map(mapModality),
    output_modalities: raw.output_modalities.map(mapModality),
    prompt_text_token_price: raw.prompt_text_token_price,
    prompt_image_token_price: raw.prompt_image_token_price,
    system_fingerprint: raw.system_fingerprint,
  };
}

export function translateImageGenerationModel(
  raw: WireImageGenerationModel,
): ImageGenerationModel {
  return {
    name: raw.name,
    aliases: [...raw.aliases],
    version: raw.version,
    input_modalities: raw.input_modalities.map(mapModality),
    output_modalities: raw.output_modalities.map(mapModality),
    image_price: raw.image_price,
    max_prompt_length: raw.max_prompt_length,
    system_fingerprint: raw.system_fingerprint,
  };
}
