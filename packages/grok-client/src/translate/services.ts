/**
 * Request/response translation for the smaller services: tokenize, auth,
 * raw sampling, image generation and document search.
 */

import {
  ImageFormat,
  RankingMetric,
  type ApiKeyInfo,
  type DocumentSearchRequest,
  type DocumentSearchResponse,
  type ImageGenerationRequest,
  type ImageGenerationResponse,
  type SampleFinishReason,
  type SampleRequest,
  type SampleResponse,
  type TokenizeRequest,
  type TokenizeResponse,
} from "../types/index.js";
import { WireFinishReason, WireImageFormat, WireRankingMetric } from "../wire/enums.js";
import type {
  WireApiKey,
  WireGenerateImageRequest,
  WireImageResponse,
  WireSampleTextRequest,
  WireSampleTextResponse,
  WireSearchRequest,
  WireSearchResponse,
  WireTokenizeTextRequest,
  WireTokenizeTextResponse,
} from "../wire/types.js";
import { fromTimestamp } from "./timestamp.js";
import { translateUsage } from "./translate-response.js";

// ---------------------------------------------------------------------------
// Tokenize
// ---------------------------------------------------------------------------

export function translateTokenizeRequest(request: TokenizeRequest): WireTokenizeTextRequest {
  return {
    text: request.text,
    model: request.model,
    ...(request.user !== undefined ? { user: request.user } : {}),
  };
}

export function translateTokenizeResponse(raw: WireTokenizeTextResponse): TokenizeResponse {
  return {
    model: raw.model,
    tokens: raw.tokens.map((token) => ({
      token_id: token.token_id,
      string_token: token.string_token,
      token_bytes: Uint8Array.from(token.token_bytes),
    })),
  };
}

// ---------------------------------------------------------------------------
// API key
// ---------------------------------------------------------------------------

export function translateApiKey(raw: WireApiKey): ApiKeyInfo {
  return {
    redacted_api_key: raw.redacted_api_key,
    api_key_id: raw.api_key_id,
    name: raw.name,
    user_id: raw.user_id,
    team_id: raw.team_id,
    acls: [...raw.acls],
    created_at: fromTimestamp(raw.create_time) ?? 0,
    modified_at: fromTimestamp(raw.modify_time) ?? 0,
    modified_by: raw.modified_by,
    api_key_blocked: raw.api_key_blocked,
    team_blocked: raw.team_blocked,
    disabled: raw.api_key_disabled,
  };
}

// ---------------------------------------------------------------------------
// Sample
// ---------------------------------------------------------------------------

export function translateSampleRequest(request: SampleRequest): WireSampleTextRequest {
  const wire: WireSampleTextRequest = {
    prompt: [...request.prompts],
    model: request.model,
  };
  if (request.n !== undefined) wire.n = request.n;
  if (request.max_tokens !== undefined) wire.max_tokens = request.max_tokens;
  if (request.seed !== undefined) wire.seed = request.seed;
  if (request.stop !== undefined) wire.stop = [...request.stop];
  if (request.temperature !== undefined) wire.temperature = request.temperature;
  if (request.top_p !== undefined) wire.top_p = request.top_p;
  if (request.frequency_penalty !== undefined) {
    wire.frequency_penalty = request.frequency_penalty;
  }
  if (request.presence_penalty !== undefined) {
    wire.presence_penalty = request.presence_penalty;
  }
  if (request.logprobs !== undefined) wire.logprobs = request.logprobs;
  if (request.top_logprobs !== undefined) wire.top_logprobs = request.top_logprobs;
  if (request.user !== undefined) wire.user = request.user;
  return wire;
}

/** Zero (not finished yet) maps to "". */
export function mapSampleFinishReason(code: number): SampleFinishReason | "" {
  switch (code) {
    case WireFinishReason.REASON_INVALID:
      return "";
    case WireFinishReason.REASON_STOP:
      return "stop";
    case WireFinishReason.REASON_MAX_LEN:
      return "length";
    case WireFinishReason.REASON_MAX_CONTEXT:
      return "max_context";
    case WireFinishReason.REASON_TOOL_CALLS:
      return "tool_calls";
    case WireFinishReason.REASON_TIME_LIMIT:
      return "time_limit";
    default:
      return "unknown";
  }
}

export function translateSampleResponse(raw: WireSampleTextResponse): SampleResponse {
  return {
    id: raw.id,
    model: raw.model,
    choices: raw.choices.map((choice) => ({
      index: choice.index,
      text: choice.text,
      finish_reason: mapSampleFinishReason(choice.finish_reason),
    })),
    usage: translateUsage(raw.usage),
    ...(raw.created > 0 ? { created: raw.created } : {}),
    ...(raw.system_fingerprint ? { system_fingerprint: raw.system_fingerprint } : {}),
  };
}

// ---------------------------------------------------------------------------
// Image generation
// ---------------------------------------------------------------------------

export function translateImageRequest(
  request: ImageGenerationRequest,
): WireGenerateImageRequest {
  return {
    prompt: request.prompt,
    model: request.model,
    ...(request.image_url !== undefined ? { image_url: request.image_url } : {}),
    ...(request.n !== undefined ? { n: request.n } : {}),
    ...(request.user !== undefined ? { user: request.user } : {}),
    ...(request.format !== undefined
      ? {
          format:
            request.format === ImageFormat.URL
              ? WireImageFormat.IMG_FORMAT_URL
              : WireImageFormat.IMG_FORMAT_BASE64,
        }
      : {}),
  };
}

export function translateImageResponse(raw: WireImageResponse): ImageGenerationResponse {
  return {
    model: raw.model,
    images: raw.images.map((image) => ({
      ...(image.base64 !== undefined ? { base64: image.base64 } : {}),
      ...(image.url !== undefined ? { url: image.url } : {}),
      upsampled_prompt: image.up_sampled_prompt,
      respects_moderation: image.respect_moderation,
    })),
  };
}

// ---------------------------------------------------------------------------
// Document search
// ---------------------------------------------------------------------------

export function translateDocumentSearchRequest(
  request: DocumentSearchRequest,
): WireSearchRequest {
  return {
    query: request.query,
    source: { collection_ids: [...request.collection_ids] },
    ...(request.limit !== undefined ? { limit: request.limit } : {}),
    ...(request.ranking_metric !== undefined
      ? {
          ranking_metric:
            request.ranking_metric === RankingMetric.COSINE_SIMILARITY
              ? WireRankingMetric.RANKING_METRIC_COSINE_SIMILARITY
              : WireRankingMetric.RANKING_METRIC_L2_DISTANCE,
        }
      : {}),
    ...(request.instructions !== undefined ? { instructions: request.instructions } : {}),
  };
}

export function translateDocumentSearchResponse(
  raw: WireSearchResponse,
): DocumentSearchResponse {
  return {
    matches: raw.matches.map((match) => ({
      file_id: match.file_id,
      chunk_id: match.chunk_id,
      content: match.chunk_content,
      score: match.score,
      collection_ids: [...match.collection_ids],
    })),
  };
}
