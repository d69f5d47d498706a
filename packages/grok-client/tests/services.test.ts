import { describe, it, expect } from "vitest";
import {
  mapSampleFinishReason,
  translateApiKey,
  translateDocumentSearchRequest,
  translateDocumentSearchResponse,
  translateImageRequest,
  translateImageResponse,
  translateSampleRequest,
  translateSampleResponse,
  translateTokenizeRequest,
  translateTokenizeResponse,
} from "../src/translate/services.js";
import { apiKeyStatus, isApiKeyActive } from "../src/types/api-key.js";
import type { ApiKeyInfo } from "../src/types/api-key.js";
import { DocumentSearchRequestBuilder } from "../src/types/documents.js";
import { ImageGenerationRequestBuilder } from "../src/types/image.js";
import { SampleRequestBuilder } from "../src/types/sample.js";
import { tokenCount, tokenText } from "../src/types/tokenize.js";
import { WireImageFormat, WireRankingMetric } from "../src/wire/enums.js";
import type { WireApiKey } from "../src/wire/types.js";

// ---------------------------------------------------------------------------
// Tokenize
// ---------------------------------------------------------------------------

describe("tokenize", () => {
  it("omits an unset user", () => {
    expect(translateTokenizeRequest({ model: "grok-4", text: "hi there" })).toEqual({
      text: "hi there",
      model: "grok-4",
    });
  });

  it("decodes tokens and reassembles the text", () => {
    const response = translateTokenizeResponse({
      model: "grok-4",
      tokens: [
        { token_id: 101, string_token: "hi", token_bytes: Uint8Array.from([104, 105]) },
        { token_id: 202, string_token: " there", token_bytes: Uint8Array.from([32]) },
      ],
    });
    expect(tokenCount(response)).toBe(2);
    expect(tokenText(response)).toBe("hi there");
    expect(response.tokens[0]?.token_id).toBe(101);
  });
});

// ---------------------------------------------------------------------------
// API key
// ---------------------------------------------------------------------------

const wireKey: WireApiKey = {
  redacted_api_key: "xai-****abcd",
  user_id: "user-1",
  name: "ci key",
  create_time: { seconds: 1_700_000_000, nanos: 0 },
  modify_time: null,
  modified_by: "user-1",
  team_id: "team-1",
  acls: ["api-key:model:*"],
  api_key_id: "key-1",
  team_blocked: false,
  api_key_blocked: false,
  api_key_disabled: false,
};

describe("translateApiKey", () => {
  it("converts timestamps to seconds, 0 when unset", () => {
    const info = translateApiKey(wireKey);
    expect(info.created_at).toBe(1_700_000_000);
    expect(info.modified_at).toBe(0);
    expect(info.disabled).toBe(false);
    expect(info.acls).toEqual(["api-key:model:*"]);
  });
});

describe("apiKeyStatus", () => {
  const active: ApiKeyInfo = translateApiKey(wireKey);

  it.each([
    [{}, "Active", true],
    [{ api_key_blocked: true, team_blocked: true }, "Blocked (Key)", false],
    [{ team_blocked: true }, "Blocked (Team)", false],
    [{ disabled: true }, "Disabled", false],
  ])("%o reads %s", (overrides, status, isActive) => {
    const info = { ...active, ...overrides };
    expect(apiKeyStatus(info)).toBe(status);
    expect(isApiKeyActive(info)).toBe(isActive);
  });
});

// ---------------------------------------------------------------------------
// Sample
// ---------------------------------------------------------------------------

describe("sample", () => {
  it("builds the request with clamped sampling values", () => {
    const request = new SampleRequestBuilder("grok-2")
      .addPrompt("Once upon a time")
      .addPrompt("In a galaxy")
      .withTemperature(9)
      .withTopP(0.5)
      .withMaxTokens(32)
      .build();

    expect(translateSampleRequest(request)).toEqual({
      prompt: ["Once upon a time", "In a galaxy"],
      model: "grok-2",
      max_tokens: 32,
      temperature: 2,
      top_p: 0.5,
    });
  });

  it.each([
    [0, ""],
    [1, "length"],
    [2, "max_context"],
    [3, "stop"],
    [4, "tool_calls"],
    [5, "time_limit"],
    [77, "unknown"],
  ])("maps finish code %i to %s", (code, expected) => {
    expect(mapSampleFinishReason(code)).toBe(expected);
  });

  it("translates a response, dropping an unset creation time", () => {
    const response = translateSampleResponse({
      id: "smp_1",
      choices: [{ finish_reason: 3, index: 0, text: ", there was a test." }],
      created: 0,
      model: "grok-2",
      system_fingerprint: "",
      usage: null,
    });
    expect(response).toEqual({
      id: "smp_1",
      model: "grok-2",
      choices: [{ index: 0, text: ", there was a test.", finish_reason: "stop" }],
      usage: {
        prompt_tokens: 0,
        completion_tokens: 0,
        total_tokens: 0,
        reasoning_tokens: 0,
        cached_prompt_tokens: 0,
        prompt_image_tokens: 0,
        sources_used: 0,
      },
    });
  });
});

// ---------------------------------------------------------------------------
// Image generation
// ---------------------------------------------------------------------------

describe("image generation", () => {
  it("maps the requested format", () => {
    const request = new ImageGenerationRequestBuilder("grok-image", "a red fox")
      .withN(2)
      .withFormat("url")
      .build();
    expect(translateImageRequest(request)).toEqual({
      prompt: "a red fox",
      model: "grok-image",
      n: 2,
      format: WireImageFormat.IMG_FORMAT_URL,
    });
  });

  it("translates generated images", () => {
    const response = translateImageResponse({
      model: "grok-image",
      images: [
        { url: "https://img.example/1.png", up_sampled_prompt: "a red fox, dusk", respect_moderation: true },
      ],
    });
    expect(response.images).toEqual([
      {
        url: "https://img.example/1.png",
        upsampled_prompt: "a red fox, dusk",
        respects_moderation: true,
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Document search
// ---------------------------------------------------------------------------

describe("document search", () => {
  it("builds the request with collections and metric", () => {
    const request = new DocumentSearchRequestBuilder("refund policy")
      .addCollection("col-a")
      .addCollection("col-b")
      .withLimit(3)
      .withRankingMetric("cosine_similarity")
      .build();

    expect(translateDocumentSearchRequest(request)).toEqual({
      query: "refund policy",
      source: { collection_ids: ["col-a", "col-b"] },
      limit: 3,
      ranking_metric: WireRankingMetric.RANKING_METRIC_COSINE_SIMILARITY,
    });
  });

  it("renames chunk content on matches", () => {
    const response = translateDocumentSearchResponse({
      matches: [
        {
          file_id: "file-1",
          chunk_id: "chunk-9",
          chunk_content: "Refunds within 30 days.",
          score: 0.82,
          collection_ids: ["col-a"],
        },
      ],
    });
    expect(response.matches).toEqual([
      {
        file_id: "file-1",
        chunk_id: "chunk-9",
        content: "Refunds within 30 days.",
        score: 0.82,
        collection_ids: ["col-a"],
      },
    ]);
  });
});
