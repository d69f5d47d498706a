/**
 * Embedding requests and vector decoding.
 */

import {
  EmbedEncodingFormat,
  InvalidRequestError,
  type EmbedInput,
  type EmbedRequest,
  type EmbedResponse,
} from "../types/index.js";
import { WireEmbedEncodingFormat } from "../wire/enums.js";
import type {
  WireEmbedInput,
  WireEmbedRequest,
  WireEmbedResponse,
  WireFeatureVector,
} from "../wire/types.js";
import { translateImageDetail } from "./translate-request.js";

const FLOAT32_BYTES = 4;

/**
 * Decode one feature vector.
 *
 * `float_array` wins when non-empty; otherwise `base64_array` is decoded and
 * read as little-endian float32 values.
 */
export function decodeFeatureVector(vector: WireFeatureVector): number[] {
  if (vector.float_array.length > 0) return [...vector.float_array];

  if (vector.base64_array.length === 0) {
    throw new InvalidRequestError("Embedding has neither float nor base64 data");
  }

  const bytes = Buffer.from(vector.base64_array, "base64");
  if (bytes.byteLength % FLOAT32_BYTES !== 0) {
    throw new InvalidRequestError(
      `Embedding byte length ${bytes.byteLength} is not divisible by 4`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values: number[] = [];
  for (let offset = 0; offset < bytes.byteLength; offset += FLOAT32_BYTES) {
    values.push(view.getFloat32(offset, true));
  }
  return values;
}

function translateEmbedInput(input: EmbedInput): WireEmbedInput {
  switch (input.kind) {
    case "text":
      return { string: input.text };
    case "image_url":
      return {
        image_url: { image_url: input.url, detail: translateImageDetail(input.detail) },
      };
  }
}

export function translateEmbedRequest(request: EmbedRequest): WireEmbedRequest {
  return {
    input: request.inputs.map(translateEmbedInput),
    model: request.model,
    ...(request.encoding_format !== undefined
      ? {
          encoding_format:
            request.encoding_format === EmbedEncodingFormat.BASE64
              ? WireEmbedEncodingFormat.FORMAT_BASE64
              : WireEmbedEncodingFormat.FORMAT_FLOAT,
        }
      : {}),
    ...(request.user !== undefined ? { user: request.user } : {}),
  };
}

export function translateEmbedResponse(raw: WireEmbedResponse): EmbedResponse {
  return {
    id: raw.id,
    model: raw.model,
    embeddings: raw.embeddings.map((embedding) => {
      const first = embedding.embeddings[0];
      if (first === undefined) {
        throw new InvalidRequestError(
          `Embedding ${embedding.index} carries no feature vector`,
        );
      }
      return { index: embedding.index, vector: decodeFeatureVector(first) };
    }),
    usage: {
      num_text_embeddings: raw.usage?.num_text_embeddings ?? 0,
      num_image_embeddings: raw.usage?.num_image_embeddings ?? 0,
    },
    ...(raw.system_fingerprint ? { system_fingerprint: raw.system_fingerprint } : {}),
  };
}
