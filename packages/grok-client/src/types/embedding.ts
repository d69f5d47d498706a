/**
 * Embedding request/response types.
 */

import type { EmbedEncodingFormat, ImageDetail } from "./enums.js";

export type EmbedInput =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "image_url"; readonly url: string; readonly detail?: ImageDetail };

export interface EmbedRequest {
  readonly model: string;
  readonly inputs: readonly EmbedInput[];
  /** Unset lets the service pick; vectors decode the same either way. */
  readonly encoding_format?: EmbedEncodingFormat;
  readonly user?: string;
}

export interface Embedding {
  /** Position of the matching input. */
  readonly index: number;
  readonly vector: readonly number[];
}

export interface EmbedResponse {
  readonly id: string;
  readonly model: string;
  readonly embeddings: readonly Embedding[];
  readonly usage: {
    readonly num_text_embeddings: number;
    readonly num_image_embeddings: number;
  };
  readonly system_fingerprint?: string;
}

/** Fluent builder for `EmbedRequest`. Inputs keep their order. */
export class EmbedRequestBuilder {
  private readonly inputs: EmbedInput[] = [];
  private encodingFormat: EmbedEncodingFormat | undefined;
  private user: string | undefined;

  constructor(private readonly model: string) {}

  addText(text: string): this {
    this.inputs.push({ kind: "text", text });
    return this;
  }

  addImage(url: string, detail?: ImageDetail): this {
    this.inputs.push(
      detail === undefined ? { kind: "image_url", url } : { kind: "image_url", url, detail },
    );
    return this;
  }

  withEncodingFormat(format: EmbedEncodingFormat): this {
    this.encodingFormat = format;
    return this;
  }

  withUser(user: string): this {
    this.user = user;
    return this;
  }

  build(): EmbedRequest {
    return Object.freeze({
      model: this.model,
      inputs: Object.freeze([...this.inputs]),
      ...(this.encodingFormat !== undefined ? { encoding_format: this.encodingFormat } : {}),
      ...(this.user !== undefined ? { user: this.user } : {}),
    });
  }
}
