/**
 * Image generation request/response types.
 */

import type { ImageFormat } from "./enums.js";

export interface ImageGenerationRequest {
  readonly model: string;
  readonly prompt: string;
  /** Source image for image-to-image generation. */
  readonly image_url?: string;
  readonly n?: number;
  readonly format?: ImageFormat;
  readonly user?: string;
}

/** Exactly one of `base64` / `url` is set, depending on the requested format. */
export interface GeneratedImage {
  readonly base64?: string;
  readonly url?: string;
  /** The prompt the service actually used after rewriting. */
  readonly upsampled_prompt: string;
  readonly respects_moderation: boolean;
}

export interface ImageGenerationResponse {
  readonly model: string;
  readonly images: readonly GeneratedImage[];
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export class ImageGenerationRequestBuilder {
  private readonly fields: Mutable<Omit<ImageGenerationRequest, "model" | "prompt">> = {};

  constructor(
    private readonly model: string,
    private readonly prompt: string,
  ) {}

  withN(n: number): this {
    this.fields.n = n;
    return this;
  }

  withSourceImage(url: string): this {
    this.fields.image_url = url;
    return this;
  }

  withFormat(format: ImageFormat): this {
    this.fields.format = format;
    return this;
  }

  withUser(user: string): this {
    this.fields.user = user;
    return this;
  }

  build(): ImageGenerationRequest {
    return Object.freeze({ ...this.fields, model: this.model, prompt: this.prompt });
  }
}
