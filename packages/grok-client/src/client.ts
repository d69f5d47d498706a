/**
 * GrokClient: the public entry point.
 *
 * Builds wire requests from domain values, sends them through a
 * `GrokTransport` and assembles domain responses. Chat calls pass through an
 * onion-ordered middleware chain. Nothing is retried here; wrap calls in
 * `retry()` to opt in.
 */

import type { Logger } from "pino";
import { apiKeyFromEnv, resolveConfig, type GrokConfig, type GrokConfigInput } from "./config.js";
import {
  interpretDeferredStatus,
  waitForDeferred,
  type WaitForDeferredOptions,
} from "./deferred.js";
import { getLogger } from "./logger.js";
import { translateEmbedRequest, translateEmbedResponse } from "./translate/embedding.js";
import {
  translateEmbeddingModel,
  translateImageGenerationModel,
  translateLanguageModel,
} from "./translate/models.js";
import {
  translateApiKey,
  translateDocumentSearchRequest,
  translateDocumentSearchResponse,
  translateImageRequest,
  translateImageResponse,
  translateSampleRequest,
  translateSampleResponse,
  translateTokenizeRequest,
  translateTokenizeResponse,
} from "./translate/services.js";
import { translateChatRequest } from "./translate/translate-request.js";
import { translateChatChunk, translateChatResponse } from "./translate/translate-response.js";
import { assertHeaderSafe } from "./transport/auth.js";
import { GrpcTransport } from "./transport/grpc.js";
import type { GrokTransport } from "./transport/transport.js";
import { ChatRequestBuilder } from "./types/index.js";
import type {
  ApiKeyInfo,
  ChatChunk,
  ChatRequest,
  ChatResponse,
  DocumentSearchRequest,
  DocumentSearchResponse,
  EmbedRequest,
  EmbedResponse,
  EmbeddingModel,
  ImageGenerationModel,
  ImageGenerationRequest,
  ImageGenerationResponse,
  LanguageModel,
  SampleRequest,
  SampleResponse,
  TokenizeRequest,
  TokenizeResponse,
} from "./types/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Middleware for `completeChat()` calls.
 *
 * Follows the onion pattern: middleware runs in registration order for the
 * request phase and in reverse order for the response phase.
 */
export type Middleware = (
  request: ChatRequest,
  next: (request: ChatRequest) => Promise<ChatResponse>,
) => Promise<ChatResponse>;

/**
 * Middleware for `streamChat()` calls.
 *
 * Wraps the chunk iterator so each middleware can observe/transform chunks.
 */
export type StreamMiddleware = (
  request: ChatRequest,
  next: (request: ChatRequest) => AsyncIterableIterator<ChatChunk>,
) => AsyncIterableIterator<ChatChunk>;

export interface GrokClientOptions extends GrokConfigInput {
  /** Replaces the gRPC transport, e.g. with an in-memory fake. */
  transport?: GrokTransport;
  middleware?: Middleware[];
  streamMiddleware?: StreamMiddleware[];
  logger?: Logger;
}

export type WaitOptions = WaitForDeferredOptions;

// ---------------------------------------------------------------------------
// GrokClient
// ---------------------------------------------------------------------------

export class GrokClient {
  readonly config: Readonly<Omit<GrokConfig, "apiKey">>;
  private readonly transport: GrokTransport;
  private readonly middleware: Middleware[];
  private readonly streamMiddleware: StreamMiddleware[];
  private readonly logger: Logger;

  constructor(options: GrokClientOptions) {
    const { transport, middleware, streamMiddleware, logger, ...input } = options;
    const config = resolveConfig(input);
    assertHeaderSafe(config.apiKey);

    // Keep everything but the credential; the transport holds that.
    const { apiKey: _apiKey, ...publicConfig } = config;
    this.config = Object.freeze(publicConfig);
    this.logger = logger ?? getLogger();
    this.transport = transport ?? new GrpcTransport(config, { logger: this.logger });
    this.middleware = [...(middleware ?? [])];
    this.streamMiddleware = [...(streamMiddleware ?? [])];

    this.logger.debug(
      { endpoint: config.endpoint, defaultModel: config.defaultModel },
      "client created",
    );
  }

  // -----------------------------------------------------------------------
  // Static factory
  // -----------------------------------------------------------------------

  /**
   * Create a client whose credential comes from `XAI_API_KEY`.
   *
   * Throws `MissingCredentialError` when the variable is not set.
   */
  static fromEnv(overrides: Omit<GrokClientOptions, "apiKey"> = {}): GrokClient {
    return new GrokClient({ ...overrides, apiKey: apiKeyFromEnv() });
  }

  // -----------------------------------------------------------------------
  // Chat
  // -----------------------------------------------------------------------

  /**
   * Blocking completion. Applies the middleware chain in onion pattern.
   */
  async completeChat(request: ChatRequest): Promise<ChatResponse> {
    const innermost = async (req: ChatRequest): Promise<ChatResponse> => {
      const raw = await this.transport.getCompletion(
        translateChatRequest(req, this.config.defaultModel),
      );
      return translateChatResponse(raw);
    };

    // The first middleware registered is the outermost.
    const chain = this.middleware.reduceRight<(req: ChatRequest) => Promise<ChatResponse>>(
      (next, mw) => (req: ChatRequest) => mw(req, next),
      innermost,
    );

    return chain(request);
  }

  /**
   * Streaming completion. Breaking out of the loop cancels the call.
   */
  streamChat(request: ChatRequest): AsyncIterableIterator<ChatChunk> {
    const innermost = (req: ChatRequest): AsyncIterableIterator<ChatChunk> =>
      this.chunks(req);

    const chain = this.streamMiddleware.reduceRight<
      (req: ChatRequest) => AsyncIterableIterator<ChatChunk>
    >((next, mw) => (req: ChatRequest) => mw(req, next), innermost);

    return chain(request);
  }

  private async *chunks(request: ChatRequest): AsyncGenerator<ChatChunk> {
    const wire = translateChatRequest(request, this.config.defaultModel);
    for await (const raw of this.transport.getCompletionChunk(wire)) {
      yield translateChatChunk(raw);
    }
  }

  // -----------------------------------------------------------------------
  // Deferred and stored completions
  // -----------------------------------------------------------------------

  /** Start a deferred completion; returns the id to poll with. */
  async startDeferred(request: ChatRequest): Promise<string> {
    const reply = await this.transport.startDeferredCompletion(
      translateChatRequest(request, this.config.defaultModel),
    );
    this.logger.debug({ request_id: reply.request_id }, "deferred completion started");
    return reply.request_id;
  }

  /** One status check: the response when done, `undefined` while pending. */
  async pollDeferred(requestId: string): Promise<ChatResponse | undefined> {
    const raw = await this.transport.getDeferredCompletion({ request_id: requestId });
    return interpretDeferredStatus(raw);
  }

  /**
   * Poll until the deferred completion is done.
   *
   * Throws `RequestTimeoutError` once `timeout` ms have passed, and
   * `InvalidRequestError` on an expired or unrecognized status.
   */
  waitForDeferred(requestId: string, options: WaitOptions): Promise<ChatResponse> {
    return waitForDeferred(() => this.pollDeferred(requestId), options);
  }

  /** Fetch a completion stored with `store_messages`. */
  async getStoredCompletion(responseId: string): Promise<ChatResponse> {
    const raw = await this.transport.getStoredCompletion({ response_id: responseId });
    return translateChatResponse(raw);
  }

  async deleteStoredCompletion(responseId: string): Promise<void> {
    await this.transport.deleteStoredCompletion({ response_id: responseId });
  }

  // -----------------------------------------------------------------------
  // Models
  // -----------------------------------------------------------------------

  /** List language models available to this API key. */
  async listModels(): Promise<LanguageModel[]> {
    const list = await this.transport.listLanguageModels();
    return list.models.map(translateLanguageModel);
  }

  async getModel(name: string): Promise<LanguageModel> {
    return translateLanguageModel(await this.transport.getLanguageModel({ name }));
  }

  async listEmbeddingModels(): Promise<EmbeddingModel[]> {
    const list = await this.transport.listEmbeddingModels();
    return list.models.map(translateEmbeddingModel);
  }

  async getEmbeddingModel(name: string): Promise<EmbeddingModel> {
    return translateEmbeddingModel(await this.transport.getEmbeddingModel({ name }));
  }

  async listImageGenerationModels(): Promise<ImageGenerationModel[]> {
    const list = await this.transport.listImageGenerationModels();
    return list.models.map(translateImageGenerationModel);
  }

  async getImageGenerationModel(name: string): Promise<ImageGenerationModel> {
    return translateImageGenerationModel(
      await this.transport.getImageGenerationModel({ name }),
    );
  }

  // -----------------------------------------------------------------------
  // Other services
  // -----------------------------------------------------------------------

  async embed(request: EmbedRequest): Promise<EmbedResponse> {
    const raw = await this.transport.embed(translateEmbedRequest(request));
    return translateEmbedResponse(raw);
  }

  async tokenize(request: TokenizeRequest): Promise<TokenizeResponse> {
    const raw = await this.transport.tokenizeText(translateTokenizeRequest(request));
    return translateTokenizeResponse(raw);
  }

  /** Details about the key this client authenticates with. */
  async getApiKeyInfo(): Promise<ApiKeyInfo> {
    return translateApiKey(await this.transport.getApiKeyInfo());
  }

  /** Raw text sampling, without chat formatting. */
  async sample(request: SampleRequest): Promise<SampleResponse> {
    const raw = await this.transport.sampleText(translateSampleRequest(request));
    return translateSampleResponse(raw);
  }

  async *sampleStream(request: SampleRequest): AsyncGenerator<SampleResponse> {
    for await (const raw of this.transport.sampleTextStreaming(translateSampleRequest(request))) {
      yield translateSampleResponse(raw);
    }
  }

  async generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResponse> {
    const raw = await this.transport.generateImage(translateImageRequest(request));
    return translateImageResponse(raw);
  }

  async searchDocuments(request: DocumentSearchRequest): Promise<DocumentSearchResponse> {
    const raw = await this.transport.searchDocuments(translateDocumentSearchRequest(request));
    return translateDocumentSearchResponse(raw);
  }

  // -----------------------------------------------------------------------
  // Diagnostics and lifecycle
  // -----------------------------------------------------------------------

  /**
   * Send a one-line prompt with the default model and return the reply text.
   * Bypasses the middleware chain.
   */
  async testConnection(): Promise<string> {
    const request = new ChatRequestBuilder()
      .user("Say 'Hello from gRPC!' in one sentence.")
      .withMaxTokens(50)
      .build();
    const raw = await this.transport.getCompletion(
      translateChatRequest(request, this.config.defaultModel),
    );
    return translateChatResponse(raw).content;
  }

  /** Close the channel. Calls made afterwards fail. */
  close(): void {
    this.transport.close();
  }
}
