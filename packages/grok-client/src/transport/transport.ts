/**
 * Transport interface: one method per remote procedure, in wire shapes.
 *
 * Every method rejects (or, for streams, throws while iterating) with an
 * `SDKError`. `GrpcTransport` is the real implementation; tests substitute
 * an in-memory one.
 */

import type {
  WireApiKey,
  WireDeleteStoredCompletionResponse,
  WireEmbedRequest,
  WireEmbedResponse,
  WireEmbeddingModel,
  WireGenerateImageRequest,
  WireGetChatCompletionChunk,
  WireGetChatCompletionResponse,
  WireGetCompletionsRequest,
  WireGetDeferredCompletionResponse,
  WireGetDeferredRequest,
  WireGetModelRequest,
  WireImageGenerationModel,
  WireImageResponse,
  WireLanguageModel,
  WireModelList,
  WireSampleTextRequest,
  WireSampleTextResponse,
  WireSearchRequest,
  WireSearchResponse,
  WireStartDeferredResponse,
  WireStoredCompletionRequest,
  WireTokenizeTextRequest,
  WireTokenizeTextResponse,
} from "../wire/types.js";

export interface GrokTransport {
  // Chat
  getCompletion(request: WireGetCompletionsRequest): Promise<WireGetChatCompletionResponse>;
  getCompletionChunk(
    request: WireGetCompletionsRequest,
  ): AsyncIterableIterator<WireGetChatCompletionChunk>;
  startDeferredCompletion(request: WireGetCompletionsRequest): Promise<WireStartDeferredResponse>;
  getDeferredCompletion(request: WireGetDeferredRequest): Promise<WireGetDeferredCompletionResponse>;
  getStoredCompletion(request: WireStoredCompletionRequest): Promise<WireGetChatCompletionResponse>;
  deleteStoredCompletion(
    request: WireStoredCompletionRequest,
  ): Promise<WireDeleteStoredCompletionResponse>;

  // Models
  listLanguageModels(): Promise<WireModelList<WireLanguageModel>>;
  getLanguageModel(request: WireGetModelRequest): Promise<WireLanguageModel>;
  listEmbeddingModels(): Promise<WireModelList<WireEmbeddingModel>>;
  getEmbeddingModel(request: WireGetModelRequest): Promise<WireEmbeddingModel>;
  listImageGenerationModels(): Promise<WireModelList<WireImageGenerationModel>>;
  getImageGenerationModel(request: WireGetModelRequest): Promise<WireImageGenerationModel>;

  // Other services
  embed(request: WireEmbedRequest): Promise<WireEmbedResponse>;
  tokenizeText(request: WireTokenizeTextRequest): Promise<WireTokenizeTextResponse>;
  getApiKeyInfo(): Promise<WireApiKey>;
  sampleText(request: WireSampleTextRequest): Promise<WireSampleTextResponse>;
  sampleTextStreaming(
    request: WireSampleTextRequest,
  ): AsyncIterableIterator<WireSampleTextResponse>;
  generateImage(request: WireGenerateImageRequest): Promise<WireImageResponse>;
  searchDocuments(request: WireSearchRequest): Promise<WireSearchResponse>;

  /** Release the channel. Calls made afterwards fail. */
  close(): void;
}
