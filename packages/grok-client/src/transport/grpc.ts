/**
 * gRPC transport over `@grpc/grpc-js`, with the schema loaded at run time by
 * `@grpc/proto-loader`.
 *
 * One channel serves every service. TLS is used for `https` endpoints and
 * plaintext for `http`. Each call carries a deadline of `timeoutMs` and the
 * bearer credential (added by an interceptor).
 */

import { Client, Metadata, credentials, type ChannelCredentials } from "@grpc/grpc-js";
import type { PackageDefinition } from "@grpc/proto-loader";
import type { Logger } from "pino";
import type { GrokConfig } from "../config.js";
import { getLogger } from "../logger.js";
import { TransportError } from "../types/index.js";
import { mapGrpcError } from "../utils/error-mapping.js";
import { getMethod, getService, loadGrokProto, ServiceName } from "../wire/proto.js";
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
import { bearerAuthInterceptor } from "./auth.js";
import type { GrokTransport } from "./transport.js";

// ---------------------------------------------------------------------------
// Channel target
// ---------------------------------------------------------------------------

export interface ChannelTarget {
  /** `host:port` as grpc-js expects it. */
  readonly target: string;
  readonly secure: boolean;
}

/** `https://api.x.ai` -> `{ target: "api.x.ai:443", secure: true }`. */
export function channelTarget(endpoint: string): ChannelTarget {
  const url = new URL(endpoint);
  const secure = url.protocol === "https:";
  const port = url.port || (secure ? "443" : "80");
  return { target: `${url.hostname}:${port}`, secure };
}

// ---------------------------------------------------------------------------
// GrpcTransport
// ---------------------------------------------------------------------------

export interface GrpcTransportOptions {
  /** Pre-loaded schema; loaded from `config.protoRoot` otherwise. */
  definition?: PackageDefinition;
  /** Override channel credentials (e.g. a custom CA). */
  credentials?: ChannelCredentials;
  logger?: Logger;
}

export class GrpcTransport implements GrokTransport {
  private readonly client: Client;
  private readonly definition: PackageDefinition;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: GrokConfig, options: GrpcTransportOptions = {}) {
    const { target, secure } = channelTarget(config.endpoint);
    this.definition = options.definition ?? loadGrokProto(config.protoRoot);
    this.timeoutMs = config.timeoutMs;
    this.logger = (options.logger ?? getLogger()).child({ component: "grpc" });

    this.client = new Client(
      target,
      options.credentials ?? (secure ? credentials.createSsl() : credentials.createInsecure()),
      {
        interceptors: [bearerAuthInterceptor(config.apiKey)],
        "grpc.keepalive_time_ms": config.keepAliveMs,
        "grpc.keepalive_timeout_ms": config.keepAliveTimeoutMs,
        "grpc.keepalive_permit_without_calls": 1,
      },
    );
    this.logger.debug({ target, secure }, "channel created");
  }

  // -----------------------------------------------------------------------
  // Call helpers
  // -----------------------------------------------------------------------

  private deadline(): Date {
    return new Date(Date.now() + this.timeoutMs);
  }

  private resolve(service: ServiceName, method: string) {
    return getMethod(getService(this.definition, service), method);
  }

  private unary<Res>(service: ServiceName, method: string, request: object): Promise<Res> {
    const def = this.resolve(service, method);
    const started = performance.now();

    return new Promise<Res>((resolve, reject) => {
      this.client.makeUnaryRequest<object, Res>(
        def.path,
        def.requestSerialize,
        // Decoded shape is described by the matching Wire* interface.
        (bytes: Buffer) => def.responseDeserialize(bytes) as Res,
        request,
        new Metadata(),
        { deadline: this.deadline() },
        (err, value) => {
          const duration_ms = Math.round(performance.now() - started);
          if (err) {
            this.logger.debug({ method: def.path, duration_ms, code: err.code }, "rpc failed");
            reject(mapGrpcError(err));
            return;
          }
          if (value === undefined) {
            reject(new TransportError(`Empty reply from ${def.path}`));
            return;
          }
          this.logger.debug({ method: def.path, duration_ms }, "rpc completed");
          resolve(value);
        },
      );
    });
  }

  private async *serverStream<Res>(
    service: ServiceName,
    method: string,
    request: object,
  ): AsyncGenerator<Res> {
    const def = this.resolve(service, method);
    const started = performance.now();
    const call = this.client.makeServerStreamRequest<object, Res>(
      def.path,
      def.requestSerialize,
      (bytes: Buffer) => def.responseDeserialize(bytes) as Res,
      request,
      new Metadata(),
      { deadline: this.deadline() },
    );

    let messages = 0;
    try {
      for await (const message of call) {
        messages++;
        yield message;
      }
    } catch (err: unknown) {
      throw mapGrpcError(err);
    } finally {
      // No-op once the stream has ended; stops the call if the consumer broke out.
      call.cancel();
      this.logger.debug(
        { method: def.path, duration_ms: Math.round(performance.now() - started), messages },
        "stream closed",
      );
    }
  }

  // -----------------------------------------------------------------------
  // Chat
  // -----------------------------------------------------------------------

  getCompletion(request: WireGetCompletionsRequest): Promise<WireGetChatCompletionResponse> {
    return this.unary(ServiceName.CHAT, "GetCompletion", request);
  }

  getCompletionChunk(
    request: WireGetCompletionsRequest,
  ): AsyncIterableIterator<WireGetChatCompletionChunk> {
    return this.serverStream(ServiceName.CHAT, "GetCompletionChunk", request);
  }

  startDeferredCompletion(request: WireGetCompletionsRequest): Promise<WireStartDeferredResponse> {
    return this.unary(ServiceName.CHAT, "StartDeferredCompletion", request);
  }

  getDeferredCompletion(
    request: WireGetDeferredRequest,
  ): Promise<WireGetDeferredCompletionResponse> {
    return this.unary(ServiceName.CHAT, "GetDeferredCompletion", request);
  }

  getStoredCompletion(
    request: WireStoredCompletionRequest,
  ): Promise<WireGetChatCompletionResponse> {
    return this.unary(ServiceName.CHAT, "GetStoredCompletion", request);
  }

  deleteStoredCompletion(
    request: WireStoredCompletionRequest,
  ): Promise<WireDeleteStoredCompletionResponse> {
    return this.unary(ServiceName.CHAT, "DeleteStoredCompletion", request);
  }

  // -----------------------------------------------------------------------
  // Models
  // -----------------------------------------------------------------------

  listLanguageModels(): Promise<WireModelList<WireLanguageModel>> {
    return this.unary(ServiceName.MODELS, "ListLanguageModels", {});
  }

  getLanguageModel(request: WireGetModelRequest): Promise<WireLanguageModel> {
    return this.unary(ServiceName.MODELS, "GetLanguageModel", request);
  }

  listEmbeddingModels(): Promise<WireModelList<WireEmbeddingModel>> {
    return this.unary(ServiceName.MODELS, "ListEmbeddingModels", {});
  }

  getEmbeddingModel(request: WireGetModelRequest): Promise<WireEmbeddingModel> {
    return this.unary(ServiceName.MODELS, "GetEmbeddingModel", request);
  }

  listImageGenerationModels(): Promise<WireModelList<WireImageGenerationModel>> {
    return this.unary(ServiceName.MODELS, "ListImageGenerationModels", {});
  }

  getImageGenerationModel(request: WireGetModelRequest): Promise<WireImageGenerationModel> {
    return this.unary(ServiceName.MODELS, "GetImageGenerationModel", request);
  }

  // -----------------------------------------------------------------------
  // Other services
  // -----------------------------------------------------------------------

  embed(request: WireEmbedRequest): Promise<WireEmbedResponse> {
    return this.unary(ServiceName.EMBEDDER, "Embed", request);
  }

  tokenizeText(request: WireTokenizeTextRequest): Promise<WireTokenizeTextResponse> {
    return this.unary(ServiceName.TOKENIZE, "TokenizeText", request);
  }

  getApiKeyInfo(): Promise<WireApiKey> {
    return this.unary(ServiceName.AUTH, "get_api_key_info", {});
  }

  sampleText(request: WireSampleTextRequest): Promise<WireSampleTextResponse> {
    return this.unary(ServiceName.SAMPLE, "SampleText", request);
  }

  sampleTextStreaming(
    request: WireSampleTextRequest,
  ): AsyncIterableIterator<WireSampleTextResponse> {
    return this.serverStream(ServiceName.SAMPLE, "SampleTextStreaming", request);
  }

  generateImage(request: WireGenerateImageRequest): Promise<WireImageResponse> {
    return this.unary(ServiceName.IMAGE, "GenerateImage", request);
  }

  searchDocuments(request: WireSearchRequest): Promise<WireSearchResponse> {
    return this.unary(ServiceName.DOCUMENTS, "Search", request);
  }

  close(): void {
    this.client.close();
    this.logger.debug("channel closed");
  }
}
