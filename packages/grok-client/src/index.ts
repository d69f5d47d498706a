export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export utilities (opt-in retry, gRPC error mapping)
export * from "./utils/index.js";

// Configuration and logging
export {
  API_KEY_ENV,
  DEFAULT_ENDPOINT,
  DEFAULT_MODEL,
  apiKeyFromEnv,
  grokConfigSchema,
  resolveConfig,
} from "./config.js";
export type { GrokConfig, GrokConfigInput } from "./config.js";
export { getLogger, setLogger, setLogLevel } from "./logger.js";

// Deferred polling
export { interpretDeferredStatus, waitForDeferred } from "./deferred.js";
export type { WaitForDeferredOptions } from "./deferred.js";

// Wire translation, for callers driving a transport directly
export {
  translateChatRequest,
  translateMessage,
  translateContentPart,
} from "./translate/translate-request.js";
export {
  translateChatResponse,
  translateChatChunk,
  mapFinishReason,
  translateUsage,
} from "./translate/translate-response.js";
export { translateTool, translateToolCall, translateToolChoice } from "./translate/tools.js";
export { decodeFeatureVector } from "./translate/embedding.js";

// Transport
export type { GrokTransport } from "./transport/transport.js";
export { GrpcTransport, channelTarget } from "./transport/grpc.js";
export type { GrpcTransportOptions, ChannelTarget } from "./transport/grpc.js";
export { bearerAuthInterceptor } from "./transport/auth.js";
export { loadGrokProto, ServiceName, DEFAULT_PROTO_ROOT } from "./wire/proto.js";

// Client
export { GrokClient } from "./client.js";
export type {
  GrokClientOptions,
  Middleware,
  StreamMiddleware,
  WaitOptions,
} from "./client.js";

// ---------------------------------------------------------------------------
// Module-level default client
// ---------------------------------------------------------------------------

import { GrokClient } from "./client.js";

let defaultClient: GrokClient | undefined;

/**
 * Set the module-level default GrokClient instance.
 */
export function setDefaultClient(client: GrokClient): void {
  defaultClient = client;
}

/**
 * Get the module-level default GrokClient instance.
 *
 * If none has been set, creates one via `GrokClient.fromEnv()` and caches it.
 */
export function getDefaultClient(): GrokClient {
  if (!defaultClient) {
    defaultClient = GrokClient.fromEnv();
  }
  return defaultClient;
}

/**
 * Reset the module-level default client to undefined.
 * Primarily useful for testing.
 */
export function resetDefaultClient(): void {
  defaultClient = undefined;
}
