/**
 * Barrel re-export for all type modules.
 */

// Enums
export {
  Role,
  ContentKind,
  ImageDetail,
  ReasoningEffort,
  SearchMode,
  SearchSourceKind,
  ToolKind,
  ToolCallKind,
  ToolCallStatus,
  IncludeOption,
  Modality,
  EmbedEncodingFormat,
  ImageFormat,
  RankingMetric,
} from "./enums.js";

// Message types
export type {
  TextContentPart,
  ImageUrlContentPart,
  FileContentPart,
  ContentPart,
  MessageContent,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolResultMessage,
  Message,
} from "./message.js";
export {
  textPart,
  imageUrlPart,
  filePart,
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolResultMessage,
  getMessageText,
} from "./message.js";

// Tool types
export type {
  FunctionTool,
  WebSearchTool,
  XSearchTool,
  CodeExecutionTool,
  CollectionsSearchTool,
  McpTool,
  DocumentSearchTool,
  Tool,
  ToolChoice,
  ToolCall,
} from "./tool.js";
export {
  functionTool,
  webSearchTool,
  xSearchTool,
  codeExecutionTool,
  collectionsSearchTool,
  mcpTool,
  documentSearchTool,
  parseToolCallArguments,
} from "./tool.js";

// Request types
export type {
  ResponseFormat,
  WebSearchSource,
  NewsSearchSource,
  XSearchSource,
  SearchSource,
  SearchConfig,
  ChatRequest,
  CompletionOptions,
} from "./request.js";
export {
  ChatRequestBuilder,
  webSearchConfig,
  clampTemperature,
  clampTopP,
} from "./request.js";

// Response types
export type {
  FinishReason,
  TokenUsage,
  TopLogProb,
  TokenLogProb,
  ChatResponse,
  ChatChunk,
} from "./response.js";
export {
  EMPTY_USAGE,
  requiresToolExecution,
  describeFinishReason,
} from "./response.js";

// Stream accumulation
export { ChunkAccumulator } from "./stream.js";

// Models
export type {
  LanguageModel,
  EmbeddingModel,
  ImageGenerationModel,
} from "./models.js";
export { calculateCost, supportsMultimodal } from "./models.js";

// Endpoint types
export type {
  EmbedInput,
  EmbedRequest,
  Embedding,
  EmbedResponse,
} from "./embedding.js";
export { EmbedRequestBuilder } from "./embedding.js";
export type { TokenizeRequest, Token, TokenizeResponse } from "./tokenize.js";
export { tokenCount, tokenText } from "./tokenize.js";
export type {
  SampleRequest,
  SampleFinishReason,
  SampleChoice,
  SampleResponse,
} from "./sample.js";
export { SampleRequestBuilder } from "./sample.js";
export type {
  ImageGenerationRequest,
  GeneratedImage,
  ImageGenerationResponse,
} from "./image.js";
export { ImageGenerationRequestBuilder } from "./image.js";
export type {
  DocumentSearchRequest,
  SearchMatch,
  DocumentSearchResponse,
} from "./documents.js";
export { DocumentSearchRequestBuilder } from "./documents.js";
export type { ApiKeyInfo } from "./api-key.js";
export { isApiKeyActive, apiKeyStatus } from "./api-key.js";

// Error types
export {
  SDKError,
  StatusError,
  RateLimitError,
  AuthenticationError,
  TransportError,
  InvalidRequestError,
  ConfigurationError,
  MissingCredentialError,
  InvalidHeaderError,
  RequestTimeoutError,
  isRetryableStatusCode,
} from "./errors.js";
