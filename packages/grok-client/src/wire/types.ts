/**
 * Native wire shapes for the Grok gRPC schema.
 *
 * These describe messages exactly as `@grpc/proto-loader` hands them over
 * with `keepCase`, `longs: Number` and `defaults: true`: unset sub-messages
 * arrive as `null`, repeated fields as `[]`, scalars as their zero value,
 * and proto3 `optional` or oneof members are simply missing. Enums stay
 * numeric (see `./enums.ts`).
 *
 * Request shapes are what we hand to the serializer; every field the caller
 * did not set is left out so it stays unset on the wire.
 */

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export interface WireTimestamp {
  seconds: number;
  nanos: number;
}

export interface WireSamplingUsage {
  completion_tokens: number;
  reasoning_tokens: number;
  prompt_tokens: number;
  total_tokens: number;
  prompt_text_tokens: number;
  cached_prompt_text_tokens: number;
  prompt_image_tokens: number;
  num_sources_used: number;
}

export interface WireEmbeddingUsage {
  num_text_embeddings: number;
  num_image_embeddings: number;
}

export interface WireImageUrlContent {
  image_url: string;
  detail?: number;
}

// ---------------------------------------------------------------------------
// Chat: request
// ---------------------------------------------------------------------------

export interface WireContent {
  text?: string;
  image_url?: WireImageUrlContent;
  file?: { file_id: string };
}

export interface WireFunctionCall {
  name: string;
  arguments: string;
}

export interface WireToolCall {
  id: string;
  type: number;
  status: number;
  error_message?: string;
  function?: WireFunctionCall | null;
}

export interface WireMessage {
  content: WireContent[];
  role: number;
  reasoning_content?: string;
  name?: string;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
}

export interface WireFunction {
  name: string;
  description: string;
  strict: boolean;
  parameters: string;
}

export interface WireWebSearch {
  excluded_domains: string[];
  allowed_domains: string[];
  enable_image_understanding?: boolean;
}

export interface WireXSearch {
  from_date?: WireTimestamp;
  to_date?: WireTimestamp;
  allowed_x_handles: string[];
  excluded_x_handles: string[];
  enable_image_understanding?: boolean;
  enable_video_understanding?: boolean;
}

export interface WireCollectionsSearch {
  collection_ids: string[];
  limit?: number;
}

export interface WireMcp {
  server_label: string;
  server_description: string;
  server_url: string;
  allowed_tool_names: string[];
  authorization?: string;
  extra_headers: Record<string, string>;
}

/** Exactly one member is set. */
export interface WireTool {
  function?: WireFunction;
  web_search?: WireWebSearch;
  x_search?: WireXSearch;
  code_execution?: Record<string, never>;
  collections_search?: WireCollectionsSearch;
  mcp?: WireMcp;
  document_search?: { limit?: number };
}

export interface WireToolChoice {
  mode?: number;
  function_name?: string;
}

export interface WireResponseFormat {
  format_type: number;
  schema?: string;
}

export interface WireWebSource {
  excluded_websites: string[];
  allowed_websites: string[];
  country?: string;
  safe_search: boolean;
}

export interface WireNewsSource {
  excluded_websites: string[];
  country?: string;
  safe_search: boolean;
}

export interface WireXSource {
  included_x_handles: string[];
  excluded_x_handles: string[];
}

export interface WireSource {
  web?: WireWebSource;
  news?: WireNewsSource;
  x?: WireXSource;
}

export interface WireSearchParameters {
  mode: number;
  sources: WireSource[];
  from_date?: WireTimestamp;
  to_date?: WireTimestamp;
  return_citations: boolean;
  max_search_results?: number;
}

export interface WireGetCompletionsRequest {
  messages: WireMessage[];
  model: string;
  user?: string;
  n?: number;
  max_tokens?: number;
  seed?: number;
  stop?: string[];
  temperature?: number;
  top_p?: number;
  logprobs?: boolean;
  top_logprobs?: number;
  tools?: WireTool[];
  tool_choice?: WireToolChoice;
  response_format?: WireResponseFormat;
  frequency_penalty?: number;
  presence_penalty?: number;
  reasoning_effort?: number;
  search_parameters?: WireSearchParameters;
  parallel_tool_calls?: boolean;
  previous_response_id?: string;
  store_messages?: boolean;
  max_turns?: number;
  include?: number[];
}

// ---------------------------------------------------------------------------
// Chat: response
// ---------------------------------------------------------------------------

export interface WireTopLogProb {
  token: string;
  logprob: number;
  bytes: Uint8Array;
}

export interface WireLogProb extends WireTopLogProb {
  top_logprobs: WireTopLogProb[];
}

export interface WireLogProbs {
  content: WireLogProb[];
}

export interface WireCompletionMessage {
  content: string;
  reasoning_content: string;
  role: number;
  tool_calls: WireToolCall[];
}

export interface WireCompletionOutput {
  finish_reason: number;
  index: number;
  message: WireCompletionMessage | null;
  logprobs: WireLogProbs | null;
}

export interface WireGetChatCompletionResponse {
  id: string;
  outputs: WireCompletionOutput[];
  created: WireTimestamp | null;
  model: string;
  system_fingerprint: string;
  usage: WireSamplingUsage | null;
  citations: string[];
}

export interface WireCompletionOutputChunk {
  delta: WireCompletionMessage | null;
  logprobs: WireLogProbs | null;
  finish_reason: number;
  index: number;
}

export interface WireGetChatCompletionChunk {
  id: string;
  outputs: WireCompletionOutputChunk[];
  created: WireTimestamp | null;
  model: string;
  system_fingerprint: string;
  usage: WireSamplingUsage | null;
  citations: string[];
}

// ---------------------------------------------------------------------------
// Chat: deferred and stored completions
// ---------------------------------------------------------------------------

export interface WireStartDeferredResponse {
  request_id: string;
}

export interface WireGetDeferredRequest {
  request_id: string;
}

export interface WireGetDeferredCompletionResponse {
  status: number;
  response?: WireGetChatCompletionResponse | null;
}

export interface WireStoredCompletionRequest {
  response_id: string;
}

export interface WireDeleteStoredCompletionResponse {
  response_id: string;
}

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export interface WireGetModelRequest {
  name: string;
}

export interface WireLanguageModel {
  name: string;
  aliases: string[];
  version: string;
  input_modalities: number[];
  output_modalities: number[];
  prompt_text_token_price: number;
  prompt_image_token_price: number;
  cached_prompt_token_price: number;
  completion_text_token_price: number;
  search_price: number;
  max_prompt_length: number;
  system_fingerprint: string;
}

export interface WireEmbeddingModel {
  name: string;
  aliases: string[];
  version: string;
  input_modalities: number[];
  output_modalities: number[];
  prompt_text_token_price: number;
  prompt_image_token_price: number;
  system_fingerprint: string;
}

export interface WireImageGenerationModel {
  name: string;
  aliases: string[];
  version: string;
  input_modalities: number[];
  output_modalities: number[];
  image_price: number;
  max_prompt_length: number;
  system_fingerprint: string;
}

export interface WireModelList<M> {
  models: M[];
}

// ---------------------------------------------------------------------------
// Embeddings
// ---------------------------------------------------------------------------

export interface WireEmbedInput {
  string?: string;
  image_url?: WireImageUrlContent;
}

export interface WireEmbedRequest {
  input: WireEmbedInput[];
  model: string;
  encoding_format?: number;
  user?: string;
}

export interface WireFeatureVector {
  float_array: number[];
  base64_array: string;
}

export interface WireEmbedding {
  index: number;
  embeddings: WireFeatureVector[];
}

export interface WireEmbedResponse {
  id: string;
  embeddings: WireEmbedding[];
  usage: WireEmbeddingUsage | null;
  model: string;
  system_fingerprint: string;
}

// ---------------------------------------------------------------------------
// Tokenize
// ---------------------------------------------------------------------------

export interface WireTokenizeTextRequest {
  text: string;
  model: string;
  user?: string;
}

export interface WireToken {
  token_id: number;
  string_token: string;
  token_bytes: Uint8Array;
}

export interface WireTokenizeTextResponse {
  tokens: WireToken[];
  model: string;
}

// ---------------------------------------------------------------------------
// Auth
// ---------------------------------------------------------------------------

export interface WireApiKey {
  redacted_api_key: string;
  user_id: string;
  name: string;
  create_time: WireTimestamp | null;
  modify_time: WireTimestamp | null;
  modified_by: string;
  team_id: string;
  acls: string[];
  api_key_id: string;
  team_blocked: boolean;
  api_key_blocked: boolean;
  api_key_disabled: boolean;
}

// ---------------------------------------------------------------------------
// Sample
// ---------------------------------------------------------------------------

export interface WireSampleTextRequest {
  prompt: string[];
  model: string;
  n?: number;
  max_tokens?: number;
  seed?: number;
  stop?: string[];
  temperature?: number;
  top_p?: number;
  frequency_penalty?: number;
  logprobs?: boolean;
  presence_penalty?: number;
  top_logprobs?: number;
  user?: string;
}

export interface WireSampleChoice {
  finish_reason: number;
  index: number;
  text: string;
}

export interface WireSampleTextResponse {
  id: string;
  choices: WireSampleChoice[];
  created: number;
  model: string;
  system_fingerprint: string;
  usage: WireSamplingUsage | null;
}

// ---------------------------------------------------------------------------
// Image generation
// ---------------------------------------------------------------------------

export interface WireGenerateImageRequest {
  prompt: string;
  image_url?: string;
  model: string;
  n?: number;
  user?: string;
  format?: number;
}

export interface WireGeneratedImage {
  base64?: string;
  url?: string;
  up_sampled_prompt: string;
  respect_moderation: boolean;
}

export interface WireImageResponse {
  images: WireGeneratedImage[];
  model: string;
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export interface WireSearchRequest {
  query: string;
  source: { collection_ids: string[] };
  limit?: number;
  ranking_metric?: number;
  instructions?: string;
}

export interface WireSearchMatch {
  file_id: string;
  chunk_id: string;
  chunk_content: string;
  score: number;
  collection_ids: string[];
}

export interface WireSearchResponse {
  matches: WireSearchMatch[];
}
