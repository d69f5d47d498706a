/**
 * Domain enums for the Grok client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Conversation roles the service accepts. */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Human input. Text, images, file references. */
  USER: "user",
  /** Model output. Text and tool calls. */
  ASSISTANT: "assistant",
  /** Tool execution results, linked by tool_call_id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// ContentKind
// ---------------------------------------------------------------------------

/** Discriminator tags for ContentPart. */
export const ContentKind = {
  TEXT: "text",
  /** Image by URL (http(s) or data URI). Never fetched by the client. */
  IMAGE_URL: "image_url",
  /** A previously uploaded file, by id. */
  FILE: "file",
} as const satisfies Record<string, string>;

export type ContentKind = (typeof ContentKind)[keyof typeof ContentKind];

// ---------------------------------------------------------------------------
// ImageDetail
// ---------------------------------------------------------------------------

export const ImageDetail = {
  AUTO: "auto",
  LOW: "low",
  HIGH: "high",
} as const satisfies Record<string, string>;

export type ImageDetail = (typeof ImageDetail)[keyof typeof ImageDetail];

// ---------------------------------------------------------------------------
// ReasoningEffort
// ---------------------------------------------------------------------------

export const ReasoningEffort = {
  LOW: "low",
  MEDIUM: "medium",
  HIGH: "high",
} as const satisfies Record<string, string>;

export type ReasoningEffort =
  (typeof ReasoningEffort)[keyof typeof ReasoningEffort];

// ---------------------------------------------------------------------------
// Live search
// ---------------------------------------------------------------------------

export const SearchMode = {
  OFF: "off",
  ON: "on",
  /** Let the model decide whether to search. */
  AUTO: "auto",
} as const satisfies Record<string, string>;

export type SearchMode = (typeof SearchMode)[keyof typeof SearchMode];

export const SearchSourceKind = {
  WEB: "web",
  NEWS: "news",
  X: "x",
} as const satisfies Record<string, string>;

export type SearchSourceKind =
  (typeof SearchSourceKind)[keyof typeof SearchSourceKind];

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** Discriminator tags for Tool. */
export const ToolKind = {
  FUNCTION: "function",
  WEB_SEARCH: "web_search",
  X_SEARCH: "x_search",
  CODE_EXECUTION: "code_execution",
  COLLECTIONS_SEARCH: "collections_search",
  MCP: "mcp",
  DOCUMENT_SEARCH: "document_search",
} as const satisfies Record<string, string>;

export type ToolKind = (typeof ToolKind)[keyof typeof ToolKind];

/** Where a tool call in a response was (or must be) executed. */
export const ToolCallKind = {
  /** Executed by the caller; answer with a tool-result message. */
  CLIENT_SIDE: "client_side",
  WEB_SEARCH: "web_search",
  X_SEARCH: "x_search",
  CODE_EXECUTION: "code_execution",
  COLLECTIONS_SEARCH: "collections_search",
  MCP: "mcp",
  UNKNOWN: "unknown",
} as const satisfies Record<string, string>;

export type ToolCallKind = (typeof ToolCallKind)[keyof typeof ToolCallKind];

export const ToolCallStatus = {
  IN_PROGRESS: "in_progress",
  COMPLETED: "completed",
  INCOMPLETE: "incomplete",
  FAILED: "failed",
  UNKNOWN: "unknown",
} as const satisfies Record<string, string>;

export type ToolCallStatus =
  (typeof ToolCallStatus)[keyof typeof ToolCallStatus];

// ---------------------------------------------------------------------------
// IncludeOption
// ---------------------------------------------------------------------------

/** Extra output the server should attach to a response. */
export const IncludeOption = {
  WEB_SEARCH_CALL_OUTPUT: "web_search_call_output",
  X_SEARCH_CALL_OUTPUT: "x_search_call_output",
  CODE_EXECUTION_CALL_OUTPUT: "code_execution_call_output",
  COLLECTIONS_SEARCH_CALL_OUTPUT: "collections_search_call_output",
  DOCUMENT_SEARCH_CALL_OUTPUT: "document_search_call_output",
  MCP_CALL_OUTPUT: "mcp_call_output",
  INLINE_CITATIONS: "inline_citations",
} as const satisfies Record<string, string>;

export type IncludeOption = (typeof IncludeOption)[keyof typeof IncludeOption];

// ---------------------------------------------------------------------------
// Modality
// ---------------------------------------------------------------------------

export const Modality = {
  TEXT: "text",
  IMAGE: "image",
  EMBEDDING: "embedding",
  UNKNOWN: "unknown",
} as const satisfies Record<string, string>;

export type Modality = (typeof Modality)[keyof typeof Modality];

// ---------------------------------------------------------------------------
// Endpoint-specific formats
// ---------------------------------------------------------------------------

export const EmbedEncodingFormat = {
  FLOAT: "float",
  BASE64: "base64",
} as const satisfies Record<string, string>;

export type EmbedEncodingFormat =
  (typeof EmbedEncodingFormat)[keyof typeof EmbedEncodingFormat];

export const ImageFormat = {
  BASE64: "base64",
  URL: "url",
} as const satisfies Record<string, string>;

export type ImageFormat = (typeof ImageFormat)[keyof typeof ImageFormat];

export const RankingMetric = {
  L2_DISTANCE: "l2_distance",
  COSINE_SIMILARITY: "cosine_similarity",
} as const satisfies Record<string, string>;

export type RankingMetric = (typeof RankingMetric)[keyof typeof RankingMetric];
