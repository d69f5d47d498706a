/**
 * Numeric enum values of the Grok protobuf schema.
 *
 * Mirrors `proto/xai/api/v1/*.proto`. The loader keeps enums as numbers, so
 * these tables are what the translate layer maps domain values onto.
 */

export const WireMessageRole = {
  INVALID_ROLE: 0,
  ROLE_USER: 1,
  ROLE_ASSISTANT: 2,
  ROLE_SYSTEM: 3,
  ROLE_FUNCTION: 4,
  ROLE_TOOL: 5,
} as const satisfies Record<string, number>;

export const WireFinishReason = {
  REASON_INVALID: 0,
  REASON_MAX_LEN: 1,
  REASON_MAX_CONTEXT: 2,
  REASON_STOP: 3,
  REASON_TOOL_CALLS: 4,
  REASON_TIME_LIMIT: 5,
} as const satisfies Record<string, number>;

export const WireImageDetail = {
  DETAIL_INVALID: 0,
  DETAIL_AUTO: 1,
  DETAIL_LOW: 2,
  DETAIL_HIGH: 3,
} as const satisfies Record<string, number>;

export const WireReasoningEffort = {
  INVALID_EFFORT: 0,
  EFFORT_LOW: 1,
  EFFORT_MEDIUM: 2,
  EFFORT_HIGH: 3,
} as const satisfies Record<string, number>;

export const WireSearchMode = {
  OFF_SEARCH_MODE: 0,
  ON_SEARCH_MODE: 1,
  AUTO_SEARCH_MODE: 2,
} as const satisfies Record<string, number>;

export const WireFormatType = {
  FORMAT_TYPE_INVALID: 0,
  FORMAT_TYPE_TEXT: 1,
  FORMAT_TYPE_JSON_OBJECT: 2,
  FORMAT_TYPE_JSON_SCHEMA: 3,
} as const satisfies Record<string, number>;

export const WireToolMode = {
  TOOL_MODE_INVALID: 0,
  TOOL_MODE_AUTO: 1,
  TOOL_MODE_NONE: 2,
  TOOL_MODE_REQUIRED: 3,
} as const satisfies Record<string, number>;

export const WireToolCallType = {
  TOOL_CALL_TYPE_INVALID: 0,
  TOOL_CALL_TYPE_CLIENT_SIDE_TOOL: 1,
  TOOL_CALL_TYPE_WEB_SEARCH_TOOL: 2,
  TOOL_CALL_TYPE_X_SEARCH_TOOL: 3,
  TOOL_CALL_TYPE_CODE_EXECUTION_TOOL: 4,
  TOOL_CALL_TYPE_COLLECTIONS_SEARCH_TOOL: 5,
  TOOL_CALL_TYPE_MCP_TOOL: 6,
} as const satisfies Record<string, number>;

export const WireToolCallStatus = {
  TOOL_CALL_STATUS_IN_PROGRESS: 0,
  TOOL_CALL_STATUS_COMPLETED: 1,
  TOOL_CALL_STATUS_INCOMPLETE: 2,
  TOOL_CALL_STATUS_FAILED: 3,
} as const satisfies Record<string, number>;

export const WireIncludeOption = {
  INCLUDE_OPTION_INVALID: 0,
  INCLUDE_OPTION_WEB_SEARCH_CALL_OUTPUT: 1,
  INCLUDE_OPTION_X_SEARCH_CALL_OUTPUT: 2,
  INCLUDE_OPTION_CODE_EXECUTION_CALL_OUTPUT: 3,
  INCLUDE_OPTION_COLLECTIONS_SEARCH_CALL_OUTPUT: 4,
  INCLUDE_OPTION_DOCUMENT_SEARCH_CALL_OUTPUT: 5,
  INCLUDE_OPTION_MCP_CALL_OUTPUT: 6,
  INCLUDE_OPTION_INLINE_CITATIONS: 7,
} as const satisfies Record<string, number>;

export const WireDeferredStatus = {
  INVALID_DEFERRED_STATUS: 0,
  DONE: 1,
  EXPIRED: 2,
  PENDING: 3,
} as const satisfies Record<string, number>;

export const WireModality = {
  INVALID_MODALITY: 0,
  TEXT: 1,
  IMAGE: 2,
  EMBEDDING: 3,
} as const satisfies Record<string, number>;

export const WireEmbedEncodingFormat = {
  FORMAT_INVALID: 0,
  FORMAT_FLOAT: 1,
  FORMAT_BASE64: 2,
} as const satisfies Record<string, number>;

export const WireImageFormat = {
  IMG_FORMAT_INVALID: 0,
  IMG_FORMAT_BASE64: 1,
  IMG_FORMAT_URL: 2,
} as const satisfies Record<string, number>;

export const WireRankingMetric = {
  RANKING_METRIC_UNKNOWN: 0,
  RANKING_METRIC_L2_DISTANCE: 1,
  RANKING_METRIC_COSINE_SIMILARITY: 2,
} as const satisfies Record<string, number>;
