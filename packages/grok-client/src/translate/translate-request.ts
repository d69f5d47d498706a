/**
 * Translate a ChatRequest into the wire `GetCompletionsRequest`.
 *
 * - An unset model becomes the client's default model. Nothing else gets a
 *   default: every other unset field stays unset on the wire.
 * - System and assistant text become one text part; user parts keep order.
 * - Tool-result messages become ROLE_TOOL messages carrying tool_call_id.
 */

import {
  ContentKind,
  ImageDetail,
  IncludeOption,
  ReasoningEffort,
  Role,
  SearchMode,
  SearchSourceKind,
  type ChatRequest,
  type ContentPart,
  type Message,
  type ResponseFormat,
  type SearchConfig,
  type SearchSource,
} from "../types/index.js";
import {
  WireFormatType,
  WireImageDetail,
  WireIncludeOption,
  WireMessageRole,
  WireReasoningEffort,
  WireSearchMode,
} from "../wire/enums.js";
import type {
  WireContent,
  WireGetCompletionsRequest,
  WireMessage,
  WireResponseFormat,
  WireSearchParameters,
  WireSource,
} from "../wire/types.js";
import { toTimestamp } from "./timestamp.js";
import { translateTool, translateToolCallToWire, translateToolChoice } from "./tools.js";

// ---------------------------------------------------------------------------
// Enum tables
// ---------------------------------------------------------------------------

const IMAGE_DETAILS: Readonly<Record<ImageDetail, number>> = {
  [ImageDetail.AUTO]: WireImageDetail.DETAIL_AUTO,
  [ImageDetail.LOW]: WireImageDetail.DETAIL_LOW,
  [ImageDetail.HIGH]: WireImageDetail.DETAIL_HIGH,
};

const REASONING_EFFORTS: Readonly<Record<ReasoningEffort, number>> = {
  [ReasoningEffort.LOW]: WireReasoningEffort.EFFORT_LOW,
  [ReasoningEffort.MEDIUM]: WireReasoningEffort.EFFORT_MEDIUM,
  [ReasoningEffort.HIGH]: WireReasoningEffort.EFFORT_HIGH,
};

const SEARCH_MODES: Readonly<Record<SearchMode, number>> = {
  [SearchMode.OFF]: WireSearchMode.OFF_SEARCH_MODE,
  [SearchMode.ON]: WireSearchMode.ON_SEARCH_MODE,
  [SearchMode.AUTO]: WireSearchMode.AUTO_SEARCH_MODE,
};

const INCLUDE_OPTIONS: Readonly<Record<IncludeOption, number>> = {
  [IncludeOption.WEB_SEARCH_CALL_OUTPUT]: WireIncludeOption.INCLUDE_OPTION_WEB_SEARCH_CALL_OUTPUT,
  [IncludeOption.X_SEARCH_CALL_OUTPUT]: WireIncludeOption.INCLUDE_OPTION_X_SEARCH_CALL_OUTPUT,
  [IncludeOption.CODE_EXECUTION_CALL_OUTPUT]:
    WireIncludeOption.INCLUDE_OPTION_CODE_EXECUTION_CALL_OUTPUT,
  [IncludeOption.COLLECTIONS_SEARCH_CALL_OUTPUT]:
    WireIncludeOption.INCLUDE_OPTION_COLLECTIONS_SEARCH_CALL_OUTPUT,
  [IncludeOption.DOCUMENT_SEARCH_CALL_OUTPUT]:
    WireIncludeOption.INCLUDE_OPTION_DOCUMENT_SEARCH_CALL_OUTPUT,
  [IncludeOption.MCP_CALL_OUTPUT]: WireIncludeOption.INCLUDE_OPTION_MCP_CALL_OUTPUT,
  [IncludeOption.INLINE_CITATIONS]: WireIncludeOption.INCLUDE_OPTION_INLINE_CITATIONS,
};

/** Unmapped values (e.g. from untyped callers) fall back to the wire's 0. */
function lookup<K extends string>(table: Readonly<Record<K, number>>, key: K): number {
  return table[key] ?? 0;
}

export function translateImageDetail(detail: ImageDetail | undefined): number {
  return detail === undefined ? WireImageDetail.DETAIL_AUTO : lookup(IMAGE_DETAILS, detail);
}

// ---------------------------------------------------------------------------
// Content and messages
// ---------------------------------------------------------------------------

export function translateContentPart(part: ContentPart): WireContent {
  switch (part.kind) {
    case ContentKind.TEXT:
      return { text: part.text };
    case ContentKind.IMAGE_URL:
      return {
        image_url: { image_url: part.url, detail: translateImageDetail(part.detail) },
      };
    case ContentKind.FILE:
      return { file: { file_id: part.file_id } };
  }
}

export function translateMessage(message: Message): WireMessage {
  switch (message.role) {
    case Role.SYSTEM:
      return { role: WireMessageRole.ROLE_SYSTEM, content: [{ text: message.content }] };

    case Role.USER:
      return {
        role: WireMessageRole.ROLE_USER,
        content:
          typeof message.content === "string"
            ? [{ text: message.content }]
            : message.content.map(translateContentPart),
        ...(message.name !== undefined ? { name: message.name } : {}),
      };

    case Role.ASSISTANT:
      return {
        role: WireMessageRole.ROLE_ASSISTANT,
        content: [{ text: message.content }],
        ...(message.tool_calls
          ? { tool_calls: message.tool_calls.map(translateToolCallToWire) }
          : {}),
      };

    case Role.TOOL:
      return {
        role: WireMessageRole.ROLE_TOOL,
        content: [{ text: message.content }],
        tool_call_id: message.tool_call_id,
      };
  }
}

// ---------------------------------------------------------------------------
// Response format and search
// ---------------------------------------------------------------------------

export function translateResponseFormat(format: ResponseFormat): WireResponseFormat {
  switch (format.type) {
    case "text":
      return { format_type: WireFormatType.FORMAT_TYPE_TEXT };
    case "json_object":
      return { format_type: WireFormatType.FORMAT_TYPE_JSON_OBJECT };
    case "json_schema":
      return {
        format_type: WireFormatType.FORMAT_TYPE_JSON_SCHEMA,
        schema: JSON.stringify(format.json_schema),
      };
  }
}

function translateSearchSource(source: SearchSource): WireSource {
  switch (source.kind) {
    case SearchSourceKind.WEB:
      return {
        web: {
          excluded_websites: [...(source.excluded_websites ?? [])],
          allowed_websites: [...(source.allowed_websites ?? [])],
          ...(source.country !== undefined ? { country: source.country } : {}),
          safe_search: source.safe_search ?? false,
        },
      };
    case SearchSourceKind.NEWS:
      return {
        news: {
          excluded_websites: [...(source.excluded_websites ?? [])],
          ...(source.country !== undefined ? { country: source.country } : {}),
          safe_search: source.safe_search ?? false,
        },
      };
    case SearchSourceKind.X:
      return {
        x: {
          included_x_handles: [...(source.included_x_handles ?? [])],
          excluded_x_handles: [...(source.excluded_x_handles ?? [])],
        },
      };
  }
}

export function translateSearch(search: SearchConfig): WireSearchParameters {
  return {
    mode: lookup(SEARCH_MODES, search.mode),
    sources: search.sources.map(translateSearchSource),
    ...(search.from_date ? { from_date: toTimestamp(search.from_date) } : {}),
    ...(search.to_date ? { to_date: toTimestamp(search.to_date) } : {}),
    return_citations: search.return_citations ?? false,
    ...(search.max_search_results !== undefined
      ? { max_search_results: search.max_search_results }
      : {}),
  };
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

/**
 * Build the wire request. `defaultModel` is used only when the request names
 * no model.
 */
export function translateChatRequest(
  request: ChatRequest,
  defaultModel: string,
): WireGetCompletionsRequest {
  const wire: WireGetCompletionsRequest = {
    messages: request.messages.map(translateMessage),
    model: request.model ?? defaultModel,
  };

  if (request.max_tokens !== undefined) wire.max_tokens = request.max_tokens;
  if (request.temperature !== undefined) wire.temperature = request.temperature;
  if (request.top_p !== undefined) wire.top_p = request.top_p;
  if (request.frequency_penalty !== undefined) {
    wire.frequency_penalty = request.frequency_penalty;
  }
  if (request.presence_penalty !== undefined) {
    wire.presence_penalty = request.presence_penalty;
  }
  if (request.stop_sequences !== undefined) wire.stop = [...request.stop_sequences];
  if (request.seed !== undefined) wire.seed = request.seed;
  if (request.user !== undefined) wire.user = request.user;
  if (request.logprobs !== undefined) wire.logprobs = request.logprobs;
  if (request.top_logprobs !== undefined) wire.top_logprobs = request.top_logprobs;

  if (request.tools !== undefined) wire.tools = request.tools.map(translateTool);
  if (request.tool_choice !== undefined) {
    wire.tool_choice = translateToolChoice(request.tool_choice);
  }
  if (request.parallel_tool_calls !== undefined) {
    wire.parallel_tool_calls = request.parallel_tool_calls;
  }
  if (request.response_format !== undefined) {
    wire.response_format = translateResponseFormat(request.response_format);
  }
  if (request.search !== undefined) {
    wire.search_parameters = translateSearch(request.search);
  }
  if (request.reasoning_effort !== undefined) {
    wire.reasoning_effort = lookup(REASONING_EFFORTS, request.reasoning_effort);
  }

  if (request.previous_response_id !== undefined) {
    wire.previous_response_id = request.previous_response_id;
  }
  if (request.store_messages !== undefined) wire.store_messages = request.store_messages;
  if (request.max_turns !== undefined) wire.max_turns = request.max_turns;
  if (request.include !== undefined) {
    wire.include = request.include.map((option) => lookup(INCLUDE_OPTIONS, option));
  }

  return wire;
}
