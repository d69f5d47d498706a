/**
 * Tool definitions, tool choice and tool calls across the wire boundary.
 *
 * Request direction is a total match over the Tool union; each variant fills
 * exactly one member of the wire oneof. Response direction never throws:
 * unrecognised kinds and statuses decode to "unknown".
 */

import {
  InvalidRequestError,
  ToolCallKind,
  ToolCallStatus,
  ToolKind,
  type Tool,
  type ToolCall,
  type ToolChoice,
} from "../types/index.js";
import { WireToolCallStatus, WireToolCallType, WireToolMode } from "../wire/enums.js";
import type { WireTool, WireToolCall, WireToolChoice } from "../wire/types.js";
import { toTimestamp } from "./timestamp.js";

// ---------------------------------------------------------------------------
// Tool -> wire
// ---------------------------------------------------------------------------

export function translateTool(tool: Tool): WireTool {
  switch (tool.kind) {
    case ToolKind.FUNCTION:
      return {
        function: {
          name: tool.name,
          description: tool.description,
          strict: tool.strict ?? false,
          parameters: JSON.stringify(tool.parameters),
        },
      };

    case ToolKind.WEB_SEARCH:
      return {
        web_search: {
          allowed_domains: [...(tool.allowed_domains ?? [])],
          excluded_domains: [...(tool.excluded_domains ?? [])],
          ...(tool.enable_image_understanding !== undefined
            ? { enable_image_understanding: tool.enable_image_understanding }
            : {}),
        },
      };

    case ToolKind.X_SEARCH:
      return {
        x_search: {
          ...(tool.from_date ? { from_date: toTimestamp(tool.from_date) } : {}),
          ...(tool.to_date ? { to_date: toTimestamp(tool.to_date) } : {}),
          allowed_x_handles: [...(tool.allowed_x_handles ?? [])],
          excluded_x_handles: [...(tool.excluded_x_handles ?? [])],
          ...(tool.enable_image_understanding !== undefined
            ? { enable_image_understanding: tool.enable_image_understanding }
            : {}),
          ...(tool.enable_video_understanding !== undefined
            ? { enable_video_understanding: tool.enable_video_understanding }
            : {}),
        },
      };

    case ToolKind.CODE_EXECUTION:
      return { code_execution: {} };

    case ToolKind.COLLECTIONS_SEARCH:
      return {
        collections_search: {
          collection_ids: [...tool.collection_ids],
          ...(tool.limit !== undefined ? { limit: tool.limit } : {}),
        },
      };

    case ToolKind.MCP:
      return {
        mcp: {
          server_label: tool.server_label,
          server_description: tool.server_description ?? "",
          server_url: tool.server_url,
          allowed_tool_names: [...(tool.allowed_tool_names ?? [])],
          ...(tool.authorization !== undefined ? { authorization: tool.authorization } : {}),
          extra_headers: { ...(tool.extra_headers ?? {}) },
        },
      };

    case ToolKind.DOCUMENT_SEARCH:
      return {
        document_search: tool.limit !== undefined ? { limit: tool.limit } : {},
      };
  }
}

export function translateToolChoice(choice: ToolChoice): WireToolChoice {
  switch (choice.mode) {
    case "auto":
      return { mode: WireToolMode.TOOL_MODE_AUTO };
    case "none":
      return { mode: WireToolMode.TOOL_MODE_NONE };
    case "required":
      return { mode: WireToolMode.TOOL_MODE_REQUIRED };
    case "named":
      if (!choice.tool_name) {
        throw new InvalidRequestError("Named tool choice requires a tool name");
      }
      return { function_name: choice.tool_name };
  }
}

// ---------------------------------------------------------------------------
// Wire -> ToolCall
// ---------------------------------------------------------------------------

const TOOL_CALL_KINDS: Readonly<Record<number, ToolCallKind>> = {
  [WireToolCallType.TOOL_CALL_TYPE_CLIENT_SIDE_TOOL]: ToolCallKind.CLIENT_SIDE,
  [WireToolCallType.TOOL_CALL_TYPE_WEB_SEARCH_TOOL]: ToolCallKind.WEB_SEARCH,
  [WireToolCallType.TOOL_CALL_TYPE_X_SEARCH_TOOL]: ToolCallKind.X_SEARCH,
  [WireToolCallType.TOOL_CALL_TYPE_CODE_EXECUTION_TOOL]: ToolCallKind.CODE_EXECUTION,
  [WireToolCallType.TOOL_CALL_TYPE_COLLECTIONS_SEARCH_TOOL]: ToolCallKind.COLLECTIONS_SEARCH,
  [WireToolCallType.TOOL_CALL_TYPE_MCP_TOOL]: ToolCallKind.MCP,
};

const TOOL_CALL_STATUSES: Readonly<Record<number, ToolCallStatus>> = {
  [WireToolCallStatus.TOOL_CALL_STATUS_IN_PROGRESS]: ToolCallStatus.IN_PROGRESS,
  [WireToolCallStatus.TOOL_CALL_STATUS_COMPLETED]: ToolCallStatus.COMPLETED,
  [WireToolCallStatus.TOOL_CALL_STATUS_INCOMPLETE]: ToolCallStatus.INCOMPLETE,
  [WireToolCallStatus.TOOL_CALL_STATUS_FAILED]: ToolCallStatus.FAILED,
};

export function translateToolCall(call: WireToolCall): ToolCall {
  return {
    id: call.id,
    kind: TOOL_CALL_KINDS[call.type] ?? ToolCallKind.UNKNOWN,
    status: TOOL_CALL_STATUSES[call.status] ?? ToolCallStatus.UNKNOWN,
    ...(call.error_message ? { error_message: call.error_message } : {}),
    function: {
      name: call.function?.name ?? "",
      arguments: call.function?.arguments ?? "",
    },
  };
}

const WIRE_TOOL_CALL_TYPES: Readonly<Record<ToolCallKind, number>> = {
  [ToolCallKind.CLIENT_SIDE]: WireToolCallType.TOOL_CALL_TYPE_CLIENT_SIDE_TOOL,
  [ToolCallKind.WEB_SEARCH]: WireToolCallType.TOOL_CALL_TYPE_WEB_SEARCH_TOOL,
  [ToolCallKind.X_SEARCH]: WireToolCallType.TOOL_CALL_TYPE_X_SEARCH_TOOL,
  [ToolCallKind.CODE_EXECUTION]: WireToolCallType.TOOL_CALL_TYPE_CODE_EXECUTION_TOOL,
  [ToolCallKind.COLLECTIONS_SEARCH]: WireToolCallType.TOOL_CALL_TYPE_COLLECTIONS_SEARCH_TOOL,
  [ToolCallKind.MCP]: WireToolCallType.TOOL_CALL_TYPE_MCP_TOOL,
  [ToolCallKind.UNKNOWN]: WireToolCallType.TOOL_CALL_TYPE_INVALID,
};

const WIRE_TOOL_CALL_STATUSES: Readonly<Record<ToolCallStatus, number>> = {
  [ToolCallStatus.IN_PROGRESS]: WireToolCallStatus.TOOL_CALL_STATUS_IN_PROGRESS,
  [ToolCallStatus.COMPLETED]: WireToolCallStatus.TOOL_CALL_STATUS_COMPLETED,
  [ToolCallStatus.INCOMPLETE]: WireToolCallStatus.TOOL_CALL_STATUS_INCOMPLETE,
  [ToolCallStatus.FAILED]: WireToolCallStatus.TOOL_CALL_STATUS_FAILED,
  [ToolCallStatus.UNKNOWN]: WireToolCallStatus.TOOL_CALL_STATUS_IN_PROGRESS,
};

/** Encode a tool call, e.g. when replaying an assistant turn. */
export function translateToolCallToWire(call: ToolCall): WireToolCall {
  return {
    id: call.id,
    type: WIRE_TOOL_CALL_TYPES[call.kind],
    status: WIRE_TOOL_CALL_STATUSES[call.status],
    ...(call.error_message !== undefined ? { error_message: call.error_message } : {}),
    function: { name: call.function.name, arguments: call.function.arguments },
  };
}
