/**
 * Tool-related types for the Grok client.
 *
 * `Tool` is what a request offers the model; `ToolCall` is what a response
 * asks for. Server-side tools (search, code execution, MCP) run remotely and
 * only show up in responses for bookkeeping.
 */

import type { ToolCallKind, ToolCallStatus } from "./enums.js";
import { ToolKind } from "./enums.js";
import { InvalidRequestError } from "./errors.js";

// ---------------------------------------------------------------------------
// Tool (Definition): discriminated union on `kind`
// ---------------------------------------------------------------------------

/** A function the caller executes locally. */
export interface FunctionTool {
  readonly kind: typeof ToolKind.FUNCTION;
  readonly name: string;
  readonly description: string;
  /** JSON Schema for the arguments. Serialized verbatim, never validated. */
  readonly parameters: Record<string, unknown>;
  readonly strict?: boolean;
}

export interface WebSearchTool {
  readonly kind: typeof ToolKind.WEB_SEARCH;
  readonly allowed_domains?: readonly string[];
  readonly excluded_domains?: readonly string[];
  readonly enable_image_understanding?: boolean;
}

export interface XSearchTool {
  readonly kind: typeof ToolKind.X_SEARCH;
  readonly from_date?: Date;
  readonly to_date?: Date;
  readonly allowed_x_handles?: readonly string[];
  readonly excluded_x_handles?: readonly string[];
  readonly enable_image_understanding?: boolean;
  readonly enable_video_understanding?: boolean;
}

export interface CodeExecutionTool {
  readonly kind: typeof ToolKind.CODE_EXECUTION;
}

export interface CollectionsSearchTool {
  readonly kind: typeof ToolKind.COLLECTIONS_SEARCH;
  readonly collection_ids: readonly string[];
  readonly limit?: number;
}

/** A remote MCP server the service connects to on the caller's behalf. */
export interface McpTool {
  readonly kind: typeof ToolKind.MCP;
  readonly server_label: string;
  readonly server_url: string;
  readonly server_description?: string;
  readonly allowed_tool_names?: readonly string[];
  readonly authorization?: string;
  readonly extra_headers?: Readonly<Record<string, string>>;
}

export interface DocumentSearchTool {
  readonly kind: typeof ToolKind.DOCUMENT_SEARCH;
  readonly limit?: number;
}

export type Tool =
  | FunctionTool
  | WebSearchTool
  | XSearchTool
  | CodeExecutionTool
  | CollectionsSearchTool
  | McpTool
  | DocumentSearchTool;

// ---------------------------------------------------------------------------
// Tool factories
// ---------------------------------------------------------------------------

export function functionTool(
  name: string,
  description: string,
  parameters: Record<string, unknown>,
  options?: { strict?: boolean },
): FunctionTool {
  return { kind: ToolKind.FUNCTION, name, description, parameters, ...options };
}

export function webSearchTool(
  options?: Omit<WebSearchTool, "kind">,
): WebSearchTool {
  return { kind: ToolKind.WEB_SEARCH, ...options };
}

export function xSearchTool(options?: Omit<XSearchTool, "kind">): XSearchTool {
  return { kind: ToolKind.X_SEARCH, ...options };
}

export function codeExecutionTool(): CodeExecutionTool {
  return { kind: ToolKind.CODE_EXECUTION };
}

export function collectionsSearchTool(
  collection_ids: readonly string[],
  limit?: number,
): CollectionsSearchTool {
  return limit === undefined
    ? { kind: ToolKind.COLLECTIONS_SEARCH, collection_ids }
    : { kind: ToolKind.COLLECTIONS_SEARCH, collection_ids, limit };
}

export function mcpTool(
  server_label: string,
  server_url: string,
  options?: Omit<McpTool, "kind" | "server_label" | "server_url">,
): McpTool {
  return { kind: ToolKind.MCP, server_label, server_url, ...options };
}

export function documentSearchTool(limit?: number): DocumentSearchTool {
  return limit === undefined
    ? { kind: ToolKind.DOCUMENT_SEARCH }
    : { kind: ToolKind.DOCUMENT_SEARCH, limit };
}

// ---------------------------------------------------------------------------
// ToolChoice
// ---------------------------------------------------------------------------

/** Controls whether and how the model uses tools. "named" forces one function. */
export type ToolChoice =
  | { readonly mode: "auto" | "none" | "required" }
  | { readonly mode: "named"; readonly tool_name: string };

// ---------------------------------------------------------------------------
// ToolCall
// ---------------------------------------------------------------------------

/** A model-initiated tool invocation extracted from a response. */
export interface ToolCall {
  /** Unique identifier (service-assigned). */
  readonly id: string;
  readonly kind: ToolCallKind;
  readonly status: ToolCallStatus;
  /** Set when a server-side tool failed. */
  readonly error_message?: string;
  readonly function: {
    readonly name: string;
    /** Raw JSON argument string, exactly as received. */
    readonly arguments: string;
  };
}

/**
 * Parse a tool call's argument string into an object.
 *
 * An empty string parses to `{}`. Anything that is not a JSON object is an
 * `InvalidRequestError`.
 */
export function parseToolCallArguments(call: ToolCall): Record<string, unknown> {
  const raw = call.function.arguments;
  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new InvalidRequestError(
      `Tool call ${call.id} has malformed arguments`,
      { cause: err },
    );
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InvalidRequestError(
      `Tool call ${call.id} arguments are not a JSON object`,
    );
  }
  return Object.fromEntries(Object.entries(parsed));
}
