/**
 * Message and ContentPart types for the Grok client.
 */

import type { ImageDetail } from "./enums.js";
import type { ToolCall } from "./tool.js";
import { ContentKind } from "./enums.js";
import { Role as RoleValues } from "./enums.js";

// ---------------------------------------------------------------------------
// ContentPart: discriminated union on `kind`
// ---------------------------------------------------------------------------

export interface TextContentPart {
  readonly kind: typeof ContentKind.TEXT;
  readonly text: string;
}

/** Image reference. The URL is passed through untouched. */
export interface ImageUrlContentPart {
  readonly kind: typeof ContentKind.IMAGE_URL;
  readonly url: string;
  /** Processing fidelity hint. Unset lets the server decide. */
  readonly detail?: ImageDetail;
}

export interface FileContentPart {
  readonly kind: typeof ContentKind.FILE;
  readonly file_id: string;
}

export type ContentPart =
  | TextContentPart
  | ImageUrlContentPart
  | FileContentPart;

/** Plain text, or an ordered list of parts (order is kept on the wire). */
export type MessageContent = string | readonly ContentPart[];

// ---------------------------------------------------------------------------
// Message: discriminated union on `role`
// ---------------------------------------------------------------------------

export interface SystemMessage {
  readonly role: typeof RoleValues.SYSTEM;
  readonly content: string;
}

export interface UserMessage {
  readonly role: typeof RoleValues.USER;
  readonly content: MessageContent;
  /** Optional participant name. */
  readonly name?: string;
}

export interface AssistantMessage {
  readonly role: typeof RoleValues.ASSISTANT;
  readonly content: string;
  /** Calls from an earlier response, when replaying a tool-use turn. */
  readonly tool_calls?: readonly ToolCall[];
}

/**
 * The answer to one client-side tool call.
 *
 * The service pairs results with calls by position, not by id: append results
 * in the same order as the tool calls of the response they answer.
 */
export interface ToolResultMessage {
  readonly role: typeof RoleValues.TOOL;
  readonly tool_call_id: string;
  readonly content: string;
}

export type Message =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolResultMessage;

// ---------------------------------------------------------------------------
// Content part factories
// ---------------------------------------------------------------------------

export function textPart(text: string): TextContentPart {
  return { kind: ContentKind.TEXT, text };
}

export function imageUrlPart(url: string, detail?: ImageDetail): ImageUrlContentPart {
  return detail === undefined
    ? { kind: ContentKind.IMAGE_URL, url }
    : { kind: ContentKind.IMAGE_URL, url, detail };
}

export function filePart(file_id: string): FileContentPart {
  return { kind: ContentKind.FILE, file_id };
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): SystemMessage {
  return { role: RoleValues.SYSTEM, content: text };
}

/** Create a user message from plain text or ordered parts. */
export function createUserMessage(content: MessageContent): UserMessage {
  return { role: RoleValues.USER, content };
}

/** Create an assistant message, optionally carrying the calls it made. */
export function createAssistantMessage(
  text: string,
  tool_calls?: readonly ToolCall[],
): AssistantMessage {
  return tool_calls === undefined || tool_calls.length === 0
    ? { role: RoleValues.ASSISTANT, content: text }
    : { role: RoleValues.ASSISTANT, content: text, tool_calls };
}

/** Create a tool-result message. */
export function createToolResultMessage(
  tool_call_id: string,
  content: string,
): ToolResultMessage {
  return { role: RoleValues.TOOL, tool_call_id, content };
}

// ---------------------------------------------------------------------------
// Helper: getMessageText
// ---------------------------------------------------------------------------

/**
 * Concatenate text from all TEXT content parts of a message.
 * Returns empty string if no text parts exist.
 */
export function getMessageText(message: Message): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .filter((part): part is TextContentPart => part.kind === ContentKind.TEXT)
    .map((part) => part.text)
    .join("");
}
