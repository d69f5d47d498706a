/**
 * Tokenizer request/response types.
 */

export interface TokenizeRequest {
  readonly model: string;
  readonly text: string;
  readonly user?: string;
}

export interface Token {
  readonly token_id: number;
  readonly string_token: string;
  readonly token_bytes: Uint8Array;
}

export interface TokenizeResponse {
  readonly model: string;
  readonly tokens: readonly Token[];
}

export function tokenCount(response: TokenizeResponse): number {
  return response.tokens.length;
}

/** The input text as the tokenizer reassembles it. */
export function tokenText(response: TokenizeResponse): string {
  return response.tokens.map((token) => token.string_token).join("");
}
