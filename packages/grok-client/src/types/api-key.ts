/**
 * Metadata about the API key the client authenticates with.
 */

export interface ApiKeyInfo {
  /** The key with its secret part masked by the service. */
  readonly redacted_api_key: string;
  readonly api_key_id: string;
  readonly name: string;
  readonly user_id: string;
  readonly team_id: string;
  readonly acls: readonly string[];
  /** Unix seconds; 0 when the service did not say. */
  readonly created_at: number;
  readonly modified_at: number;
  readonly modified_by: string;
  readonly api_key_blocked: boolean;
  readonly team_blocked: boolean;
  readonly disabled: boolean;
}

export function isApiKeyActive(info: ApiKeyInfo): boolean {
  return !info.api_key_blocked && !info.team_blocked && !info.disabled;
}

/** One of "Blocked (Key)", "Blocked (Team)", "Disabled", "Active". */
export function apiKeyStatus(info: ApiKeyInfo): string {
  if (info.api_key_blocked) return "Blocked (Key)";
  if (info.team_blocked) return "Blocked (Team)";
  if (info.disabled) return "Disabled";
  return "Active";
}
