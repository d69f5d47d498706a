import { z } from "zod";
import { ConfigurationError, MissingCredentialError } from "./types/index.js";

export const DEFAULT_ENDPOINT = "https://api.x.ai";
export const DEFAULT_MODEL = "grok-code-fast-1";
export const API_KEY_ENV = "XAI_API_KEY";

// ── Client config ─────────────────────────────────────────────
export const grokConfigSchema = z.object({
  endpoint: z
    .string()
    .url("Must be a valid URL, e.g. https://api.x.ai")
    .refine((value) => /^https?:\/\//i.test(value), {
      message: "Endpoint scheme must be http or https",
    })
    .default(DEFAULT_ENDPOINT),
  apiKey: z.string().min(1, "API key is required"),
  /** Used when a chat request names no model. */
  defaultModel: z.string().min(1).default(DEFAULT_MODEL),
  /** Per-call deadline. */
  timeoutMs: z.number().int().positive().default(60_000),
  keepAliveMs: z.number().int().positive().default(30_000),
  keepAliveTimeoutMs: z.number().int().positive().default(10_000),
  /** Directory with `xai/api/v1/*.proto`; defaults to the bundled copy. */
  protoRoot: z.string().min(1).optional(),
});

// ── Exported types ────────────────────────────────────────────
export type GrokConfig = z.infer<typeof grokConfigSchema>;
export type GrokConfigInput = z.input<typeof grokConfigSchema>;

/**
 * Validate and fill defaults. Failures become `ConfigurationError`; issue
 * messages name the field, never its value.
 */
export function resolveConfig(input: GrokConfigInput): GrokConfig {
  const result = grokConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid client configuration: ${details}`);
  }
  return result.data;
}

/** Read the credential from `XAI_API_KEY`. */
export function apiKeyFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const value = env[API_KEY_ENV];
  if (value === undefined) {
    throw new MissingCredentialError(API_KEY_ENV);
  }
  return value;
}
