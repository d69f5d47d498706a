/**
 * Loads the Grok protobuf schema at run time.
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import * as protoLoader from "@grpc/proto-loader";
import type {
  MethodDefinition,
  PackageDefinition,
  ServiceDefinition,
} from "@grpc/proto-loader";
import { ConfigurationError } from "../types/index.js";

/** Directory holding `xai/api/v1/*.proto`, shipped beside `src/`. */
export const DEFAULT_PROTO_ROOT = fileURLToPath(
  new URL("../../proto", import.meta.url),
);

export const PROTO_FILES = [
  "xai/api/v1/chat.proto",
  "xai/api/v1/models.proto",
  "xai/api/v1/embed.proto",
  "xai/api/v1/tokenize.proto",
  "xai/api/v1/auth.proto",
  "xai/api/v1/sample.proto",
  "xai/api/v1/image.proto",
  "xai/api/v1/documents.proto",
] as const;

/** Fully qualified names of every service the transport calls. */
export const ServiceName = {
  CHAT: "xai_api.Chat",
  MODELS: "xai_api.Models",
  EMBEDDER: "xai_api.Embedder",
  TOKENIZE: "xai_api.Tokenize",
  AUTH: "xai_api.Auth",
  SAMPLE: "xai_api.Sample",
  IMAGE: "xai_api.Image",
  DOCUMENTS: "xai_api.Documents",
} as const satisfies Record<string, string>;

export type ServiceName = (typeof ServiceName)[keyof typeof ServiceName];

const cache = new Map<string, PackageDefinition>();

/**
 * Load (and memoize per root) the package definition.
 *
 * Enums are left numeric and oneof virtual fields are not added; see
 * `./types.ts` for the resulting shapes.
 */
export function loadGrokProto(protoRoot: string = DEFAULT_PROTO_ROOT): PackageDefinition {
  const resolved = path.resolve(protoRoot);
  const cached = cache.get(resolved);
  if (cached) return cached;

  const definition = protoLoader.loadSync([...PROTO_FILES], {
    keepCase: true,
    longs: Number,
    defaults: true,
    includeDirs: [resolved],
  });
  cache.set(resolved, definition);
  return definition;
}

/** Look up a service; `ConfigurationError` when the schema lacks it. */
export function getService(
  definition: PackageDefinition,
  name: ServiceName,
): ServiceDefinition {
  const entry = definition[name];
  if (entry === undefined || "format" in entry) {
    throw new ConfigurationError(`Service ${name} not found in the loaded schema`);
  }
  return entry;
}

/** Look up one method of a service by its original (proto) name. */
export function getMethod(
  service: ServiceDefinition,
  method: string,
): MethodDefinition<object, object> {
  const entry = service[method];
  if (entry === undefined) {
    throw new ConfigurationError(`Method ${method} not found in service`);
  }
  return entry;
}
