import type { LoggerOptions } from "../utils/logging/enhanced-logger";
import type { ModelFamilyDefinition } from "../models/model-family";

export type WireApi = "chat" | "responses" | "gemini";

export type AuthStyle = "bearer" | "x-goog-api-key";

export type ProviderConfig = {
  name: string;
  baseUrl: string;
  // Name of the environment variable holding the credential. Absent for
  // local endpoints that take no key.
  credentialEnvKey?: string;
  wireApi: WireApi;
  streaming: boolean;
  authStyle?: AuthStyle;
  headers?: Record<string, string>;
  queryParams?: Record<string, string>;
  streamIdleTimeoutMs?: number;
};

export type StreamLimits = {
  // Accumulated argument text per function call
  maxArgumentBytes: number;
  // One SSE event, or one non-streaming body
  maxEventBytes: number;
};

export const DEFAULT_LIMITS: StreamLimits = {
  maxArgumentBytes: 4 * 1024 * 1024,
  maxEventBytes: 8 * 1024 * 1024,
};

export type MissingSignatureAction = "error" | "omit" | "bypass";

export type SignaturePolicy = {
  onMissing: MissingSignatureAction;
};

export const DEFAULT_SIGNATURE_POLICY: SignaturePolicy = { onMissing: "error" };

export const DEFAULT_STREAM_IDLE_TIMEOUT_MS = 300_000;

export type ClientConfig = {
  model: string;
  modelProvider: string;
  providers: Record<string, ProviderConfig>;
  modelFamilies: ModelFamilyDefinition[];
  limits: StreamLimits;
  thoughtSignatures: SignaturePolicy;
  logging?: LoggerOptions;
};
