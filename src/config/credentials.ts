import { AuthError } from "../adapters/errors/client-errors";
import type { ProviderConfig } from "./types";

export type Env = Record<string, string | undefined>;

/**
 * Reads the provider's credential from the environment. Returns null for
 * providers that declare no credential; throws before any request is made
 * when a declared one is missing.
 */
export function resolveCredential(provider: ProviderConfig, env: Env = process.env): string | null {
  const key = provider.credentialEnvKey;
  if (!key) return null;
  const value = env[key]?.trim();
  if (!value) {
    throw new AuthError(
      `Missing credential for provider "${provider.name}": set the ${key} environment variable`
    );
  }
  return value;
}

export function authHeaders(provider: ProviderConfig, credential: string | null): Record<string, string> {
  if (!credential) return {};
  if (provider.authStyle === "x-goog-api-key") {
    return { "x-goog-api-key": credential };
  }
  return { authorization: `Bearer ${credential}` };
}
