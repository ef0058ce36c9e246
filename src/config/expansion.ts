import { ConfigError } from "../adapters/errors/client-errors";
import type { Env } from "./credentials";

/**
 * Expands environment variables in configuration values
 * Supports:
 * - ${ENV_VAR} - Simple environment variable expansion
 * - ${ENV_VAR:-default} - With default value if not set
 * - ${ENV_VAR:?error message} - Throws error if not set
 */
export function expandValue(value: string, env: Env = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (match, expr: string) => {
    const defaultMatch = /^([^:]+):-(.*)$/.exec(expr);
    if (defaultMatch) {
      const [, varName = "", defaultValue = ""] = defaultMatch;
      return env[varName.trim()] || defaultValue;
    }

    const errorMatch = /^([^:]+):\?(.*)$/.exec(expr);
    if (errorMatch) {
      const [, varName = "", errorMessage = ""] = errorMatch;
      const resolved = env[varName.trim()];
      if (!resolved) {
        throw new ConfigError(errorMessage || `Environment variable ${varName.trim()} is not set`);
      }
      return resolved;
    }

    // Unset variables are left as written
    return env[expr.trim()] || match;
  });
}

/** Recursively expands all string values; the result is validated afterwards. */
export function expandConfig(config: unknown, env: Env = process.env): unknown {
  if (typeof config === "string") return expandValue(config, env);
  if (Array.isArray(config)) return config.map((item) => expandConfig(item, env));
  if (config && typeof config === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = expandConfig(value, env);
    }
    return result;
  }
  return config;
}
