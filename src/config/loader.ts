import { readFile } from "node:fs/promises";
import { ConfigError } from "../adapters/errors/client-errors";
import { configureLogger } from "../utils/logging/enhanced-logger";
import { logInfo } from "../utils/logging/helpers";
import type { Env } from "./credentials";
import { expandConfig } from "./expansion";
import { resolveConfigPath } from "./paths";
import { BUILT_IN_PROVIDERS } from "./providers";
import { configFileSchema, formatIssues, type ConfigFile } from "./schema";
import { DEFAULT_LIMITS, DEFAULT_SIGNATURE_POLICY, type ClientConfig, type ProviderConfig } from "./types";

export type LoadConfigOptions = {
  cwd?: string;
  env?: Env;
};

/** User providers override built-ins with the same key. */
export function toClientConfig(file: ConfigFile): ClientConfig {
  const providers: Record<string, ProviderConfig> = { ...BUILT_IN_PROVIDERS };
  for (const [key, { name, ...rest }] of Object.entries(file.providers)) {
    providers[key] = { name: name ?? key, ...rest };
  }
  if (!providers[file.modelProvider]) {
    throw new ConfigError(
      `modelProvider "${file.modelProvider}" is not configured; known providers: ${Object.keys(providers).join(", ")}`
    );
  }
  return {
    model: file.model,
    modelProvider: file.modelProvider,
    providers,
    modelFamilies: file.modelFamilies,
    limits: file.limits,
    thoughtSignatures: file.thoughtSignatures,
    ...(file.logging ? { logging: file.logging } : {}),
  };
}

export function parseConfig(json: unknown, env: Env = process.env): ClientConfig {
  const result = configFileSchema.safeParse(expandConfig(json, env));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return toClientConfig(result.data);
}

/** Config without a file: TURNSTREAM_MODEL and TURNSTREAM_PROVIDER over the built-ins. */
export function configFromEnv(env: Env = process.env): ClientConfig | null {
  const model = env.TURNSTREAM_MODEL?.trim();
  if (!model) return null;
  const modelProvider = env.TURNSTREAM_PROVIDER?.trim() || "openai";
  if (!BUILT_IN_PROVIDERS[modelProvider]) {
    throw new ConfigError(
      `TURNSTREAM_PROVIDER "${modelProvider}" is not a built-in provider; use a config file to define it`
    );
  }
  return {
    model,
    modelProvider,
    providers: { ...BUILT_IN_PROVIDERS },
    modelFamilies: [],
    limits: DEFAULT_LIMITS,
    thoughtSignatures: DEFAULT_SIGNATURE_POLICY,
  };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ClientConfig> {
  const env = options.env ?? process.env;
  const location = resolveConfigPath(options.cwd, env);

  if (!location.exists) {
    if (location.explicit) {
      throw new ConfigError(`Config file not found: ${location.path}`);
    }
    const synthesized = configFromEnv(env);
    if (synthesized) return synthesized;
    throw new ConfigError(
      `No configuration found. Provide either: 1) TURNSTREAM_MODEL (and optionally TURNSTREAM_PROVIDER), or 2) a config file at ${location.path}.`
    );
  }

  const raw = await readFile(location.path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${location.path} is not valid JSON`, { cause: err });
  }
  const config = parseConfig(json, env);
  if (config.logging) configureLogger(config.logging);
  logInfo("Configuration loaded", { path: location.path, provider: config.modelProvider, model: config.model });
  return config;
}

let cachedConfig: ClientConfig | null = null;
let loadingPromise: Promise<ClientConfig> | null = null;

export async function loadConfigOnce(options: LoadConfigOptions = {}): Promise<ClientConfig> {
  if (cachedConfig) return cachedConfig;
  if (loadingPromise) return loadingPromise;

  loadingPromise = (async () => {
    try {
      const config = await loadConfig(options);
      cachedConfig = config;
      return config;
    } finally {
      loadingPromise = null;
    }
  })();

  return loadingPromise;
}

export function getConfigCache(): ClientConfig | null {
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
  loadingPromise = null;
}
