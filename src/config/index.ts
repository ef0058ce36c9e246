export type {
  AuthStyle,
  ClientConfig,
  MissingSignatureAction,
  ProviderConfig,
  SignaturePolicy,
  StreamLimits,
  WireApi,
} from "./types";
export { DEFAULT_LIMITS, DEFAULT_SIGNATURE_POLICY, DEFAULT_STREAM_IDLE_TIMEOUT_MS } from "./types";
export { BUILT_IN_PROVIDERS } from "./providers";
export { authHeaders, resolveCredential, type Env } from "./credentials";
export { configFromEnv, getConfigCache, loadConfig, loadConfigOnce, parseConfig, resetConfigCache } from "./loader";
export { resolveConfigPath, CONFIG_FILE_NAME, CONFIG_PATH_ENV } from "./paths";
