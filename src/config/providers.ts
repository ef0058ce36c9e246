import type { ProviderConfig } from "./types";

export const BUILT_IN_PROVIDERS: Readonly<Record<string, ProviderConfig>> = {
  openai: {
    name: "OpenAI",
    baseUrl: "https://api.openai.com/v1",
    credentialEnvKey: "OPENAI_API_KEY",
    wireApi: "responses",
    streaming: true,
  },
  "openai-chat": {
    name: "OpenAI (Chat Completions)",
    baseUrl: "https://api.openai.com/v1",
    credentialEnvKey: "OPENAI_API_KEY",
    wireApi: "chat",
    streaming: true,
  },
  gemini: {
    name: "Google Gemini",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta",
    credentialEnvKey: "GEMINI_API_KEY",
    wireApi: "gemini",
    streaming: true,
    authStyle: "x-goog-api-key",
  },
  openrouter: {
    name: "OpenRouter",
    baseUrl: "https://openrouter.ai/api/v1",
    credentialEnvKey: "OPENROUTER_API_KEY",
    wireApi: "chat",
    streaming: true,
  },
  ollama: {
    name: "Ollama",
    baseUrl: "http://localhost:11434/v1",
    wireApi: "chat",
    streaming: true,
  },
};
