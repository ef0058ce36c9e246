import type { WireAdapter } from "../adapter";
import { joinUrl } from "../shared/url";
import { buildGeminiRequest } from "./request";
import { createGeminiDecoder, decodeGenerateContent } from "./stream-decoder";
import type { GenerateContentRequest } from "./types";

export const geminiAdapter: WireAdapter<GenerateContentRequest> = {
  wireApi: "gemini",
  buildRequest: buildGeminiRequest,
  endpoint: (provider, model) => {
    const name = model.startsWith("models/") ? model.slice("models/".length) : model;
    const path = `models/${encodeURIComponent(name)}`;
    return provider.streaming
      ? `${joinUrl(provider.baseUrl, path)}:streamGenerateContent?alt=sse`
      : `${joinUrl(provider.baseUrl, path)}:generateContent`;
  },
  createDecoder: createGeminiDecoder,
  decodeComplete: decodeGenerateContent,
};
