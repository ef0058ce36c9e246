import type { WireAdapter } from "../adapter";
import { joinUrl } from "../shared/url";
import { buildChatRequest } from "./request";
import { createChatDecoder, decodeChatCompletion } from "./stream-decoder";
import type { ChatRequestBody } from "./types";

export const chatAdapter: WireAdapter<ChatRequestBody> = {
  wireApi: "chat",
  buildRequest: buildChatRequest,
  endpoint: (provider) => joinUrl(provider.baseUrl, "chat/completions"),
  createDecoder: createChatDecoder,
  decodeComplete: decodeChatCompletion,
};
