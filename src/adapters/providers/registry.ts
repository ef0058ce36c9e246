import type { WireApi } from "../../config/types";
import type { WireAdapter } from "./adapter";
import { chatAdapter } from "./chat";
import { geminiAdapter } from "./gemini";
import { responsesAdapter } from "./responses";

/** One builder / decoder pair per wire API. */
export const WIRE_ADAPTERS: { readonly [K in WireApi]: WireAdapter } = {
  chat: chatAdapter,
  responses: responsesAdapter,
  gemini: geminiAdapter,
};

export function getWireAdapter(wireApi: WireApi): WireAdapter {
  return WIRE_ADAPTERS[wireApi];
}
