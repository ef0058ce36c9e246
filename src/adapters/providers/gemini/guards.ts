import { isObject, readNumber, readObject, readString } from "../shared/type-guards";
import type { GeminiFunctionCall, GeminiUsageMetadata } from "./types";

export type DecodedGeminiPart =
  | { kind: "text"; text: string; thought: boolean; thoughtSignature?: string }
  | { kind: "function_call"; call: GeminiFunctionCall; thoughtSignature?: string }
  | { kind: "other" };

export function isGeminiResponse(v: unknown): v is Record<string, unknown> {
  return isObject(v) && ("candidates" in v || "usageMetadata" in v || "promptFeedback" in v);
}

export function decodeGeminiPart(p: unknown): DecodedGeminiPart {
  if (!isObject(p)) return { kind: "other" };
  const partSignature = readString(p, "thoughtSignature");
  const fc = readObject(p, "functionCall");
  if (fc) {
    const name = readString(fc, "name");
    if (!name) return { kind: "other" };
    const id = readString(fc, "id");
    const args = readObject(fc, "args");
    const signature = partSignature ?? readString(fc, "thoughtSignature");
    return {
      kind: "function_call",
      call: { name, ...(id ? { id } : {}), ...(args ? { args } : {}) },
      ...(signature ? { thoughtSignature: signature } : {}),
    };
  }
  const text = readString(p, "text");
  if (text !== undefined) {
    return {
      kind: "text",
      text,
      thought: p.thought === true,
      ...(partSignature ? { thoughtSignature: partSignature } : {}),
    };
  }
  return { kind: "other" };
}

export function readUsageMetadata(resp: Record<string, unknown>): GeminiUsageMetadata | undefined {
  const raw = readObject(resp, "usageMetadata");
  if (!raw) return undefined;
  return {
    promptTokenCount: readNumber(raw, "promptTokenCount"),
    candidatesTokenCount: readNumber(raw, "candidatesTokenCount"),
    totalTokenCount: readNumber(raw, "totalTokenCount"),
    cachedContentTokenCount: readNumber(raw, "cachedContentTokenCount"),
    thoughtsTokenCount: readNumber(raw, "thoughtsTokenCount"),
  };
}
