import {
  ContentBlockedError,
  ContextWindowExceededError,
  ProtocolError,
  type ClientError,
} from "../../errors/client-errors";
import { upstreamErrorFromPayload } from "../../errors/http-error";
import type { DecoderContext, StreamDecoder, StreamEvent, TokenUsage } from "../adapter";
import { ArgumentBudget } from "../shared/argument-budget";
import { parseJsonData, type SseEvent } from "../shared/sse";
import { isObject, readArray, readObject, readString } from "../shared/type-guards";
import { decodeGeminiPart, isGeminiResponse, readUsageMetadata } from "./guards";
import type { GeminiUsageMetadata } from "./types";

const BLOCKING_FINISH_REASONS = new Set(["SAFETY", "RECITATION", "BLOCKLIST", "PROHIBITED_CONTENT", "SPII"]);

export function geminiUsage(meta: GeminiUsageMetadata): TokenUsage {
  const inputTokens = meta.promptTokenCount ?? 0;
  const outputTokens = meta.candidatesTokenCount ?? 0;
  return {
    inputTokens,
    cachedInputTokens: meta.cachedContentTokenCount ?? 0,
    outputTokens,
    reasoningOutputTokens: meta.thoughtsTokenCount ?? 0,
    totalTokens: meta.totalTokenCount ?? inputTokens + outputTokens,
  };
}

// Gemini often leaves call ids out; generated ones must stay unique across turns of one history
const generateCallId = (): string => {
  const random = Math.random().toString(36).substring(2, 15);
  const timestamp = Date.now().toString(36);
  return `gemini_call_${timestamp}_${random}`;
};

function finishReasonError(reason: string): ClientError | null {
  if (reason === "MAX_TOKENS") return new ContextWindowExceededError();
  if (BLOCKING_FINISH_REASONS.has(reason)) return new ContentBlockedError(reason);
  return null;
}

/**
 * Each SSE data payload is a complete GenerateContentResponse. Gemini sends
 * function calls whole, so a call's start, arguments and done come out of
 * the same part.
 */
export class GeminiStreamDecoder implements StreamDecoder {
  private readonly budget: ArgumentBudget;
  private usage: TokenUsage | undefined;
  private done = false;

  constructor(
    context: DecoderContext,
    private readonly newCallId: () => string = generateCallId
  ) {
    this.budget = new ArgumentBudget(context.limits.maxArgumentBytes);
  }

  onEvent(event: SseEvent): StreamEvent[] {
    if (this.done) return [];
    const payload = parseJsonData(event);
    if (isObject(payload) && isObject(payload.error)) throw upstreamErrorFromPayload(payload);
    if (!isGeminiResponse(payload)) throw new ProtocolError("Stream chunk is not a GenerateContentResponse");

    const feedback = readObject(payload, "promptFeedback");
    const blockReason = feedback ? readString(feedback, "blockReason") : undefined;
    if (blockReason) return this.fail([], new ContentBlockedError(blockReason));

    const meta = readUsageMetadata(payload);
    if (meta) this.usage = geminiUsage(meta);

    const out: StreamEvent[] = [];
    for (const candidate of readArray(payload, "candidates")) {
      if (!isObject(candidate)) continue;
      const content = readObject(candidate, "content");
      for (const raw of content ? readArray(content, "parts") : []) {
        this.onPart(raw, out);
      }
      const reason = readString(candidate, "finishReason");
      const error = reason ? finishReasonError(reason) : null;
      if (error) return this.fail(out, error);
    }
    return out;
  }

  finish(): StreamEvent[] {
    if (this.done) return [];
    this.done = true;
    return [
      ...(this.usage ? [{ type: "usage_reported" as const, usage: this.usage }] : []),
      { type: "completed" },
    ];
  }

  private onPart(raw: unknown, out: StreamEvent[]): void {
    const part = decodeGeminiPart(raw);
    switch (part.kind) {
      case "text":
        if (part.thought) {
          if (part.text || part.thoughtSignature) {
            out.push({
              type: "reasoning_delta",
              text: part.text,
              ...(part.thoughtSignature ? { thoughtSignature: part.thoughtSignature } : {}),
            });
          }
        } else if (part.text) {
          out.push({ type: "text_delta", text: part.text });
        }
        break;
      case "function_call": {
        const callId = part.call.id ?? this.newCallId();
        const fragment = JSON.stringify(part.call.args ?? {});
        this.budget.add(callId, fragment);
        out.push(
          { type: "function_call_start", callId, name: part.call.name },
          { type: "function_call_argument_delta", callId, fragment },
          {
            type: "function_call_done",
            callId,
            ...(part.thoughtSignature ? { thoughtSignature: part.thoughtSignature } : {}),
          }
        );
        break;
      }
      case "other":
        break;
    }
  }

  private fail(out: StreamEvent[], error: ClientError): StreamEvent[] {
    this.done = true;
    out.push({ type: "failed", error });
    return out;
  }
}

export function createGeminiDecoder(context: DecoderContext): StreamDecoder {
  return new GeminiStreamDecoder(context);
}

/** `:generateContent` answers with the same shape as one stream chunk. */
export function decodeGenerateContent(body: unknown, context: DecoderContext): StreamEvent[] {
  const decoder = new GeminiStreamDecoder(context);
  const events = decoder.onEvent({ data: JSON.stringify(body) });
  return [...events, ...decoder.finish()];
}
