import type { ClientError } from "../errors/client-errors";
import type { ConversationItem } from "../../conversation/items";
import type { ModelFamily } from "../../models/model-family";
import type { ToolSpec } from "../../tools/tool-spec";
import type { ProviderConfig, SignaturePolicy, StreamLimits, WireApi } from "../../config/types";
import type { SseEvent } from "./shared/sse";

export type TokenUsage = {
  inputTokens: number;
  cachedInputTokens: number;
  outputTokens: number;
  reasoningOutputTokens: number;
  totalTokens: number;
};

export type StreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "reasoning_delta"; text: string; thoughtSignature?: string }
  | { type: "function_call_start"; callId: string; name: string }
  | { type: "function_call_argument_delta"; callId: string; fragment: string }
  | { type: "function_call_done"; callId: string; thoughtSignature?: string }
  | { type: "usage_reported"; usage: TokenUsage }
  | { type: "completed" }
  | { type: "failed"; error: ClientError };

export function isTerminalEvent(event: StreamEvent): boolean {
  return event.type === "completed" || event.type === "failed";
}

/** Everything a request builder may look at. Builders never mutate it. */
export type TurnRequest = {
  model: string;
  instructions: string;
  items: readonly ConversationItem[];
  tools: readonly ToolSpec[];
  family: ModelFamily;
  provider: ProviderConfig;
  signaturePolicy: SignaturePolicy;
};

export type DecoderContext = {
  family: ModelFamily;
  limits: StreamLimits;
};

/**
 * Pull-based state machine over framed SSE events. `onEvent` and `finish`
 * throw a ClientError to end the turn as failed.
 */
export interface StreamDecoder {
  onEvent(event: SseEvent): StreamEvent[];
  // Called once on clean connection close
  finish(): StreamEvent[];
}

export interface WireAdapter<TBody = unknown> {
  readonly wireApi: WireApi;
  buildRequest(request: TurnRequest): TBody;
  endpoint(provider: ProviderConfig, model: string): string;
  createDecoder(context: DecoderContext): StreamDecoder;
  // Events for a provider configured with `streaming: false`
  decodeComplete(body: unknown, context: DecoderContext): StreamEvent[];
}
