import {
  ContentBlockedError,
  ContextWindowExceededError,
  ProtocolError,
} from "../../errors/client-errors";
import { upstreamErrorFromPayload } from "../../errors/http-error";
import type { DecoderContext, StreamDecoder, StreamEvent, TokenUsage } from "../adapter";
import { ArgumentBudget } from "../shared/argument-budget";
import { parseJsonData, type SseEvent } from "../shared/sse";
import {
  isObject,
  readArray,
  readExtraContentSignature,
  readNumber,
  readObject,
  readString,
} from "../shared/type-guards";

type ToolCallState = {
  callId?: string;
  name?: string;
  started: boolean;
  // Fragments that arrived before the id and name were known
  pending: string[];
  signature?: string;
};

export function chatUsage(raw: Record<string, unknown>): TokenUsage {
  const prompt = readObject(raw, "prompt_tokens_details");
  const completion = readObject(raw, "completion_tokens_details");
  const inputTokens = readNumber(raw, "prompt_tokens") ?? 0;
  const outputTokens = readNumber(raw, "completion_tokens") ?? 0;
  return {
    inputTokens,
    cachedInputTokens: (prompt && readNumber(prompt, "cached_tokens")) ?? 0,
    outputTokens,
    reasoningOutputTokens: (completion && readNumber(completion, "reasoning_tokens")) ?? 0,
    totalTokens: readNumber(raw, "total_tokens") ?? inputTokens + outputTokens,
  };
}

export function finishReasonError(reason: string): ContextWindowExceededError | ContentBlockedError | null {
  if (reason === "length") return new ContextWindowExceededError();
  if (reason === "content_filter") return new ContentBlockedError(reason);
  return null;
}

/**
 * Chat Completions chunks: text and tool calls (keyed by index) of the
 * first choice, terminated by the literal `[DONE]`. Requests never ask for
 * `n > 1`; other choices a server sends anyway are ignored, since the event
 * stream has no notion of alternatives.
 */
export class ChatStreamDecoder implements StreamDecoder {
  private readonly calls = new Map<number, ToolCallState>();
  private readonly budget: ArgumentBudget;
  private usage: TokenUsage | undefined;
  private sawFinishReason = false;
  private done = false;

  constructor(private readonly context: DecoderContext) {
    this.budget = new ArgumentBudget(context.limits.maxArgumentBytes);
  }

  onEvent(event: SseEvent): StreamEvent[] {
    if (this.done) return [];
    if (event.data.trim() === "[DONE]") return this.complete();

    const chunk = parseJsonData(event);
    if (!isObject(chunk)) throw new ProtocolError("Chat chunk is not a JSON object");
    if (chunk.error !== undefined && chunk.error !== null) throw upstreamErrorFromPayload(chunk);

    const out: StreamEvent[] = [];
    for (const choice of readArray(chunk, "choices")) {
      if (!isObject(choice) || (readNumber(choice, "index") ?? 0) !== 0) continue;
      this.onChoice(choice, out);
      if (this.done) return out;
    }
    const usage = readObject(chunk, "usage");
    if (usage) this.usage = chatUsage(usage);
    return out;
  }

  finish(): StreamEvent[] {
    if (this.done) return [];
    if (!this.sawFinishReason) {
      throw new ProtocolError("Chat stream closed before [DONE]");
    }
    return this.complete();
  }

  private onChoice(choice: Record<string, unknown>, out: StreamEvent[]): void {
    const delta = readObject(choice, "delta");
    if (delta) {
      const text = readString(delta, "content");
      if (text) out.push({ type: "text_delta", text });
      const reasoning = readString(delta, "reasoning_content") ?? readString(delta, "reasoning");
      if (reasoning) out.push({ type: "reasoning_delta", text: reasoning });

      readArray(delta, "tool_calls").forEach((raw, position) => {
        if (isObject(raw)) this.onToolCallDelta(raw, position, out);
      });
    }

    const finishReason = readString(choice, "finish_reason");
    if (finishReason) {
      this.sawFinishReason = true;
      const error = finishReasonError(finishReason);
      if (error) {
        // Truncated calls are never reported as done
        this.done = true;
        out.push({ type: "failed", error });
        return;
      }
      out.push(...this.closeCalls());
    }
  }

  private onToolCallDelta(raw: Record<string, unknown>, position: number, out: StreamEvent[]): void {
    const key = readNumber(raw, "index") ?? position;
    let state = this.calls.get(key);
    if (!state) {
      state = { started: false, pending: [] };
      this.calls.set(key, state);
    }

    const id = readString(raw, "id");
    if (id && !state.callId) state.callId = id;
    const fn = readObject(raw, "function");
    const name = fn ? readString(fn, "name") : undefined;
    if (name && !state.name) state.name = name;
    const signature = readExtraContentSignature(raw, this.context.family.signatureVendor);
    if (signature) state.signature = signature;

    const fragment = fn ? readString(fn, "arguments") : undefined;
    if (fragment) {
      this.budget.add(String(key), fragment);
      state.pending.push(fragment);
    }
    this.flush(state, out);
  }

  private flush(state: ToolCallState, out: StreamEvent[]): void {
    if (!state.started) {
      if (!state.callId || !state.name) return;
      state.started = true;
      out.push({ type: "function_call_start", callId: state.callId, name: state.name });
    }
    const callId = state.callId;
    if (!callId) return;
    for (const fragment of state.pending) {
      out.push({ type: "function_call_argument_delta", callId, fragment });
    }
    state.pending = [];
  }

  private closeCalls(): StreamEvent[] {
    const out: StreamEvent[] = [];
    for (const [key, state] of this.calls) {
      this.calls.delete(key);
      if (!state.name) {
        throw new ProtocolError(`Tool call ${state.callId ?? key} ended without a function name`);
      }
      // Some OpenAI-compatible servers never send an id
      if (!state.callId) state.callId = `call_0_${key}`;
      this.flush(state, out);
      out.push({
        type: "function_call_done",
        callId: state.callId,
        ...(state.signature ? { thoughtSignature: state.signature } : {}),
      });
    }
    return out;
  }

  private complete(): StreamEvent[] {
    const out = this.closeCalls();
    if (this.usage) out.push({ type: "usage_reported", usage: this.usage });
    out.push({ type: "completed" });
    this.done = true;
    return out;
  }
}

export function createChatDecoder(context: DecoderContext): StreamDecoder {
  return new ChatStreamDecoder(context);
}

/** Non-streaming `chat.completion` body → the event sequence a stream would have produced. */
export function decodeChatCompletion(body: unknown, context: DecoderContext): StreamEvent[] {
  if (!isObject(body)) throw new ProtocolError("Chat completion body is not a JSON object");
  if (body.error !== undefined && body.error !== null) throw upstreamErrorFromPayload(body);

  const decoder = new ChatStreamDecoder(context);
  const choices = readArray(body, "choices").map((choice) => {
    if (!isObject(choice)) return choice;
    const message = readObject(choice, "message");
    const toolCalls = message ? readArray(message, "tool_calls") : [];
    return {
      index: readNumber(choice, "index") ?? 0,
      finish_reason: readString(choice, "finish_reason") ?? "stop",
      delta: {
        content: message ? readString(message, "content") : undefined,
        reasoning_content: message ? readString(message, "reasoning_content") : undefined,
        tool_calls: toolCalls.map((call, index) => (isObject(call) ? { index, ...call } : call)),
      },
    };
  });
  const usage = readObject(body, "usage");
  const events = decoder.onEvent({ data: JSON.stringify({ choices, ...(usage ? { usage } : {}) }) });
  return [...events, ...decoder.finish()];
}
