import {
  type ClientError,
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

type OutputCall = {
  callId: string;
  streamedArguments: boolean;
};

const CALL_ITEM_TYPES = new Set(["function_call", "custom_tool_call"]);

export function responsesUsage(raw: Record<string, unknown>): TokenUsage {
  const input = readObject(raw, "input_tokens_details");
  const output = readObject(raw, "output_tokens_details");
  const inputTokens = readNumber(raw, "input_tokens") ?? 0;
  const outputTokens = readNumber(raw, "output_tokens") ?? 0;
  return {
    inputTokens,
    cachedInputTokens: (input && readNumber(input, "cached_tokens")) ?? 0,
    outputTokens,
    reasoningOutputTokens: (output && readNumber(output, "reasoning_tokens")) ?? 0,
    totalTokens: readNumber(raw, "total_tokens") ?? inputTokens + outputTokens,
  };
}

function incompleteError(response: Record<string, unknown> | undefined): ClientError {
  const details = response ? readObject(response, "incomplete_details") : undefined;
  const reason = details ? readString(details, "reason") : undefined;
  if (reason === "max_output_tokens") return new ContextWindowExceededError();
  if (reason === "content_filter") return new ContentBlockedError(reason);
  return new ProtocolError(`Response incomplete: ${reason ?? "unknown reason"}`);
}

/**
 * Responses API typed events. Argument deltas reference the output item id,
 * so calls are tracked by item id and reported by call id.
 */
export class ResponsesStreamDecoder implements StreamDecoder {
  private readonly calls = new Map<string, OutputCall>();
  private readonly budget: ArgumentBudget;
  private done = false;

  constructor(private readonly context: DecoderContext) {
    this.budget = new ArgumentBudget(context.limits.maxArgumentBytes);
  }

  onEvent(event: SseEvent): StreamEvent[] {
    if (this.done) return [];
    const payload = parseJsonData(event);
    if (!isObject(payload)) throw new ProtocolError("Responses event is not a JSON object");
    const type = readString(payload, "type") ?? event.event;

    switch (type) {
      case "response.output_text.delta": {
        const text = readString(payload, "delta");
        return text ? [{ type: "text_delta", text }] : [];
      }
      case "response.reasoning_summary_text.delta":
      case "response.reasoning_text.delta": {
        const text = readString(payload, "delta");
        return text ? [{ type: "reasoning_delta", text }] : [];
      }
      case "response.output_item.added": {
        const item = readObject(payload, "item");
        return item ? this.startCall(item) : [];
      }
      case "response.function_call_arguments.delta":
      case "response.custom_tool_call_input.delta":
        return this.argumentDelta(payload);
      case "response.output_item.done": {
        const item = readObject(payload, "item");
        return item ? this.itemDone(item) : [];
      }
      case "response.completed": {
        this.done = true;
        const response = readObject(payload, "response");
        const usage = response ? readObject(response, "usage") : undefined;
        return [
          ...(usage ? [{ type: "usage_reported" as const, usage: responsesUsage(usage) }] : []),
          { type: "completed" },
        ];
      }
      case "response.failed": {
        const response = readObject(payload, "response");
        const error = response ? response.error : undefined;
        throw upstreamErrorFromPayload({ error: isObject(error) ? error : { message: "Response failed" } });
      }
      case "response.incomplete":
        throw incompleteError(readObject(payload, "response"));
      case "error":
        throw upstreamErrorFromPayload({ error: payload });
      default:
        // created, in_progress, content_part.* and *.done events carry nothing new
        return [];
    }
  }

  finish(): StreamEvent[] {
    if (this.done) return [];
    throw new ProtocolError("Responses stream closed before response.completed");
  }

  private startCall(item: Record<string, unknown>): StreamEvent[] {
    const itemType = readString(item, "type");
    if (!itemType || !CALL_ITEM_TYPES.has(itemType)) return [];
    const callId = readString(item, "call_id");
    const name = readString(item, "name");
    if (!callId || !name) throw new ProtocolError(`Output item ${itemType} is missing call_id or name`);
    const itemId = readString(item, "id") ?? callId;
    this.calls.set(itemId, { callId, streamedArguments: false });
    return [{ type: "function_call_start", callId, name }];
  }

  private argumentDelta(payload: Record<string, unknown>): StreamEvent[] {
    const itemId = readString(payload, "item_id");
    const fragment = readString(payload, "delta");
    const call = itemId ? this.calls.get(itemId) : undefined;
    if (!call) throw new ProtocolError(`Argument delta for unknown output item ${itemId ?? "(none)"}`);
    if (!fragment) return [];
    this.budget.add(call.callId, fragment);
    call.streamedArguments = true;
    return [{ type: "function_call_argument_delta", callId: call.callId, fragment }];
  }

  private itemDone(item: Record<string, unknown>): StreamEvent[] {
    const itemType = readString(item, "type");
    if (itemType === "reasoning") {
      const signature = readString(item, "encrypted_content");
      return signature ? [{ type: "reasoning_delta", text: "", thoughtSignature: signature }] : [];
    }
    if (!itemType || !CALL_ITEM_TYPES.has(itemType)) return [];

    const out: StreamEvent[] = [];
    const itemId = readString(item, "id") ?? readString(item, "call_id");
    let call = itemId ? this.calls.get(itemId) : undefined;
    if (!call) {
      // Item never announced through output_item.added
      out.push(...this.startCall(item));
      call = itemId ? this.calls.get(itemId) : undefined;
      if (!call) return out;
    }
    if (itemId) this.calls.delete(itemId);

    const full = readString(item, itemType === "custom_tool_call" ? "input" : "arguments");
    if (!call.streamedArguments && full) {
      this.budget.add(call.callId, full);
      out.push({ type: "function_call_argument_delta", callId: call.callId, fragment: full });
    }
    const signature = readExtraContentSignature(item, this.context.family.signatureVendor);
    out.push({
      type: "function_call_done",
      callId: call.callId,
      ...(signature ? { thoughtSignature: signature } : {}),
    });
    return out;
  }
}

export function createResponsesDecoder(context: DecoderContext): StreamDecoder {
  return new ResponsesStreamDecoder(context);
}

/** Non-streaming `response` object → the events its stream would have carried. */
export function decodeResponsesBody(body: unknown, context: DecoderContext): StreamEvent[] {
  if (!isObject(body)) throw new ProtocolError("Responses body is not a JSON object");
  if (isObject(body.error)) throw upstreamErrorFromPayload({ error: body.error });
  if (readString(body, "status") === "incomplete") throw incompleteError(body);

  const decoder = new ResponsesStreamDecoder(context);
  const out: StreamEvent[] = [];
  for (const item of readArray(body, "output")) {
    if (!isObject(item)) continue;
    if (readString(item, "type") === "message") {
      for (const part of readArray(item, "content")) {
        const text = isObject(part) && readString(part, "type") === "output_text" ? readString(part, "text") : undefined;
        if (text) out.push({ type: "text_delta", text });
      }
      continue;
    }
    out.push(...decoder.onEvent({ data: JSON.stringify({ type: "response.output_item.done", item }) }));
  }
  out.push(...decoder.onEvent({ data: JSON.stringify({ type: "response.completed", response: body }) }));
  return out;
}
