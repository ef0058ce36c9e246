import type { ClientError } from "../adapters/errors/client-errors";
import type { StreamEvent, TokenUsage } from "../adapters/providers/adapter";
import type { ConversationItem } from "./items";
import { assistantMessage } from "./items";

type TextSlot = { kind: "text"; text: string };
type ReasoningSlot = { kind: "reasoning"; text: string; thoughtSignature?: string };
type CallSlot = { kind: "call"; callId: string; name: string; arguments: string; done: boolean; thoughtSignature?: string };
type Slot = TextSlot | ReasoningSlot | CallSlot;

export type TurnStatus = "streaming" | "completed" | "failed" | "cancelled";

/**
 * Folds a turn's events into conversation items, in the order they started.
 * Calls that never reached `function_call_done` are dropped, whatever way
 * the turn ended.
 */
export class TurnAccumulator {
  private readonly slots: Slot[] = [];
  private readonly calls = new Map<string, CallSlot>();
  private _status: TurnStatus = "streaming";
  private _usage: TokenUsage | undefined;
  private _error: ClientError | undefined;

  get status(): TurnStatus {
    return this._status;
  }

  get usage(): TokenUsage | undefined {
    return this._usage;
  }

  get error(): ClientError | undefined {
    return this._error;
  }

  apply(event: StreamEvent): void {
    if (this._status !== "streaming") return;
    switch (event.type) {
      case "text_delta": {
        const last = this.slots[this.slots.length - 1];
        if (last && last.kind === "text") last.text += event.text;
        else this.slots.push({ kind: "text", text: event.text });
        break;
      }
      case "reasoning_delta": {
        const last = this.slots[this.slots.length - 1];
        const slot: ReasoningSlot = last && last.kind === "reasoning" ? last : { kind: "reasoning", text: "" };
        if (slot !== last) this.slots.push(slot);
        slot.text += event.text;
        if (event.thoughtSignature) slot.thoughtSignature = event.thoughtSignature;
        break;
      }
      case "function_call_start": {
        const slot: CallSlot = {
          kind: "call",
          callId: event.callId,
          name: event.name,
          arguments: "",
          done: false,
        };
        this.calls.set(event.callId, slot);
        this.slots.push(slot);
        break;
      }
      case "function_call_argument_delta": {
        const slot = this.calls.get(event.callId);
        if (slot && !slot.done) slot.arguments += event.fragment;
        break;
      }
      case "function_call_done": {
        const slot = this.calls.get(event.callId);
        if (!slot) break;
        slot.done = true;
        if (event.thoughtSignature) slot.thoughtSignature = event.thoughtSignature;
        break;
      }
      case "usage_reported":
        this._usage = event.usage;
        break;
      case "completed":
        this._status = "completed";
        break;
      case "failed":
        this._status = "failed";
        this._error = event.error;
        break;
    }
  }

  markCancelled(): void {
    if (this._status === "streaming") this._status = "cancelled";
  }

  items(): ConversationItem[] {
    const items: ConversationItem[] = [];
    for (const slot of this.slots) {
      switch (slot.kind) {
        case "text":
          if (slot.text) items.push(assistantMessage(slot.text));
          break;
        case "reasoning":
          if (slot.text || slot.thoughtSignature) {
            items.push({
              type: "reasoning",
              content: slot.text,
              ...(slot.thoughtSignature ? { thoughtSignature: slot.thoughtSignature } : {}),
            });
          }
          break;
        case "call":
          if (!slot.done) break;
          items.push({
            type: "function_call",
            callId: slot.callId,
            name: slot.name,
            arguments: slot.arguments,
            ...(slot.thoughtSignature ? { thoughtSignature: slot.thoughtSignature } : {}),
          });
          break;
      }
    }
    return items;
  }

  /** Consumes a whole stream. A stream that ends with no terminal event counts as cancelled. */
  static async collect(events: AsyncIterable<StreamEvent>): Promise<TurnAccumulator> {
    const acc = new TurnAccumulator();
    for await (const event of events) acc.apply(event);
    acc.markCancelled();
    return acc;
  }
}
