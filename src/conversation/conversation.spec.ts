import { describe, it, expect } from "vitest";
import type { StreamEvent } from "../adapters/providers/adapter";
import { ContentBlockedError } from "../adapters/errors/client-errors";
import { TurnAccumulator } from "./accumulator";
import { ConversationHistory } from "./history";
import { assistantMessage, collectFunctionCallNames, messageText, userMessage, type ConversationItem } from "./items";

async function* fromArray(events: readonly StreamEvent[]): AsyncGenerator<StreamEvent, void, unknown> {
  for (const event of events) yield event;
}

describe("TurnAccumulator", () => {
  it("folds deltas into items in the order they started", async () => {
    const acc = await TurnAccumulator.collect(
      fromArray([
        { type: "reasoning_delta", text: "a" },
        { type: "reasoning_delta", text: "b", thoughtSignature: "s" },
        { type: "text_delta", text: "Hel" },
        { type: "text_delta", text: "lo" },
        { type: "function_call_start", callId: "c1", name: "shell" },
        { type: "function_call_argument_delta", callId: "c1", fragment: "{\"a\"" },
        { type: "function_call_argument_delta", callId: "c1", fragment: ":1}" },
        { type: "function_call_done", callId: "c1", thoughtSignature: "x" },
        { type: "function_call_start", callId: "c2", name: "shell" },
        {
          type: "usage_reported",
          usage: { inputTokens: 1, cachedInputTokens: 0, outputTokens: 2, reasoningOutputTokens: 0, totalTokens: 3 },
        },
        { type: "completed" },
      ])
    );

    expect(acc.status).toBe("completed");
    expect(acc.usage?.totalTokens).toBe(3);
    expect(acc.items()).toEqual([
      { type: "reasoning", content: "ab", thoughtSignature: "s" },
      assistantMessage("Hello"),
      { type: "function_call", callId: "c1", name: "shell", arguments: "{\"a\":1}", thoughtSignature: "x" },
    ]);
  });

  it("keeps text on either side of a call separate", () => {
    const acc = new TurnAccumulator();
    const events: StreamEvent[] = [
      { type: "text_delta", text: "before" },
      { type: "function_call_start", callId: "c1", name: "shell" },
      { type: "function_call_done", callId: "c1" },
      { type: "text_delta", text: "after" },
    ];
    events.forEach((e) => acc.apply(e));
    expect(acc.items()).toEqual([
      assistantMessage("before"),
      { type: "function_call", callId: "c1", name: "shell", arguments: "" },
      assistantMessage("after"),
    ]);
  });

  it("records the failure and ignores events after a terminal one", () => {
    const acc = new TurnAccumulator();
    const error = new ContentBlockedError("SAFETY");
    acc.apply({ type: "text_delta", text: "x" });
    acc.apply({ type: "failed", error });
    acc.apply({ type: "text_delta", text: "y" });
    expect(acc.status).toBe("failed");
    expect(acc.error).toBe(error);
    expect(acc.items()).toEqual([assistantMessage("x")]);
  });

  it("counts a stream without a terminal event as cancelled", async () => {
    const acc = await TurnAccumulator.collect(fromArray([{ type: "text_delta", text: "partial" }]));
    expect(acc.status).toBe("cancelled");
  });
});

describe("ConversationHistory", () => {
  it("stores frozen copies and hands out frozen snapshots", () => {
    const item = userMessage("hi");
    const history = new ConversationHistory([item]);
    item.content.push({ type: "text", text: " there" });

    const snapshot = history.snapshot();
    expect(history.length).toBe(1);
    expect(snapshot[0] && snapshot[0].type === "message" ? messageText(snapshot[0]) : undefined).toBe("hi");
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it("does not change earlier snapshots on append", () => {
    const history = new ConversationHistory();
    const before = history.snapshot();
    history.append(userMessage("one"), assistantMessage("two"));
    expect(before).toHaveLength(0);
    expect(history.snapshot()).toHaveLength(2);
  });
});

describe("collectFunctionCallNames", () => {
  it("maps call ids to tool names", () => {
    const items: ConversationItem[] = [
      userMessage("go"),
      { type: "function_call", callId: "c1", name: "shell", arguments: "{}" },
      { type: "function_call", callId: "c2", name: "apply_patch", arguments: "" },
    ];
    expect([...collectFunctionCallNames(items)]).toEqual([
      ["c1", "shell"],
      ["c2", "apply_patch"],
    ]);
  });
});
