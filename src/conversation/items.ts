export type MessageRole = "user" | "assistant" | "system" | "developer";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; imageUrl: string };

export type MessageItem = {
  type: "message";
  role: MessageRole;
  content: ContentPart[];
};

/**
 * `thoughtSignature` is provider-issued state. Nothing in this package reads
 * it; it is only copied back onto the request that replays the call.
 */
export type FunctionCallItem = {
  type: "function_call";
  callId: string;
  name: string;
  arguments: string;
  thoughtSignature?: string;
};

export type FunctionCallOutputItem = {
  type: "function_call_output";
  callId: string;
  output: string;
  success: boolean;
};

export type ReasoningItem = {
  type: "reasoning";
  content: string;
  thoughtSignature?: string;
};

export type ConversationItem =
  | MessageItem
  | FunctionCallItem
  | FunctionCallOutputItem
  | ReasoningItem;

export function userMessage(text: string): MessageItem {
  return { type: "message", role: "user", content: [{ type: "text", text }] };
}

export function assistantMessage(text: string): MessageItem {
  return { type: "message", role: "assistant", content: [{ type: "text", text }] };
}

export function messageText(item: MessageItem): string {
  return item.content
    .map((p) => (p.type === "text" ? p.text : ""))
    .join("");
}

export function isFunctionCall(item: ConversationItem): item is FunctionCallItem {
  return item.type === "function_call";
}

/** Maps call ids to tool names; Gemini function responses are keyed by name. */
export function collectFunctionCallNames(items: readonly ConversationItem[]): Map<string, string> {
  const names = new Map<string, string>();
  for (const item of items) {
    if (isFunctionCall(item)) names.set(item.callId, item.name);
  }
  return names;
}
