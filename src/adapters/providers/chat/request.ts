import type {
  ChatCompletionAssistantMessageParam,
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { MessageItem } from "../../../conversation/items";
import { messageText } from "../../../conversation/items";
import { asFunctionTool, type ToolSpec } from "../../../tools/tool-spec";
import type { TurnRequest } from "../adapter";
import { resolveReplaySignatures } from "../shared/thought-signatures";
import { extraContentFor } from "../shared/type-guards";
import type { ChatRequestBody, ChatToolCallParam } from "./types";

type AssistantDraft = ChatCompletionAssistantMessageParam & { tool_calls?: ChatToolCallParam[] };

function userContent(item: MessageItem): string | ChatCompletionContentPart[] {
  if (!item.content.some((p) => p.type === "image")) return messageText(item);
  return item.content.map((p): ChatCompletionContentPart =>
    p.type === "text"
      ? { type: "text", text: p.text }
      : { type: "image_url", image_url: { url: p.imageUrl } }
  );
}

export function toChatTools(tools: readonly ToolSpec[]): ChatCompletionTool[] {
  return tools.map((tool) => {
    const fn = asFunctionTool(tool);
    return {
      type: "function",
      function: {
        name: fn.name,
        description: fn.description,
        parameters: fn.parameters,
        ...(fn.strict !== undefined ? { strict: fn.strict } : {}),
      },
    };
  });
}

/**
 * Chat Completions body. Consecutive function calls share one assistant
 * message, which is also the assistant text message right before them when
 * there is one. Reasoning items have no Chat Completions form and are not sent.
 */
export function buildChatRequest(request: TurnRequest): ChatRequestBody {
  const { family, provider } = request;
  const signatures = resolveReplaySignatures(request.items, family, request.signaturePolicy);
  const messages: ChatCompletionMessageParam[] = [];
  if (request.instructions) {
    messages.push({ role: "system", content: request.instructions });
  }

  // The assistant message that function calls may still be attached to
  let openAssistant: AssistantDraft | null = null;

  for (const item of request.items) {
    switch (item.type) {
      case "message": {
        if (item.role === "assistant") {
          openAssistant = { role: "assistant", content: messageText(item) };
          messages.push(openAssistant);
          continue;
        }
        openAssistant = null;
        if (item.role === "user") {
          messages.push({ role: "user", content: userContent(item) });
        } else {
          messages.push({ role: "system", content: messageText(item) });
        }
        break;
      }
      case "function_call": {
        const call: ChatToolCallParam = {
          id: item.callId,
          type: "function",
          function: { name: item.name, arguments: item.arguments },
          ...extraContentFor(family.signatureVendor, signatures.get(item.callId)),
        };
        if (openAssistant) {
          openAssistant.tool_calls = [...(openAssistant.tool_calls ?? []), call];
        } else {
          openAssistant = { role: "assistant", content: null, tool_calls: [call] };
          messages.push(openAssistant);
        }
        break;
      }
      case "function_call_output":
        openAssistant = null;
        messages.push({ role: "tool", tool_call_id: item.callId, content: item.output });
        break;
      case "reasoning":
        break;
    }
  }

  const tools = toChatTools(request.tools);
  return {
    model: request.model,
    messages,
    ...(tools.length > 0
      ? { tools, tool_choice: "auto" as const, parallel_tool_calls: family.supportsParallelToolCalls }
      : {}),
    stream: provider.streaming,
    ...(provider.streaming ? { stream_options: { include_usage: true } } : {}),
  };
}
