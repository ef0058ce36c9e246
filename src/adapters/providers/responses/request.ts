import type { ResponseInputMessageContentList } from "openai/resources/responses/responses";
import type { MessageItem } from "../../../conversation/items";
import { messageText } from "../../../conversation/items";
import type { ToolSpec } from "../../../tools/tool-spec";
import type { TurnRequest } from "../adapter";
import { replayReasoningSignature, resolveReplaySignatures } from "../shared/thought-signatures";
import { extraContentFor } from "../shared/type-guards";
import type { ResponsesInputItem, ResponsesRequestBody, ResponsesTool } from "./types";

function messageContent(item: MessageItem): string | ResponseInputMessageContentList {
  if (item.role !== "user" || !item.content.some((p) => p.type === "image")) return messageText(item);
  return item.content.map((p) =>
    p.type === "text"
      ? { type: "input_text" as const, text: p.text }
      : { type: "input_image" as const, image_url: p.imageUrl, detail: "auto" as const }
  );
}

export function toResponsesTools(tools: readonly ToolSpec[]): ResponsesTool[] {
  return tools.map((tool): ResponsesTool =>
    tool.type === "freeform"
      ? { type: "custom", name: tool.name, description: tool.description, format: tool.format }
      : {
          type: "function",
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
          strict: tool.strict ?? false,
        }
  );
}

/**
 * Responses API body. Calls to grammar tools travel as custom tool calls;
 * reasoning is replayed only when it carries a signature the family accepts.
 */
export function buildResponsesRequest(request: TurnRequest): ResponsesRequestBody {
  const { family } = request;
  const signatures = resolveReplaySignatures(request.items, family, request.signaturePolicy);
  const freeformNames = new Set(request.tools.filter((t) => t.type === "freeform").map((t) => t.name));
  const customCallIds = new Set<string>();
  const input: ResponsesInputItem[] = [];

  for (const item of request.items) {
    switch (item.type) {
      case "message":
        input.push({ type: "message", role: item.role, content: messageContent(item) });
        break;
      case "function_call": {
        const extra = extraContentFor(family.signatureVendor, signatures.get(item.callId));
        if (freeformNames.has(item.name)) {
          customCallIds.add(item.callId);
          input.push({ type: "custom_tool_call", call_id: item.callId, name: item.name, input: item.arguments, ...extra });
        } else {
          input.push({ type: "function_call", call_id: item.callId, name: item.name, arguments: item.arguments, ...extra });
        }
        break;
      }
      case "function_call_output":
        input.push(
          customCallIds.has(item.callId)
            ? { type: "custom_tool_call_output", call_id: item.callId, output: item.output }
            : { type: "function_call_output", call_id: item.callId, output: item.output }
        );
        break;
      case "reasoning": {
        const signature = replayReasoningSignature(family, item.thoughtSignature);
        if (!signature) break;
        input.push({
          type: "reasoning",
          summary: item.content ? [{ type: "summary_text", text: item.content }] : [],
          encrypted_content: signature,
        });
        break;
      }
    }
  }

  return {
    model: request.model,
    instructions: request.instructions,
    input,
    tools: toResponsesTools(request.tools),
    tool_choice: "auto",
    parallel_tool_calls: family.supportsParallelToolCalls,
    store: false,
    stream: request.provider.streaming,
    ...(family.thoughtSignatures !== "none" ? { include: ["reasoning.encrypted_content"] } : {}),
  };
}
