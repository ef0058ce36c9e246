import type { ContentPart, ConversationItem } from "../../../conversation/items";
import { collectFunctionCallNames } from "../../../conversation/items";
import { asFunctionTool, type ToolSpec } from "../../../tools/tool-spec";
import type { TurnRequest } from "../adapter";
import { replayReasoningSignature, resolveReplaySignatures } from "../shared/thought-signatures";
import { isObject } from "../shared/type-guards";
import { normalizeSchemaForGemini } from "./schema";
import type { GeminiContent, GeminiFunctionDeclaration, GeminiPart, GenerateContentRequest } from "./types";

function imagePart(imageUrl: string): GeminiPart | null {
  if (!imageUrl.startsWith("data:")) {
    return { fileData: { fileUri: imageUrl, mimeType: "image/jpeg" } };
  }
  const comma = imageUrl.indexOf(",");
  if (comma < 0) return null;
  const mimeType = imageUrl.slice("data:".length, comma).split(";")[0] || "image/png";
  return { inlineData: { mimeType, data: imageUrl.slice(comma + 1) } };
}

function contentParts(content: readonly ContentPart[]): GeminiPart[] {
  const parts: GeminiPart[] = [];
  for (const p of content) {
    if (p.type === "text") {
      if (p.text) parts.push({ text: p.text });
      continue;
    }
    const image = imagePart(p.imageUrl);
    if (image) parts.push(image);
  }
  return parts;
}

function parseArgs(args: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(args);
    return isObject(parsed) ? parsed : {};
  } catch {
    // Gemini only takes an object here
    return {};
  }
}

export function toFunctionDeclarations(tools: readonly ToolSpec[]): GeminiFunctionDeclaration[] {
  return tools.map((tool) => {
    const fn = asFunctionTool(tool);
    return { name: fn.name, description: fn.description, parameters: normalizeSchemaForGemini(fn.parameters) };
  });
}

/** Adjacent contents from the same side are sent as one content. */
function pushContent(contents: GeminiContent[], role: GeminiContent["role"], parts: GeminiPart[]): void {
  if (parts.length === 0) return;
  const last = contents[contents.length - 1];
  if (last && last.role === role) {
    last.parts.push(...parts);
    return;
  }
  contents.push({ role, parts: [...parts] });
}

export function itemsToGeminiContents(
  items: readonly ConversationItem[],
  signatures: ReadonlyMap<string, string>,
  reasoningSignature: (signature: string | undefined) => string | undefined
): GeminiContent[] {
  const names = collectFunctionCallNames(items);
  const contents: GeminiContent[] = [];
  for (const item of items) {
    switch (item.type) {
      case "message":
        pushContent(contents, item.role === "assistant" ? "model" : "user", contentParts(item.content));
        break;
      case "function_call": {
        const signature = signatures.get(item.callId);
        pushContent(contents, "model", [
          {
            functionCall: { name: item.name, args: parseArgs(item.arguments) },
            ...(signature ? { thoughtSignature: signature } : {}),
          },
        ]);
        break;
      }
      case "function_call_output":
        pushContent(contents, "user", [
          {
            functionResponse: {
              name: names.get(item.callId) ?? "unknown",
              response: item.success ? { output: item.output } : { error: item.output },
            },
          },
        ]);
        break;
      case "reasoning": {
        const signature = reasoningSignature(item.thoughtSignature);
        if (signature) pushContent(contents, "model", [{ text: item.content, thought: true, thoughtSignature: signature }]);
        break;
      }
    }
  }
  return contents;
}

export function buildGeminiRequest(request: TurnRequest): GenerateContentRequest {
  const { family } = request;
  const signatures = resolveReplaySignatures(request.items, family, request.signaturePolicy);
  const contents = itemsToGeminiContents(request.items, signatures, (s) => replayReasoningSignature(family, s));
  const declarations = toFunctionDeclarations(request.tools);
  return {
    contents,
    ...(request.instructions ? { systemInstruction: { parts: [{ text: request.instructions }] } } : {}),
    ...(declarations.length > 0 ? { tools: [{ functionDeclarations: declarations }] } : {}),
  };
}
