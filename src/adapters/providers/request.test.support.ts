import { DEFAULT_SIGNATURE_POLICY, type ProviderConfig } from "../../config/types";
import { BUILT_IN_PROVIDERS } from "../../config/providers";
import type { ConversationItem } from "../../conversation/items";
import { ModelFamilyRegistry } from "../../models/registry";
import { toolsForFamily } from "../../tools/family-tools";
import type { TurnRequest } from "./adapter";

export function builtInProvider(key: string): ProviderConfig {
  const provider = BUILT_IN_PROVIDERS[key];
  if (!provider) throw new Error(`no built-in provider ${key}`);
  return provider;
}

export function turnRequest(
  model: string,
  providerKey: string,
  items: ConversationItem[],
  overrides: Partial<TurnRequest> = {}
): TurnRequest {
  const family = new ModelFamilyRegistry().resolve(model);
  return {
    model,
    instructions: "Be brief.",
    items,
    tools: toolsForFamily(family),
    family,
    provider: builtInProvider(providerKey),
    signaturePolicy: DEFAULT_SIGNATURE_POLICY,
    ...overrides,
  };
}

export function call(callId: string, name: string, args: object, thoughtSignature?: string): ConversationItem {
  return {
    type: "function_call",
    callId,
    name,
    arguments: JSON.stringify(args),
    ...(thoughtSignature ? { thoughtSignature } : {}),
  };
}

export function output(callId: string, text: string, success = true): ConversationItem {
  return { type: "function_call_output", callId, output: text, success };
}
