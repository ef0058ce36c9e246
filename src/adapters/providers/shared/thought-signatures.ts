import type { SignaturePolicy } from "../../../config/types";
import { isFunctionCall, type ConversationItem } from "../../../conversation/items";
import type { ModelFamily } from "../../../models/model-family";
import { MissingThoughtSignatureError } from "../../errors/client-errors";
import { logWarn } from "../../../utils/logging/helpers";

// Documented token that tells Gemini to skip signature validation for a call
export const SIGNATURE_BYPASS_TOKEN = "skip_thought_signature_validator";

function currentTurnStart(items: readonly ConversationItem[]): number {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item && item.type === "message" && item.role === "user") return i + 1;
  }
  return 0;
}

/**
 * Decides which signature each replayed function call carries.
 *
 * Families that take no signatures get none. Otherwise every stored
 * signature is echoed verbatim. For families that require them, the first
 * call of each model step in the current turn (the items after the last
 * user message, split at tool outputs) must have one; what happens when it
 * does not is up to `policy.onMissing`.
 */
export function resolveReplaySignatures(
  items: readonly ConversationItem[],
  family: ModelFamily,
  policy: SignaturePolicy
): Map<string, string> {
  const signatures = new Map<string, string>();
  if (family.thoughtSignatures === "none") return signatures;

  for (const item of items) {
    if (isFunctionCall(item) && item.thoughtSignature) {
      signatures.set(item.callId, item.thoughtSignature);
    }
  }
  if (family.thoughtSignatures !== "required") return signatures;

  let stepHasCall = false;
  for (let i = currentTurnStart(items); i < items.length; i++) {
    const item = items[i];
    if (!item) continue;
    if (item.type === "function_call_output") {
      stepHasCall = false;
      continue;
    }
    if (item.type !== "function_call") continue;
    if (stepHasCall) continue;
    stepHasCall = true;
    if (item.thoughtSignature) continue;

    switch (policy.onMissing) {
      case "error":
        throw new MissingThoughtSignatureError(item.callId, family.id);
      case "omit":
        logWarn("Replaying function call without a thought signature", {
          callId: item.callId,
          family: family.id,
        });
        break;
      case "bypass":
        signatures.set(item.callId, SIGNATURE_BYPASS_TOKEN);
        break;
    }
  }
  return signatures;
}

/** Reasoning signatures are echoed for any family that accepts signatures at all. */
export function replayReasoningSignature(family: ModelFamily, signature: string | undefined): string | undefined {
  return family.thoughtSignatures === "none" ? undefined : signature;
}
