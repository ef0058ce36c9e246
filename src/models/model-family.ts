export type ShellType = "shell_command" | "exec";

export type ApplyPatchToolType = "freeform" | "structured";

/**
 * How a family treats provider-issued thought signatures on replay:
 * - none: never sent back
 * - preserve: echoed whenever present
 * - required: echoed, and the first call of every step in the current turn must have one
 */
export type SignatureRequirement = "none" | "preserve" | "required";

export type ModelFamily = {
  id: string;
  shellType: ShellType;
  applyPatchToolType: ApplyPatchToolType;
  supportsParallelToolCalls: boolean;
  thoughtSignatures: SignatureRequirement;
  // Key under `extra_content` used by OpenAI-compatible gateways
  signatureVendor?: string;
  baseInstructions: string;
};

export type ModelFamilyDefinition = ModelFamily & {
  prefixes?: string[];
  // Regular expression source, for families whose names are not prefix-shaped
  pattern?: string;
};

/**
 * `models/gemini-3-pro` and gateway slugs like `google/gemini-3-pro` both
 * resolve as `gemini-3-pro`.
 */
export function normalizeModelName(model: string): string {
  let s = model.trim().toLowerCase();
  if (s.startsWith("models/")) s = s.slice("models/".length);
  const slash = s.lastIndexOf("/");
  if (slash >= 0) s = s.slice(slash + 1);
  return s;
}
