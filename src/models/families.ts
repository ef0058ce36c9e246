import type { ModelFamilyDefinition } from "./model-family";

const AGENT_INSTRUCTIONS = [
  "You are a coding agent working in the user's repository.",
  "Use the shell tool to inspect files and run commands, and the apply_patch tool to edit files.",
  "Keep changes focused on the request and report what you changed.",
].join("\n");

const GEMINI_INSTRUCTIONS = [
  AGENT_INSTRUCTIONS,
  "Call tools directly instead of describing the call in text.",
].join("\n");

// Order matters: the first matching family wins.
export const BUILT_IN_FAMILIES: readonly ModelFamilyDefinition[] = [
  {
    id: "gpt-5-codex",
    prefixes: ["gpt-5-codex", "gpt-5.1-codex", "codex-"],
    shellType: "shell_command",
    applyPatchToolType: "freeform",
    supportsParallelToolCalls: true,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
  {
    id: "gpt-5",
    prefixes: ["gpt-5"],
    shellType: "exec",
    applyPatchToolType: "freeform",
    supportsParallelToolCalls: false,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
  {
    id: "o-series",
    pattern: "^o[34](-mini)?(-|$)",
    shellType: "exec",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: false,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
  {
    id: "gpt-4.1",
    prefixes: ["gpt-4.1"],
    shellType: "exec",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: true,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
  {
    id: "gpt-4o",
    prefixes: ["gpt-4o"],
    shellType: "exec",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: true,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
  {
    id: "gemini-3",
    prefixes: ["gemini-3"],
    shellType: "shell_command",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: true,
    thoughtSignatures: "required",
    signatureVendor: "google",
    baseInstructions: GEMINI_INSTRUCTIONS,
  },
  {
    id: "gemini-2.5",
    prefixes: ["gemini-2.5"],
    shellType: "shell_command",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: true,
    thoughtSignatures: "preserve",
    signatureVendor: "google",
    baseInstructions: GEMINI_INSTRUCTIONS,
  },
  {
    id: "gemini",
    prefixes: ["gemini"],
    shellType: "shell_command",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: false,
    thoughtSignatures: "preserve",
    signatureVendor: "google",
    baseInstructions: GEMINI_INSTRUCTIONS,
  },
  {
    id: "claude",
    prefixes: ["claude"],
    shellType: "shell_command",
    applyPatchToolType: "structured",
    supportsParallelToolCalls: true,
    thoughtSignatures: "none",
    baseInstructions: AGENT_INSTRUCTIONS,
  },
];
