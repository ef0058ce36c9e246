import type { ModelFamily } from "../models/model-family";
import type { FreeformToolSpec, FunctionToolSpec, ToolSpec } from "./tool-spec";

const APPLY_PATCH_GRAMMAR = `start: begin_patch hunk+ end_patch
begin_patch: "*** Begin Patch" LF
end_patch: "*** End Patch" LF?

hunk: add_hunk | delete_hunk | update_hunk
add_hunk: "*** Add File: " filename LF add_line+
delete_hunk: "*** Delete File: " filename LF
update_hunk: "*** Update File: " filename LF change_move? change?

filename: /(.+)/
add_line: "+" /(.*)/ LF -> line

change_move: "*** Move to: " filename LF
change: (change_context | change_line)+ eof_line?
change_context: ("@@" | "@@ " /(.+)/) LF
change_line: ("+" | "-" | " ") /(.*)/ LF
eof_line: "*** End of File" LF

%import common.LF
`;

const APPLY_PATCH_DESCRIPTION =
  "Edit files by applying a patch in the *** Begin Patch / *** End Patch format.";

const SHELL_COMMAND_TOOL: FunctionToolSpec = {
  type: "function",
  name: "shell_command",
  description: "Runs a shell command given as one string and returns its output.",
  parameters: {
    type: "object",
    properties: {
      command: { type: "string", description: "The shell script to execute." },
      workdir: { type: "string", description: "Working directory for the command." },
      timeout_ms: { type: "number", description: "Timeout in milliseconds." },
    },
    required: ["command"],
    additionalProperties: false,
  },
};

const EXEC_TOOL: FunctionToolSpec = {
  type: "function",
  name: "shell",
  description: "Runs a program with arguments (argv form) and returns its output.",
  parameters: {
    type: "object",
    properties: {
      command: { type: "array", items: { type: "string" }, description: "Program and arguments." },
      workdir: { type: "string", description: "Working directory for the command." },
      timeout_ms: { type: "number", description: "Timeout in milliseconds." },
    },
    required: ["command"],
    additionalProperties: false,
  },
};

const APPLY_PATCH_FREEFORM: FreeformToolSpec = {
  type: "freeform",
  name: "apply_patch",
  description: APPLY_PATCH_DESCRIPTION,
  format: { type: "grammar", syntax: "lark", definition: APPLY_PATCH_GRAMMAR },
};

const APPLY_PATCH_STRUCTURED: FunctionToolSpec = {
  type: "function",
  name: "apply_patch",
  description: APPLY_PATCH_DESCRIPTION,
  parameters: {
    type: "object",
    properties: {
      input: { type: "string", description: "The entire patch." },
    },
    required: ["input"],
    additionalProperties: false,
  },
};

/**
 * The tool list depends on the model family only. Whatever wire API carries
 * the request, the same family sees the same tools. Caller tools come after
 * the family's; a caller tool reusing a family tool name is dropped.
 */
export function toolsForFamily(family: ModelFamily, extra: readonly ToolSpec[] = []): ToolSpec[] {
  const tools: ToolSpec[] = [
    family.shellType === "shell_command" ? SHELL_COMMAND_TOOL : EXEC_TOOL,
    family.applyPatchToolType === "freeform" ? APPLY_PATCH_FREEFORM : APPLY_PATCH_STRUCTURED,
  ];
  const names = new Set(tools.map((t) => t.name));
  for (const tool of extra) {
    if (names.has(tool.name)) continue;
    names.add(tool.name);
    tools.push(tool);
  }
  return tools;
}
