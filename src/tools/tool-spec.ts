export type JsonSchema = Record<string, unknown>;

export type FunctionToolSpec = {
  type: "function";
  name: string;
  description: string;
  parameters: JsonSchema;
  strict?: boolean;
};

/** A tool whose input is free text constrained by a grammar rather than JSON. */
export type FreeformToolSpec = {
  type: "freeform";
  name: string;
  description: string;
  format: { type: "grammar"; syntax: "lark"; definition: string };
};

export type ToolSpec = FunctionToolSpec | FreeformToolSpec;

/**
 * Wire APIs without grammar tools get the freeform tool as a function with
 * a single string argument named `input`.
 */
export function asFunctionTool(tool: ToolSpec): FunctionToolSpec {
  if (tool.type === "function") return tool;
  return {
    type: "function",
    name: tool.name,
    description: tool.description,
    parameters: {
      type: "object",
      properties: {
        input: { type: "string", description: "The entire contents of the tool input." },
      },
      required: ["input"],
      additionalProperties: false,
    },
  };
}

