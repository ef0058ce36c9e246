import type {
  EasyInputMessage,
  FunctionTool,
  ResponseFunctionToolCall,
  ResponseInputItem,
} from "openai/resources/responses/responses";
import type { SignatureExtension } from "../chat/types";

export type ResponsesFunctionCall = ResponseFunctionToolCall & {
  extra_content?: SignatureExtension;
};

// Grammar tools and their calls, plus reasoning replay, are typed locally
// so the body does not depend on which SDK release ships them.
export type ResponsesCustomToolCall = {
  type: "custom_tool_call";
  call_id: string;
  name: string;
  input: string;
  extra_content?: SignatureExtension;
};

export type ResponsesCustomToolCallOutput = {
  type: "custom_tool_call_output";
  call_id: string;
  output: string;
};

export type ResponsesReasoningInput = {
  type: "reasoning";
  summary: Array<{ type: "summary_text"; text: string }>;
  encrypted_content: string;
};

export type ResponsesInputItem =
  | EasyInputMessage
  | ResponsesFunctionCall
  | ResponseInputItem.FunctionCallOutput
  | ResponsesCustomToolCall
  | ResponsesCustomToolCallOutput
  | ResponsesReasoningInput;

export type ResponsesCustomTool = {
  type: "custom";
  name: string;
  description: string;
  format: { type: "grammar"; syntax: "lark"; definition: string };
};

export type ResponsesTool = FunctionTool | ResponsesCustomTool;

export type ResponsesRequestBody = {
  model: string;
  instructions: string;
  input: ResponsesInputItem[];
  tools: ResponsesTool[];
  tool_choice: "auto";
  parallel_tool_calls: boolean;
  store: false;
  stream: boolean;
  include?: string[];
};
