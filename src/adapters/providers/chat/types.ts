import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";

export type SignatureExtension = Record<string, { thought_signature: string }>;

// Gateways relaying Gemini accept the signature beside the call
export type ChatToolCallParam = ChatCompletionMessageToolCall & {
  extra_content?: SignatureExtension;
};

export type ChatRequestBody = {
  model: string;
  messages: ChatCompletionMessageParam[];
  tools?: ChatCompletionTool[];
  tool_choice?: "auto";
  parallel_tool_calls?: boolean;
  stream: boolean;
  stream_options?: { include_usage: boolean };
};
