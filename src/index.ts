export * from "./conversation/items";
export { ConversationHistory } from "./conversation/history";
export { TurnAccumulator, type TurnStatus } from "./conversation/accumulator";

export type { ModelFamily, ModelFamilyDefinition, ShellType, ApplyPatchToolType, SignatureRequirement } from "./models/model-family";
export { normalizeModelName } from "./models/model-family";
export { BUILT_IN_FAMILIES } from "./models/families";
export { ModelFamilyRegistry } from "./models/registry";

export type { ToolSpec, FunctionToolSpec, FreeformToolSpec, JsonSchema } from "./tools/tool-spec";
export { toolsForFamily } from "./tools/family-tools";

export * from "./config";

export type { StreamEvent, TokenUsage, TurnRequest, WireAdapter, StreamDecoder } from "./adapters/providers/adapter";
export { WIRE_ADAPTERS, getWireAdapter } from "./adapters/providers/registry";
export { SseParser, type SseEvent } from "./adapters/providers/shared/sse";
export { SIGNATURE_BYPASS_TOKEN } from "./adapters/providers/shared/thought-signatures";
export * from "./adapters/errors/client-errors";
export { toClientError } from "./adapters/errors/error-converter";

export { ModelClient, createModelClientFromConfig, type Prompt, type ModelClientOptions } from "./client/model-client";
export { TurnStream } from "./client/turn-stream";

export { configureLogger, getLogger, type LoggerOptions } from "./utils/logging/enhanced-logger";
