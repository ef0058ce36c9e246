import { randomUUID } from "node:crypto";
import type { ConversationItem } from "../conversation/items";
import type { ToolSpec } from "../tools/tool-spec";
import { toolsForFamily } from "../tools/family-tools";
import { ModelFamilyRegistry } from "../models/registry";
import {
  DEFAULT_LIMITS,
  DEFAULT_SIGNATURE_POLICY,
  DEFAULT_STREAM_IDLE_TIMEOUT_MS,
  type ClientConfig,
  type ProviderConfig,
  type SignaturePolicy,
  type StreamLimits,
} from "../config/types";
import { authHeaders, resolveCredential, type Env } from "../config/credentials";
import { ConfigError, ProtocolError, TransportError } from "../adapters/errors/client-errors";
import { isAbortError, summarizeError, toClientError } from "../adapters/errors/error-converter";
import { upstreamErrorFromResponse } from "../adapters/errors/http-error";
import type { DecoderContext, StreamEvent } from "../adapters/providers/adapter";
import { getWireAdapter } from "../adapters/providers/registry";
import { decodeCompleteBody, decodeEventStream } from "../adapters/providers/shared/event-stream";
import { readChunks } from "../adapters/providers/shared/read-chunks";
import type { LogContext } from "../utils/logging/enhanced-logger";
import { logDebug, logError, logInfo } from "../utils/logging/helpers";
import { maskHeaders, maskUrl } from "../utils/security/mask-sensitive";
import { endpointUrl } from "./endpoint";
import { TurnStream } from "./turn-stream";

export type Prompt = {
  // Falls back to the client's default model
  model?: string;
  items: readonly ConversationItem[];
  // Caller tools, appended after the family's own
  tools?: readonly ToolSpec[];
  // Replaces the family's base instructions
  instructions?: string;
  signal?: AbortSignal;
};

export type ModelClientOptions = {
  provider: ProviderConfig;
  model?: string;
  registry?: ModelFamilyRegistry;
  limits?: StreamLimits;
  signaturePolicy?: SignaturePolicy;
  env?: Env;
  fetchImpl?: typeof fetch;
};

/** Forwards the caller's abort to the turn; the returned function detaches it. */
function linkSignal(external: AbortSignal | undefined, controller: AbortController): () => void {
  if (!external) return () => undefined;
  if (external.aborted) {
    controller.abort();
    return () => undefined;
  }
  const onAbort = () => controller.abort();
  external.addEventListener("abort", onAbort, { once: true });
  return () => external.removeEventListener("abort", onAbort);
}

async function readErrorBody(res: Response, context: LogContext): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    logDebug("Could not read error response body", err, context);
    return "";
  }
}

async function* logTurn(
  events: AsyncIterable<StreamEvent>,
  context: LogContext,
  startedAt: number
): AsyncGenerator<StreamEvent, void, unknown> {
  for await (const event of events) {
    if (event.type === "completed") {
      logInfo("Turn completed", { durationMs: Date.now() - startedAt }, context);
    } else if (event.type === "failed") {
      logError("Turn failed", summarizeError(event.error), context);
    } else if (event.type === "usage_reported") {
      logDebug("Usage reported", event.usage, context);
    }
    yield event;
  }
}

/**
 * Sends one turn to one provider and hands back its normalized events.
 * Nothing here retries; failures carry a `retryable` hint for the caller.
 */
export class ModelClient {
  readonly provider: ProviderConfig;
  private readonly defaultModel: string | undefined;
  private readonly registry: ModelFamilyRegistry;
  private readonly limits: StreamLimits;
  private readonly signaturePolicy: SignaturePolicy;
  private readonly env: Env;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ModelClientOptions) {
    this.provider = options.provider;
    this.defaultModel = options.model;
    this.registry = options.registry ?? new ModelFamilyRegistry();
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.signaturePolicy = options.signaturePolicy ?? DEFAULT_SIGNATURE_POLICY;
    this.env = options.env ?? process.env;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Resolves family and credential, builds the wire request and opens the
   * connection. Rejects with ConfigError, AuthError, UpstreamError or
   * TransportError before any event exists; later failures arrive as a
   * `failed` event.
   */
  async stream(prompt: Prompt): Promise<TurnStream> {
    const model = prompt.model ?? this.defaultModel;
    if (!model) throw new ConfigError("No model given and the client has no default model");

    const provider = this.provider;
    const family = this.registry.resolve(model);
    const credential = resolveCredential(provider, this.env);
    const adapter = getWireAdapter(provider.wireApi);
    const context: LogContext = {
      requestId: randomUUID(),
      provider: provider.name,
      model,
      wireApi: provider.wireApi,
    };

    const body = adapter.buildRequest({
      model,
      instructions: prompt.instructions ?? family.baseInstructions,
      items: prompt.items,
      tools: toolsForFamily(family, prompt.tools ?? []),
      family,
      provider,
      signaturePolicy: this.signaturePolicy,
    });
    const url = endpointUrl(adapter, provider, model);
    const headers: Record<string, string> = {
      "content-type": "application/json",
      accept: provider.streaming ? "text/event-stream" : "application/json",
      ...(provider.headers ?? {}),
      ...authHeaders(provider, credential),
    };

    const controller = new AbortController();
    const unlinkSignal = linkSignal(prompt.signal, controller);
    logInfo("Starting turn", { family: family.id, items: prompt.items.length }, context);
    logDebug("Request", { url: maskUrl(url), headers: maskHeaders(headers) }, context);

    const startedAt = Date.now();
    const fetchImpl = this.fetchImpl;
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      const error = isAbortError(err)
        ? new TransportError("Request aborted before the provider answered", { cause: err })
        : toClientError(err);
      unlinkSignal();
      logError("Request failed", summarizeError(error), context);
      throw error;
    }

    if (!res.ok) {
      const error = upstreamErrorFromResponse(res, await readErrorBody(res, context));
      unlinkSignal();
      logError("Provider rejected request", summarizeError(error), context);
      throw error;
    }
    const responseBody = res.body;
    if (!responseBody) {
      const error = new ProtocolError(`Provider answered ${res.status} with no body`);
      unlinkSignal();
      logError("Provider rejected request", summarizeError(error), context);
      throw error;
    }

    const decoderContext: DecoderContext = { family, limits: this.limits };
    const idleTimeoutMs = provider.streamIdleTimeoutMs ?? DEFAULT_STREAM_IDLE_TIMEOUT_MS;
    const limits = this.limits;
    return new TurnStream((signal) => {
      const chunks = readChunks(responseBody, { signal, idleTimeoutMs });
      const events = provider.streaming
        ? decodeEventStream(chunks, adapter.createDecoder(decoderContext), { limits, signal })
        : decodeCompleteBody(chunks, (json) => adapter.decodeComplete(json, decoderContext), { limits, signal });
      return logTurn(events, context, startedAt);
    }, { controller, onRelease: unlinkSignal });
  }
}

export function createModelClientFromConfig(
  config: ClientConfig,
  options: { providerKey?: string; env?: Env; fetchImpl?: typeof fetch } = {}
): ModelClient {
  const key = options.providerKey ?? config.modelProvider;
  const provider = config.providers[key];
  if (!provider) {
    const known = Object.keys(config.providers).join(", ");
    throw new ConfigError(`Unknown model provider "${key}"; configured providers: ${known}`);
  }
  return new ModelClient({
    provider,
    model: config.model,
    registry: new ModelFamilyRegistry(config.modelFamilies),
    limits: config.limits,
    signaturePolicy: config.thoughtSignatures,
    env: options.env,
    fetchImpl: options.fetchImpl,
  });
}
