import { getEventListeners } from "node:events";
import { describe, it, expect } from "vitest";
import {
  AuthError,
  ConfigError,
  ContextWindowExceededError,
  MissingThoughtSignatureError,
  TransportError,
  UpstreamError,
} from "../src/adapters/errors/client-errors";
import type { StreamEvent } from "../src/adapters/providers/adapter";
import {
  failureOf,
  fakeFetch,
  openStream,
  sseBody,
  sseResponse,
  type RecordedRequest,
} from "../src/adapters/providers/shared/stream.test.support";
import { createModelClientFromConfig, ModelClient } from "../src/client/model-client";
import { parseConfig } from "../src/config/loader";
import { BUILT_IN_PROVIDERS } from "../src/config/providers";
import { TurnAccumulator } from "../src/conversation/accumulator";
import { ConversationHistory } from "../src/conversation/history";
import { isFunctionCall, userMessage, type ConversationItem } from "../src/conversation/items";
import { ModelFamilyRegistry } from "../src/models/registry";
import { toolsForFamily } from "../src/tools/family-tools";

const ENV = { OPENAI_API_KEY: "test-secret", GEMINI_API_KEY: "test-secret", OPENROUTER_API_KEY: "test-secret" };

function chatChunk(delta: Record<string, unknown>, finishReason: string | null = null) {
  return { choices: [{ index: 0, delta, finish_reason: finishReason }] };
}

function geminiChunk(parts: unknown[], finishReason?: string) {
  return { candidates: [{ content: { role: "model", parts }, ...(finishReason ? { finishReason } : {}) }] };
}

function callIdsOf(items: readonly ConversationItem[]): string[] {
  return items.filter(isFunctionCall).map((item) => item.callId);
}

/** Answers each request with the next response in line. */
function queued(...responses: Array<() => Response>): (request: RecordedRequest) => Response {
  return () => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected request");
    return next();
  };
}

describe("ModelClient over Chat Completions", () => {
  it("sends the wire request and streams normalized events", async () => {
    const { fetchImpl, requests } = fakeFetch(
      queued(() =>
        sseResponse(sseBody([chatChunk({ content: "Hel" }), chatChunk({ content: "lo" }, "stop"), "[DONE]"]), [7])
      )
    );
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")] })).collect();

    expect(events).toEqual([
      { type: "text_delta", text: "Hel" },
      { type: "text_delta", text: "lo" },
      { type: "completed" },
    ]);
    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request?.url).toBe("https://api.openai.com/v1/chat/completions");
    expect(request?.method).toBe("POST");
    expect(request?.headers).toMatchObject({
      authorization: "Bearer test-secret",
      accept: "text/event-stream",
      "content-type": "application/json",
    });
    expect(request?.body).toMatchObject({
      model: "gpt-4o",
      stream: true,
      messages: [
        { role: "system", content: new ModelFamilyRegistry().resolve("gpt-4o").baseInstructions },
        { role: "user", content: "hi" },
      ],
    });
  });

  it("decodes a non-streaming provider's JSON body", async () => {
    const { fetchImpl, requests } = fakeFetch(
      queued(
        () =>
          new Response(
            JSON.stringify({
              choices: [{ index: 0, message: { role: "assistant", content: "Hi" }, finish_reason: "stop" }],
            }),
            { status: 200, headers: { "content-type": "application/json" } }
          )
      )
    );
    const provider = { ...BUILT_IN_PROVIDERS["openai-chat"], streaming: false };
    const client = new ModelClient({ provider, model: "gpt-4o", env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")], instructions: "Be brief." })).collect();

    expect(events).toEqual([{ type: "text_delta", text: "Hi" }, { type: "completed" }]);
    expect(requests[0]?.headers.accept).toBe("application/json");
    expect(requests[0]?.body).toMatchObject({ stream: false, messages: [{ role: "system", content: "Be brief." }, {}] });
  });

  it("reports a length cut-off as a failed event", async () => {
    const { fetchImpl } = fakeFetch(queued(() => sseResponse(sseBody([chatChunk({ content: "tru" }, "length")]))));
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")] })).collect();

    expect(events).toHaveLength(2);
    expect(failureOf(events[1])).toBeInstanceOf(ContextWindowExceededError);
  });
});

describe("ModelClient over Gemini", () => {
  it("addresses the model's streaming method with the provider's extras", async () => {
    const { fetchImpl, requests } = fakeFetch(
      queued(() => sseResponse(sseBody([geminiChunk([{ text: "ok" }], "STOP")])))
    );
    const provider = { ...BUILT_IN_PROVIDERS.gemini, headers: { "x-team": "core" }, queryParams: { labels: "ci" } };
    const client = new ModelClient({ provider, model: "gemini-2.5-pro", env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")] })).collect();

    expect(events).toEqual([{ type: "text_delta", text: "ok" }, { type: "completed" }]);
    expect(requests[0]?.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-pro:streamGenerateContent?alt=sse&labels=ci"
    );
    expect(requests[0]?.headers).toMatchObject({ "x-goog-api-key": "test-secret", "x-team": "core" });
    expect(requests[0]?.headers.authorization).toBeUndefined();
  });

  it("replays the thought signature of a call on the next turn", async () => {
    const { fetchImpl, requests } = fakeFetch(
      queued(
        () =>
          sseResponse(
            sseBody([
              geminiChunk(
                [{ functionCall: { name: "shell_command", args: { command: "ls" } }, thoughtSignature: "sig-123" }],
                "STOP"
              ),
            ])
          ),
        () => sseResponse(sseBody([geminiChunk([{ text: "a.txt is there" }], "STOP")]))
      )
    );
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.gemini, model: "gemini-3-pro-preview", env: ENV, fetchImpl });
    const history = new ConversationHistory([userMessage("list files")]);

    const first = await TurnAccumulator.collect(await client.stream({ items: history.snapshot() }));
    expect(first.status).toBe("completed");
    const [callId = ""] = callIdsOf(first.items());
    history.append(...first.items(), { type: "function_call_output", callId, output: "a.txt", success: true });

    const second = await TurnAccumulator.collect(await client.stream({ items: history.snapshot() }));
    expect(second.status).toBe("completed");
    expect(requests[1]?.body).toMatchObject({
      contents: [
        { role: "user", parts: [{ text: "list files" }] },
        {
          role: "model",
          parts: [{ functionCall: { name: "shell_command", args: { command: "ls" } }, thoughtSignature: "sig-123" }],
        },
        { role: "user", parts: [{ functionResponse: { name: "shell_command", response: { output: "a.txt" } } }] },
      ],
    });
  });

  it("keeps each turn's call paired with its own signature and name", async () => {
    const { fetchImpl, requests } = fakeFetch(
      queued(
        () =>
          sseResponse(
            sseBody([
              geminiChunk([{ functionCall: { name: "read_file", args: { path: "a.txt" } }, thoughtSignature: "sig-A" }], "STOP"),
            ])
          ),
        () =>
          sseResponse(
            sseBody([
              geminiChunk([{ functionCall: { name: "shell_command", args: { command: "ls" } }, thoughtSignature: "sig-B" }], "STOP"),
            ])
          ),
        () => sseResponse(sseBody([geminiChunk([{ text: "done" }], "STOP")]))
      )
    );
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.gemini, model: "gemini-3-pro-preview", env: ENV, fetchImpl });
    const history = new ConversationHistory([userMessage("read a.txt, then list files")]);

    for (const output of ["hello", "a.txt"]) {
      const turn = await TurnAccumulator.collect(await client.stream({ items: history.snapshot() }));
      const [callId = ""] = callIdsOf(turn.items());
      history.append(...turn.items(), { type: "function_call_output", callId, output, success: true });
    }
    await TurnAccumulator.collect(await client.stream({ items: history.snapshot() }));

    const [firstId, secondId] = callIdsOf(history.snapshot());
    expect(firstId).not.toBe(secondId);
    expect(requests[2]?.body).toMatchObject({
      contents: [
        { role: "user", parts: [{ text: "read a.txt, then list files" }] },
        { role: "model", parts: [{ functionCall: { name: "read_file", args: { path: "a.txt" } }, thoughtSignature: "sig-A" }] },
        { role: "user", parts: [{ functionResponse: { name: "read_file", response: { output: "hello" } } }] },
        {
          role: "model",
          parts: [{ functionCall: { name: "shell_command", args: { command: "ls" } }, thoughtSignature: "sig-B" }],
        },
        { role: "user", parts: [{ functionResponse: { name: "shell_command", response: { output: "a.txt" } } }] },
      ],
    });
  });

  it("refuses to replay a call whose required signature was lost", async () => {
    const { fetchImpl, requests } = fakeFetch(queued());
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.gemini, model: "gemini-3-pro-preview", env: ENV, fetchImpl });

    await expect(
      client.stream({
        items: [
          userMessage("list files"),
          { type: "function_call", callId: "c1", name: "shell_command", arguments: "{}" },
          { type: "function_call_output", callId: "c1", output: "a.txt", success: true },
        ],
      })
    ).rejects.toBeInstanceOf(MissingThoughtSignatureError);
    expect(requests).toHaveLength(0);
  });
});

describe("provider selection", () => {
  const model = "gemini-3-pro-preview";
  const toolNames = toolsForFamily(new ModelFamilyRegistry().resolve(model)).map((tool) => tool.name);

  it.each([
    {
      providerKey: "gemini",
      url: `https://generativelanguage.googleapis.com/v1beta/models/${model}:streamGenerateContent?alt=sse`,
      reply: [geminiChunk([{ text: "ok" }], "STOP")],
      body: {
        contents: [{ role: "user", parts: [{ text: "hi" }] }],
        tools: [{ functionDeclarations: toolNames.map((name) => ({ name })) }],
      },
    },
    {
      providerKey: "openrouter",
      url: "https://openrouter.ai/api/v1/chat/completions",
      reply: [chatChunk({ content: "ok" }, "stop"), "[DONE]"],
      body: {
        model,
        messages: [{ role: "system" }, { role: "user", content: "hi" }],
        tools: toolNames.map((name) => ({ type: "function", function: { name } })),
      },
    },
  ])("sends $providerKey requests in its provider's wire format", async ({ providerKey, url, reply, body }) => {
    const { fetchImpl, requests } = fakeFetch(queued(() => sseResponse(sseBody(reply))));
    const config = parseConfig({ model, modelProvider: providerKey }, {});
    const client = createModelClientFromConfig(config, { env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")] })).collect();

    expect(events).toEqual([{ type: "text_delta", text: "ok" }, { type: "completed" }]);
    expect(requests[0]?.url).toBe(url);
    expect(requests[0]?.body).toMatchObject(body);
  });
});

describe("ModelClient failures before streaming", () => {
  it("fails on a missing credential without touching the network", async () => {
    const { fetchImpl, requests } = fakeFetch(queued());
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.openai, model: "gpt-5", env: {}, fetchImpl });
    await expect(client.stream({ items: [userMessage("hi")] })).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(0);
  });

  it("fails on a model no family matches", async () => {
    const { fetchImpl, requests } = fakeFetch(queued());
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.openai, env: ENV, fetchImpl });
    await expect(client.stream({ model: "llama-3", items: [userMessage("hi")] })).rejects.toBeInstanceOf(ConfigError);
    await expect(client.stream({ items: [userMessage("hi")] })).rejects.toThrow(
      "No model given and the client has no default model"
    );
    expect(requests).toHaveLength(0);
  });

  it("rejects with a retryable UpstreamError on 429", async () => {
    const { fetchImpl } = fakeFetch(
      queued(
        () =>
          new Response(JSON.stringify({ error: { message: "Slow down", code: "rate_limit_exceeded" } }), {
            status: 429,
            statusText: "Too Many Requests",
            headers: { "retry-after": "3" },
          })
      )
    );
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS.openai, model: "gpt-5", env: ENV, fetchImpl });
    const error = await client.stream({ items: [userMessage("hi")] }).then(
      () => undefined,
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ retryable: true, retryAfterSeconds: 3, upstreamCode: "rate_limit_exceeded" });
  });

  it("reports an aborted request as a TransportError", async () => {
    const fetchImpl: typeof fetch = async (_input, init) => {
      if (init?.signal?.aborted) throw new DOMException("This operation was aborted", "AbortError");
      return sseResponse(sseBody(["[DONE]"]));
    };
    const controller = new AbortController();
    controller.abort();
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });
    await expect(client.stream({ items: [userMessage("hi")], signal: controller.signal })).rejects.toThrow(
      new TransportError("Request aborted before the provider answered")
    );
  });
});

describe("TurnStream", () => {
  async function openTurn(signal?: AbortSignal) {
    const source = openStream();
    const { fetchImpl } = fakeFetch(queued(() => new Response(source.stream, { status: 200 })));
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });
    const turn = await client.stream({ items: [userMessage("hi")], signal });
    return { source, turn };
  }

  async function nextEvent(iterator: AsyncIterator<StreamEvent>): Promise<IteratorResult<StreamEvent>> {
    return iterator.next();
  }

  it("stops yielding and closes the connection on cancel()", async () => {
    const { source, turn } = await openTurn();
    const iterator = turn[Symbol.asyncIterator]();
    source.push(sseBody([chatChunk({ content: "partial" })]));
    expect(await nextEvent(iterator)).toEqual({ done: false, value: { type: "text_delta", text: "partial" } });

    turn.cancel();
    expect(await nextEvent(iterator)).toEqual({ done: true, value: undefined });
    expect(turn.cancelled).toBe(true);
    expect(source.cancelled()).toBe(true);
  });

  it("follows the caller's abort signal", async () => {
    const controller = new AbortController();
    const { source, turn } = await openTurn(controller.signal);
    const iterator = turn[Symbol.asyncIterator]();
    source.push(sseBody([chatChunk({ content: "partial" })]));
    await nextEvent(iterator);

    controller.abort();
    expect(await nextEvent(iterator)).toEqual({ done: true, value: undefined });
    expect(turn.cancelled).toBe(true);
  });

  it("releases the connection when the consumer stops early", async () => {
    const { source, turn } = await openTurn();
    source.push(sseBody([chatChunk({ content: "first" })]));
    for await (const event of turn) {
      expect(event.type).toBe("text_delta");
      break;
    }
    expect(turn.cancelled).toBe(true);
    expect(source.cancelled()).toBe(true);
  });

  it("detaches from a shared abort signal once each turn ends", async () => {
    const done = () => sseResponse(sseBody([chatChunk({ content: "ok" }, "stop"), "[DONE]"]));
    const { fetchImpl } = fakeFetch(queued(done, done, done));
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });
    const session = new AbortController();

    for (let i = 0; i < 3; i++) {
      const turn = await client.stream({ items: [userMessage("hi")], signal: session.signal });
      expect(getEventListeners(session.signal, "abort")).toHaveLength(1);
      await turn.collect();
      expect(getEventListeners(session.signal, "abort")).toHaveLength(0);
    }
    expect(session.signal.aborted).toBe(false);
  });

  it("detaches from the abort signal when the request is rejected", async () => {
    const { fetchImpl } = fakeFetch(queued(() => new Response("{}", { status: 500 })));
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });
    const session = new AbortController();

    await expect(client.stream({ items: [userMessage("hi")], signal: session.signal })).rejects.toBeInstanceOf(UpstreamError);
    expect(getEventListeners(session.signal, "abort")).toHaveLength(0);
  });

  it("cannot be iterated twice", async () => {
    const { fetchImpl } = fakeFetch(queued(() => sseResponse(sseBody([chatChunk({}, "stop"), "[DONE]"]))));
    const client = new ModelClient({ provider: BUILT_IN_PROVIDERS["openai-chat"], model: "gpt-4o", env: ENV, fetchImpl });
    const turn = await client.stream({ items: [userMessage("hi")] });
    expect(await turn.collect()).toEqual([{ type: "completed" }]);
    await expect(turn.collect()).rejects.toThrow("TurnStream can only be iterated once");
  });

  it("fails the turn when the provider goes quiet", async () => {
    const source = openStream();
    const { fetchImpl } = fakeFetch(queued(() => new Response(source.stream, { status: 200 })));
    const provider = { ...BUILT_IN_PROVIDERS["openai-chat"], streamIdleTimeoutMs: 20 };
    const client = new ModelClient({ provider, model: "gpt-4o", env: ENV, fetchImpl });

    const events = await (await client.stream({ items: [userMessage("hi")] })).collect();

    expect(events).toHaveLength(1);
    expect(failureOf(events[0])).toBeInstanceOf(TransportError);
    expect(source.cancelled()).toBe(true);
  });
});

describe("createModelClientFromConfig", () => {
  it("picks the configured provider and model families", async () => {
    const config = parseConfig(
      {
        model: "house-model",
        modelProvider: "gemini",
        modelFamilies: [
          {
            id: "house",
            prefixes: ["house-"],
            shellType: "shell_command",
            applyPatchToolType: "structured",
          },
        ],
      },
      {}
    );
    const { fetchImpl, requests } = fakeFetch(queued(() => sseResponse(sseBody([geminiChunk([{ text: "ok" }])]))));
    const client = createModelClientFromConfig(config, { env: ENV, fetchImpl });

    expect(client.provider.name).toBe("Google Gemini");
    expect(await (await client.stream({ items: [userMessage("hi")] })).collect()).toEqual([
      { type: "text_delta", text: "ok" },
      { type: "completed" },
    ]);
    expect(requests[0]?.body).toMatchObject({ tools: [{ functionDeclarations: [{ name: "shell_command" }, { name: "apply_patch" }] }] });
  });

  it("rejects an unknown provider key", () => {
    const config = parseConfig({ model: "gpt-4o" }, {});
    expect(() => createModelClientFromConfig(config, { providerKey: "nowhere" })).toThrow(ConfigError);
  });
});
