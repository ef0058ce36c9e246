import type { ClientError } from "../../errors/client-errors";
import type { StreamEvent } from "../adapter";

const encoder = new TextEncoder();

export function sseBody(payloads: ReadonlyArray<string | object>): string {
  return payloads.map((p) => `data: ${typeof p === "string" ? p : JSON.stringify(p)}\n\n`).join("");
}

/** Splits the encoded text into byte chunks of the given sizes, cycling through them. */
export function splitBytes(text: string, sizes: readonly number[]): Uint8Array[] {
  const bytes = encoder.encode(text);
  const chunks: Uint8Array[] = [];
  let offset = 0;
  let i = 0;
  while (offset < bytes.length) {
    const size = Math.max(1, sizes[i % sizes.length] ?? bytes.length);
    chunks.push(bytes.slice(offset, offset + size));
    offset += size;
    i++;
  }
  return chunks;
}

export function bodyStream(text: string, sizes: readonly number[] = [Number.MAX_SAFE_INTEGER]): ReadableStream<Uint8Array> {
  const chunks = splitBytes(text, sizes);
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const next = chunks.shift();
      if (next) controller.enqueue(next);
      else controller.close();
    },
  });
}

export async function* asyncChunks(chunks: readonly Uint8Array[]): AsyncGenerator<Uint8Array, void, unknown> {
  for (const chunk of chunks) yield chunk;
}

export type OpenStream = {
  stream: ReadableStream<Uint8Array>;
  push: (text: string) => void;
  cancelled: () => boolean;
};

/** A body that stays open until the test pushes more or the reader cancels it. */
export function openStream(): OpenStream {
  let controllerRef: ReadableStreamDefaultController<Uint8Array> | undefined;
  let wasCancelled = false;
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controllerRef = controller;
    },
    cancel() {
      wasCancelled = true;
    },
  });
  return {
    stream,
    push: (text) => controllerRef?.enqueue(encoder.encode(text)),
    cancelled: () => wasCancelled,
  };
}

export async function collectEvents(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

export function failureOf(event: StreamEvent | undefined): ClientError | undefined {
  return event?.type === "failed" ? event.error : undefined;
}

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
};

export type FakeFetch = {
  fetchImpl: typeof fetch;
  requests: RecordedRequest[];
};

/** In-process stand-in for the provider: records each request and answers with `respond`. */
export function fakeFetch(respond: (request: RecordedRequest) => Response): FakeFetch {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const rawBody = typeof init?.body === "string" ? init.body : "";
    const request: RecordedRequest = {
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? "GET",
      headers,
      body: rawBody ? JSON.parse(rawBody) : undefined,
    };
    requests.push(request);
    return respond(request);
  };
  return { fetchImpl, requests };
}

export function sseResponse(text: string, sizes?: readonly number[]): Response {
  return new Response(bodyStream(text, sizes), {
    status: 200,
    headers: { "content-type": "text/event-stream" },
  });
}
