import type { StreamLimits } from "../../../config/types";
import { ProtocolError, ResponseTooLargeError } from "../../errors/client-errors";
import { toClientError } from "../../errors/error-converter";
import { isTerminalEvent, type StreamDecoder, type StreamEvent } from "../adapter";
import { SseParser } from "./sse";

export type DecodeEventStreamOptions = {
  limits: StreamLimits;
  signal?: AbortSignal;
};

/**
 * Runs raw body chunks through UTF-8 decoding, SSE framing and a wire
 * decoder. Exactly one terminal event ends a turn that was not cancelled;
 * after cancellation nothing more is yielded.
 */
export async function* decodeEventStream(
  chunks: AsyncIterable<Uint8Array>,
  decoder: StreamDecoder,
  options: DecodeEventStreamOptions
): AsyncGenerator<StreamEvent, void, unknown> {
  const { limits, signal } = options;
  const text = new TextDecoder("utf-8");
  const parser = new SseParser(limits.maxEventBytes);

  try {
    for await (const chunk of chunks) {
      if (signal?.aborted) return;
      for (const sse of parser.push(text.decode(chunk, { stream: true }))) {
        for (const event of decoder.onEvent(sse)) {
          yield event;
          if (isTerminalEvent(event)) return;
        }
      }
    }
    if (signal?.aborted) return;

    const tail = [...parser.push(text.decode()), ...parser.end()];
    for (const sse of tail) {
      for (const event of decoder.onEvent(sse)) {
        yield event;
        if (isTerminalEvent(event)) return;
      }
    }
    if (parser.hasPartialEvent()) {
      throw new ProtocolError("Stream closed in the middle of an SSE event");
    }
    for (const event of decoder.finish()) {
      yield event;
      if (isTerminalEvent(event)) return;
    }
    throw new ProtocolError("Stream ended without a completion event");
  } catch (err) {
    if (signal?.aborted) return;
    yield { type: "failed", error: toClientError(err) };
  }
}

/**
 * Same contract as `decodeEventStream` for a provider configured with
 * `streaming: false`: the whole body is read (bounded by `maxEventBytes`)
 * and turned into the events a stream would have carried.
 */
export async function* decodeCompleteBody(
  chunks: AsyncIterable<Uint8Array>,
  decode: (body: unknown) => StreamEvent[],
  options: DecodeEventStreamOptions
): AsyncGenerator<StreamEvent, void, unknown> {
  const { limits, signal } = options;
  const text = new TextDecoder("utf-8");
  let body = "";
  let bytes = 0;
  try {
    for await (const chunk of chunks) {
      if (signal?.aborted) return;
      bytes += chunk.byteLength;
      if (bytes > limits.maxEventBytes) throw new ResponseTooLargeError("Response body", limits.maxEventBytes);
      body += text.decode(chunk, { stream: true });
    }
    if (signal?.aborted) return;
    body += text.decode();

    for (const event of decode(JSON.parse(body))) {
      yield event;
      if (isTerminalEvent(event)) return;
    }
    throw new ProtocolError("Response body produced no completion event");
  } catch (err) {
    if (signal?.aborted) return;
    yield { type: "failed", error: toClientError(err) };
  }
}
