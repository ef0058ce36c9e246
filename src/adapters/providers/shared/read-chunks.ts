import { TransportError } from "../../errors/client-errors";
import { logDebug } from "../../../utils/logging/helpers";

export type ReadChunksOptions = {
  signal?: AbortSignal;
  idleTimeoutMs?: number;
};

function readWithTimeout(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  idleTimeoutMs: number | undefined
): Promise<ReadableStreamReadResult<Uint8Array>> {
  if (!idleTimeoutMs || idleTimeoutMs <= 0 || !Number.isFinite(idleTimeoutMs)) return reader.read();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransportError(`Idle timeout: no data from provider for ${idleTimeoutMs}ms`));
    }, idleTimeoutMs);
  });
  return Promise.race([reader.read(), timeout]).finally(() => clearTimeout(timer));
}

/**
 * Yields raw chunks from a response body. Aborting the signal cancels the
 * reader, which ends the iteration without an error; so does the consumer
 * returning early.
 */
export async function* readChunks(
  body: ReadableStream<Uint8Array>,
  options: ReadChunksOptions = {}
): AsyncGenerator<Uint8Array, void, unknown> {
  const { signal, idleTimeoutMs } = options;
  const reader = body.getReader();
  let finished = false;
  const cancel = () => {
    reader.cancel().catch((err: unknown) => {
      logDebug("Response body cancel failed", err);
    });
  };
  signal?.addEventListener("abort", cancel, { once: true });
  try {
    while (!signal?.aborted) {
      const { done, value } = await readWithTimeout(reader, idleTimeoutMs);
      if (done) {
        finished = true;
        return;
      }
      if (value && value.byteLength > 0) yield value;
    }
  } finally {
    signal?.removeEventListener("abort", cancel);
    if (!finished) cancel();
  }
}
