import { isTerminalEvent, type StreamEvent } from "../adapters/providers/adapter";

export type StreamSource = (signal: AbortSignal) => AsyncIterable<StreamEvent>;

export type TurnStreamOptions = {
  controller?: AbortController;
  // Runs once, when the turn ends or is cancelled
  onRelease?: () => void;
};

/**
 * One turn's events. Iterable once; the connection is opened by the client
 * before the stream is handed out and closed when iteration ends, when the
 * consumer stops early, or on `cancel()`. After cancellation nothing more is
 * yielded.
 */
export class TurnStream implements AsyncIterable<StreamEvent> {
  private readonly controller: AbortController;
  private readonly onRelease: (() => void) | undefined;
  private iterated = false;
  private released = false;

  constructor(
    private readonly source: StreamSource,
    options: TurnStreamOptions = {}
  ) {
    this.controller = options.controller ?? new AbortController();
    this.onRelease = options.onRelease;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
    this.release();
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamEvent, void, undefined> {
    if (this.iterated) throw new Error("TurnStream can only be iterated once");
    this.iterated = true;
    const signal = this.controller.signal;
    let ended = false;
    try {
      if (signal.aborted) return;
      for await (const event of this.source(signal)) {
        if (signal.aborted) return;
        yield event;
        if (isTerminalEvent(event)) {
          ended = true;
          return;
        }
      }
      ended = true;
    } finally {
      // Consumer left early: release the connection
      if (!ended) this.cancel();
      this.release();
    }
  }

  /** Drains the stream into an array; stops at the terminal event. */
  async collect(): Promise<StreamEvent[]> {
    const events: StreamEvent[] = [];
    for await (const event of this) events.push(event);
    return events;
  }
}
