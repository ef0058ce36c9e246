import { ProtocolError, ResponseTooLargeError } from "../../errors/client-errors";

export type SseEvent = {
  event?: string;
  data: string;
  id?: string;
};

/**
 * Incremental server-sent-events framer. Feed it decoded text in whatever
 * pieces the network produced; it returns every event whose terminating
 * blank line has been seen. Lines may end in \n, \r\n or \r, including a
 * \r\n split across two pushes.
 */
export class SseParser {
  private buffer = "";
  private dataLines: string[] = [];
  private eventName: string | undefined;
  private lastId: string | undefined;
  private eventBytes = 0;
  private hasFields = false;

  constructor(private readonly maxEventBytes: number = Number.POSITIVE_INFINITY) {}

  push(text: string): SseEvent[] {
    this.buffer += text;
    const events: SseEvent[] = [];
    let start = 0;
    for (let i = 0; i < this.buffer.length; i++) {
      const c = this.buffer[i];
      if (c !== "\n" && c !== "\r") continue;
      // A trailing \r may be the first half of \r\n; wait for the next push
      if (c === "\r" && i === this.buffer.length - 1) break;
      const line = this.buffer.slice(start, i);
      if (c === "\r" && this.buffer[i + 1] === "\n") i++;
      start = i + 1;
      const event = this.processLine(line);
      if (event) events.push(event);
    }
    this.buffer = this.buffer.slice(start);
    this.checkSize(this.buffer.length);
    return events;
  }

  /** Flushes a final line ended by a lone \r once the input is over. */
  end(): SseEvent[] {
    if (this.buffer.endsWith("\r")) {
      const line = this.buffer.slice(0, -1);
      this.buffer = "";
      const event = this.processLine(line);
      return event ? [event] : [];
    }
    return [];
  }

  /** True when input stopped inside an event (no terminating blank line yet). */
  hasPartialEvent(): boolean {
    return this.buffer.length > 0 || this.hasFields;
  }

  private processLine(line: string): SseEvent | null {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return null;

    const colon = line.indexOf(":");
    const field = colon < 0 ? line : line.slice(0, colon);
    let value = colon < 0 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    switch (field) {
      case "data":
        this.dataLines.push(value);
        this.eventBytes += Buffer.byteLength(value) + 1;
        this.hasFields = true;
        this.checkSize(0);
        break;
      case "event":
        this.eventName = value;
        this.hasFields = true;
        break;
      case "id":
        if (!value.includes("\0")) this.lastId = value;
        this.hasFields = true;
        break;
      default:
        // retry and unknown fields carry nothing we use
        break;
    }
    return null;
  }

  private dispatch(): SseEvent | null {
    const event: SseEvent | null =
      this.dataLines.length > 0
        ? {
            data: this.dataLines.join("\n"),
            ...(this.eventName !== undefined ? { event: this.eventName } : {}),
            ...(this.lastId !== undefined ? { id: this.lastId } : {}),
          }
        : null;
    this.dataLines = [];
    this.eventName = undefined;
    this.eventBytes = 0;
    this.hasFields = false;
    return event;
  }

  private checkSize(pendingChars: number): void {
    if (this.eventBytes + pendingChars > this.maxEventBytes) {
      throw new ResponseTooLargeError("SSE event", this.maxEventBytes);
    }
  }
}

export function parseJsonData(event: SseEvent): unknown {
  try {
    return JSON.parse(event.data);
  } catch (err) {
    throw new ProtocolError(`Malformed SSE data: ${event.data.slice(0, 200)}`, { cause: err });
  }
}
