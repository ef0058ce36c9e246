import { ResponseTooLargeError } from "../../errors/client-errors";

/** Tracks accumulated argument bytes per call id against `maxArgumentBytes`. */
export class ArgumentBudget {
  private readonly used = new Map<string, number>();

  constructor(private readonly maxBytes: number) {}

  add(callId: string, fragment: string): void {
    const total = (this.used.get(callId) ?? 0) + Buffer.byteLength(fragment);
    if (total > this.maxBytes) {
      throw new ResponseTooLargeError(`Arguments of function call ${callId}`, this.maxBytes);
    }
    this.used.set(callId, total);
  }

  bytes(callId: string): number {
    return this.used.get(callId) ?? 0;
  }
}
