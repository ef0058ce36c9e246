import { describe, it, expect } from "vitest";
import { maskApiKey, maskHeaders, maskUrl } from "./mask-sensitive";

const KEY = "abcdefghijklmnopqrst";
const MASKED = `abc${"*".repeat(17)}`;

describe("maskApiKey", () => {
  it("keeps a short prefix and masks the rest", () => {
    expect(maskApiKey(KEY)).toBe(MASKED);
    expect(maskApiKey("abc")).toBe("***");
    expect(maskApiKey(undefined)).toBe("not set");
  });
});

describe("maskHeaders", () => {
  it("masks credential headers only", () => {
    expect(
      maskHeaders({ Authorization: `Bearer ${KEY}`, "x-goog-api-key": KEY, accept: "text/event-stream" })
    ).toEqual({ Authorization: `Bearer ${MASKED}`, "x-goog-api-key": MASKED, accept: "text/event-stream" });
  });
});

describe("maskUrl", () => {
  it("masks key query parameters", () => {
    expect(maskUrl(`https://llm.example.com/v1/models/m:streamGenerateContent?key=${KEY}&alt=sse`)).toBe(
      `https://llm.example.com/v1/models/m:streamGenerateContent?key=${MASKED}&alt=sse`
    );
  });

  it("returns unparseable input unchanged", () => {
    expect(maskUrl("not a url")).toBe("not a url");
  });
});
