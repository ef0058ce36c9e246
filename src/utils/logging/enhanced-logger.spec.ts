import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProtocolError } from "../../adapters/errors/client-errors";
import { JsonlFile } from "../jsonl/writer";
import { configureLogger, EnhancedLogger } from "./enhanced-logger";
import { logError, logWarn } from "./helpers";

let ROOT: string;

beforeAll(() => {
  ROOT = mkdtempSync(join(tmpdir(), "turnstream-logs-"));
});

afterAll(() => {
  rmSync(ROOT, { recursive: true, force: true });
});

function readRecords(file: string): unknown[] {
  return readFileSync(file, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("EnhancedLogger", () => {
  it("writes one JSON line per record", async () => {
    const logger = new EnhancedLogger({ dir: join(ROOT, "on"), enabled: true });
    const file = logger.filePath;
    logger.info("Starting turn", { items: 2 }, { provider: "OpenAI" });
    logger.debug("Request", { url: "https://llm.example.com" });
    logger.error("Turn failed", new ProtocolError("bad frame"));
    await logger.close();

    expect(readRecords(file)).toEqual([
      {
        timestamp: expect.any(String),
        level: "info",
        message: "Starting turn",
        data: { items: 2 },
        context: { provider: "OpenAI" },
      },
      {
        timestamp: expect.any(String),
        level: "error",
        message: "Turn failed",
        data: { name: "ProtocolError", message: "bad frame", code: "protocol_error" },
      },
    ]);
  });

  it("writes debug records only when asked to", async () => {
    const logger = new EnhancedLogger({ dir: join(ROOT, "debug"), enabled: true, debugEnabled: true });
    const file = logger.filePath;
    logger.debug("Usage reported");
    await logger.close();
    expect(readRecords(file)).toEqual([{ timestamp: expect.any(String), level: "debug", message: "Usage reported" }]);
  });

  it("touches nothing when disabled", async () => {
    const logger = new EnhancedLogger({ dir: join(ROOT, "off") });
    logger.warn("ignored");
    await logger.flush();
    expect(existsSync(join(ROOT, "off"))).toBe(false);
  });
});

describe("log helpers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    configureLogger({});
  });

  it("record through the configured logger and echo errors", async () => {
    vi.stubEnv("DEBUG", "false");
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const warnings = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = configureLogger({ dir: join(ROOT, "helpers"), enabled: true });
    const file = logger.filePath;

    logWarn("Replaying call without signature", { callId: "c1" });
    logError("Request failed", "timeout");
    await logger.close();

    expect(readRecords(file)).toEqual([
      { timestamp: expect.any(String), level: "warn", message: "Replaying call without signature", data: { callId: "c1" } },
      { timestamp: expect.any(String), level: "error", message: "Request failed", data: "timeout" },
    ]);
    expect(warnings).not.toHaveBeenCalled();
    expect(errors).toHaveBeenCalledWith("[ERROR] Request failed", "timeout");
  });
});

describe("JsonlFile", () => {
  it("appends in order to an existing file", async () => {
    const path = join(ROOT, "append.jsonl");
    const first = new JsonlFile(path, (err) => {
      throw err;
    });
    first.append({ n: 1 });
    await first.close();

    const second = new JsonlFile(path, (err) => {
      throw err;
    });
    second.append({ n: 2 });
    second.append({ n: 3 });
    await second.close();

    expect(readRecords(path)).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
  });
});
