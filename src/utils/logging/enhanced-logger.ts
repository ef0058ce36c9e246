import { mkdirSync } from "node:fs";
import path from "node:path";
import { JsonlFile } from "../jsonl/writer";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = {
  requestId?: string;
  provider?: string;
  model?: string;
  wireApi?: string;
};

export type LogRecord = {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  context?: LogContext;
};

export type LoggerOptions = {
  dir?: string;
  enabled?: boolean;
  debugEnabled?: boolean;
};

const DEFAULT_LOG_DIR = "logs";

function serialize(data: unknown): unknown {
  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      ...("code" in data && typeof data.code === "string" ? { code: data.code } : {}),
    };
  }
  return data;
}

function reportWriteError(err: unknown): void {
  console.error(`[logger] failed to write log file: ${String(err)}`);
}

export class EnhancedLogger {
  private readonly enabled: boolean;
  private readonly debugEnabled: boolean;
  private readonly dir: string;
  // One file per UTC day; a file being rotated out is closed in the background
  private file: JsonlFile | null = null;
  private retiring: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    this.enabled = options.enabled ?? false;
    this.debugEnabled = options.debugEnabled ?? false;
    this.dir = options.dir ?? DEFAULT_LOG_DIR;
  }

  get filePath(): string {
    return path.join(this.dir, `turnstream-${this.currentDate()}.jsonl`);
  }

  debug(message: string, data?: unknown, context?: LogContext): void {
    if (!this.debugEnabled) return;
    this.record("debug", message, data, context);
  }

  info(message: string, data?: unknown, context?: LogContext): void {
    this.record("info", message, data, context);
  }

  warn(message: string, data?: unknown, context?: LogContext): void {
    this.record("warn", message, data, context);
  }

  error(message: string, data?: unknown, context?: LogContext): void {
    this.record("error", message, data, context);
  }

  /** Resolves once every queued record has reached the file. */
  async flush(): Promise<void> {
    await this.retiring;
    await this.file?.drain();
  }

  async close(): Promise<void> {
    await this.retiring;
    const file = this.file;
    this.file = null;
    await file?.close();
  }

  private record(level: LogLevel, message: string, data: unknown, context: LogContext | undefined): void {
    if (!this.enabled) return;
    const entry: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data !== undefined ? { data: serialize(data) } : {}),
      ...(context ? { context } : {}),
    };
    this.fileFor(this.filePath).append(entry);
  }

  private fileFor(filePath: string): JsonlFile {
    if (this.file && this.file.path === filePath) return this.file;
    const previous = this.file;
    if (previous) {
      this.retiring = this.retiring.then(() => previous.close()).catch(reportWriteError);
    }
    mkdirSync(this.dir, { recursive: true });
    this.file = new JsonlFile(filePath, reportWriteError);
    return this.file;
  }

  private currentDate(): string {
    return new Date().toISOString().slice(0, 10);
  }
}

let instance: EnhancedLogger | null = null;

export function configureLogger(options: LoggerOptions): EnhancedLogger {
  const previous = instance;
  instance = new EnhancedLogger(options);
  if (previous) {
    previous.close().catch((err: unknown) => {
      console.error(`[logger] failed to close previous logger: ${String(err)}`);
    });
  }
  return instance;
}

export function getLogger(): EnhancedLogger {
  if (!instance) instance = new EnhancedLogger();
  return instance;
}
