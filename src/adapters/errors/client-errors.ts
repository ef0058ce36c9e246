export type ClientErrorCode =
  | "config_error"
  | "auth_error"
  | "transport_error"
  | "protocol_error"
  | "missing_thought_signature"
  | "response_too_large"
  | "upstream_error"
  | "context_window_exceeded"
  | "content_blocked";

/**
 * Base class for every failure the client reports. The orchestrator decides
 * what to do with it; `retryable` is a hint, nothing here retries.
 */
export class ClientError extends Error {
  readonly code: ClientErrorCode;
  readonly retryable: boolean;

  constructor(code: ClientErrorCode, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ClientError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** Bad or missing provider / model family mapping. */
export class ConfigError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_error", message, options);
    this.name = "ConfigError";
  }
}

export class AuthError extends ClientError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("auth_error", message);
    this.name = "AuthError";
    if (typeof status === "number") this.status = status;
  }
}

/** Connection-level failure: reset, DNS, idle timeout. */
export class TransportError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport_error", message, { retryable: true, cause: options?.cause });
    this.name = "TransportError";
  }
}

export class ProtocolError extends ClientError {
  constructor(message: string, options?: { cause?: unknown; code?: "protocol_error" | "missing_thought_signature" }) {
    super(options?.code ?? "protocol_error", message, { cause: options?.cause });
    this.name = "ProtocolError";
  }
}

export class MissingThoughtSignatureError extends ProtocolError {
  readonly callId: string;

  constructor(callId: string, familyId: string) {
    super(
      `Function call ${callId} has no thought signature, which model family ${familyId} requires on replay`,
      { code: "missing_thought_signature" }
    );
    this.name = "MissingThoughtSignatureError";
    this.callId = callId;
  }
}

export class ResponseTooLargeError extends ClientError {
  readonly limit: number;

  constructor(what: string, limit: number) {
    super("response_too_large", `${what} exceeded the ${limit} byte limit`);
    this.name = "ResponseTooLargeError";
    this.limit = limit;
  }
}

export class UpstreamError extends ClientError {
  readonly status?: number;
  readonly upstreamCode?: string;
  readonly retryAfterSeconds?: number;

  constructor(
    message: string,
    options: { status?: number; upstreamCode?: string; retryable: boolean; retryAfterSeconds?: number }
  ) {
    super("upstream_error", message, { retryable: options.retryable });
    this.name = "UpstreamError";
    if (typeof options.status === "number") this.status = options.status;
    if (options.upstreamCode) this.upstreamCode = options.upstreamCode;
    if (typeof options.retryAfterSeconds === "number" && !Number.isNaN(options.retryAfterSeconds)) {
      this.retryAfterSeconds = options.retryAfterSeconds;
    }
  }
}

export class ContextWindowExceededError extends ClientError {
  constructor(message = "Model output hit the token limit") {
    super("context_window_exceeded", message);
    this.name = "ContextWindowExceededError";
  }
}

export class ContentBlockedError extends ClientError {
  readonly reason: string;

  constructor(reason: string) {
    super("content_blocked", `Response blocked by provider (${reason})`);
    this.name = "ContentBlockedError";
    this.reason = reason;
  }
}
