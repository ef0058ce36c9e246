import { AuthError, UpstreamError } from "./client-errors";

const MAX_ERROR_BODY_CHARS = 4000;

function normalizeErrorCode(status: number, fallback?: string): string {
  if (fallback) return fallback;
  if (status === 401) return "unauthorized";
  if (status === 403) return "forbidden";
  if (status === 404) return "not_found";
  if (status === 408) return "request_timeout";
  if (status === 409) return "conflict";
  if (status === 422) return "unprocessable_entity";
  if (status === 429) return "rate_limited";
  if (status >= 500) return "upstream_error";
  return "bad_request";
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

export type UpstreamErrorBody = {
  message?: string;
  code?: string;
};

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

/**
 * Both OpenAI-style and Google-style endpoints answer with
 * `{ error: { message, code | status | type } }`.
 */
export function parseErrorBody(bodyText: string | undefined): UpstreamErrorBody {
  if (!bodyText) return {};
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    return { message: bodyText.slice(0, MAX_ERROR_BODY_CHARS) };
  }
  if (isObject(json) && typeof json.error === "string") return { message: json.error };
  const err = isObject(json) && isObject(json.error) ? json.error : isObject(json) ? json : undefined;
  if (!err) return { message: bodyText.slice(0, MAX_ERROR_BODY_CHARS) };
  const message = typeof err.message === "string" ? err.message : undefined;
  const codeCandidate = [err.code, err.status, err.type].find(
    (c): c is string | number => typeof c === "string" || typeof c === "number"
  );
  return { message, code: codeCandidate !== undefined ? String(codeCandidate) : undefined };
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds)) return seconds;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

export function upstreamErrorFromResponse(res: Response, bodyText?: string): UpstreamError | AuthError {
  const status = res.status;
  const parsed = parseErrorBody(bodyText);
  const statusText = res.statusText || "";
  const message = parsed.message && parsed.message.trim().length > 0
    ? `${status} ${statusText}: ${parsed.message}`.replace(/\s+:/, ":").trim()
    : `${status} ${statusText}`.trim();

  if (status === 401 || status === 403) {
    return new AuthError(message, status);
  }
  return new UpstreamError(message, {
    status,
    upstreamCode: normalizeErrorCode(status, parsed.code),
    retryable: isRetryableStatus(status),
    retryAfterSeconds: parseRetryAfter(res.headers.get("retry-after")),
  });
}

/** In-stream `{ error: ... }` payloads carry no HTTP status; classify by code. */
export function upstreamErrorFromPayload(payload: unknown): UpstreamError {
  const parsed = parseErrorBody(JSON.stringify(payload));
  const code = parsed.code ?? "stream_error";
  const retryable = /rate_limit|overloaded|unavailable|server_error|internal|resource_exhausted|429|5\d\d/i.test(code);
  return new UpstreamError(parsed.message ?? "Provider reported an error mid-stream", {
    upstreamCode: code,
    retryable,
  });
}
