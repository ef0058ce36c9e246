const SENSITIVE_HEADERS = new Set(["authorization", "x-goog-api-key", "api-key", "x-api-key"]);
const SENSITIVE_QUERY_PARAMS = new Set(["key", "api_key", "access_token"]);

export function maskApiKey(apiKey: string | undefined, displayRate = 0.15): string {
  if (!apiKey) return "not set";
  const displayLength = Math.floor(apiKey.length * displayRate);
  if (apiKey.length <= displayLength) return "***";
  const prefix = apiKey.substring(0, displayLength);
  const masked = "*".repeat(Math.min(apiKey.length - displayLength, 32));

  return `${prefix}${masked}`;
}

export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!SENSITIVE_HEADERS.has(name.toLowerCase())) {
      out[name] = value;
      continue;
    }
    const bearer = /^Bearer\s+/i.exec(value);
    out[name] = bearer ? `${bearer[0]}${maskApiKey(value.slice(bearer[0].length))}` : maskApiKey(value);
  }
  return out;
}

/** Masks credentials passed as query parameters (`?key=` on Google endpoints). */
export function maskUrl(url: string): string {
  let u: URL;
  try {
    u = new URL(url);
  } catch {
    return url;
  }
  for (const name of [...u.searchParams.keys()]) {
    if (SENSITIVE_QUERY_PARAMS.has(name.toLowerCase())) {
      u.searchParams.set(name, maskApiKey(u.searchParams.get(name) ?? undefined));
    }
  }
  return u.toString();
}
