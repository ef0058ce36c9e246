export function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function readString(o: Record<string, unknown>, key: string): string | undefined {
  const v = o[key];
  return typeof v === "string" ? v : undefined;
}

export function readNumber(o: Record<string, unknown>, key: string): number | undefined {
  const v = o[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function readObject(o: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const v = o[key];
  return isObject(v) ? v : undefined;
}

export function readArray(o: Record<string, unknown>, key: string): unknown[] {
  const v = o[key];
  return Array.isArray(v) ? v : [];
}

/**
 * Gateways relaying Gemini over OpenAI-shaped APIs put the signature at
 * `extra_content.<vendor>.thought_signature`.
 */
export function readExtraContentSignature(o: Record<string, unknown>, vendor: string | undefined): string | undefined {
  if (!vendor) return undefined;
  const extra = readObject(o, "extra_content");
  const scoped = extra ? readObject(extra, vendor) : undefined;
  return scoped ? readString(scoped, "thought_signature") : undefined;
}

export function extraContentFor(
  vendor: string | undefined,
  signature: string | undefined
): { extra_content: Record<string, { thought_signature: string }> } | Record<string, never> {
  if (!vendor || !signature) return {};
  return { extra_content: { [vendor]: { thought_signature: signature } } };
}
