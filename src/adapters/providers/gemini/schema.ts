import { isObject } from "../shared/type-guards";

// Keywords outside the OpenAPI subset Gemini function declarations accept
const UNSUPPORTED_KEYWORDS = new Set(["additionalProperties", "$schema", "strict"]);

/** Returns a copy of the schema without keywords Gemini rejects. */
export function normalizeSchemaForGemini(schema: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(schema)) {
    if (UNSUPPORTED_KEYWORDS.has(key)) continue;
    if (key === "properties" && isObject(value)) {
      const props: Record<string, unknown> = {};
      for (const [name, prop] of Object.entries(value)) {
        props[name] = isObject(prop) ? normalizeSchemaForGemini(prop) : prop;
      }
      out[key] = props;
    } else if (key === "items" && isObject(value)) {
      out[key] = normalizeSchemaForGemini(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}
