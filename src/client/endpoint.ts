import type { ProviderConfig } from "../config/types";
import type { WireAdapter } from "../adapters/providers/adapter";
import { withQueryParams } from "../adapters/providers/shared/url";

/**
 * chat:      {base}/chat/completions
 * responses: {base}/responses
 * gemini:    {base}/models/{model}:streamGenerateContent?alt=sse, or :generateContent
 */
export function endpointUrl(adapter: WireAdapter, provider: ProviderConfig, model: string): string {
  return withQueryParams(adapter.endpoint(provider, model), provider.queryParams);
}
