import type { WireAdapter } from "../adapter";
import { joinUrl } from "../shared/url";
import { buildResponsesRequest } from "./request";
import { createResponsesDecoder, decodeResponsesBody } from "./stream-decoder";
import type { ResponsesRequestBody } from "./types";

export const responsesAdapter: WireAdapter<ResponsesRequestBody> = {
  wireApi: "responses",
  buildRequest: buildResponsesRequest,
  endpoint: (provider) => joinUrl(provider.baseUrl, "responses"),
  createDecoder: createResponsesDecoder,
  decodeComplete: decodeResponsesBody,
};
