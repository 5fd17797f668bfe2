import type { Speech, TtsProviderAdapter, TtsRequest } from "../ai-provider.js";
import { errorPayloadText, isJsonContentType, isRecord, isSuccessStatus, parseJsonBody } from "../ai-parse.js";
import type { RawResponse } from "../http.js";
import { type Key, providerDomain } from "../keys.js";
import { requestHeaders } from "../request-headers.js";
import { type AdapterResult, fail, ok } from "../result.js";
import { assembleTtsBody } from "./body.js";

/**
 * OpenAI answers a synthesis request with the audio bytes themselves and an
 * audio content type. Only a JSON content type is read as a payload.
 */
export function createOpenAiTtsAdapter(): TtsProviderAdapter {
  return {
    provider: "openai",

    address(key: Key): AdapterResult<string> {
      const domain = providerDomain(key);
      if (!domain.ok) return domain;
      return ok(`${domain.value}/v1/audio/speech`);
    },

    buildBody(request: TtsRequest): AdapterResult<Record<string, unknown>> {
      const { voice } = request.config;
      return ok(
        assembleTtsBody(request, {
          input: { input: request.text },
          voice: voice !== undefined ? { voice } : undefined,
        }),
      );
    },

    headers: requestHeaders,

    parse(response: RawResponse): AdapterResult<Speech> {
      const { status } = response;

      if (isJsonContentType(response.contentType)) {
        const parsed = parseJsonBody(response.body, "openai", status);
        if (!parsed.ok) return parsed;
        if (isRecord(parsed.value) && parsed.value.error !== undefined) {
          return fail("provider_error", `OpenAI returned an error: ${errorPayloadText(parsed.value.error)}`, {
            provider: "openai",
            status,
          });
        }
        return fail("malformed_response", "Unexpected OpenAI response: JSON body without audio", {
          provider: "openai",
          status,
        });
      }

      if (!isSuccessStatus(status)) {
        return fail("http_error", `HTTP ${status}`, { provider: "openai", status });
      }

      return ok({ requestId: null, fileFormat: "mp3", audio: response.body });
    },
  };
}
