import { z } from "zod";
import type { Speech, TtsProviderAdapter, TtsRequest } from "../ai-provider.js";
import { decodeBase64Strict, readJsonPayload } from "../ai-parse.js";
import type { RawResponse } from "../http.js";
import { type Key, providerDomain } from "../keys.js";
import { requestHeaders } from "../request-headers.js";
import { type AdapterResult, fail, ok } from "../result.js";
import { assembleTtsBody } from "./body.js";

const hyperbolicSpeechSchema = z.object({
  audio: z.string(),
});

export function createHyperbolicTtsAdapter(): TtsProviderAdapter {
  return {
    provider: "hyperbolic",

    address(key: Key): AdapterResult<string> {
      const domain = providerDomain(key);
      if (!domain.ok) return domain;
      return ok(`${domain.value}/v1/audio/generation`);
    },

    buildBody(request: TtsRequest): AdapterResult<Record<string, unknown>> {
      // Hyperbolic has no voice field we know of; pass one through `other` instead.
      if (request.config.voice !== undefined) {
        return fail("invalid_config", "Hyperbolic does not accept a voice setting", { provider: "hyperbolic" });
      }
      return ok(assembleTtsBody(request, { input: { text: request.text } }));
    },

    headers: requestHeaders,

    parse(response: RawResponse): AdapterResult<Speech> {
      // Hyperbolic has no documented error key; anything without `audio` is malformed.
      const payload = readJsonPayload(response, "hyperbolic", null, hyperbolicSpeechSchema);
      if (!payload.ok) return payload;

      const audio = decodeBase64Strict(payload.value.audio, "hyperbolic");
      if (!audio.ok) return audio;

      return ok({ requestId: null, fileFormat: "mp3", audio: audio.value });
    },
  };
}
