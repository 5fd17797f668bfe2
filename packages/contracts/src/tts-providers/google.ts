import { z } from "zod";
import type { Speech, TtsProviderAdapter, TtsRequest } from "../ai-provider.js";
import { decodeBase64Strict, readJsonPayload } from "../ai-parse.js";
import type { RawResponse } from "../http.js";
import type { Key } from "../keys.js";
import { type RequestHeaders, requestHeaders, withoutAuthorization } from "../request-headers.js";
import { type AdapterResult, ok } from "../result.js";
import { assembleTtsBody } from "./body.js";

const TTS_ENDPOINT = "https://texttospeech.googleapis.com/v1beta1/text:synthesize";

const AUDIO_CONFIG = {
  audioEncoding: "LINEAR16",
  pitch: 0,
  speakingRate: 1,
} as const;

const googleSpeechSchema = z.object({
  audioContent: z.string(),
  timepoints: z.array(z.unknown()).optional(),
});

/**
 * Cloud Text-to-Speech lives on its own host regardless of the key's domain,
 * and takes the API key as a query parameter instead of a bearer header.
 */
export function createGoogleTtsAdapter(): TtsProviderAdapter {
  return {
    provider: "google",

    address(key: Key): AdapterResult<string> {
      return ok(`${TTS_ENDPOINT}?key=${encodeURIComponent(key.key)}`);
    },

    buildBody(request: TtsRequest): AdapterResult<Record<string, unknown>> {
      const { voice, languageCode } = request.config;
      return ok(
        assembleTtsBody(request, {
          input: { input: { text: request.text } },
          voice:
            voice !== undefined
              ? {
                  voice: languageCode !== undefined ? { name: voice, languageCode } : { name: voice },
                  audioConfig: { ...AUDIO_CONFIG },
                }
              : undefined,
        }),
      );
    },

    headers(key: Key): RequestHeaders {
      return withoutAuthorization(requestHeaders(key));
    },

    parse(response: RawResponse): AdapterResult<Speech> {
      const payload = readJsonPayload(response, "google", "error", googleSpeechSchema);
      if (!payload.ok) return payload;

      const audio = decodeBase64Strict(payload.value.audioContent, "google");
      if (!audio.ok) return audio;

      return ok({ requestId: null, fileFormat: "mp3", audio: audio.value });
    },
  };
}
