import { z } from "zod";
import type { Speech, TtsProviderAdapter, TtsRequest } from "../ai-provider.js";
import { decodeBase64Strict, readJsonPayload } from "../ai-parse.js";
import type { RawResponse } from "../http.js";
import { type Key, providerDomain } from "../keys.js";
import { requestHeaders } from "../request-headers.js";
import { type AdapterResult, fail, ok } from "../result.js";
import { assembleTtsBody } from "./body.js";

export const DEEPINFRA_DEFAULT_TTS_MODEL = "hexgrad/Kokoro-82M";
export const DEEPINFRA_AUDIO_PREFIX = "data:audio/mp3;base64,";

const deepInfraSpeechSchema = z.object({
  audio: z.string(),
  request_id: z.string().nullish(),
  output_format: z.string(),
});

/**
 * Strip the data-URL prefix DeepInfra puts in front of its audio and decode
 * the rest.
 */
export function decodeDeepInfraAudio(audio: string): AdapterResult<Buffer> {
  if (!audio.startsWith(DEEPINFRA_AUDIO_PREFIX)) {
    return fail("malformed_response", `DeepInfra audio is missing the ${DEEPINFRA_AUDIO_PREFIX} prefix`, {
      provider: "deepinfra",
    });
  }
  return decodeBase64Strict(audio.slice(DEEPINFRA_AUDIO_PREFIX.length), "deepinfra");
}

export function createDeepInfraTtsAdapter(): TtsProviderAdapter {
  return {
    provider: "deepinfra",

    address(key: Key, model?: string): AdapterResult<string> {
      const domain = providerDomain(key);
      if (!domain.ok) return domain;
      return ok(`${domain.value}/v1/inference/${model ?? DEEPINFRA_DEFAULT_TTS_MODEL}`);
    },

    buildBody(request: TtsRequest): AdapterResult<Record<string, unknown>> {
      const { voice } = request.config;
      return ok(
        assembleTtsBody(request, {
          input: { text: request.text },
          voice: voice !== undefined ? { preset_voice: voice } : undefined,
        }),
      );
    },

    headers: requestHeaders,

    parse(response: RawResponse): AdapterResult<Speech> {
      const payload = readJsonPayload(response, "deepinfra", "detail", deepInfraSpeechSchema);
      if (!payload.ok) return payload;

      const audio = decodeDeepInfraAudio(payload.value.audio);
      if (!audio.ok) return audio;

      return ok({
        requestId: payload.value.request_id ?? null,
        fileFormat: payload.value.output_format,
        audio: audio.value,
      });
    },
  };
}
