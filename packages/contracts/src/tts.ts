import type { Speech, TtsConfig, TtsProviderAdapter } from "./ai-provider.js";
import { parseJsonBody } from "./ai-parse.js";
import { postJson, type RawResponse, type RequestOptions } from "./http.js";
import type { Key } from "./keys.js";
import type { Provider } from "./provider.js";
import { type AdapterResult, ok, unsupportedProvider } from "./result.js";
import { getTtsAdapter } from "./tts-providers/registry.js";

function adapterFor(provider: Provider): AdapterResult<TtsProviderAdapter> {
  const adapter = getTtsAdapter(provider);
  return adapter ? ok(adapter) : unsupportedProvider(provider, "text-to-speech");
}

export function ttsAddress(key: Key, model?: string): AdapterResult<string> {
  const adapter = adapterFor(key.provider);
  if (!adapter.ok) return adapter;
  return adapter.value.address(key, model);
}

export function buildTtsBody(
  provider: Provider,
  config: TtsConfig,
  model: string | undefined,
  text: string,
): AdapterResult<Record<string, unknown>> {
  const adapter = adapterFor(provider);
  if (!adapter.ok) return adapter;
  return adapter.value.buildBody({ config, model, text });
}

/**
 * A provider's answer to a synthesis request, kept as received.
 *
 * `provider` must be the provider the request went to: it picks the parser.
 */
export class SpeechResponse {
  constructor(
    readonly provider: Provider,
    private readonly response: RawResponse,
  ) {}

  get status(): number {
    return this.response.status;
  }

  get contentType(): string | null {
    return this.response.contentType;
  }

  bytes(): Buffer {
    return this.response.body;
  }

  rawValue(): AdapterResult<unknown> {
    return parseJsonBody(this.response.body, this.provider, this.response.status);
  }

  structured(): AdapterResult<Speech> {
    const adapter = adapterFor(this.provider);
    if (!adapter.ok) return adapter;

    const speech = adapter.value.parse(this.response);
    if (!speech.ok) {
      console.warn("[tts] could not read speech response", {
        provider: this.provider,
        kind: speech.error.kind,
        status: this.response.status,
      });
    }
    return speech;
  }
}

export async function tts(
  key: Key,
  config: TtsConfig,
  model: string | undefined,
  text: string,
  options: RequestOptions = {},
): Promise<AdapterResult<SpeechResponse>> {
  const adapter = adapterFor(key.provider);
  if (!adapter.ok) return adapter;

  const address = adapter.value.address(key, model);
  if (!address.ok) return address;

  const body = adapter.value.buildBody({ config, model, text });
  if (!body.ok) return body;

  console.debug("[tts] requesting text-to-speech", {
    provider: key.provider,
    model: model ?? null,
    fields: Object.keys(body.value),
  });

  const res = await postJson(key.provider, address.value, adapter.value.headers(key), body.value, options);
  if (!res.ok) return res;

  console.debug("[tts] response received", {
    provider: key.provider,
    status: res.value.status,
    contentType: res.value.contentType,
    bytes: res.value.body.length,
  });

  return ok(new SpeechResponse(key.provider, res.value));
}
