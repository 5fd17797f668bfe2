import type { TtsRequest } from "../ai-provider.js";

interface ProviderFields {
  input: Record<string, unknown>;
  voice?: Record<string, unknown>;
}

/**
 * Lay out a synthesis body. Only fields the caller set are written, so the
 * provider's own defaults apply to the rest. `other` goes last and may
 * overwrite anything before it.
 */
export function assembleTtsBody(request: TtsRequest, fields: ProviderFields): Record<string, unknown> {
  const { config, model } = request;
  const body: Record<string, unknown> = { ...fields.input };

  if (model !== undefined) {
    body.model = model;
  }
  if (fields.voice) {
    Object.assign(body, fields.voice);
  }
  if (config.speed !== undefined) {
    body.speed = config.speed;
  }
  if (config.outputFormat !== undefined) {
    body.output_format = config.outputFormat;
  }
  if (config.other) {
    for (const [name, value] of Object.entries(config.other)) {
      body[name] = value;
    }
  }

  return body;
}
