import { z } from "zod";
import { type ChatConfig, type Message, messageRoleSchema } from "./ai-provider.js";
import { parseJsonBody, readJsonPayload } from "./ai-parse.js";
import { postJson, type RawResponse, type RequestOptions } from "./http.js";
import { type Key, providerDomain } from "./keys.js";
import type { Provider } from "./provider.js";
import { requestHeaders } from "./request-headers.js";
import { type AdapterResult, fail, ok } from "./result.js";

// Paths under each provider's domain where its OpenAI-compatible API lives.
const CHAT_PATHS: Partial<Record<Provider, string>> = {
  deepinfra: "/v1/openai/chat/completions",
  google: "/v1beta/openai/chat/completions",
};
const DEFAULT_CHAT_PATH = "/v1/chat/completions";

export interface ChatChoice {
  index: number;
  message: Message;
  finishReason: string | null;
}

export interface ChatUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletion {
  id: string | null;
  model: string | null;
  choices: ChatChoice[];
  usage: ChatUsage | null;
}

const chatCompletionSchema = z.object({
  id: z.string().nullish(),
  model: z.string().nullish(),
  choices: z.array(
    z.object({
      index: z.number().int().optional(),
      message: z.object({
        role: messageRoleSchema,
        content: z.string().nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number().int(),
      completion_tokens: z.number().int(),
      total_tokens: z.number().int(),
    })
    .nullish(),
});

export function chatAddress(key: Key): AdapterResult<string> {
  const domain = providerDomain(key);
  if (!domain.ok) return domain;
  return ok(`${domain.value}${CHAT_PATHS[key.provider] ?? DEFAULT_CHAT_PATH}`);
}

export function buildChatBody(
  model: string,
  messages: readonly Message[],
  config: ChatConfig = {},
): Record<string, unknown> {
  const body: Record<string, unknown> = { model, messages };

  if (config.temperature !== undefined) {
    body.temperature = config.temperature;
  }
  if (config.maxTokens !== undefined) {
    body.max_tokens = config.maxTokens;
  }
  if (config.other) {
    for (const [name, value] of Object.entries(config.other)) {
      body[name] = value;
    }
  }

  return body;
}

export class ChatCompletionResponse {
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

  structured(): AdapterResult<ChatCompletion> {
    const payload = readJsonPayload(this.response, this.provider, "error", chatCompletionSchema);
    if (!payload.ok) {
      console.warn("[chat] could not read chat completion", {
        provider: this.provider,
        kind: payload.error.kind,
        status: this.response.status,
      });
      return payload;
    }

    const raw = payload.value;
    return ok({
      id: raw.id ?? null,
      model: raw.model ?? null,
      choices: raw.choices.map((choice, position) => ({
        index: choice.index ?? position,
        message: { role: choice.message.role, content: choice.message.content ?? "" },
        finishReason: choice.finish_reason ?? null,
      })),
      usage: raw.usage
        ? {
            promptTokens: raw.usage.prompt_tokens,
            completionTokens: raw.usage.completion_tokens,
            totalTokens: raw.usage.total_tokens,
          }
        : null,
    });
  }

  /** Content of the first choice's message. */
  content(): AdapterResult<string> {
    const completion = this.structured();
    if (!completion.ok) return completion;

    const first = completion.value.choices[0];
    if (!first) {
      return fail("malformed_response", "Chat completion has no choices", {
        provider: this.provider,
        status: this.response.status,
      });
    }
    return ok(first.message.content);
  }
}

export async function chatCompletion(
  key: Key,
  model: string,
  messages: readonly Message[],
  config: ChatConfig = {},
  options: RequestOptions = {},
): Promise<AdapterResult<ChatCompletionResponse>> {
  const address = chatAddress(key);
  if (!address.ok) return address;

  const body = buildChatBody(model, messages, config);
  console.debug("[chat] requesting chat completion", {
    provider: key.provider,
    model,
    messages: messages.length,
  });

  const res = await postJson(key.provider, address.value, requestHeaders(key), body, options);
  if (!res.ok) return res;

  console.debug("[chat] response received", {
    provider: key.provider,
    status: res.value.status,
    bytes: res.value.body.length,
  });

  return ok(new ChatCompletionResponse(key.provider, res.value));
}
