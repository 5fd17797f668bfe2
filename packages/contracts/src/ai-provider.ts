import { z } from "zod";
import type { RawResponse } from "./http.js";
import type { Key } from "./keys.js";
import type { Provider } from "./provider.js";
import type { RequestHeaders } from "./request-headers.js";
import type { AdapterResult } from "./result.js";

/**
 * Provider-specific fields merged into the request body after every typed
 * field. Nothing checks them: a wrong name or value reaches the provider as-is.
 */
export const extraFieldsSchema = z.record(z.unknown());
export type ExtraFields = z.infer<typeof extraFieldsSchema>;

export const messageRoleSchema = z.enum(["system", "user", "assistant"]);
export type MessageRole = z.infer<typeof messageRoleSchema>;

export const messageSchema = z.object({
  role: messageRoleSchema,
  content: z.string(),
});
export type Message = z.infer<typeof messageSchema>;

export function createMessage(role: MessageRole, content: string): Message {
  return { role, content };
}

export const chatConfigSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  other: extraFieldsSchema.optional(),
});
export type ChatConfig = z.infer<typeof chatConfigSchema>;

export const ttsConfigSchema = z.object({
  outputFormat: z.string().optional(),
  voice: z.string().optional(),
  speed: z.number().positive().optional(),
  languageCode: z.string().optional(),
  other: extraFieldsSchema.optional(),
});
export type TtsConfig = z.infer<typeof ttsConfigSchema>;

export interface Speech {
  requestId: string | null;
  fileFormat: string;
  audio: Buffer;
}

export interface TtsRequest {
  config: TtsConfig;
  model?: string;
  text: string;
}

/**
 * One text-to-speech vendor: where to send a request, what it looks like,
 * and how to read the answer.
 */
export interface TtsProviderAdapter {
  readonly provider: Provider;
  address(key: Key, model?: string): AdapterResult<string>;
  buildBody(request: TtsRequest): AdapterResult<Record<string, unknown>>;
  headers(key: Key): RequestHeaders;
  parse(response: RawResponse): AdapterResult<Speech>;
}
