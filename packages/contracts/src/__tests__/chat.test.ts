import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMessage } from "../ai-provider.js";
import { buildChatBody, ChatCompletionResponse, chatAddress, chatCompletion } from "../chat.js";
import type { Key } from "../keys.js";
import { jsonResponse, rawJson, stubFetch } from "./helpers.js";

const messages = [
  createMessage("system", "You are a helpful assistant."),
  createMessage("user", "This is a test. Please respond with 'hello world'."),
];

const completionFixture = {
  id: "chatcmpl-1",
  object: "chat.completion",
  model: "meta-llama/Llama-3.3-70B-Instruct",
  choices: [
    {
      index: 0,
      message: { role: "assistant", content: "hello world" },
      finish_reason: "stop",
    },
  ],
  usage: { prompt_tokens: 25, completion_tokens: 2, total_tokens: 27 },
};

beforeEach(() => {
  vi.spyOn(console, "debug").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe("chatAddress", () => {
  const cases: Array<[Key, string]> = [
    [{ provider: "openai", key: "k" }, "https://api.openai.com/v1/chat/completions"],
    [{ provider: "deepinfra", key: "k" }, "https://api.deepinfra.com/v1/openai/chat/completions"],
    [{ provider: "hyperbolic", key: "k" }, "https://api.hyperbolic.xyz/v1/chat/completions"],
    [
      { provider: "google", key: "k" },
      "https://generativelanguage.googleapis.com/v1beta/openai/chat/completions",
    ],
    [{ provider: "groq", key: "k" }, "https://api.groq.com/openai/v1/chat/completions"],
    [{ provider: "together", key: "k" }, "https://api.together.xyz/v1/chat/completions"],
    [
      { provider: "openai-compatible", key: "k", baseUrl: "http://localhost:11434/" },
      "http://localhost:11434/v1/chat/completions",
    ],
  ];

  it.each(cases)("resolves the endpoint for %o", (key, expected) => {
    expect(chatAddress(key)).toEqual({ ok: true, value: expected });
  });

  it("requires a base URL for a self-hosted server", () => {
    expect(chatAddress({ provider: "openai-compatible", key: "k" })).toEqual({
      ok: false,
      error: {
        kind: "invalid_config",
        message: "No base URL configured for provider openai-compatible",
        provider: "openai-compatible",
      },
    });
  });
});

describe("buildChatBody", () => {
  it("contains only model and messages by default", () => {
    expect(buildChatBody("gpt-4o-mini", messages)).toEqual({ model: "gpt-4o-mini", messages });
  });

  it("maps typed settings and merges extra fields last", () => {
    const body = buildChatBody("gpt-4o-mini", messages, {
      temperature: 0.2,
      maxTokens: 64,
      other: { seed: 7, temperature: 0 },
    });
    expect(body).toEqual({ model: "gpt-4o-mini", messages, temperature: 0, max_tokens: 64, seed: 7 });
  });
});

describe("ChatCompletionResponse", () => {
  it("normalizes an OpenAI-shaped completion", () => {
    const response = new ChatCompletionResponse("deepinfra", rawJson(completionFixture));
    expect(response.structured()).toEqual({
      ok: true,
      value: {
        id: "chatcmpl-1",
        model: "meta-llama/Llama-3.3-70B-Instruct",
        choices: [{ index: 0, message: { role: "assistant", content: "hello world" }, finishReason: "stop" }],
        usage: { promptTokens: 25, completionTokens: 2, totalTokens: 27 },
      },
    });
  });

  it("exposes the status and content type", () => {
    const response = new ChatCompletionResponse("together", rawJson(completionFixture, 201));
    expect(response.status).toBe(201);
    expect(response.contentType).toBe("application/json");
  });

  it("returns the first choice's content", () => {
    const response = new ChatCompletionResponse("deepinfra", rawJson(completionFixture));
    expect(response.content()).toEqual({ ok: true, value: "hello world" });
  });

  it("fills optional fields when the provider omits them", () => {
    const response = new ChatCompletionResponse(
      "groq",
      rawJson({ choices: [{ message: { role: "assistant", content: null } }] }),
    );
    expect(response.structured()).toEqual({
      ok: true,
      value: {
        id: null,
        model: null,
        choices: [{ index: 0, message: { role: "assistant", content: "" }, finishReason: null }],
        usage: null,
      },
    });
  });

  it("reports an empty choice list as malformed", () => {
    const response = new ChatCompletionResponse("openai", rawJson({ id: "x", choices: [] }));
    expect(response.content()).toEqual({
      ok: false,
      error: {
        kind: "malformed_response",
        message: "Chat completion has no choices",
        provider: "openai",
        status: 200,
      },
    });
  });

  it("turns an error payload into a provider error", () => {
    const response = new ChatCompletionResponse(
      "openai",
      rawJson({ error: { message: "The model does not exist", code: "model_not_found" } }, 404),
    );
    expect(response.structured()).toEqual({
      ok: false,
      error: {
        kind: "provider_error",
        message: "OpenAI returned an error: The model does not exist",
        provider: "openai",
        status: 404,
      },
    });
  });
});

describe("chatCompletion", () => {
  it("posts the messages to the provider endpoint", async () => {
    const fetchMock = stubFetch(jsonResponse(completionFixture));
    const key: Key = { provider: "deepinfra", key: "test-key" };

    const result = await chatCompletion(key, "meta-llama/Llama-3.3-70B-Instruct", messages);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.deepinfra.com/v1/openai/chat/completions");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "meta-llama/Llama-3.3-70B-Instruct",
      messages,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.content()).toEqual({ ok: true, value: "hello world" });
  });

  it("returns a network error when fetch rejects", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValueOnce(new Error("socket hang up")));

    const result = await chatCompletion({ provider: "openai", key: "test-key" }, "gpt-4o-mini", messages);

    expect(result).toEqual({
      ok: false,
      error: { kind: "network_error", message: "socket hang up", provider: "openai" },
    });
  });

  it("does not call fetch without a base URL for a self-hosted server", async () => {
    const fetchMock = stubFetch();

    const result = await chatCompletion({ provider: "openai-compatible", key: "test-key" }, "m", messages);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "invalid_config",
        message: "No base URL configured for provider openai-compatible",
        provider: "openai-compatible",
      },
    });
  });
});
