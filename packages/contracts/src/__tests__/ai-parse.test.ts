import { describe, expect, it } from "vitest";
import { decodeBase64Strict, errorPayloadText, isJsonContentType } from "../ai-parse.js";
import { DEEPINFRA_AUDIO_PREFIX, decodeDeepInfraAudio } from "../tts-providers/deepinfra.js";

describe("decodeBase64Strict", () => {
  it("decodes padded standard base64", () => {
    expect(decodeBase64Strict("dGVzdC1hdWRpbw==")).toEqual({ ok: true, value: Buffer.from("test-audio") });
  });

  it("decodes an empty payload to no bytes", () => {
    expect(decodeBase64Strict("")).toEqual({ ok: true, value: Buffer.alloc(0) });
  });

  it("decodes a payload of several megabytes", () => {
    const audio = Buffer.alloc(8 * 1024 * 1024, 7);
    const result = decodeBase64Strict(audio.toString("base64"));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.equals(audio)).toBe(true);
  });

  it.each(["dGVzdC1hdWRpbw", "dGVzdC1hdWRpbx==", "dGVz dA==", "dGVzdC1h_WRpbw==", "data:audio/mp3;base64,AAAA"])(
    "rejects %s",
    (encoded) => {
      expect(decodeBase64Strict(encoded, "hyperbolic")).toEqual({
        ok: false,
        error: { kind: "malformed_response", message: "Audio payload is not valid base64", provider: "hyperbolic" },
      });
    },
  );
});

describe("decodeDeepInfraAudio", () => {
  it("recovers the original bytes from prefixed base64", () => {
    const original = Buffer.from([0, 17, 34, 128, 200, 255, 3]);
    const encoded = `${DEEPINFRA_AUDIO_PREFIX}${original.toString("base64")}`;

    expect(decodeDeepInfraAudio(encoded)).toEqual({ ok: true, value: original });
  });

  it("requires the data prefix", () => {
    const result = decodeDeepInfraAudio("AAEC");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("malformed_response");
  });
});

describe("isJsonContentType", () => {
  it("accepts JSON media types with parameters", () => {
    expect(isJsonContentType("application/json; charset=utf-8")).toBe(true);
    expect(isJsonContentType("application/problem+json")).toBe(true);
  });

  it("rejects audio and missing content types", () => {
    expect(isJsonContentType("audio/mpeg")).toBe(false);
    expect(isJsonContentType(null)).toBe(false);
  });
});

describe("errorPayloadText", () => {
  it("prefers a message field", () => {
    expect(errorPayloadText({ message: "quota exceeded", code: 429 })).toBe("quota exceeded");
  });

  it("passes strings through", () => {
    expect(errorPayloadText("x")).toBe("x");
  });

  it("falls back to JSON", () => {
    expect(errorPayloadText({ code: 500 })).toBe('{"code":500}');
    expect(errorPayloadText(["a"])).toBe('["a"]');
  });
});
