import type { z } from "zod";
import type { RawResponse } from "./http.js";
import { type Provider, providerDisplayName } from "./provider.js";
import { type AdapterResult, fail, ok } from "./result.js";

/**
 * Decode standard, padded base64.
 *
 * `Buffer.from(s, "base64")` skips characters it does not understand and
 * accepts the URL-safe alphabet, so the decoded bytes must re-encode to the
 * exact input.
 */
export function decodeBase64Strict(encoded: string, provider?: Provider): AdapterResult<Buffer> {
  const decoded = Buffer.from(encoded, "base64");
  if (decoded.toString("base64") !== encoded) {
    return fail("malformed_response", "Audio payload is not valid base64", { provider });
  }
  return ok(decoded);
}

export function isJsonContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mediaType === "application/json" || mediaType.endsWith("+json");
}

export function parseJsonBody(
  body: Buffer,
  provider: Provider,
  status?: number,
): AdapterResult<unknown> {
  try {
    return ok(JSON.parse(body.toString("utf8")) as unknown);
  } catch (err) {
    return fail(
      "malformed_response",
      `Response body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { provider, status },
    );
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text of a vendor error payload: `error.message` when present, the value
 * itself when it is a string, its JSON otherwise.
 */
export function errorPayloadText(value: unknown): string {
  if (typeof value === "string") return value;
  if (isRecord(value) && typeof value.message === "string") return value.message;
  return JSON.stringify(value) ?? String(value);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Read a JSON response: vendor error payload under `errorKey` first, then the
 * success shape described by `schema`.
 *
 * A non-2xx answer that matches neither becomes an `http_error`.
 */
export function readJsonPayload<T>(
  response: RawResponse,
  provider: Provider,
  errorKey: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): AdapterResult<T> {
  const { status } = response;
  const parsed = parseJsonBody(response.body, provider, status);
  if (!parsed.ok) {
    return isSuccessStatus(status) ? parsed : fail("http_error", `HTTP ${status}`, { provider, status });
  }

  const value = parsed.value;
  if (errorKey !== null && isRecord(value) && value[errorKey] !== undefined) {
    return fail(
      "provider_error",
      `${providerDisplayName(provider)} returned an error: ${errorPayloadText(value[errorKey])}`,
      { provider, status },
    );
  }

  const payload = schema.safeParse(value);
  if (!payload.success) {
    if (!isSuccessStatus(status)) {
      return fail("http_error", `HTTP ${status}`, { provider, status });
    }
    return fail(
      "malformed_response",
      `Unexpected ${providerDisplayName(provider)} response: ${summarizeIssues(payload.error)}`,
      { provider, status },
    );
  }
  return ok(payload.data);
}
