import type { Provider } from "./provider.js";
import type { RequestHeaders } from "./request-headers.js";
import { type AdapterResult, fail, ok } from "./result.js";

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface RawResponse {
  status: number;
  contentType: string | null;
  body: Buffer;
}

export async function postJson(
  provider: Provider,
  address: string,
  headers: RequestHeaders,
  body: Record<string, unknown>,
  options: RequestOptions = {},
): Promise<AdapterResult<RawResponse>> {
  let res: Response;
  try {
    res = await fetch(address, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (err) {
    return fail("network_error", err instanceof Error ? err.message : "network error", { provider });
  }

  let bytes: ArrayBuffer;
  try {
    bytes = await res.arrayBuffer();
  } catch (err) {
    return fail("network_error", err instanceof Error ? err.message : "failed to read response body", {
      provider,
      status: res.status,
    });
  }

  return ok({
    status: res.status,
    contentType: res.headers.get("content-type"),
    body: Buffer.from(bytes),
  });
}
