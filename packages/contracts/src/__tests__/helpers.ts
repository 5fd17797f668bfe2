import { vi } from "vitest";
import type { RawResponse } from "../http.js";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function rawJson(body: unknown, status = 200): RawResponse {
  return {
    status,
    contentType: "application/json",
    body: Buffer.from(JSON.stringify(body)),
  };
}

export function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected fetch call");
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
