import type { Key } from "./keys.js";

export type RequestHeaders = Record<string, string>;

export function requestHeaders(key: Key): RequestHeaders {
  return {
    "Content-Type": "application/json",
    Authorization: `Bearer ${key.key}`,
  };
}

export function withoutAuthorization(headers: RequestHeaders): RequestHeaders {
  const { Authorization: _, ...rest } = headers;
  return rest;
}
