import { type Provider, providerDisplayName } from "./provider.js";

export type AdapterErrorKind =
  | "provider_error"
  | "malformed_response"
  | "unsupported_provider"
  | "invalid_config"
  | "http_error"
  | "network_error";

/**
 * A failed adapter call.
 *
 * `provider_error` means the vendor answered with its own error payload.
 * Every other kind is raised by this library while building the request or
 * reading the answer; none of them are thrown.
 */
export interface AdapterError {
  kind: AdapterErrorKind;
  message: string;
  provider?: Provider;
  status?: number;
}

export type AdapterResult<T> = { ok: true; value: T } | { ok: false; error: AdapterError };

export function ok<T>(value: T): AdapterResult<T> {
  return { ok: true, value };
}

export function fail<T>(
  kind: AdapterErrorKind,
  message: string,
  details: { provider?: Provider; status?: number } = {},
): AdapterResult<T> {
  return { ok: false, error: { kind, message, ...details } };
}

export function formatAdapterError(error: AdapterError): string {
  const scope = error.provider ? `${error.provider} ${error.kind}` : error.kind;
  return `[${scope}] ${error.message}`;
}

export function unsupportedProvider<T>(provider: Provider, capability: string): AdapterResult<T> {
  return fail("unsupported_provider", `Unsupported ${capability} provider: ${providerDisplayName(provider)}`, {
    provider,
  });
}
