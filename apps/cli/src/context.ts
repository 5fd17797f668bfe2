import { type AdapterError, formatAdapterError, type KeyStore, type Provider, providerSchema } from "@polyvox/contracts";
import type { CliEnv } from "./config/env.js";

export interface CliContext {
  env: CliEnv;
  keys: KeyStore;
  writeFile(path: string, data: Buffer): Promise<void>;
  stdout(line: string): void;
  stderr(line: string): void;
}

export class UsageError extends Error {}

export function resolveProvider(flag: string | undefined, env: CliEnv): Provider {
  const value = flag ?? env.POLYVOX_DEFAULT_PROVIDER;
  if (value === undefined) {
    throw new UsageError("No provider given: pass --provider or set POLYVOX_DEFAULT_PROVIDER");
  }
  const parsed = providerSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Unknown provider "${value}". Expected one of: ${providerSchema.options.join(", ")}`);
  }
  return parsed.data;
}

export function parseNumberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new UsageError(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function reportAdapterError(context: CliContext, error: AdapterError): number {
  context.stderr(formatAdapterError(error));
  return 1;
}
