import { z } from "zod";
import { defaultDomain, PROVIDERS, type Provider, providerSchema } from "./provider.js";
import { type AdapterResult, fail, ok } from "./result.js";

export const keySchema = z.object({
  provider: providerSchema,
  key: z.string().min(1),
  baseUrl: z.string().url().optional(),
});
export type Key = Readonly<z.infer<typeof keySchema>>;

export function providerDomain(key: Key): AdapterResult<string> {
  const domain = key.baseUrl ?? defaultDomain(key.provider);
  if (!domain) {
    return fail("invalid_config", `No base URL configured for provider ${key.provider}`, {
      provider: key.provider,
    });
  }
  return ok(domain.replace(/\/+$/, ""));
}

export interface KeyStore {
  forProvider(provider: Provider): Key | null;
  listAvailable(): Provider[];
}

export type KeyEnv = Readonly<Record<string, string | undefined>>;

function envPrefix(provider: Provider): string {
  return provider.toUpperCase().replace(/-/g, "_");
}

function readVar(env: KeyEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds a read-only key store from an env-like record.
 *
 * Each provider is looked up as `<PROVIDER>_KEY`, then `<PROVIDER>_API_KEY`
 * (`OPENAI_KEY`, `DEEPINFRA_API_KEY`, ...). The self-hosted
 * `openai-compatible` provider also needs `OPENAI_COMPATIBLE_BASE_URL`.
 */
export function createKeyStore(env: KeyEnv): KeyStore {
  const keys = new Map<Provider, Key>();

  for (const provider of PROVIDERS) {
    const prefix = envPrefix(provider);
    const secret = readVar(env, `${prefix}_KEY`) ?? readVar(env, `${prefix}_API_KEY`);
    if (!secret) continue;

    const baseUrl = readVar(env, `${prefix}_BASE_URL`);
    if (defaultDomain(provider) === null && !baseUrl) continue;

    const parsed = keySchema.safeParse({ provider, key: secret, baseUrl });
    if (!parsed.success) {
      console.warn("[keys] ignoring invalid key configuration", {
        provider,
        issues: parsed.error.issues.map((issue) => issue.path.join(".")),
      });
      continue;
    }
    keys.set(provider, Object.freeze(parsed.data));
  }

  return {
    forProvider(provider: Provider): Key | null {
      return keys.get(provider) ?? null;
    },

    listAvailable(): Provider[] {
      return [...keys.keys()];
    },
  };
}
