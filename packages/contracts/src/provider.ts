import { z } from "zod";

export const providerSchema = z.enum([
  "openai",
  "deepinfra",
  "hyperbolic",
  "google",
  "groq",
  "together",
  "openai-compatible",
]);
export type Provider = z.infer<typeof providerSchema>;

export const PROVIDERS: readonly Provider[] = providerSchema.options;

const DISPLAY_NAMES: Record<Provider, string> = {
  openai: "OpenAI",
  deepinfra: "DeepInfra",
  hyperbolic: "Hyperbolic",
  google: "Google",
  groq: "Groq",
  together: "Together",
  "openai-compatible": "OpenAI-compatible",
};

// Self-hosted OpenAI-compatible servers have no fixed domain; the key carries it.
const DEFAULT_DOMAINS: Record<Provider, string | null> = {
  openai: "https://api.openai.com",
  deepinfra: "https://api.deepinfra.com",
  hyperbolic: "https://api.hyperbolic.xyz",
  google: "https://generativelanguage.googleapis.com",
  groq: "https://api.groq.com/openai",
  together: "https://api.together.xyz",
  "openai-compatible": null,
};

export function providerDisplayName(provider: Provider): string {
  return DISPLAY_NAMES[provider];
}

export function defaultDomain(provider: Provider): string | null {
  return DEFAULT_DOMAINS[provider];
}
