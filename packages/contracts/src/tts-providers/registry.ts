import type { TtsProviderAdapter } from "../ai-provider.js";
import type { Provider } from "../provider.js";
import { createDeepInfraTtsAdapter } from "./deepinfra.js";
import { createGoogleTtsAdapter } from "./google.js";
import { createHyperbolicTtsAdapter } from "./hyperbolic.js";
import { createOpenAiTtsAdapter } from "./openai.js";

const adapters = new Map<Provider, TtsProviderAdapter>(
  [
    createDeepInfraTtsAdapter(),
    createHyperbolicTtsAdapter(),
    createOpenAiTtsAdapter(),
    createGoogleTtsAdapter(),
  ].map((adapter): [Provider, TtsProviderAdapter] => [adapter.provider, adapter]),
);

export function getTtsAdapter(provider: Provider): TtsProviderAdapter | null {
  return adapters.get(provider) ?? null;
}

export function listTtsProviders(): Provider[] {
  return [...adapters.keys()];
}
