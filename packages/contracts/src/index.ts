export * from "./provider.js";
export * from "./result.js";
export * from "./keys.js";
export * from "./request-headers.js";
export * from "./http.js";
export * from "./ai-provider.js";
export * from "./ai-parse.js";
export * from "./chat.js";
export * from "./tts.js";
export {
  createDeepInfraTtsAdapter,
  DEEPINFRA_AUDIO_PREFIX,
  DEEPINFRA_DEFAULT_TTS_MODEL,
  decodeDeepInfraAudio,
} from "./tts-providers/deepinfra.js";
export { createGoogleTtsAdapter } from "./tts-providers/google.js";
export { createHyperbolicTtsAdapter } from "./tts-providers/hyperbolic.js";
export { createOpenAiTtsAdapter } from "./tts-providers/openai.js";
export { getTtsAdapter, listTtsProviders } from "./tts-providers/registry.js";
