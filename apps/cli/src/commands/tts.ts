import { parseArgs } from "node:util";
import { tts, ttsConfigSchema } from "@polyvox/contracts";
import { type CliContext, parseNumberFlag, reportAdapterError, resolveProvider, UsageError } from "../context.js";

export const TTS_USAGE =
  "polyvox tts [--provider <id>] [--model <name>] [--voice <name>] [--language-code <code>] [--speed <n>] [--format <fmt>] --out <file> <text...>";

export async function runTts(args: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      provider: { type: "string", short: "p" },
      model: { type: "string", short: "m" },
      voice: { type: "string", short: "v" },
      "language-code": { type: "string" },
      speed: { type: "string" },
      format: { type: "string" },
      out: { type: "string", short: "o" },
    },
  });

  const provider = resolveProvider(values.provider, context.env);
  if (!values.out) {
    throw new UsageError("--out is required for tts");
  }
  const text = positionals.join(" ").trim();
  if (!text) {
    throw new UsageError("Text to speak is required for tts");
  }

  const config = ttsConfigSchema.safeParse({
    voice: values.voice,
    languageCode: values["language-code"],
    speed: parseNumberFlag("speed", values.speed),
    outputFormat: values.format,
  });
  if (!config.success) {
    throw new UsageError(`Invalid speech settings: ${config.error.issues.map((issue) => issue.message).join("; ")}`);
  }

  const key = context.keys.forProvider(provider);
  if (!key) {
    throw new UsageError(`No key configured for ${provider}`);
  }

  const response = await tts(key, config.data, values.model, text);
  if (!response.ok) return reportAdapterError(context, response.error);

  const speech = response.value.structured();
  if (!speech.ok) return reportAdapterError(context, speech.error);

  await context.writeFile(values.out, speech.value.audio);
  console.info("[cli] wrote speech file", {
    provider,
    path: values.out,
    bytes: speech.value.audio.length,
    fileFormat: speech.value.fileFormat,
  });
  context.stdout(`Wrote ${speech.value.audio.length} bytes of ${speech.value.fileFormat} audio to ${values.out}`);
  return 0;
}
