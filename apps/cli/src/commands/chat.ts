import { parseArgs } from "node:util";
import { chatCompletion, chatConfigSchema, createMessage, type Message } from "@polyvox/contracts";
import { type CliContext, parseNumberFlag, reportAdapterError, resolveProvider, UsageError } from "../context.js";

export const CHAT_USAGE =
  "polyvox chat [--provider <id>] --model <name> [--system <text>] [--temperature <n>] [--max-tokens <n>] <prompt...>";

export async function runChat(args: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      provider: { type: "string", short: "p" },
      model: { type: "string", short: "m" },
      system: { type: "string", short: "s" },
      temperature: { type: "string" },
      "max-tokens": { type: "string" },
    },
  });

  const provider = resolveProvider(values.provider, context.env);
  if (!values.model) {
    throw new UsageError("--model is required for chat");
  }
  const prompt = positionals.join(" ").trim();
  if (!prompt) {
    throw new UsageError("A prompt is required for chat");
  }

  const config = chatConfigSchema.safeParse({
    temperature: parseNumberFlag("temperature", values.temperature),
    maxTokens: parseNumberFlag("max-tokens", values["max-tokens"]),
  });
  if (!config.success) {
    throw new UsageError(`Invalid chat settings: ${config.error.issues.map((issue) => issue.message).join("; ")}`);
  }

  const key = context.keys.forProvider(provider);
  if (!key) {
    throw new UsageError(`No key configured for ${provider}`);
  }

  const messages: Message[] = [];
  if (values.system) {
    messages.push(createMessage("system", values.system));
  }
  messages.push(createMessage("user", prompt));

  const response = await chatCompletion(key, values.model, messages, config.data);
  if (!response.ok) return reportAdapterError(context, response.error);

  const content = response.value.content();
  if (!content.ok) return reportAdapterError(context, content.error);

  context.stdout(content.value);
  return 0;
}
