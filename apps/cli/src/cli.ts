import { runChat, CHAT_USAGE } from "./commands/chat.js";
import { runTts, TTS_USAGE } from "./commands/tts.js";
import { type CliContext, UsageError } from "./context.js";

export const USAGE = ["Usage:", `  ${CHAT_USAGE}`, `  ${TTS_USAGE}`].join("\n");

const commands: Record<string, (args: string[], context: CliContext) => Promise<number>> = {
  chat: runChat,
  tts: runTts,
};

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const [name, ...args] = argv;

  if (name === undefined || name === "help" || name === "--help" || name === "-h") {
    context.stdout(USAGE);
    return name === undefined ? 1 : 0;
  }

  const command = commands[name];
  if (!command) {
    context.stderr(`Unknown command "${name}"`);
    context.stderr(USAGE);
    return 1;
  }

  try {
    return await command(args, context);
  } catch (err) {
    // parseArgs reports unknown or malformed flags with a TypeError carrying a code.
    if (err instanceof UsageError || (err instanceof TypeError && "code" in err)) {
      context.stderr(err.message);
      return 1;
    }
    throw err;
  }
}
