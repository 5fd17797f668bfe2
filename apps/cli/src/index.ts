import { writeFile } from "node:fs/promises";
import { runCli } from "./cli.js";
import { loadEnv } from "./config/env.js";
import { loadKeys } from "./config/keys.js";

async function start() {
  const env = loadEnv();
  const keys = loadKeys(env.POLYVOX_KEYS_FILE);

  process.exitCode = await runCli(process.argv.slice(2), {
    env,
    keys,
    writeFile: (path, data) => writeFile(path, data),
    stdout: (line) => {
      process.stdout.write(`${line}\n`);
    },
    stderr: (line) => {
      process.stderr.write(`${line}\n`);
    },
  });
}

start().catch((error) => {
  console.error("[cli] failed", error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) console.error(error.stack);
  process.exit(1);
});
