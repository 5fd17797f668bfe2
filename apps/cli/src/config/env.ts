import { providerSchema } from "@polyvox/contracts";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  POLYVOX_KEYS_FILE: z.string().min(1).default(".env"),
  POLYVOX_DEFAULT_PROVIDER: providerSchema.optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  return envSchema.parse(source);
}
