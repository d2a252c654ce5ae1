import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DIAGNOSIS_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}
