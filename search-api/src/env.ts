import { EnvSchema, parseEnv } from "query-engine";
import { z } from "zod";

export const ApiEnvSchema = EnvSchema.extend({
  PORT: z.coerce.number().int().min(0).max(65535).default(3333),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(5),
});

export type ApiEnv = z.infer<typeof ApiEnvSchema>;

export function loadApiEnv(source: NodeJS.ProcessEnv = process.env): ApiEnv {
  return parseEnv(ApiEnvSchema, source);
}
