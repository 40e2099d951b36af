import { z } from 'zod';

/**
 * Environment configuration for the HTTP replay service.
 * The CLI needs none of it.
 */
export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  // body-parser size string, e.g. "10mb"
  REPLAY_BODY_LIMIT: z.string().min(1).default('10mb'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(60),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse(env);
}
