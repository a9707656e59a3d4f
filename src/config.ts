import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.string().default('./logs'),
  LOG_PRETTY: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
  ETL_CONFIG_PATH: z.string().default('./config/config.yaml'),
  FOOTBALL_DATA_TOKEN: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const config = parseEnv(process.env);
