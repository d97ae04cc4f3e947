import { z } from 'zod';

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : !['false', '0', 'no', 'off', ''].includes(value.trim().toLowerCase())));

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter(Boolean)
  );

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1).optional(),
  AUTO_MIGRATE: booleanFromEnv.default(true),
  OPENROUTER_API_KEY: z.string().default(''),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENROUTER_MODEL: z.string().min(1).default('google/gemini-2.5-flash'),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  TOOL_SERVERS_ROOT: z.string().min(1).default('/opt/tool-servers'),
  TOOL_DEFAULT_ENABLED_SERVERS: commaList,
  TOOL_CUSTOM_SERVERS_JSON: z.string().default(''),
  TOOL_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TOOL_STOP_GRACE_MS: z.coerce.number().int().nonnegative().default(2000),
  TOOL_MAX_ROUNDS: z.coerce.number().int().positive().default(4),
  FOLLOW_UP_WINDOW_MINUTES: z.coerce.number().positive().default(30)
});

export type AppConfig = z.infer<typeof configSchema>;
