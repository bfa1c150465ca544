import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppConfig = {
  env: string;
  logLevel: LogLevel;
};

const envSchema = z.object({
  NODE_ENV: z.string().min(1).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    console.warn(`[config] ignoring invalid settings (${fields}), using defaults.`);
    return { env: env.NODE_ENV || 'development', logLevel: 'warn' };
  }
  return {
    env: parsed.data.NODE_ENV,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

export const config: AppConfig = loadConfig();

export default config;
