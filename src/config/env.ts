import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  EXPENSES_FILE: z.string().min(1).default('./expenses.csv'),
  CURRENCY_SYMBOL: z.string().default('$'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('warn'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
