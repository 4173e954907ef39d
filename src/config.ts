import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().default(6379),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LEDGER_PATH: z.string().default('./model_performance/model_performance_log.csv'),
  PREDICTIONS_DIR: z.string().default('./model_output'),
  PUSH_POLICY: z.enum(['loss', 'void']).default('loss'),
  CLOSE_GAME_MARGIN: z.coerce.number().nonnegative().default(3),
  OVERTIME_TOTAL_PROXY: z.coerce.number().positive().default(260),
  ESPN_TIMEOUT_MS: z.coerce.number().positive().default(10000),
  EVALUATION_CRON: z.string().default('0 6,12,18 * * *'),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
