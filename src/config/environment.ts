import { z } from 'zod';

/**
 * Environment contract. Database parameters follow the PostgreSQL container
 * conventions (POSTGRES_*).
 */
export const environmentSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['error', 'warn', 'info', 'debug', 'verbose'])),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().min(1),
  POSTGRES_PASSWORD: z.string(),
  POSTGRES_DB: z.string().min(1),
  DB_POOL_SIZE: z.coerce.number().int().positive().optional(),
  DB_POOL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
});

export type Environment = z.infer<typeof environmentSchema>;

export type LogLevelName = Environment['LOG_LEVEL'];

/**
 * Validate raw environment variables. Used as the ConfigModule `validate`
 * hook and directly by the bootstrap.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Environment {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  return result.data;
}
