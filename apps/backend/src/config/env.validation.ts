import { z } from 'zod';

export const envSchema = z.object({
  DATABASE_URL: z.string().url(),

  PORT: z.string().transform(Number).default('3000'),
  NODE_ENV: z
    .enum(['development', 'staging', 'production'])
    .default('development'),

  // Deployer identity: the only caller that can manage registry admins
  OWNER_ID: z
    .string()
    .regex(/\S/, 'OWNER_ID cannot be blank')
    .max(128),

  // Seeds the owner's account at startup when set
  OWNER_API_KEY: z
    .string()
    .startsWith('sk-', 'OWNER_API_KEY must start with sk-')
    .min(16)
    .optional(),

  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  return envSchema.parse(config);
}
