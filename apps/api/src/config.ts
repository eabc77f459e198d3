import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8787),
    HOST: z.string().trim().min(1).default('127.0.0.1'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: optionalString,
    DOWNLOAD_TOKEN_SECRET: z.string().trim().min(16, 'DOWNLOAD_TOKEN_SECRET must be at least 16 characters'),
    DOWNLOAD_TOKEN_TTL_SEC: z.coerce.number().int().positive().default(300),
    PAYMENT_WEBHOOK_SECRET: optionalString,
    OPS_API_TOKEN: optionalString,
    CATALOG_BASE_URL: optionalString.pipe(z.string().url().optional()),
    CATALOG_FIXTURE_PATH: optionalString,
    CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'required when STORE_DRIVER=postgres' });
    }
  });

export type AppConfig = {
  port: number;
  host: string;
  logLevel: string;
  store: { driver: 'memory' } | { driver: 'postgres'; databaseUrl: string };
  downloadToken: { secret: string; ttlSec: number };
  paymentWebhookSecret: string | null;
  opsApiToken: string | null;
  catalog: { baseUrl: string | null; fixturePath: string | null; timeoutMs: number };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const v = parsed.data;

  return {
    port: v.PORT,
    host: v.HOST,
    logLevel: v.LOG_LEVEL,
    store:
      v.STORE_DRIVER === 'postgres' && v.DATABASE_URL
        ? { driver: 'postgres', databaseUrl: v.DATABASE_URL }
        : { driver: 'memory' },
    downloadToken: { secret: v.DOWNLOAD_TOKEN_SECRET, ttlSec: v.DOWNLOAD_TOKEN_TTL_SEC },
    paymentWebhookSecret: v.PAYMENT_WEBHOOK_SECRET ?? null,
    opsApiToken: v.OPS_API_TOKEN ?? null,
    catalog: {
      baseUrl: v.CATALOG_BASE_URL ?? null,
      fixturePath: v.CATALOG_FIXTURE_PATH ?? null,
      timeoutMs: v.CATALOG_TIMEOUT_MS,
    },
  };
}
