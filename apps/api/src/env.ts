import { z } from 'zod';

const OptionalSecretSchema = z.string().min(1).optional();

const ApiEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  APP_ENV: z.string().min(1).default('local'),
  API_PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().url().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  CRUSTDATA_API_TOKEN: z.string().min(1),
  CRUSTDATA_BASE_URL: z.string().url().default('https://api.crustdata.com'),
  CRUSTDATA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DISCOVERY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  PEOPLE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(20),
  SCREEN_PAGE_SIZE: z.coerce.number().int().positive().default(50),
  SCORING_REFERENCE_YEAR: z.coerce.number().int().min(1900).max(9999).optional(),
  OPENAI_API_KEY: OptionalSecretSchema,
  OPENAI_GENERATION_MODEL: z.string().min(1).optional(),
  RESEND_API_KEY: OptionalSecretSchema,
  SENDER_EMAIL: z.string().email().optional(),
  OUTREACH_PRODUCT_VISION: z.string().min(1).optional(),
});

export type ApiEnv = z.infer<typeof ApiEnvSchema>;

/** Empty strings count as unset, the way `.env` files leave optional keys. */
function dropEmptyValues(source: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim().length > 0) {
      values[key] = value;
    }
  }
  return values;
}

export function loadApiEnv(source: NodeJS.ProcessEnv): ApiEnv {
  const parsed = ApiEnvSchema.safeParse(dropEmptyValues(source));

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid API environment configuration:\n${issues.join('\n')}`);
  }

  return parsed.data;
}
