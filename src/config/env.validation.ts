import { z } from 'zod';

const environmentSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  INVOICE_PROFILE: z.enum(['relaxed', 'strict']).default('relaxed'),
  DEFAULT_TAX_PERCENT: z.coerce.number().nonnegative().optional(),
  INVOICE_STORAGE_PATH: z.string().min(1).default('data/invoices.json'),
  SESSION_HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL_NAME: z.string().min(1).default('gpt-4'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ASSISTANT_URL: z.string().url().optional(),
  ASSISTANT_LANGUAGE: z.string().min(1).default('English'),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Used as `ConfigModule.forRoot({ validate })`. Unknown keys are kept so the
 * rest of the process environment stays readable through ConfigService.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return { ...config, ...result.data };
}
