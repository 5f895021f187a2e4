import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  OLLAMA_BASE_URL: z
    .string()
    .url('OLLAMA_BASE_URL must be a valid URL')
    .default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.2'),

  GROQ_API_KEY: optionalString,
  GROQ_MODEL: optionalString,
  TOGETHER_API_KEY: optionalString,
  TOGETHER_MODEL: optionalString,
  HUGGINGFACE_API_KEY: optionalString,
  HUGGINGFACE_MODEL: optionalString,

  MAILGUN_API_KEY: optionalString,
  MAILGUN_DOMAIN: optionalString,
  FROM_EMAIL: optionalString,
  FROM_NAME: z.string().min(1).default('Outreach'),
  CC_EMAIL: optionalString,
  SCHEDULING_LINK: z
    .string()
    .url('SCHEDULING_LINK must be a valid URL')
    .default('https://calendar.example.com/book'),
  CAMPAIGN_SEND_DELAY_MS: z.coerce.number().int().min(0).default(3000),

  PROSPECTS_CSV_PATH: z.string().min(1).default('data/prospects.csv'),
  EMAIL_TEMPLATE_PATH: z
    .string()
    .min(1)
    .default('templates/outreach-email.txt'),
});

export type Env = z.infer<typeof envSchema>;

/** `validate` hook for ConfigModule: fails startup with every invalid variable listed. */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return result.data;
}
