import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(3000),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  S3_BUCKET: z.string().min(1),

  PG_HOST: z.string().min(1).default('localhost'),
  PG_PORT: intFromEnv(5432),
  PG_USER: z.string().min(1).default('postgres'),
  PG_PASS: z.string().default(''),
  PG_DB: z.string().min(1).default('recordings'),
  PG_SYNCHRONIZE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),

  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: intFromEnv(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: intFromEnv(0),

  AMQP_URL: z.string().min(1).default('amqp://localhost'),
  CHUNK_UPLOAD_QUEUE: z.string().min(1).default('chunk_uploads'),
  PIPELINE_QUEUE: z.string().min(1).default('pipeline_steps'),
  INTAKE_MAX_ATTEMPTS: intFromEnv(5),
  INTAKE_RETRY_BASE_MS: intFromEnv(10_000),

  TRANSCODER_LAMBDA_ARN: z.string().min(1),
  TRANSCRIBE_SERVICE_ROLE_ARN: z.string().optional(),
  BEDROCK_MODEL_ID: z
    .string()
    .min(1)
    .default('anthropic.claude-sonnet-4-20250514'),
  BEDROCK_MAX_TOKENS: intFromEnv(4096),

  PIPELINE_VERSION: z.string().min(1).default('1.0.0'),
  PIPELINE_MAX_ATTEMPTS: intFromEnv(3),
  PIPELINE_RETRY_BASE_MS: intFromEnv(5_000),
  TRANSCRIBE_POLL_INITIAL_MS: intFromEnv(15_000),
  TRANSCRIBE_POLL_MAX_MS: intFromEnv(120_000),
  TRANSCRIBE_TIMEOUT_MS: intFromEnv(2 * 60 * 60 * 1000),
  SEGMENT_TTL_SECONDS: intFromEnv(30 * 24 * 60 * 60),
});

export type AppEnv = z.infer<typeof envSchema>;

/** Used as `ConfigModule.forRoot({ validate })`. */
export function validateEnv(raw: Record<string, unknown>): AppEnv {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}
