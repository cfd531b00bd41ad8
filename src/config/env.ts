import { z } from 'zod';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const seconds = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .positive(`${name} must be greater than 0`)
    .default(fallback);

const count = (name: string, fallback: number, min: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(min, `${name} must be at least ${min}`)
    .default(fallback);

const normalizeOrigin = (origin: string) => origin.toLowerCase().replace(/\/$/, '');

const envSchema = z
  .object({
    STORE_PROVIDER: z.enum(['s3', 'memory']).default('s3'),
    STORE_S3_ENDPOINT: z
      .string()
      .optional()
      .transform((value) => (value ? value.replace(/\/$/, '') : '')),
    STORE_REGION: z.string().min(1).default('auto'),
    STORE_ACCESS_KEY_ID: z.string().optional().default(''),
    STORE_SECRET_ACCESS_KEY: z.string().optional().default(''),
    TOOL_BUCKETS: z.string().optional().default(''),
    ALLOWED_ORIGINS: z.string().min(1, 'ALLOWED_ORIGINS is required'),
    POLL_INTERVAL_SECONDS: seconds('POLL_INTERVAL_SECONDS', 5),
    MAX_WAIT_SECONDS: seconds('MAX_WAIT_SECONDS', 300),
    CHUNK_SIZE: count('CHUNK_SIZE', 50, 1),
    CHUNK_SIZE_MIN: count('CHUNK_SIZE_MIN', 10, 1),
    CHUNK_SIZE_MAX: count('CHUNK_SIZE_MAX', 1000, 1),
    MAX_IN_FLIGHT: count('MAX_IN_FLIGHT', 1, 1),
    MAX_CHUNK_RETRIES: count('MAX_CHUNK_RETRIES', 0, 0),
    LEDGER_PARTITIONED: booleanString,
    MERGE_LEASE_SECONDS: seconds('MERGE_LEASE_SECONDS', 600),
    PRESIGN_TTL: seconds('PRESIGN_TTL', 900),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
    NODE_ENV: z
      .enum(['development', 'production', 'test'], {
        errorMap: () => ({ message: 'NODE_ENV must be development, production or test' }),
      })
      .default('development'),
  })
  .superRefine((data, ctx) => {
    if (data.STORE_PROVIDER === 's3') {
      for (const key of ['STORE_S3_ENDPOINT', 'STORE_ACCESS_KEY_ID', 'STORE_SECRET_ACCESS_KEY'] as const) {
        if (!data[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${key} is required when STORE_PROVIDER is s3`,
            path: [key],
          });
        }
      }
    }

    if (data.CHUNK_SIZE_MIN > data.CHUNK_SIZE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'CHUNK_SIZE_MIN cannot exceed CHUNK_SIZE_MAX',
        path: ['CHUNK_SIZE_MIN'],
      });
    }

    if (data.CHUNK_SIZE < data.CHUNK_SIZE_MIN || data.CHUNK_SIZE > data.CHUNK_SIZE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `CHUNK_SIZE must be between ${data.CHUNK_SIZE_MIN} and ${data.CHUNK_SIZE_MAX}`,
        path: ['CHUNK_SIZE'],
      });
    }

    if (data.POLL_INTERVAL_SECONDS >= data.MAX_WAIT_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'POLL_INTERVAL_SECONDS must be shorter than MAX_WAIT_SECONDS',
        path: ['POLL_INTERVAL_SECONDS'],
      });
    }
  });

function parseBucketOverrides(raw: string): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const pair of raw.split(',').map((entry) => entry.trim()).filter(Boolean)) {
    const [tool, bucket] = pair.split('=').map((part) => part.trim());
    if (!tool || !bucket) {
      throw new Error(`TOOL_BUCKETS entry "${pair}" must look like tool=bucket`);
    }
    overrides[tool] = bucket;
  }
  return overrides;
}

export type Env = ReturnType<typeof loadEnv>;

export function loadEnv(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);

    const allowedOrigins = parsed.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean);

    if (allowedOrigins.length === 0) {
      throw new Error('ALLOWED_ORIGINS must include at least one origin');
    }

    return {
      STORE_PROVIDER: parsed.STORE_PROVIDER,
      STORE_S3_ENDPOINT:
        !parsed.STORE_S3_ENDPOINT || parsed.STORE_S3_ENDPOINT.startsWith('http')
          ? parsed.STORE_S3_ENDPOINT
          : `https://${parsed.STORE_S3_ENDPOINT}`,
      STORE_REGION: parsed.STORE_REGION,
      STORE_ACCESS_KEY_ID: parsed.STORE_ACCESS_KEY_ID,
      STORE_SECRET_ACCESS_KEY: parsed.STORE_SECRET_ACCESS_KEY,
      TOOL_BUCKETS: parseBucketOverrides(parsed.TOOL_BUCKETS),
      ALLOWED_ORIGINS: allowedOrigins,
      ALLOWED_ORIGINS_NORMALIZED: allowedOrigins.map(normalizeOrigin),
      POLL_INTERVAL_MS: parsed.POLL_INTERVAL_SECONDS * 1000,
      MAX_WAIT_MS: parsed.MAX_WAIT_SECONDS * 1000,
      CHUNK_SIZE: parsed.CHUNK_SIZE,
      CHUNK_SIZE_MIN: parsed.CHUNK_SIZE_MIN,
      CHUNK_SIZE_MAX: parsed.CHUNK_SIZE_MAX,
      MAX_IN_FLIGHT: parsed.MAX_IN_FLIGHT,
      MAX_CHUNK_RETRIES: parsed.MAX_CHUNK_RETRIES,
      LEDGER_PARTITIONED: parsed.LEDGER_PARTITIONED,
      MERGE_LEASE_MS: parsed.MERGE_LEASE_SECONDS * 1000,
      PRESIGN_TTL: parsed.PRESIGN_TTL,
      LOG_LEVEL: parsed.LOG_LEVEL,
      NODE_ENV: parsed.NODE_ENV,
    } as const;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}

export const env = loadEnv();
