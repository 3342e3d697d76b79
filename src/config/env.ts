import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const AES_KEY_LENGTHS = [16, 24, 32];
const MIN_BLIND_INDEX_KEY_LENGTH = 32;

// Standard alphabet, '=' padded to a multiple of four characters
const PADDED_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const base64Key = (name: string, isValidLength: (length: number) => boolean, hint: string) =>
  z
    .string()
    .optional()
    .refine(value => value === undefined || PADDED_BASE64.test(value), {
      message: `${name} must be padded base64`
    })
    .refine(
      value =>
        value === undefined ||
        value.length === 0 ||
        !PADDED_BASE64.test(value) ||
        isValidLength(Buffer.from(value, 'base64').length),
      { message: `${name} must decode to ${hint}` }
    )
    .describe(`Base64 encoded ${name}`);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  MONGO_URI: z
    .string()
    .url('MONGO_URI must be a valid connection string')
    .default('mongodb://localhost:27017/sealed_fields'),
  MONGO_MAX_POOL_SIZE: z
    .string()
    .default('20')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(500).describe('MONGO_MAX_POOL_SIZE must be within 1-500')),
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z
    .string()
    .default('5000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_SERVER_SELECTION_TIMEOUT_MS must be >= 1000ms')),
  MONGO_CONNECT_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_CONNECT_TIMEOUT_MS must be >= 1000ms')),
  FIELD_ENCRYPTION_KEY_BASE64: base64Key(
    'FIELD_ENCRYPTION_KEY_BASE64',
    length => AES_KEY_LENGTHS.includes(length),
    '16, 24 or 32 bytes'
  ),
  BLIND_INDEX_KEY_BASE64: base64Key(
    'BLIND_INDEX_KEY_BASE64',
    length => length >= MIN_BLIND_INDEX_KEY_LENGTH,
    `at least ${MIN_BLIND_INDEX_KEY_LENGTH} bytes`
  )
});

export function parseEnv(source: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  const data = parseResult.data;

  return {
    ...data,
    isDevelopment: data.NODE_ENV === 'development',
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test'
  };
}

export const env = parseEnv(process.env);

export type AppEnvironment = ReturnType<typeof parseEnv>;
