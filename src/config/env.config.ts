import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const booleanString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('5000')
    .transform((val) => parseInt(val, 10)),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Sports data provider
  // "offline" reads a slate file from disk, "live" calls the HTTP data API
  SPORTS_DATA_PROVIDER: z.enum(['offline', 'live']).default('offline'),
  OFFLINE_SLATE_PATH: z.string().min(1).default('data/offline-slate.json'),
  SPORTS_DATA_API_URL: z.string().url().optional(),
  SPORTS_DATA_API_KEY: z.string().optional(),
  SPORTS_DATA_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(100).max(120000)),

  // Projection engine
  // One starter policy per deployment: "lenient" fills from the depth chart, "strict" rejects
  STARTER_RESOLUTION_POLICY: z.enum(['lenient', 'strict']).default('lenient'),
  RENORMALIZE_RED_ZONE: booleanString('false'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    const parsed = envSchema.parse(process.env);
    if (parsed.SPORTS_DATA_PROVIDER === 'live' && !parsed.SPORTS_DATA_API_URL) {
      throw new ValidationException('SPORTS_DATA_API_URL is required when SPORTS_DATA_PROVIDER=live');
    }
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
