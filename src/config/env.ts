import { z } from 'zod';
import dotenv from 'dotenv';
import { getCountries, type CountryCode } from 'libphonenumber-js';

// Load environment variables
dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z.string().transform((val) => val === 'true' || val === '1').default(fallback);

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Use HH:mm (24-hour)');

/**
 * Environment configuration schema with strict validation
 * Collaborator credentials are optional at load time and checked where they are first used
 */
const envSchema = z
  .object({
    // Server
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: booleanFlag('false'),

    // Redis (session store)
    REDIS_URL: z.string().default('redis://localhost:6379'),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_DB: z.coerce.number().int().min(0).max(15).default(0),
    REDIS_ENABLED: booleanFlag('true'),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(900),

    // Supabase
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(20).optional(),

    // Business configuration
    BUSINESS_TIMEZONE: z.string().default('America/Edmonton'),
    BUSINESS_HOURS_START: clockTime.default('09:00'),
    BUSINESS_HOURS_END: clockTime.default('17:00'),
    BUSINESS_DAYS: z.string().regex(/^[0-6](,[0-6])*$/).default('1,2,3,4,5,6'),
    // Per-day exceptions, e.g. "6=09:00-14:00" (Saturday closes early)
    BUSINESS_HOURS_OVERRIDES: z
      .string()
      .regex(/^([0-6]=\d{2}:\d{2}-\d{2}:\d{2})?(,[0-6]=\d{2}:\d{2}-\d{2}:\d{2})*$/)
      .default('6=09:00-14:00'),
    BUSINESS_SLOT_MINUTES: z.coerce.number().int().positive().max(120).default(30),
    BUSINESS_LOOKAHEAD_DAYS: z.coerce.number().int().positive().max(60).default(14),
    APPOINTMENT_DURATION_MINUTES: z.coerce.number().int().positive().default(30),

    // Extraction
    DEFAULT_PHONE_REGION: z
      .string()
      .default('CA')
      .transform((val, ctx): CountryCode => {
        const region = getCountries().find((country) => country === val.toUpperCase());
        if (!region) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported phone region '${val}'` });
          return z.NEVER;
        }
        return region;
      }),
    NER_TIMEOUT_MS: z.coerce.number().int().positive().default(1500),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    TURN_BUDGET_MS: z.coerce.number().int().positive().default(8000),

    // LLM
    LLM_ENABLED: booleanFlag('false'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),

    // Calendar sync
    CALENDAR_SYNC_URL: z.string().url().optional(),
    CALENDAR_SYNC_TOKEN: z.string().optional(),

    // Security
    API_KEY: z.string().min(16).optional(),
    TWILIO_AUTH_TOKEN: z.string().optional(),
    TWILIO_WEBHOOK_SIGNATURE_VALIDATION: booleanFlag('false'),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(300),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_ENABLED && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'Required when LLM_ENABLED is set',
      });
    }
    if (env.TWILIO_WEBHOOK_SIGNATURE_VALIDATION && !env.TWILIO_AUTH_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TWILIO_AUTH_TOKEN'],
        message: 'Required when TWILIO_WEBHOOK_SIGNATURE_VALIDATION is set',
      });
    }
  });

/**
 * Parse and validate environment variables
 * @throws {Error} If validation fails with detailed error messages
 */
function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missingVars = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(
        `Environment validation failed:\n${missingVars.join('\n')}\n\nPlease check your .env file.`
      );
    }
    throw error;
  }
}

/**
 * Validated and typed environment configuration
 */
export const config = validateEnv();

export const isDevelopment = config.NODE_ENV === 'development';

/**
 * Business days as weekday numbers (0=Sunday, 6=Saturday)
 */
export const businessDays = config.BUSINESS_DAYS.split(',').map((d) => parseInt(d, 10));

/**
 * Convert "HH:mm" into minutes since midnight
 */
export function toMinutes(clock: string): number {
  const [hours, minutes] = clock.split(':').map(Number);
  return hours * 60 + minutes;
}

export const businessHoursStart = toMinutes(config.BUSINESS_HOURS_START);
export const businessHoursEnd = toMinutes(config.BUSINESS_HOURS_END);

/**
 * Per-weekday opening overrides keyed by weekday number
 */
export const businessHoursOverrides = new Map<number, { open: number; close: number }>(
  config.BUSINESS_HOURS_OVERRIDES.split(',')
    .filter(Boolean)
    .map((entry) => {
      const [day, range] = entry.split('=');
      const [open, close] = range.split('-');
      return [parseInt(day, 10), { open: toMinutes(open), close: toMinutes(close) }];
    })
);

