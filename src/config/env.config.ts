import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../middleware/error.middleware';
import { LLM } from '../utils/constants';
import { normalizeLogLevel, type LogLevel } from '../utils/logger';

// ── Environment variable schema ───────────────────────────────────

const envSchema = z.object({
  // Twilio
  TWILIO_ACCOUNT_SID: z.string().default(''),
  TWILIO_AUTH_TOKEN: z.string().default(''),
  TWILIO_PHONE_NUMBER: z.string().default(''),

  // Groq (OpenAI-compatible)
  GROQ_API_KEY: z.string().default(''),
  GROQ_MODEL: z.string().min(1).default(LLM.DEFAULT_MODEL),
  GROQ_BASE_URL: z.string().url().default(LLM.DEFAULT_BASE_URL),

  // PostgreSQL
  DATABASE_URL: z.string().default(''),

  // App config
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  DEBUG: z.string().default('true').transform((value) => value.toLowerCase() === 'true'),
  PUBLIC_URL: z.string().default(''),
  CLINIC_NAME: z.string().min(1).default('Medicare'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.string().default('INFO').transform((value, ctx): LogLevel => {
    const level = normalizeLogLevel(value);
    if (!level) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported log level "${value}"` });
      return z.NEVER;
    }
    return level;
  }),
  LOG_FILE: z.string().min(1).default('call_log.txt'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  twilio: {
    accountSid: string;
    authToken: string;
    phoneNumber: string;
  };
  groq: {
    apiKey: string;
    model: string;
    baseUrl: string;
  };
  database: {
    url: string;
  };
  app: {
    port: number;
    debug: boolean;
    publicUrl: string;
    clinicName: string;
    env: EnvConfig['NODE_ENV'];
  };
  logging: {
    level: LogLevel;
    file: string;
  };
}

// ── Validate and export config ────────────────────────────────────

let _config: AppConfig | null = null;

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

const toAppConfig = (env: EnvConfig): AppConfig => ({
  twilio: {
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    phoneNumber: env.TWILIO_PHONE_NUMBER,
  },
  groq: {
    apiKey: env.GROQ_API_KEY,
    model: env.GROQ_MODEL,
    baseUrl: env.GROQ_BASE_URL,
  },
  database: {
    url: env.DATABASE_URL,
  },
  app: {
    port: env.PORT,
    debug: env.DEBUG,
    publicUrl: stripTrailingSlash(env.PUBLIC_URL.trim()),
    clinicName: env.CLINIC_NAME,
    env: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
});

/**
 * Parse and cache the configuration. `.env` is read only when validating the
 * real process environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (_config) return _config;

  if (env === process.env) {
    dotenv.config();
  }

  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n  ${issues.join('\n  ')}`, issues);
  }

  _config = toAppConfig(result.data);
  return _config;
}

export function getConfig(): AppConfig {
  if (!_config) {
    throw new ConfigurationError('Config not loaded. Call loadConfig() first.');
  }
  return _config;
}

export function resetConfig(): void {
  _config = null;
}

// ── Launcher helpers ──────────────────────────────────────────────

export interface ResolvedPublicUrl {
  url: string;
  /** false when the URL is a localhost fallback Twilio cannot call back */
  reachable: boolean;
}

/**
 * Public base URL for webhooks: a command line argument (https:// added when no
 * scheme is given), then PUBLIC_URL, then localhost.
 */
export function resolvePublicUrl(arg: string | undefined, port: number, publicUrl = ''): ResolvedPublicUrl {
  const fromArg = arg?.trim();
  if (fromArg) {
    const withScheme = fromArg.startsWith('http') ? fromArg : `https://${fromArg}`;
    return { url: stripTrailingSlash(withScheme), reachable: true };
  }

  if (publicUrl) {
    return { url: stripTrailingSlash(publicUrl), reachable: true };
  }

  return { url: `http://localhost:${port}`, reachable: false };
}

/**
 * Host part of a connection string, without credentials.
 */
export function describeDatabase(url: string): string {
  const at = url.lastIndexOf('@');
  return at >= 0 ? url.slice(at + 1) : 'configured';
}

export function maskAccountSid(sid: string): string {
  return `${sid.slice(0, 6)}...`;
}
