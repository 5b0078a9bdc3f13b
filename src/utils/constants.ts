export const APP_CONFIG = {
  NAME: 'Appointment Call API',
  VERSION: '1.0.0',
  DESCRIPTION: 'Voice-call appointment booking over Twilio with an LLM turn engine',
  API_PREFIX: '/api',
} as const;

export const DATABASE = {
  CONNECTION_TIMEOUT: 10000,
  IDLE_TIMEOUT: 10000,
  MAX_CONNECTIONS: 10,
  MAX_APPOINTMENTS_PER_SLOT: 3,
  // Postgres INTEGER
  MAX_ID: 2147483647,
} as const;

export const RATE_LIMIT = {
  WINDOW_MS: 15 * 60 * 1000,
  MAX_REQUESTS: 100,
  DEV_MAX_REQUESTS: 1000,
} as const;

export const LLM = {
  DEFAULT_MODEL: 'llama3-70b-8192',
  DEFAULT_BASE_URL: 'https://api.groq.com/openai/v1',
  TEMPERATURE: 0.2,
  MAX_TOKENS: 1024,
  TOP_P: 0.9,
} as const;

export const CALL = {
  GATHER_TIMEOUT_SECONDS: 10,
  SPEECH_TIMEOUT: 'auto',
  LANGUAGE: 'en-US',
  SPEECH_MODEL: 'phone_call',
  MIN_SPEECH_CONFIDENCE: 0.3,
  SESSION_MAX_AGE_MS: 60 * 60 * 1000,
  SESSION_SWEEP_INTERVAL_MS: 5 * 60 * 1000,
  TERMINAL_STATUSES: ['completed', 'failed', 'busy', 'no-answer', 'canceled'],
} as const;

export const WEBHOOK_PATHS = {
  WELCOME: '/api/welcome',
  CONVERSATION: '/api/conversation',
  CONFIRM: '/api/confirm_appointment',
  STATUS: '/api/call_status',
} as const;

export default {
  APP_CONFIG,
  DATABASE,
  RATE_LIMIT,
  LLM,
  CALL,
  WEBHOOK_PATHS,
};
