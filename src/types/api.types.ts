/**
 * API Type Definitions
 * Standard types for API responses and status codes
 */

/**
 * HTTP status codes used by the API
 */
export enum HttpStatus {
  OK = 200,
  CREATED = 201,
  NO_CONTENT = 204,

  BAD_REQUEST = 400,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  TOO_MANY_REQUESTS = 429,

  INTERNAL_SERVER_ERROR = 500,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Successful JSON response wrapper
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
}

/**
 * Response of POST /api/call
 */
export interface CallInitiatedResponse {
  success: true;
  message: string;
  call_sid: string;
}

/**
 * Response of GET /status
 */
export interface StatusResponse {
  status: 'running';
  twilio: {
    account_sid: string;
    phone_number: string;
  };
  database: string;
}

/**
 * Response of GET /health
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  database: 'up' | 'down';
}
