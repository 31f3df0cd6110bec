/**
 * Error and Health Bodies
 * Every non-2xx response of the Query API carries an `ApiError`.
 */

export interface ApiError {
  /** HTTP reason phrase, e.g. "Bad Request" */
  error: string;
  message: string;
  /** Stable machine-readable code, e.g. VALIDATION_ERROR or VECTOR_STORE_UNAVAILABLE */
  code?: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp?: string;
}

export interface FieldError {
  /** Dotted path into the request body, or "body" for the body as a whole */
  field: string;
  message: string;
  code?: string;
}

export interface ValidationErrorBody extends ApiError {
  error: 'Validation Error';
  code: 'VALIDATION_ERROR';
  validationErrors: FieldError[];
}

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface HealthCheck {
  /** e.g. "vector-store:qdrant" or "answer-synthesis" */
  name: string;
  status: CheckStatus;
  responseTime?: number;
  message?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  /** Seconds since the process started */
  uptime: number;
  checks: HealthCheck[];
}
