/**
 * Common response patterns for the quote service
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorBody;
  traceId?: string;
}

export interface ErrorBody {
  code: ErrorCodes;
  message: string;
  field?: string;
  traceId?: string;
}

export interface ErrorResponse {
  success: false;
  error: ErrorBody;
}

/**
 * Common error codes
 */
export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_ROUTE = 'INVALID_ROUTE',
  INVALID_JSON = 'INVALID_JSON',
  NO_AIRCRAFT_AVAILABLE = 'NO_AIRCRAFT_AVAILABLE',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Health check response
 */
export interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  service: string;
  timestamp: string;
}

export function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 15) + Date.now().toString(36);
}
