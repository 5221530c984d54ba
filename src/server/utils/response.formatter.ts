/**
 * Response formatter utility for the webhook endpoints.
 *
 * Provides standardized response formatting for:
 * - Success responses with consistent structure
 * - Error responses with structured error codes
 * - HTTP status code mapping for different error types
 *
 * Slack only inspects the status code; the body shape exists for operators
 * reading logs and for the health endpoint.
 */

import type { Response } from 'express';
import { EventErrorCode } from '../validation/event.validation';

/**
 * Additional API error codes specific to HTTP operations.
 */
export enum AdditionalAPIErrorCode {
  /** Request signature missing, stale or wrong */
  UNAUTHORIZED = 'UNAUTHORIZED',
  /** Route does not exist */
  NOT_FOUND = 'NOT_FOUND',
  /** Internal server error or unexpected failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  /** Word store or cache temporarily unusable */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

// Combine all error codes for complete coverage
export const APIErrorCode = {
  INVALID_EVENT: EventErrorCode.INVALID_EVENT,
  MISSING_PARAMETER: EventErrorCode.MISSING_PARAMETER,
  UNAUTHORIZED: AdditionalAPIErrorCode.UNAUTHORIZED,
  NOT_FOUND: AdditionalAPIErrorCode.NOT_FOUND,
  INTERNAL_ERROR: AdditionalAPIErrorCode.INTERNAL_ERROR,
  SERVICE_UNAVAILABLE: AdditionalAPIErrorCode.SERVICE_UNAVAILABLE,
} as const;

export type APIErrorCode = EventErrorCode | AdditionalAPIErrorCode;

/**
 * Structured API error information.
 */
export interface APIError {
  /** Machine-readable error code */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  /** Optional additional error context and details */
  details?: {
    field?: string;
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

/**
 * Error response data structure.
 */
export interface ErrorResponseData {
  error: APIError;
  /** Unix timestamp when response was generated */
  timestamp: number;
  /** Optional request ID for tracing */
  requestId?: string;
}

/**
 * HTTP status code mapping for different error types.
 */
const ERROR_STATUS_MAP: Record<APIErrorCode, number> = {
  // 400 Bad Request - malformed payloads
  [APIErrorCode.INVALID_EVENT]: 400,
  [APIErrorCode.MISSING_PARAMETER]: 400,

  // 401 Unauthorized - signature verification
  [APIErrorCode.UNAUTHORIZED]: 401,

  [APIErrorCode.NOT_FOUND]: 404,

  // 500 Internal Server Error - Server errors
  [APIErrorCode.INTERNAL_ERROR]: 500,

  // 503 Service Unavailable - Temporary service issues
  [APIErrorCode.SERVICE_UNAVAILABLE]: 503,
};

/**
 * Maps an error code to its HTTP status.
 */
export function getStatusCode(code: APIErrorCode): number {
  return ERROR_STATUS_MAP[code];
}

/**
 * Creates a structured API error.
 *
 * @example
 * ```typescript
 * createAPIError(APIErrorCode.UNAUTHORIZED, 'Invalid request signature');
 * ```
 */
export function createAPIError(
  code: APIErrorCode,
  message: string,
  details?: APIError['details']
): APIError {
  return details ? { code, message, details } : { code, message };
}

/**
 * Formats a successful API response with consistent structure.
 *
 * All data fields are spread into the response root next to a timestamp.
 *
 * @example
 * ```typescript
 * formatSuccessResponse({ ok: true });
 * // Returns: { ok: true, timestamp: 1728950400000 }
 * ```
 */
export function formatSuccessResponse<T extends Record<string, unknown>>(
  data: T,
  requestId?: string
): T & { timestamp: number; requestId?: string } {
  return requestId
    ? { ...data, timestamp: Date.now(), requestId }
    : { ...data, timestamp: Date.now() };
}

/**
 * Formats an error API response with consistent structure.
 */
export function formatErrorResponse(
  error: APIError,
  requestId?: string
): ErrorResponseData {
  const response: ErrorResponseData = {
    error,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * Sends a JSON success response (HTTP 200).
 */
export function sendSuccessResponse<T extends Record<string, unknown>>(
  res: Response,
  data: T,
  requestId?: string
): void {
  res.status(200).json(formatSuccessResponse(data, requestId));
}

/**
 * Sends a JSON error response with the status mapped from its code.
 */
export function sendErrorResponse(
  res: Response,
  error: APIError,
  requestId?: string
): void {
  res.status(getStatusCode(error.code)).json(formatErrorResponse(error, requestId));
}
