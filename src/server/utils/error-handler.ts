/**
 * Error handling utilities for the webhook endpoints.
 *
 * Provides centralized error handling with:
 * - Error classification (4xx vs 5xx)
 * - Structured error logging with request context
 * - Mapping of word cache failures to a 503 without chatting back
 * - Request ID tracing for debugging
 */

import type { Request, Response, NextFunction } from 'express';
import {
  APIErrorCode,
  createAPIError,
  sendErrorResponse,
  type APIError,
} from './response.formatter';
import { isInsultBotError } from './errors';

/**
 * Error context information for structured logging.
 */
export interface ErrorContext {
  /** Request ID for distributed tracing */
  requestId?: string;
  /** HTTP method (GET, POST, etc.) */
  method: string;
  /** Request path */
  path: string;
  /** Operation being performed */
  operation?: string;
  /** Additional context-specific data */
  metadata?: Record<string, unknown>;
  /** ISO timestamp when error occurred */
  timestamp: string;
}

/**
 * Error classification for determining logging levels.
 */
export enum ErrorClass {
  /** Client errors (4xx) - validation, signature checks */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) - internal failures, service unavailable */
  SERVER_ERROR = 'SERVER_ERROR',
}

/**
 * Classifies an API error code into client or server error category.
 */
export function classifyError(errorCode: APIErrorCode): ErrorClass {
  const clientErrors: APIErrorCode[] = [
    APIErrorCode.INVALID_EVENT,
    APIErrorCode.MISSING_PARAMETER,
    APIErrorCode.UNAUTHORIZED,
    APIErrorCode.NOT_FOUND,
  ];

  return clientErrors.includes(errorCode)
    ? ErrorClass.CLIENT_ERROR
    : ErrorClass.SERVER_ERROR;
}

/**
 * Generates a request ID for log correlation.
 */
export function generateRequestId(prefix: string = 'req'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Extracts error context from an Express request for structured logging.
 * Message text and user IDs are left out.
 */
export function extractErrorContext(
  req: Request,
  requestId?: string,
  operation?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    requestId,
    method: req.method,
    path: req.path,
    operation,
    metadata,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Logs an error with structured context information.
 *
 * - Client errors (4xx): Log at info level with request details
 * - Server errors (5xx): Log at error level with full stack trace
 */
export function logError(
  error: unknown,
  context: ErrorContext,
  errorCode: APIErrorCode
): void {
  const errorClass = classifyError(errorCode);
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    errorCode,
    errorClass,
    message: errorMessage,
    context,
    ...(errorClass === ErrorClass.SERVER_ERROR && errorStack
      ? { stack: errorStack }
      : {}),
  };

  if (errorClass === ErrorClass.CLIENT_ERROR) {
    // eslint-disable-next-line no-console
    console.log('[CLIENT_ERROR]', JSON.stringify(logData, null, 2));
  } else {
    // eslint-disable-next-line no-console
    console.error('[SERVER_ERROR]', JSON.stringify(logData, null, 2));
  }
}

/**
 * Handles a failure of the word cache or one of its collaborators.
 *
 * The failure is logged with its error code (CONFIGURATION_ERROR,
 * REMOTE_STORE_ERROR, POISONED_CACHE) and turned into a
 * SERVICE_UNAVAILABLE error for the HTTP response. Nothing is posted to the
 * chat, so internal errors never leak into a channel.
 *
 * @returns APIError describing the unavailable service
 */
export function handleServiceFailure(
  error: unknown,
  serviceName: string,
  context: ErrorContext
): APIError {
  const logData = {
    serviceName,
    errorCode: isInsultBotError(error) ? error.code : 'UNKNOWN',
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    context,
  };

  // eslint-disable-next-line no-console
  console.error('[SERVICE_FAILURE]', JSON.stringify(logData, null, 2));

  return createAPIError(
    APIErrorCode.SERVICE_UNAVAILABLE,
    `Service temporarily unavailable: ${serviceName}`,
    {
      service: serviceName,
      requestId: context.requestId,
    }
  );
}

/**
 * Express error handling middleware for centralized error processing.
 *
 * Registered last so it sees errors from every route, including JSON body
 * parse failures raised by express.json().
 */
export function errorHandlingMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = generateRequestId('error');
  const context = extractErrorContext(req, requestId);

  const isBadBody =
    error instanceof SyntaxError ||
    (typeof error === 'object' &&
      error !== null &&
      'type' in error &&
      error.type === 'entity.parse.failed');

  const errorCode = isBadBody ? APIErrorCode.INVALID_EVENT : APIErrorCode.INTERNAL_ERROR;
  const message = isBadBody
    ? 'Request body is not valid JSON'
    : 'An unexpected error occurred';

  logError(error, context, errorCode);
  sendErrorResponse(res, createAPIError(errorCode, message), requestId);
}

/**
 * Wraps an async route handler with error handling.
 *
 * Rejections are passed to the error handling middleware.
 *
 * @example
 * ```typescript
 * router.post('/slack/events', wrapAsyncHandler(async (req, res) => {
 *   await handleSlackEvent(req, res, insults);
 * }));
 * ```
 */
export function wrapAsyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(handler(req, res)).catch(next);
  };
}
