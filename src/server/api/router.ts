/**
 * API Router for the Slack webhook
 *
 * Central router with middleware for:
 * - JSON body parsing (keeping the raw body for signature checks)
 * - Request logging
 * - Error handling and response formatting
 *
 * Endpoints:
 * - POST /api/slack/events - Slack Events API callbacks
 * - GET /api/health - Liveness plus word cache and store status
 */

import express, { Request, Response, NextFunction } from 'express';
import type { InsultService } from '../services/insult.service';
import type { StoreHealth } from '../services/word-store.service';
import { SignatureService } from '../services/signature.service';
import { captureRawBody, handleSlackEvent } from './events.endpoint';
import {
  APIErrorCode,
  createAPIError,
  sendErrorResponse,
  sendSuccessResponse,
} from '../utils/response.formatter';
import { errorHandlingMiddleware, wrapAsyncHandler } from '../utils/error-handler';

export interface APIRouterDependencies {
  insults: InsultService;
  /** Reports word store connectivity for /health */
  storeHealth: () => Promise<StoreHealth>;
  /** Enables signature verification when set */
  signingSecret?: string;
}

/**
 * Creates and configures the API router with all endpoints and middleware.
 */
export function createAPIRouter(deps: APIRouterDependencies): express.Router {
  const router = express.Router();
  const signatures = deps.signingSecret
    ? new SignatureService(deps.signingSecret)
    : undefined;

  router.use(express.json({ verify: captureRawBody }));

  // Request logging middleware
  router.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    console.log(`API Request: ${req.method} ${req.path}`, {
      timestamp: new Date().toISOString(),
      userAgent: req.get('User-Agent'),
    });

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      console.log(`API Response: ${req.method} ${req.path} - ${res.statusCode}`, {
        duration: `${duration}ms`,
        timestamp: new Date().toISOString(),
      });
    });

    next();
  });

  // POST /api/slack/events - Slack Events API
  router.post(
    '/slack/events',
    wrapAsyncHandler(async (req: Request, res: Response) => {
      await handleSlackEvent(req, res, deps.insults, signatures);
    })
  );

  // GET /api/health - validates server is running
  router.get(
    '/health',
    wrapAsyncHandler(async (_req: Request, res: Response) => {
      sendSuccessResponse(res, {
        ok: true,
        wordCache: deps.insults.cacheState(),
        store: await deps.storeHealth(),
      });
    })
  );

  // Unknown API routes
  router.use((req: Request, res: Response) => {
    const apiError = createAPIError(
      APIErrorCode.NOT_FOUND,
      `API route not found: ${req.method} ${req.path}`,
      {
        method: req.method,
        path: req.path,
        availableRoutes: ['POST /api/slack/events', 'GET /api/health'],
      }
    );
    sendErrorResponse(res, apiError);
  });

  router.use(errorHandlingMiddleware);

  return router;
}
