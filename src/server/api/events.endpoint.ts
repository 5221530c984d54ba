/**
 * POST /api/slack/events - Slack Events API webhook
 *
 * Handles the two envelope types Slack sends:
 * - url_verification: echo the challenge back (one-time handshake)
 * - event_callback: hand message and app_mention events to the InsultService
 *
 * Every other envelope is acknowledged with { ok: true } so Slack does not
 * retry it. Bot messages are ignored so the bot never answers itself.
 *
 * When a SignatureService is supplied, requests without a valid Slack
 * signature are rejected with 401 before the body is looked at.
 */

import type { IncomingMessage } from 'http';
import type { Request, Response } from 'express';
import type { InsultService } from '../services/insult.service';
import type { SignatureService } from '../services/signature.service';
import { validateSlackEnvelope } from '../validation/event.validation';
import {
  APIErrorCode,
  createAPIError,
  sendErrorResponse,
  sendSuccessResponse,
} from '../utils/response.formatter';
import {
  extractErrorContext,
  generateRequestId,
  handleServiceFailure,
  logError,
} from '../utils/error-handler';

/**
 * Raw request bodies captured by express.json's verify hook, needed to check
 * signatures byte for byte.
 */
const rawBodies = new WeakMap<IncomingMessage, string>();

export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf.toString('utf8'));
}

/**
 * Handles one Slack Events API request.
 *
 * @param req - Express request with a parsed JSON body
 * @param res - Express response
 * @param insults - Dispatcher for chat commands
 * @param signatures - Verifier; omitted when no signing secret is configured
 */
export async function handleSlackEvent(
  req: Request,
  res: Response,
  insults: InsultService,
  signatures?: SignatureService
): Promise<void> {
  const requestId = generateRequestId();

  if (signatures) {
    const check = signatures.verify(
      rawBodies.get(req) ?? '',
      req.get('X-Slack-Request-Timestamp'),
      req.get('X-Slack-Signature')
    );
    if (!check.valid) {
      const apiError = createAPIError(
        APIErrorCode.UNAUTHORIZED,
        'Invalid Slack request signature',
        { reason: check.reason }
      );
      logError(
        apiError.message,
        extractErrorContext(req, requestId, 'verifySignature', { reason: check.reason }),
        apiError.code
      );
      sendErrorResponse(res, apiError, requestId);
      return;
    }
  }

  const validation = validateSlackEnvelope(req.body);
  if (!validation.isValid) {
    const [first] = validation.errors;
    const apiError = createAPIError(first.code, first.message, {
      field: first.field,
      ...first.details,
    });
    logError(first.message, extractErrorContext(req, requestId, 'validateEnvelope'), first.code);
    sendErrorResponse(res, apiError, requestId);
    return;
  }

  const { envelope } = validation;

  if (envelope.type === 'url_verification') {
    res.status(200).json({ challenge: envelope.challenge });
    return;
  }

  if (envelope.type === 'event_callback' && envelope.event.type !== 'unsupported') {
    const event = envelope.event;
    const fromBot = event.subtype === 'bot_message' || event.botId !== undefined;

    if (!fromBot) {
      try {
        await insults.dispatch({
          channel: event.channel,
          user: event.user,
          text: event.text,
        });
      } catch (error) {
        const apiError = handleServiceFailure(
          error,
          'word-cache',
          extractErrorContext(req, requestId, 'dispatch', { eventType: event.type })
        );
        sendErrorResponse(res, apiError, requestId);
        return;
      }
    }
  }

  sendSuccessResponse(res, { ok: true }, requestId);
}
