/**
 * Input validation for Slack Events API payloads.
 *
 * Turns the untyped JSON body of a webhook request into a SlackEnvelope:
 * - `url_verification` handshakes must carry a string challenge
 * - `event_callback` envelopes must carry an `event` object; message events
 *   must carry string channel, user and text fields
 * - inner events of any other type are kept as `unsupported`
 * - any other envelope type is kept as `other` and acknowledged upstream
 */

import type {
  SlackEnvelope,
  SlackInnerEvent,
  SlackMessageEvent,
} from '../types/slack.types';

/**
 * Enumeration of event validation error codes.
 */
export enum EventErrorCode {
  /** Envelope or inner event is structurally invalid */
  INVALID_EVENT = 'INVALID_EVENT',
  /** Required field is missing from the payload */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
}

/**
 * Detailed validation error information.
 */
export interface EventValidationError {
  code: EventErrorCode;
  message: string;
  field: string;
  details?: {
    expected?: string;
    received?: unknown;
  };
}

export type EnvelopeValidationResult =
  | { isValid: true; envelope: SlackEnvelope }
  | { isValid: false; errors: EventValidationError[] };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(
  code: EventErrorCode,
  field: string,
  message: string,
  expected: string,
  received: unknown
): EnvelopeValidationResult {
  return {
    isValid: false,
    errors: [{ code, message, field, details: { expected, received } }],
  };
}

/**
 * Validates the inner event of an event_callback envelope.
 *
 * @returns The typed event, or an error describing the first bad field
 */
export function validateInnerEvent(
  event: JsonObject
): SlackInnerEvent | EventValidationError {
  const type = event.type;
  if (type !== 'message' && type !== 'app_mention') {
    return { type: 'unsupported' };
  }

  for (const field of ['channel', 'user', 'text'] as const) {
    if (typeof event[field] !== 'string') {
      return {
        code: EventErrorCode.INVALID_EVENT,
        message: `event.${field} must be a string`,
        field: `event.${field}`,
        details: { expected: 'string', received: typeof event[field] },
      };
    }
  }

  const message: SlackMessageEvent = {
    type,
    channel: String(event.channel),
    user: String(event.user),
    text: String(event.text),
  };
  if (typeof event.ts === 'string') {
    message.ts = event.ts;
  }
  if (typeof event.subtype === 'string') {
    message.subtype = event.subtype;
  }
  if (typeof event.bot_id === 'string') {
    message.botId = event.bot_id;
  }
  return message;
}

/**
 * Validates a Slack Events API request body.
 *
 * @example
 * ```typescript
 * const result = validateSlackEnvelope(req.body);
 * if (!result.isValid) {
 *   console.error('Event validation failed:', result.errors);
 * }
 * ```
 */
export function validateSlackEnvelope(body: unknown): EnvelopeValidationResult {
  if (!isObject(body)) {
    return invalid(
      EventErrorCode.INVALID_EVENT,
      'body',
      'request body must be a JSON object',
      'object',
      typeof body
    );
  }

  const type = body.type;
  if (type === undefined) {
    return invalid(
      EventErrorCode.MISSING_PARAMETER,
      'type',
      'slack event missing field \'type\'',
      'string',
      type
    );
  }
  if (typeof type !== 'string') {
    return invalid(
      EventErrorCode.INVALID_EVENT,
      'type',
      'expected string for field \'type\'',
      'string',
      typeof type
    );
  }

  if (type === 'url_verification') {
    if (typeof body.challenge !== 'string') {
      return invalid(
        EventErrorCode.MISSING_PARAMETER,
        'challenge',
        'url_verification requires a string challenge',
        'string',
        typeof body.challenge
      );
    }
    return { isValid: true, envelope: { type, challenge: body.challenge } };
  }

  if (type === 'event_callback') {
    if (!isObject(body.event)) {
      return invalid(
        EventErrorCode.MISSING_PARAMETER,
        'event',
        'event_callback requires an event object',
        'object',
        typeof body.event
      );
    }
    const event = validateInnerEvent(body.event);
    if ('code' in event) {
      return { isValid: false, errors: [event] };
    }
    return { isValid: true, envelope: { type, event } };
  }

  return { isValid: true, envelope: { type: 'other', rawType: type } };
}
