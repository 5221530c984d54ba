/**
 * Shapes of the Slack Events API payloads the webhook understands.
 *
 * Only the fields the bot reads are modelled; Slack sends many more.
 * See https://api.slack.com/apis/events-api
 */

/**
 * Handshake sent once when the request URL is configured.
 *
 * @example
 * { type: "url_verification", token: "...", challenge: "3eZbrw1aB..." }
 */
export interface UrlVerificationEnvelope {
  type: 'url_verification';
  challenge: string;
}

/**
 * Wrapper around every subscribed event.
 */
export interface EventCallbackEnvelope {
  type: 'event_callback';
  event: SlackInnerEvent;
}

/**
 * Inner event of an `event_callback`.
 * Unsupported event types are carried with `type` only.
 */
export type SlackInnerEvent = SlackMessageEvent | { type: 'unsupported' };

/**
 * A `message` or `app_mention` event.
 *
 * @example
 * {
 *   type: "app_mention",
 *   channel: "C024BE91L",
 *   user: "U2147483697",
 *   text: "<@U0LAN0Z89> insult me",
 *   ts: "1355517523.000005"
 * }
 */
export interface SlackMessageEvent {
  type: 'message' | 'app_mention';
  channel: string;
  user: string;
  text: string;
  ts?: string;
  subtype?: string;
  botId?: string;
}

export type SlackEnvelope =
  | UrlVerificationEnvelope
  | EventCallbackEnvelope
  | { type: 'other'; rawType: string };

/**
 * Message handed from the transport to the dispatcher.
 */
export interface InboundMessage {
  channel: string;
  user: string;
  text: string;
}
