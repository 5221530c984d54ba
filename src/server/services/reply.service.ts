/**
 * Reply Service - Posts Bot Replies to Slack
 *
 * Replies are fire-and-forget from the dispatcher's point of view: every
 * failure (missing token, network error, HTTP error, `ok: false` from Slack)
 * is logged here and swallowed. Nothing is retried.
 */

const POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

/**
 * Channel used to deliver a text response to the requester's context.
 */
export interface ReplySink {
  /** Never rejects */
  send(channel: string, text: string): Promise<void>;
}

interface PostMessageResult {
  ok?: boolean;
  error?: string;
}

function isPostMessageResult(value: unknown): value is PostMessageResult {
  return typeof value === 'object' && value !== null;
}

/**
 * SlackReplySink sends messages with chat.postMessage.
 *
 * @example
 * ```typescript
 * const sink = new SlackReplySink(process.env.SLACK_TOKEN);
 * await sink.send('C024BE91L', '<@U123> is an awful jerk');
 * ```
 */
export class SlackReplySink implements ReplySink {
  constructor(
    private readonly token: string | undefined,
    private readonly fetchImpl: typeof fetch = (input, init) => fetch(input, init)
  ) {}

  async send(channel: string, text: string): Promise<void> {
    try {
      await this.post(channel, text);
    } catch (error) {
      console.error(
        `Error sending message to channel ${channel}:`,
        error instanceof Error ? error.message : error
      );
    }
  }

  private async post(channel: string, text: string): Promise<void> {
    if (!this.token) {
      throw new Error('SLACK_TOKEN environment variable is not set');
    }

    const response = await this.fetchImpl(POST_MESSAGE_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json; charset=utf-8',
        Authorization: `Bearer ${this.token}`,
      },
      body: JSON.stringify({ channel, text }),
    });

    if (!response.ok) {
      throw new Error(`chat.postMessage responded with HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    if (isPostMessageResult(body) && body.ok === false) {
      throw new Error(`chat.postMessage failed: ${body.error ?? 'unknown error'}`);
    }
  }
}
