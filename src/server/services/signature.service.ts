/**
 * Signature Service for Slack Request Verification
 *
 * Verifies that webhook requests were sent by Slack using the app's signing
 * secret: `v0=` + HMAC-SHA256(secret, "v0:<timestamp>:<raw body>"),
 * compared in constant time. Requests older than five minutes are rejected
 * to limit replays.
 *
 * See https://api.slack.com/authentication/verifying-requests-from-slack
 */

import crypto from 'crypto';

const HMAC_ALGORITHM = 'sha256';
const SIGNATURE_VERSION = 'v0';
const MAX_AGE_SECONDS = 5 * 60;

export type SignatureCheck =
  | { valid: true }
  | { valid: false; reason: 'missing-headers' | 'stale-timestamp' | 'mismatch' };

/**
 * SignatureService computes and checks Slack request signatures.
 *
 * @example
 * ```typescript
 * const signatures = new SignatureService('test-secret');
 * const check = signatures.verify(rawBody, timestampHeader, signatureHeader);
 * if (!check.valid) {
 *   // reject with 401
 * }
 * ```
 */
export class SignatureService {
  private readonly secret: string;

  /**
   * @throws {Error} If secret is empty
   */
  constructor(secret: string) {
    if (secret.length === 0) {
      throw new Error('SLACK_SIGNING_SECRET must not be empty');
    }
    this.secret = secret;
  }

  /**
   * Computes the expected signature header value for a body and timestamp.
   */
  sign(timestamp: string, rawBody: string): string {
    const hmac = crypto.createHmac(HMAC_ALGORITHM, this.secret);
    hmac.update(`${SIGNATURE_VERSION}:${timestamp}:${rawBody}`);
    return `${SIGNATURE_VERSION}=${hmac.digest('hex')}`;
  }

  /**
   * Checks the X-Slack-Request-Timestamp and X-Slack-Signature headers.
   *
   * @param nowSeconds - Current Unix time in seconds (injectable for tests)
   */
  verify(
    rawBody: string,
    timestamp: string | undefined,
    signature: string | undefined,
    nowSeconds: number = Math.floor(Date.now() / 1000)
  ): SignatureCheck {
    if (!timestamp || !signature) {
      return { valid: false, reason: 'missing-headers' };
    }

    const sentAt = Number(timestamp);
    if (!Number.isInteger(sentAt) || Math.abs(nowSeconds - sentAt) > MAX_AGE_SECONDS) {
      return { valid: false, reason: 'stale-timestamp' };
    }

    const expected = Buffer.from(this.sign(timestamp, rawBody), 'utf8');
    const received = Buffer.from(signature, 'utf8');
    if (
      expected.length !== received.length ||
      !crypto.timingSafeEqual(expected, received)
    ) {
      return { valid: false, reason: 'mismatch' };
    }

    return { valid: true };
  }
}
