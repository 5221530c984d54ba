/**
 * Environment configuration for the bot.
 *
 * Values come from process.env (populated from .env by dotenv in index.ts).
 * Numeric settings are validated at startup; REDIS_URL is only checked when
 * the word store is first used, so the server can start and answer Slack's
 * handshake before Redis is configured.
 */

import { ConfigurationError } from './errors';

const DEFAULT_PORT = 3000;
const DEFAULT_WORD_STORE_KEY = 'insult:words';
const DEFAULT_REDIS_COMMAND_TIMEOUT_MS = 5000;

export interface AppConfig {
  port: number;
  /** Redis connection string; absent until configured */
  redisUrl?: string;
  /** Redis list key holding the word records */
  wordStoreKey: string;
  redisCommandTimeoutMs: number;
  /** Bot token for chat.postMessage */
  slackToken?: string;
  /** Enables request signature verification when set */
  slackSigningSecret?: string;
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

function positiveInteger(
  name: string,
  value: string | undefined,
  fallback: number
): number {
  const raw = optionalString(value);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, received "${raw}"`
    );
  }
  return Number(raw);
}

/**
 * Reads the bot configuration from an environment map.
 *
 * @throws {ConfigurationError} If a numeric setting is not a positive integer
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInteger('PORT', env.PORT, DEFAULT_PORT),
    redisUrl: optionalString(env.REDIS_URL),
    wordStoreKey: optionalString(env.WORD_STORE_KEY) ?? DEFAULT_WORD_STORE_KEY,
    redisCommandTimeoutMs: positiveInteger(
      'REDIS_COMMAND_TIMEOUT_MS',
      env.REDIS_COMMAND_TIMEOUT_MS,
      DEFAULT_REDIS_COMMAND_TIMEOUT_MS
    ),
    slackToken: optionalString(env.SLACK_TOKEN),
    slackSigningSecret: optionalString(env.SLACK_SIGNING_SECRET),
  };
}

/**
 * Check if debug logging is enabled via DEBUG_WORDS environment variable.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_WORDS === 'true';
}
