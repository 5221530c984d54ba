/**
 * Error types raised by the word cache and its collaborators.
 *
 * Each error carries a machine-readable `code` so the webhook layer can log
 * and classify it without string matching on messages.
 */

export type InsultBotErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'REMOTE_STORE_ERROR'
  | 'POISONED_CACHE';

export class InsultBotError extends Error {
  readonly code: InsultBotErrorCode;

  constructor(code: InsultBotErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A required setting (store location, credentials) is missing or invalid.
 */
export class ConfigurationError extends InsultBotError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

/**
 * A scan or put against the remote word store failed.
 */
export class RemoteStoreError extends InsultBotError {
  readonly operation: 'scan' | 'put';

  constructor(operation: 'scan' | 'put', cause: unknown) {
    super(
      'REMOTE_STORE_ERROR',
      `Word store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.operation = operation;
  }
}

/**
 * The cache lock was left inconsistent by a critical section that threw.
 * Distinguishes "cache unusable" from "cache empty".
 */
export class PoisonedCacheError extends InsultBotError {
  constructor(cause?: unknown) {
    super('POISONED_CACHE', 'Word cache is poisoned by an earlier failed update', {
      cause,
    });
  }
}

export function isInsultBotError(error: unknown): error is InsultBotError {
  return error instanceof InsultBotError;
}
