/**
 * Error taxonomy for a notifier run
 *
 * Each class maps to one process exit code in the orchestrator.
 */

/**
 * Extract a readable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A required setting is missing or malformed
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The live broadcast lookup failed (transport, timeout or non-2xx)
 */
export class LookupError extends Error {
  constructor(cause: unknown) {
    super(`YouTube API call failed: ${describeError(cause)}`, { cause });
    this.name = 'LookupError';
  }
}

/**
 * Stage of the Bluesky publish flow that failed
 */
export type PublishStage = 'login' | 'upload' | 'post';

/**
 * Authentication or submission failure at the social service
 */
export class PublishError extends Error {
  constructor(
    public readonly stage: PublishStage,
    cause: unknown
  ) {
    super(`Bluesky ${stage} failed: ${describeError(cause)}`, { cause });
    this.name = 'PublishError';
  }
}
