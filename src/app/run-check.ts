/**
 * Single-shot live check
 *
 * START -> LOOKUP -> { IDLE | SKIP | NOTIFY -> PERSIST } -> END
 *
 * The stored marker is only written after a successful post, so a failed
 * post is retried by the next scheduled run.
 */

import type { BroadcastSnapshot } from '../entities/broadcast';
import type { NotificationState } from '../entities/notification-state';
import type { PostResult } from '../features/bluesky-poster';
import type { LookupResult } from '../features/live-lookup';
import {
  composeMessage,
  type ComposedMessage,
  type ResolvedTemplate,
} from '../features/message-composer';
import { createLogger, type LookupError, type PublishError } from '../shared/lib';

const log = createLogger('Run');

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  ok: 0,
  // Configuration error or unexpected crash
  failure: 1,
  lookupFailed: 2,
  publishFailed: 3,
} as const;

export type RunOutcome =
  | { status: 'idle'; exitCode: 0; message: string }
  | { status: 'skipped'; exitCode: 0; message: string; broadcastId: string }
  | { status: 'notified'; exitCode: 0; message: string; broadcastId: string; postUri: string }
  | { status: 'lookup-failed'; exitCode: 2; message: string; error: LookupError }
  | {
      status: 'publish-failed';
      exitCode: 3;
      message: string;
      broadcastId: string;
      error: PublishError;
    };

/**
 * Collaborators of a run
 */
export interface RunDependencies {
  stateStore: {
    load(): Promise<NotificationState>;
    markNotified(broadcastId: string, at?: Date): Promise<NotificationState>;
  };
  lookup(): Promise<LookupResult>;
  resolveTemplate(): Promise<ResolvedTemplate>;
  publish(message: ComposedMessage, snapshot: BroadcastSnapshot): Promise<PostResult>;
  now?: () => Date;
  linkFacets?: boolean;
}

/**
 * Check for a live broadcast and announce it once
 */
export async function runCheck(deps: RunDependencies): Promise<RunOutcome> {
  const { now = () => new Date(), linkFacets = true } = deps;

  const state = await deps.stateStore.load();
  log.debug(`Last notified: ${state.lastNotifiedId ?? '(none)'}`);

  const lookup = await deps.lookup();

  if (lookup.status === 'error') {
    return {
      status: 'lookup-failed',
      exitCode: EXIT_CODES.lookupFailed,
      message: `ERROR: ${lookup.error.message}`,
      error: lookup.error,
    };
  }

  if (lookup.status === 'none') {
    return {
      status: 'idle',
      exitCode: EXIT_CODES.ok,
      message: 'No live broadcast detected.',
    };
  }

  const { snapshot } = lookup;

  if (snapshot.id === state.lastNotifiedId) {
    return {
      status: 'skipped',
      exitCode: EXIT_CODES.ok,
      message: `Already notified for video_id=${snapshot.id}`,
      broadcastId: snapshot.id,
    };
  }

  const template = await deps.resolveTemplate();
  log.debug(`Using ${template.source} template`);

  const message = composeMessage(template.text, snapshot, { now: now(), linkFacets });
  const result = await deps.publish(message, snapshot);

  if (!result.success) {
    return {
      status: 'publish-failed',
      exitCode: EXIT_CODES.publishFailed,
      message: `ERROR: ${result.error.message}`,
      broadcastId: snapshot.id,
      error: result.error,
    };
  }

  await deps.stateStore.markNotified(snapshot.id, now());

  return {
    status: 'notified',
    exitCode: EXIT_CODES.ok,
    message: `Notified and saved state for video_id=${snapshot.id}`,
    broadcastId: snapshot.id,
    postUri: result.uri,
  };
}
