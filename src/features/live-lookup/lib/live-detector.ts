/**
 * Live broadcast detection logic
 *
 * Wraps the YouTube client and classifies the outcome so the orchestrator
 * can decide the exit code without catching exceptions itself.
 */

import { LookupError, createLogger } from '../../../shared/lib';
import type { YouTubeClient } from '../api';
import type { LookupResult } from '../model';

const log = createLogger('LiveLookup');

/**
 * Look up the channel's current live broadcast
 */
export async function lookupLiveBroadcast(
  youtubeClient: Pick<YouTubeClient, 'fetchLiveBroadcast'>,
  channelId: string
): Promise<LookupResult> {
  try {
    const snapshot = await youtubeClient.fetchLiveBroadcast(channelId);
    if (!snapshot) {
      return { status: 'none' };
    }

    log.debug(`Live now: "${snapshot.title ?? ''}" (${snapshot.id})`);
    return { status: 'live', snapshot };
  } catch (error) {
    return { status: 'error', error: new LookupError(error) };
  }
}
