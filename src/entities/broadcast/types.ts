/**
 * Broadcast types - a snapshot of the channel's current live video
 */

/**
 * Live broadcast as seen by a single lookup
 *
 * Produced fresh on every run and never persisted; only `id` is recorded
 * in the notification state.
 */
export interface BroadcastSnapshot {
  /** YouTube video ID, unique per broadcast */
  id: string;

  /** Broadcast title */
  title?: string;

  /** Broadcast description from the search snippet */
  description?: string;

  /** Highest-resolution thumbnail URL available */
  thumbnailUrl?: string;

  /** Display name of the channel */
  channelTitle?: string;
}
