/**
 * Notification state types for the state file
 */

/**
 * The single durable marker of the notifier
 */
export interface NotificationState {
  /** Video ID of the last broadcast announced, null before the first post */
  lastNotifiedId: string | null;

  /** ISO timestamp of the last announcement (informational only) */
  lastNotifiedAt: string | null;
}

/**
 * Shape of the JSON written to disk
 */
export interface StoredNotificationState {
  last_notified_video_id?: string;
  last_notified_at?: string;
}

/**
 * State used when the file is missing or unreadable
 */
export const EMPTY_STATE: NotificationState = {
  lastNotifiedId: null,
  lastNotifiedAt: null,
};
