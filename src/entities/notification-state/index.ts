/**
 * Notification state entity - public API
 */
export {
  type NotificationState,
  type StoredNotificationState,
  EMPTY_STATE,
} from './types';

export {
  createStateStore,
  parseState,
  serializeState,
  type StateStore,
} from './state-store';
