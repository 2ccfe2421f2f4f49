/**
 * Broadcast entity - public API
 */
export type { BroadcastSnapshot } from './types';
