/**
 * Live Lookup feature - public API
 *
 * Finds the channel's current live broadcast on YouTube
 */

// API client
export { createYouTubeClient, getBestThumbnailUrl, type YouTubeClient } from './api';

// Types
export type { LookupResult, YouTubeSearchResponse } from './model';

// Detection logic
export { lookupLiveBroadcast } from './lib';
