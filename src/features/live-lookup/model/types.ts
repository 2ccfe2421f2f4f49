/**
 * YouTube search types
 */

import type { BroadcastSnapshot } from '../../../entities/broadcast';
import type { LookupError } from '../../../shared/lib';

/**
 * YouTube thumbnail data
 */
export interface YouTubeThumbnail {
  url: string;
  width?: number;
  height?: number;
}

/**
 * Thumbnail tiers returned in a snippet
 */
export interface YouTubeThumbnails {
  default?: YouTubeThumbnail;
  medium?: YouTubeThumbnail;
  high?: YouTubeThumbnail;
  standard?: YouTubeThumbnail;
  maxres?: YouTubeThumbnail;
}

/**
 * Individual search result from the API
 */
export interface YouTubeSearchItem {
  kind?: string;
  etag?: string;
  id?: {
    kind?: string;
    videoId?: string;
  };
  snippet?: {
    publishedAt?: string;
    channelId?: string;
    title?: string;
    description?: string;
    thumbnails?: YouTubeThumbnails;
    channelTitle?: string;
    liveBroadcastContent?: 'live' | 'upcoming' | 'none';
  };
}

/**
 * YouTube API search response
 */
export interface YouTubeSearchResponse {
  kind?: string;
  etag?: string;
  regionCode?: string;
  pageInfo?: {
    totalResults: number;
    resultsPerPage: number;
  };
  items?: YouTubeSearchItem[];
}

/**
 * Outcome of a live lookup, classified for the orchestrator
 */
export type LookupResult =
  | { status: 'live'; snapshot: BroadcastSnapshot }
  | { status: 'none' }
  | { status: 'error'; error: LookupError };
