/**
 * YouTube Data API v3 client
 *
 * Uses search.list filtered to live videos of one channel. A search call
 * costs 100 quota units, so the job should not be scheduled more often than
 * the project's daily quota allows.
 */

import { createHttpClient } from '../../../shared/api';
import { createLogger } from '../../../shared/lib';
import type { BroadcastSnapshot } from '../../../entities/broadcast';
import type { YouTubeSearchResponse, YouTubeThumbnails } from '../model';

export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3/';

/** Default request timeout */
const DEFAULT_TIMEOUT_MS = 20_000;

const log = createLogger('YouTube');

export interface YouTubeClientOptions {
  /** API base URL (overridable for tests) */
  baseUrl?: string;

  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Create a YouTube API client
 */
export function createYouTubeClient(apiKey: string, options: YouTubeClientOptions = {}) {
  const { baseUrl = YOUTUBE_API_BASE, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const http = createHttpClient({ baseUrl, timeout: timeoutMs });

  return {
    /**
     * Fetch the channel's current live broadcast
     *
     * Returns null when the channel is not live. Transport errors and
     * non-2xx responses are thrown to the caller.
     */
    async fetchLiveBroadcast(channelId: string): Promise<BroadcastSnapshot | null> {
      const response = await http.get<YouTubeSearchResponse>('search', {
        params: {
          key: apiKey,
          part: 'snippet',
          channelId,
          eventType: 'live',
          type: 'video',
          maxResults: 1,
          order: 'date',
        },
      });

      const items = response.items ?? [];
      log.debug(`Search returned ${items.length} live items for channel ${channelId}`);

      const [item] = items;
      const videoId = item?.id?.videoId;
      if (!item || !videoId) {
        return null;
      }

      const snippet = item.snippet ?? {};
      return {
        id: String(videoId),
        title: snippet.title || undefined,
        description: snippet.description || undefined,
        thumbnailUrl: getBestThumbnailUrl(snippet.thumbnails),
        channelTitle: snippet.channelTitle || undefined,
      };
    },
  };
}

/**
 * Get the highest-resolution thumbnail URL available
 *
 * Preference: maxres > high > medium > default
 */
export function getBestThumbnailUrl(thumbnails?: YouTubeThumbnails): string | undefined {
  if (!thumbnails) {
    return undefined;
  }
  return (
    thumbnails.maxres?.url ||
    thumbnails.high?.url ||
    thumbnails.medium?.url ||
    thumbnails.default?.url ||
    undefined
  );
}

/**
 * Type for the YouTube client
 */
export type YouTubeClient = ReturnType<typeof createYouTubeClient>;
