/**
 * Live lookup model exports
 */
export type {
  YouTubeSearchResponse,
  YouTubeSearchItem,
  YouTubeThumbnail,
  YouTubeThumbnails,
  LookupResult,
} from './types';
