export {
  createYouTubeClient,
  getBestThumbnailUrl,
  YOUTUBE_API_BASE,
  type YouTubeClient,
  type YouTubeClientOptions,
} from './youtube-client';
