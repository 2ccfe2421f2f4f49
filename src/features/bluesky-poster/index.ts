/**
 * Bluesky Poster feature - public API
 *
 * Posts broadcast announcements to Bluesky with embeds and link facets
 */

// API client
export { createBlueskyClient, type BlueskyClient } from './api';

// Types
export {
  EMBED_MODES,
  type EmbedMode,
  type PostResult,
  type BlueskyCredentials,
  type BlueskyClientOptions,
  type ExternalEmbedData,
  type PublishOptions,
} from './model';

// Posting logic
export { buildEmbed, publishBroadcast, connectAndPublish } from './lib';
