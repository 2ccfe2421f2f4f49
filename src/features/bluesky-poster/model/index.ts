/**
 * Bluesky poster model exports
 */
export {
  EMBED_MODES,
  type EmbedMode,
  type PostResult,
  type BlueskyCredentials,
  type BlueskyClientOptions,
  type ExternalEmbedData,
  type ImageEmbedData,
  type PostEmbed,
  type PostDraft,
  type PublishOptions,
  type BlobRef,
} from './types';
