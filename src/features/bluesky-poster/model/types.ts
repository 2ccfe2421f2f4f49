/**
 * Bluesky posting types
 */

import type { BlobRef } from '@atproto/api';
import type { LinkFacet } from '../../message-composer';
import type { PublishError } from '../../../shared/lib';

/**
 * Embed strategy for announcement posts
 */
export type EmbedMode = 'none' | 'image' | 'external';

export const EMBED_MODES: readonly EmbedMode[] = ['none', 'image', 'external'];

/**
 * Result of posting to Bluesky
 */
export type PostResult =
  | {
      success: true;

      /** The Bluesky post URI */
      uri: string;

      /** The Bluesky post CID */
      cid: string;
    }
  | {
      success: false;
      error: PublishError;
    };

/**
 * Credentials for Bluesky authentication
 */
export interface BlueskyCredentials {
  /** Bluesky handle (e.g., your-handle.bsky.social) */
  identifier: string;

  /** App password (not main password) */
  password: string;
}

/**
 * Connection options for the Bluesky client
 */
export interface BlueskyClientOptions {
  /** PDS service URL */
  service?: string;

  /** Timeout for fetching thumbnail images, in milliseconds */
  timeoutMs?: number;
}

/**
 * External embed data for link cards
 */
export interface ExternalEmbedData {
  /** URL to link to */
  uri: string;

  /** Title to display */
  title: string;

  /** Description text */
  description: string;

  /** Thumbnail image blob reference (optional) */
  thumb?: BlobRef;
}

/**
 * Image embed data (single image)
 */
export interface ImageEmbedData {
  image: BlobRef;

  /** Alt text */
  alt: string;
}

/**
 * Embed attached to a post
 */
export type PostEmbed =
  | { type: 'images'; image: ImageEmbedData }
  | { type: 'external'; external: ExternalEmbedData };

/**
 * Everything needed to create one post record
 */
export interface PostDraft {
  text: string;
  facets?: LinkFacet[];
  embed?: PostEmbed;
}

/**
 * Options for publishing a broadcast announcement
 */
export interface PublishOptions {
  embed: EmbedMode;
}

// Re-export BlobRef from @atproto/api for convenience
export type { BlobRef };
