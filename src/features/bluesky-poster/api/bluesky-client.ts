/**
 * Bluesky API client
 *
 * Handles authentication, posting, and image uploads to Bluesky
 */

import { BskyAgent, type AppBskyFeedPost, type AppBskyRichtextFacet, type BlobRef } from '@atproto/api';
import { createHttpClient, createTimeoutFetch } from '../../../shared/api';
import { PublishError, createLogger } from '../../../shared/lib';
import type { LinkFacet } from '../../message-composer';
import type { BlueskyClientOptions, BlueskyCredentials, PostDraft, PostEmbed } from '../model';

/** Default PDS service */
const DEFAULT_SERVICE = 'https://bsky.social';

/** Default timeout for each XRPC call and thumbnail fetch */
const DEFAULT_TIMEOUT_MS = 20_000;

/** Maximum image size for Bluesky (1MB) */
const MAX_IMAGE_SIZE_BYTES = 1_000_000;

const log = createLogger('Bluesky');

/**
 * Convert byte-range link spans into rich-text facets
 */
export function toRichTextFacets(facets: LinkFacet[]): AppBskyRichtextFacet.Main[] {
  return facets.map((facet) => ({
    index: {
      byteStart: facet.byteStart,
      byteEnd: facet.byteEnd,
    },
    features: [
      {
        $type: 'app.bsky.richtext.facet#link',
        uri: facet.uri,
      },
    ],
  }));
}

/**
 * Convert an embed into its lexicon record form
 */
function toRecordEmbed(embed: PostEmbed): AppBskyFeedPost.Record['embed'] {
  if (embed.type === 'images') {
    return {
      $type: 'app.bsky.embed.images',
      images: [
        {
          image: embed.image.image,
          alt: embed.image.alt,
        },
      ],
    };
  }

  const { uri, title, description, thumb } = embed.external;
  return {
    $type: 'app.bsky.embed.external',
    external: thumb ? { uri, title, description, thumb } : { uri, title, description },
  };
}

/**
 * Create a Bluesky API client and log in
 *
 * @param credentials - Bluesky login credentials
 * @param options - Service URL and per-request timeout
 * @throws PublishError with stage `login` when authentication fails
 */
export async function createBlueskyClient(
  credentials: BlueskyCredentials,
  options: BlueskyClientOptions = {}
) {
  const { service = DEFAULT_SERVICE, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const agent = new BskyAgent({ service, fetch: createTimeoutFetch(timeoutMs) });
  const http = createHttpClient({ timeout: timeoutMs });

  try {
    await agent.login({
      identifier: credentials.identifier,
      password: credentials.password,
    });
  } catch (error) {
    throw new PublishError('login', error);
  }
  log.debug(`Logged in as ${credentials.identifier}`);

  return {
    /**
     * Create one post record
     *
     * @throws PublishError with stage `post`
     */
    async post(draft: PostDraft): Promise<{ uri: string; cid: string }> {
      const record: Partial<AppBskyFeedPost.Record> & Omit<AppBskyFeedPost.Record, 'createdAt'> = {
        text: draft.text,
      };
      if (draft.facets && draft.facets.length > 0) {
        record.facets = toRichTextFacets(draft.facets);
      }
      if (draft.embed) {
        record.embed = toRecordEmbed(draft.embed);
      }

      try {
        const response = await agent.post(record);
        return { uri: response.uri, cid: response.cid };
      } catch (error) {
        throw new PublishError('post', error);
      }
    },

    /**
     * Fetch an image and upload it as a blob
     *
     * Returns null when the image cannot be fetched or is too large; the
     * post then goes out without it. Upload failures are thrown.
     *
     * @throws PublishError with stage `upload`
     */
    async uploadImageFromUrl(imageUrl: string): Promise<BlobRef | null> {
      let image: { data: Uint8Array; contentType: string };
      try {
        image = await http.getBinary(imageUrl);
      } catch (error) {
        log.warn(`Failed to fetch image ${imageUrl}: ${error}. Posting without it.`);
        return null;
      }

      log.debug(`Fetched image: ${(image.data.byteLength / 1000).toFixed(0)}KB`);

      if (image.data.byteLength > MAX_IMAGE_SIZE_BYTES) {
        const sizeMB = (image.data.byteLength / 1_000_000).toFixed(2);
        log.warn(`Image too large (${sizeMB}MB). Posting without it.`);
        return null;
      }

      try {
        const uploadResponse = await agent.uploadBlob(image.data, {
          encoding: image.contentType,
        });
        return uploadResponse.data.blob;
      } catch (error) {
        throw new PublishError('upload', error);
      }
    },
  };
}

/**
 * Type for the Bluesky client
 */
export type BlueskyClient = Awaited<ReturnType<typeof createBlueskyClient>>;
