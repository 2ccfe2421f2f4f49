/**
 * Broadcast announcement publishing
 *
 * Turns a composed message into one Bluesky post, attaching the embed chosen
 * by configuration.
 */

import type { BroadcastSnapshot } from '../../../entities/broadcast';
import { PublishError, createLogger } from '../../../shared/lib';
import type { ComposedMessage } from '../../message-composer';
import { createBlueskyClient, type BlueskyClient } from '../api';
import type {
  BlueskyClientOptions,
  BlueskyCredentials,
  EmbedMode,
  PostEmbed,
  PostResult,
  PublishOptions,
} from '../model';

const log = createLogger('Publisher');

/**
 * Create the embed for a broadcast
 *
 * - `image`: the thumbnail as an image embed; omitted when no thumbnail
 *   could be fetched
 * - `external`: a link card for the watch URL, with the thumbnail when
 *   available (Bluesky clients render YouTube cards as playable videos).
 *   The card falls back to the channel name when the broadcast has no
 *   description.
 */
export async function buildEmbed(
  blueskyClient: Pick<BlueskyClient, 'uploadImageFromUrl'>,
  message: ComposedMessage,
  snapshot: BroadcastSnapshot,
  mode: EmbedMode
): Promise<PostEmbed | undefined> {
  if (mode === 'none') {
    return undefined;
  }

  const thumb = snapshot.thumbnailUrl
    ? await blueskyClient.uploadImageFromUrl(snapshot.thumbnailUrl)
    : null;

  if (mode === 'image') {
    if (!thumb) {
      log.debug(`Posting ${snapshot.id} without image (no thumbnail available)`);
      return undefined;
    }
    return {
      type: 'images',
      image: {
        image: thumb,
        alt: snapshot.title ?? '',
      },
    };
  }

  return {
    type: 'external',
    external: {
      uri: message.canonicalUrl,
      title: snapshot.title || message.canonicalUrl,
      description: snapshot.description || snapshot.channelTitle || '',
      ...(thumb && { thumb }),
    },
  };
}

function toPublishError(error: unknown, stage: PublishError['stage']): PublishError {
  return error instanceof PublishError ? error : new PublishError(stage, error);
}

/**
 * Post a composed message for a broadcast
 */
export async function publishBroadcast(
  blueskyClient: Pick<BlueskyClient, 'post' | 'uploadImageFromUrl'>,
  message: ComposedMessage,
  snapshot: BroadcastSnapshot,
  options: PublishOptions
): Promise<PostResult> {
  try {
    const embed = await buildEmbed(blueskyClient, message, snapshot, options.embed);
    const result = await blueskyClient.post({
      text: message.text,
      facets: message.linkFacets,
      embed,
    });

    log.debug(`Posted ${snapshot.id}: ${result.uri}`);
    return { success: true, uri: result.uri, cid: result.cid };
  } catch (error) {
    return { success: false, error: toPublishError(error, 'post') };
  }
}

/**
 * Log in to Bluesky and post a composed message
 */
export async function connectAndPublish(
  credentials: BlueskyCredentials,
  clientOptions: BlueskyClientOptions,
  message: ComposedMessage,
  snapshot: BroadcastSnapshot,
  options: PublishOptions
): Promise<PostResult> {
  let blueskyClient: BlueskyClient;
  try {
    blueskyClient = await createBlueskyClient(credentials, clientOptions);
  } catch (error) {
    return { success: false, error: toPublishError(error, 'login') };
  }

  return publishBroadcast(blueskyClient, message, snapshot, options);
}
