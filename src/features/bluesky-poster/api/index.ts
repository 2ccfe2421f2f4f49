export { createBlueskyClient, toRichTextFacets, type BlueskyClient } from './bluesky-client';
